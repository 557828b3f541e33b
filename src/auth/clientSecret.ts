import jwt from 'jsonwebtoken';
import type { Algorithm } from 'jsonwebtoken';
import { SigningError } from '../errors';
import type { EpochSeconds, SignedSecret, SigningIdentity } from '../types';
import { isRecord, readEpoch, readString } from '../utils/guards';
import type { Lazy, Stage, StageCodec } from './stage';

const SUPPORTED_ALGORITHMS = [
  'ES256', 'ES384', 'ES512',
  'RS256', 'RS384', 'RS512',
  'PS256', 'PS384', 'PS512',
] as const satisfies readonly Algorithm[];

type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

function isSupportedAlgorithm(value: string): value is SupportedAlgorithm {
  return SUPPORTED_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Signs the client secret (a JWT assertion) the token endpoint expects:
 * `sub` is the client id, `iss` the team id, `kid` the key id.
 */
export class ClientSecret implements Stage<string, SignedSecret> {
  readonly name = 'client_secret';

  constructor(
    private readonly identity: SigningIdentity,
    private readonly expirationTime: number
  ) {}

  async value(privateKey: Lazy<string>, now: EpochSeconds): Promise<SignedSecret> {
    const { algorithm } = this.identity;
    if (!isSupportedAlgorithm(algorithm)) {
      throw new SigningError(`Unsupported signing algorithm: ${algorithm}`);
    }

    const key = await privateKey();
    const expiresAt = now + this.expirationTime;

    let token: string;
    try {
      token = jwt.sign(
        {
          sub: this.identity.clientId,
          iss: this.identity.teamId,
          aud: this.identity.audience,
          iat: now,
          exp: expiresAt,
        },
        key,
        { algorithm, keyid: this.identity.keyId }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SigningError(`Failed to sign client secret: ${reason}`, { cause: error });
    }

    return { token, issuedAt: now, expiresAt };
  }
}

export const clientSecretCodec: StageCodec<SignedSecret> = {
  encode: (secret) => ({ ...secret }),
  decode(raw) {
    if (!isRecord(raw)) throw new Error('Client secret entry is not an object');
    return {
      token: readString(raw, 'token'),
      issuedAt: readEpoch(raw, 'issuedAt'),
      expiresAt: readEpoch(raw, 'expiresAt'),
    };
  },
};
