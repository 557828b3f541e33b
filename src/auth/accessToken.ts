import type { Transport, TransportResponse } from '../api/transport';
import { AuthExchangeError, SigningError } from '../errors';
import type { AccessToken, EpochSeconds, SignedSecret, TokenResponse } from '../types';
import { logger } from '../utils/logger';
import { epochToIso } from '../utils/time';
import { isRecord, readEpoch, readString } from '../utils/guards';
import type { Lazy, Stage, StageCodec } from './stage';

const SCOPE = 'searchadsorg';

function parseJson(response: TransportResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new AuthExchangeError(response.status, response.body, 'Token endpoint returned a non-JSON body', {
      cause: error,
    });
  }
}

function parseTokenResponse(response: TransportResponse): TokenResponse {
  const data = parseJson(response);

  if (
    !isRecord(data) ||
    typeof data.access_token !== 'string' ||
    data.access_token.length === 0 ||
    typeof data.expires_in !== 'number' ||
    !(data.expires_in >= 1)
  ) {
    throw new AuthExchangeError(
      response.status,
      response.body,
      'Token endpoint response is missing access_token or an expires_in of at least one second'
    );
  }

  return {
    access_token: data.access_token,
    expires_in: data.expires_in,
  };
}

/**
 * Exchanges a signed client secret for a bearer access token (client credentials grant).
 */
export class AccessTokenStage implements Stage<SignedSecret, AccessToken> {
  readonly name = 'access_token';

  constructor(
    private readonly clientId: string,
    private readonly url: string,
    private readonly transport: Transport
  ) {}

  async value(clientSecret: Lazy<SignedSecret>, now: EpochSeconds): Promise<AccessToken> {
    const secret = await clientSecret();
    if (secret.expiresAt <= now) {
      throw new SigningError(`Client secret expired at ${epochToIso(secret.expiresAt)}`);
    }

    logger.info('Fetching new access token...');

    let response: TransportResponse;
    try {
      response = await this.transport.postForm(this.url, {
        grant_type: 'client_credentials',
        client_id: this.clientId,
        client_secret: secret.token,
        scope: SCOPE,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AuthExchangeError(null, '', `Token request failed: ${reason}`, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new AuthExchangeError(
        response.status,
        response.body,
        `Authentication failed: ${response.status} ${response.body}`
      );
    }

    const data = parseTokenResponse(response);
    const expiresAt = now + Math.floor(data.expires_in);

    logger.info(`Access token obtained successfully (expires: ${epochToIso(expiresAt)})`);
    return { token: data.access_token, expiresAt };
  }
}

export const accessTokenCodec: StageCodec<AccessToken> = {
  encode: (token) => ({ ...token }),
  decode(raw) {
    if (!isRecord(raw)) throw new Error('Access token entry is not an object');
    return {
      token: readString(raw, 'token'),
      expiresAt: readEpoch(raw, 'expiresAt'),
    };
  },
};
