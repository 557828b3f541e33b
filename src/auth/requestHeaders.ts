import type { AccessToken, EpochSeconds, RequestHeaders } from '../types';
import { isRecord, readEpoch, readString } from '../utils/guards';
import type { Lazy, Stage, StageCodec } from './stage';

export function buildRequestHeaders(orgId: string, accessToken: AccessToken): RequestHeaders {
  return {
    orgId,
    authorization: `Bearer ${accessToken.token}`,
    expiresAt: accessToken.expiresAt,
  };
}

/** HTTP header form used on every data API call. */
export function toHttpHeaders(headers: RequestHeaders): Record<string, string> {
  return {
    Authorization: headers.authorization,
    'X-AP-Context': `orgId=${headers.orgId}`,
  };
}

export class RequestHeadersStage implements Stage<AccessToken, RequestHeaders> {
  readonly name = 'request_headers';

  constructor(private readonly orgId: string) {}

  async value(accessToken: Lazy<AccessToken>, _now: EpochSeconds): Promise<RequestHeaders> {
    return buildRequestHeaders(this.orgId, await accessToken());
  }
}

export const requestHeadersCodec: StageCodec<RequestHeaders> = {
  encode: (headers) => ({ ...headers }),
  decode(raw) {
    if (!isRecord(raw)) throw new Error('Request headers entry is not an object');
    return {
      orgId: readString(raw, 'orgId'),
      authorization: readString(raw, 'authorization'),
      expiresAt: readEpoch(raw, 'expiresAt'),
    };
  },
};
