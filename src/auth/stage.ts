import type { EpochSeconds, Expiring } from '../types';

/** Deferred upstream value; only evaluated when a stage actually has to compute. */
export type Lazy<T> = () => Promise<T>;

export type StageName = 'client_secret' | 'access_token' | 'request_headers';

/**
 * One step of the auth pipeline. Direct and cache-backed variants share this shape.
 */
export interface Stage<I, V extends Expiring> {
  readonly name: StageName;
  value(input: Lazy<I>, now: EpochSeconds): Promise<V>;
}

/** Converts a stage value to and from its cached JSON form. */
export interface StageCodec<V> {
  encode(value: V): unknown;
  /** Throws when `raw` does not have the expected shape. */
  decode(raw: unknown): V;
}
