import type { EpochSeconds } from '../types';

export function epochSecondsNow(): EpochSeconds {
  return Math.floor(Date.now() / 1000);
}

export function epochToIso(epochSeconds: EpochSeconds): string {
  return new Date(epochSeconds * 1000).toISOString();
}
