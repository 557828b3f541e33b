/** Instants are integer epoch seconds throughout. */
export type EpochSeconds = number;

export interface Expiring {
  expiresAt: EpochSeconds;
}

export interface SigningIdentity {
  clientId: string;
  teamId: string;
  audience: string;
  keyId: string;
  algorithm: string;
}

export interface SignedSecret extends Expiring {
  token: string;
  issuedAt: EpochSeconds;
}

export interface AccessToken extends Expiring {
  token: string;
}

export interface RequestHeaders extends Expiring {
  orgId: string;
  authorization: string;
}

export interface TokenResponse {
  access_token: string;
  expires_in: number;
}

export interface Campaign {
  id: number;
  orgId: number;
  name: string;
  status: string;
  servingStatus?: string;
  adamId?: number;
  budgetAmount?: { amount: string; currency: string };
  dailyBudgetAmount?: { amount: string; currency: string };
  countriesOrRegions?: string[];
  startTime?: string;
  endTime?: string | null;
  modificationTime?: string;
}

export interface CampaignsResponse {
  data: Campaign[];
}
