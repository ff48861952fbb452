export interface Credentials {
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds. */
  expiryDate: number;
  tokenType: string;
  scope?: string;
  idToken?: string;
}

/**
 * On-disk and admin wire shape of a credential.
 */
export interface CredentialRecord {
  access_token: string;
  refresh_token: string;
  expiry_date: number;
  token_type: string;
  scope?: string;
  id_token?: string;
}

export interface OAuthTokenResponse {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  token_type?: string;
  id_token?: string;
}

export interface CredentialsStatus {
  present: boolean;
  expiryDate: number | null;
  expired: boolean;
  tokenType: string | null;
  scope: string | null;
}

/**
 * What the upstream client needs from a credential backend.
 */
export interface CredentialsProvider {
  getCredentials(): Promise<Credentials>;
  refreshToken(): Promise<void>;
}

export const CREDENTIALS_PROVIDER = Symbol('CREDENTIALS_PROVIDER');

export function fromRecord(record: CredentialRecord): Credentials {
  const credentials: Credentials = {
    accessToken: record.access_token,
    refreshToken: record.refresh_token,
    expiryDate: record.expiry_date,
    tokenType: record.token_type,
  };
  if (record.scope) credentials.scope = record.scope;
  if (record.id_token) credentials.idToken = record.id_token;
  return credentials;
}

export function toRecord(credentials: Credentials): CredentialRecord {
  const record: CredentialRecord = {
    access_token: credentials.accessToken,
    refresh_token: credentials.refreshToken,
    expiry_date: credentials.expiryDate,
    token_type: credentials.tokenType,
  };
  if (credentials.scope) record.scope = credentials.scope;
  if (credentials.idToken) record.id_token = credentials.idToken;
  return record;
}
