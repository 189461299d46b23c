/**
 * Authenticated session models
 */

export type SessionState = 'unauthenticated' | 'valid' | 'expired' | 'invalid';

export interface Session {
  token: string | null;
  issuedAt: Date | null;
  /** null when the provider does not report an expiry */
  expiresAt: Date | null;
  state: SessionState;
}

export interface Credentials {
  email: string;
  password: string;
}

/**
 * Supplies credentials on demand; storing them is the caller's concern
 */
export interface CredentialsProvider {
  getCredentials(): Promise<Credentials>;
}
