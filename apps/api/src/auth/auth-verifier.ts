export const AUTH_VERIFIER = 'AUTH_VERIFIER';

/** Password check consulted by login. Storage of the credentials is its own business. */
export interface AuthVerifier {
  verify(userId: string, password: string): Promise<boolean>;
}
