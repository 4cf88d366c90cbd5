/**
 * Shared domain types for the authentication subsystem.
 */

/**
 * PKCE verifier/challenge pair plus the anti-CSRF state for one login attempt.
 */
export interface PkceParameters {
  /** Code verifier sent with the token exchange */
  verifier: string;
  /** base64url(SHA-256(verifier)) sent with the authorization request */
  challenge: string;
  /** Unguessable value round-tripped through the redirect */
  state: string;
}

/**
 * A project the authenticated identity can access.
 */
export interface Project {
  id: string;
  name: string;
}

/**
 * The current identity, used only to label issued credentials.
 */
export interface IdentityUser {
  id?: string;
  name?: string;
  email?: string;
}

/**
 * Key pair returned by the issuance mutation.
 */
export interface IssuedKeyPair {
  publicKey: string;
  secretKey: string;
}

/**
 * A key pair together with the project it is scoped to.
 */
export interface IssuedCredential extends IssuedKeyPair {
  projectId: string;
}

/**
 * What is persisted by the credential store.
 * `apiKey` is `publicKey:secretKey`.
 */
export interface StoredCredential {
  apiKey: string;
  projectId: string;
}

/**
 * Partial credentials supplied on the command line or via environment.
 */
export interface ExplicitKeys {
  publicKey?: string;
  secretKey?: string;
  projectId?: string;
}

/**
 * Combine a key pair into the opaque API key string.
 */
export function combineApiKey(publicKey: string, secretKey: string): string {
  return `${publicKey}:${secretKey}`;
}

/**
 * The secret half of a combined API key: everything after the first `:`.
 * A key without a separator is treated as all secret.
 */
export function secretKeyOf(apiKey: string): string {
  const separator = apiKey.indexOf(':');
  return separator === -1 ? apiKey : apiKey.slice(separator + 1);
}
