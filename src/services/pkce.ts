import * as crypto from 'crypto';
import { AuthError, errorMessage } from '../types/auth-error';
import type { PkceParameters } from '../types';

/**
 * Number of random bytes behind the verifier and the state (256 bits each).
 */
export const PKCE_RANDOM_BYTES = 32;

/**
 * Source of cryptographically secure random bytes.
 */
export type RandomSource = (size: number) => Buffer;

/**
 * Compute the S256 code challenge for a verifier.
 */
export function computeCodeChallenge(verifier: string): string {
  return crypto.createHash('sha256').update(verifier).digest('base64url');
}

function randomToken(randomSource: RandomSource): string {
  let bytes: Buffer;
  try {
    bytes = randomSource(PKCE_RANDOM_BYTES);
  } catch (err) {
    throw new AuthError(
      'RandomSourceError',
      `secure random source unavailable: ${errorMessage(err)}`,
      err
    );
  }
  if (bytes.length < PKCE_RANDOM_BYTES) {
    throw new AuthError(
      'RandomSourceError',
      `secure random source returned ${bytes.length} bytes, expected ${PKCE_RANDOM_BYTES}`
    );
  }
  return bytes.toString('base64url');
}

/**
 * Generate a fresh verifier, challenge and state for one login attempt.
 *
 * Both the verifier and the state are 32 random bytes encoded as unpadded
 * base64url. Fails with `RandomSourceError` when the random source throws.
 */
export function generatePkceParameters(
  randomSource: RandomSource = crypto.randomBytes
): PkceParameters {
  const verifier = randomToken(randomSource);
  const state = randomToken(randomSource);
  return {
    verifier,
    challenge: computeCodeChallenge(verifier),
    state,
  };
}

export interface AuthorizationUrlParams {
  authUrl: string;
  clientId: string;
  redirectUri: string;
  challenge: string;
  state: string;
}

/**
 * Build the provider authorization URL for the browser.
 */
export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
  const url = new URL(params.authUrl);
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('code_challenge', params.challenge);
  url.searchParams.set('code_challenge_method', 'S256');
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('state', params.state);
  return url.toString();
}
