/**
 * Authentication error taxonomy.
 *
 * Every failure surfaced by the login flow, the callback server or the
 * credential store is an `AuthError` tagged with one of these kinds. Commands
 * map the kind to an exit code; the orchestrator uses it to decide whether
 * anything may be persisted.
 */
export type AuthErrorKind =
  | 'RandomSourceError'
  | 'InvalidState'
  | 'MissingCode'
  | 'ExchangeFailed'
  | 'CallbackServerFailed'
  | 'AuthorizationTimeout'
  | 'Cancelled'
  | 'NoAccessibleProjects'
  | 'UserAborted'
  | 'NoTTY'
  | 'MissingCredentials'
  | 'ValidationFailed'
  | 'NotLoggedIn'
  | 'RemoteRequestFailed'
  | 'StorageFailed';

/**
 * Error with a classified kind and an optional underlying cause.
 */
export class AuthError extends Error {
  public readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AuthError';
    this.kind = kind;
  }
}

/**
 * Type guard for `AuthError`, optionally narrowed to a single kind.
 */
export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
}

/**
 * Prefix an error with the stage that produced it, keeping its kind.
 * Errors that are not `AuthError`s are classified as `fallbackKind`.
 */
export function wrapAuthError(
  stage: string,
  error: unknown,
  fallbackKind: AuthErrorKind = 'RemoteRequestFailed'
): AuthError {
  const kind = error instanceof AuthError ? error.kind : fallbackKind;
  return new AuthError(kind, `${stage}: ${errorMessage(error)}`, error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Process exit codes for authentication failures.
 */
export const EXIT_CODES = {
  GENERAL: 1,
  TIMEOUT: 2,
  INVALID_PARAMETERS: 3,
  AUTHENTICATION: 4,
  INTERRUPTED: 130,
} as const;

export function exitCodeFor(error: unknown): number {
  if (!(error instanceof AuthError)) {
    return EXIT_CODES.GENERAL;
  }
  switch (error.kind) {
    case 'AuthorizationTimeout':
      return EXIT_CODES.TIMEOUT;
    case 'NoTTY':
    case 'MissingCredentials':
      return EXIT_CODES.INVALID_PARAMETERS;
    case 'ValidationFailed':
    case 'NotLoggedIn':
      return EXIT_CODES.AUTHENTICATION;
    case 'UserAborted':
    case 'Cancelled':
      return EXIT_CODES.INTERRUPTED;
    default:
      return EXIT_CODES.GENERAL;
  }
}
