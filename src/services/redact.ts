/**
 * Fixed mask substituted for secret values in user-visible text.
 */
export const SECRET_MASK = '********';

/**
 * Replace every occurrence of each non-empty secret in `text` with the mask.
 */
export function redactSecrets(text: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = text;
  for (const secret of secrets) {
    if (!secret) continue;
    result = result.split(secret).join(SECRET_MASK);
  }
  return result;
}

