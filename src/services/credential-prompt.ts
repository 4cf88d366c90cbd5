import prompts from 'prompts';
import { AuthError } from '../types/auth-error';
import type { ExplicitKeys } from '../types';

export type CredentialField = keyof ExplicitKeys;

/**
 * Asks the user for the credential fields that were not supplied.
 */
export type CredentialPrompt = (missing: readonly CredentialField[]) => Promise<ExplicitKeys>;

const QUESTIONS: Record<CredentialField, prompts.PromptObject<CredentialField>> = {
  publicKey: { type: 'text', name: 'publicKey', message: 'Enter your public key:' },
  secretKey: { type: 'password', name: 'secretKey', message: 'Enter your secret key:' },
  projectId: { type: 'text', name: 'projectId', message: 'Enter your project ID:' },
};

function answer(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

export const promptForCredentials: CredentialPrompt = async (missing) => {
  let cancelled = false;
  const response = await prompts(
    missing.map((field) => QUESTIONS[field]),
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    throw new AuthError('UserAborted', 'credential entry cancelled');
  }

  const result: ExplicitKeys = {};
  for (const field of missing) {
    result[field] = answer(response[field]);
  }
  return result;
};
