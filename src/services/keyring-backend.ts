import { AsyncEntry } from '@napi-rs/keyring';
import { AuthError, errorMessage } from '../types/auth-error';
import type { StoredCredential } from '../types';
import type { CredentialBackend } from './credential-store';
import { parseCredential, serializeCredential } from './credential-store';

/** Account name of the single entry under the service. */
export const KEYRING_ACCOUNT = 'credentials';

const NO_ENTRY_PATTERN = /no (matching )?entry/i;

/**
 * OS secret store backend (macOS Keychain, Windows Credential Manager,
 * Secret Service on Linux).
 */
export class KeyringCredentialBackend implements CredentialBackend {
  public readonly name = 'OS keyring';

  constructor(private readonly service: string) {}

  private entry(): AsyncEntry {
    return new AsyncEntry(this.service, KEYRING_ACCOUNT);
  }

  async store(credential: StoredCredential): Promise<void> {
    await this.entry().setPassword(serializeCredential(credential));
  }

  async retrieve(): Promise<StoredCredential | null> {
    let value: string | null | undefined;
    try {
      value = await this.entry().getPassword();
    } catch (err) {
      if (NO_ENTRY_PATTERN.test(errorMessage(err))) {
        return null;
      }
      throw new AuthError('StorageFailed', `failed to read OS keyring: ${errorMessage(err)}`, err);
    }

    if (!value || value.trim() === '') {
      return null;
    }
    return parseCredential(value, 'the OS keyring');
  }

  async remove(): Promise<void> {
    try {
      await this.entry().deletePassword();
    } catch (err) {
      if (NO_ENTRY_PATTERN.test(errorMessage(err))) {
        return;
      }
      throw new AuthError('StorageFailed', `failed to delete OS keyring entry: ${errorMessage(err)}`, err);
    }
  }
}
