import chalk from 'chalk';
import type { CliConfig } from '../config/types';
import { FallbackCredentialStore, FileCredentialBackend, type CredentialStore } from './credential-store';
import { KeyringCredentialBackend } from './keyring-backend';

/**
 * Build the store for the configured storage mode.
 */
export function createCredentialStore(
  config: Pick<CliConfig, 'configDir' | 'credentialStorage' | 'keyringService' | 'verbose'>
): CredentialStore {
  const onDiagnostic = config.verbose
    ? (message: string) => console.log(chalk.gray(message))
    : undefined;
  const file = new FileCredentialBackend(config.configDir);

  switch (config.credentialStorage) {
    case 'file':
      return new FallbackCredentialStore(file, null, { onDiagnostic });
    case 'keyring':
      return new FallbackCredentialStore(new KeyringCredentialBackend(config.keyringService), null, { onDiagnostic });
    case 'auto':
    default:
      return new FallbackCredentialStore(new KeyringCredentialBackend(config.keyringService), file, { onDiagnostic });
  }
}
