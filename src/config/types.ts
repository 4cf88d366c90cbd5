/**
 * Configuration Type Definitions
 *
 * The CLI reads an optional `config.json` from its per-user configuration
 * directory (default `~/.config/cirrus`). Every key can be overridden by a
 * `CIRRUS_*` environment variable.
 *
 * Resolution order: environment > config file > built-in defaults.
 */

/**
 * Where credentials are persisted.
 * - `auto`: OS secret store, falling back to a file when it is unavailable
 * - `keyring`: OS secret store only
 * - `file`: owner-only credentials file only
 */
export type CredentialStorageMode = 'auto' | 'keyring' | 'file';

export const CREDENTIAL_STORAGE_MODES: CredentialStorageMode[] = ['auto', 'keyring', 'file'];

/**
 * Shape of `<configDir>/config.json`. All fields are optional.
 */
export interface CliConfigFile {
  /** Public REST API base URL (used for key validation) */
  apiUrl?: string;
  /** Web console base URL (hosts the authorization and success pages) */
  consoleUrl?: string;
  /** Gateway base URL (token exchange and GraphQL) */
  gatewayUrl?: string;
  credentialStorage?: CredentialStorageMode;
  /** Service name used for OS secret store entries */
  keyringService?: string;
  /** Print diagnostic lines */
  verbose?: boolean;
}

/**
 * Fully resolved configuration.
 */
export interface CliConfig {
  apiUrl: string;
  consoleUrl: string;
  gatewayUrl: string;
  credentialStorage: CredentialStorageMode;
  keyringService: string;
  verbose: boolean;
  /** Directory holding config.json and the fallback credentials file */
  configDir: string;
}

export const DEFAULT_API_URL = 'https://console.cirrus-cloud.example/public/api/v1';
export const DEFAULT_CONSOLE_URL = 'https://console.cirrus-cloud.example';
export const DEFAULT_GATEWAY_URL = 'https://console.cirrus-cloud.example/api';
export const DEFAULT_KEYRING_SERVICE = 'cirrus-cli';
export const CONFIG_FILENAME = 'config.json';
