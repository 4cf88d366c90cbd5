import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import {
  CONFIG_FILENAME,
  CREDENTIAL_STORAGE_MODES,
  DEFAULT_API_URL,
  DEFAULT_CONSOLE_URL,
  DEFAULT_GATEWAY_URL,
  DEFAULT_KEYRING_SERVICE,
  type CliConfig,
  type CliConfigFile,
  type CredentialStorageMode,
} from '../config/types';

const CredentialStorageSchema = z.enum(['auto', 'keyring', 'file']);

const CliConfigFileSchema = z.object({
  apiUrl: z.string().url().optional(),
  consoleUrl: z.string().url().optional(),
  gatewayUrl: z.string().url().optional(),
  credentialStorage: CredentialStorageSchema.optional(),
  keyringService: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
});

export interface LoadConfigOptions {
  /** Explicit directory (e.g. from `--config-dir`) */
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

/**
 * Get the default per-user configuration directory.
 * - Windows: %APPDATA%/cirrus
 * - elsewhere: $XDG_CONFIG_HOME/cirrus, or ~/.config/cirrus
 */
export function getDefaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (process.platform === 'win32') {
    return path.join(env.APPDATA ?? os.homedir(), 'cirrus');
  }
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg) {
    return path.join(xdg, 'cirrus');
  }
  return path.join(os.homedir(), '.config', 'cirrus');
}

/**
 * Resolve the configuration directory: flag > CIRRUS_CONFIG_DIR > default.
 */
export function resolveConfigDir(flagValue?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (flagValue) {
    return path.resolve(expandHome(flagValue));
  }
  if (env.CIRRUS_CONFIG_DIR) {
    return path.resolve(expandHome(env.CIRRUS_CONFIG_DIR));
  }
  return getDefaultConfigDir(env);
}

/**
 * Read `<configDir>/config.json`. A missing file yields an empty config.
 */
export function readConfigFile(configDir: string): CliConfigFile {
  const file = path.join(configDir, CONFIG_FILENAME);
  if (!fs.existsSync(file)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Failed to parse ${file}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = CliConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration in ${file}: ${issues}`);
  }
  return parsed.data;
}

function parseStorageMode(value: string): CredentialStorageMode {
  const parsed = CredentialStorageSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(
      `Invalid CIRRUS_CREDENTIAL_STORAGE "${value}" (expected one of: ${CREDENTIAL_STORAGE_MODES.join(', ')})`
    );
  }
  return parsed.data;
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Load the effective CLI configuration.
 */
export function loadCliConfig(options: LoadConfigOptions = {}): CliConfig {
  const env = options.env ?? process.env;
  const configDir = resolveConfigDir(options.configDir, env);
  const file = readConfigFile(configDir);

  return {
    apiUrl: trimTrailingSlash(env.CIRRUS_API_URL || file.apiUrl || DEFAULT_API_URL),
    consoleUrl: trimTrailingSlash(env.CIRRUS_CONSOLE_URL || file.consoleUrl || DEFAULT_CONSOLE_URL),
    gatewayUrl: trimTrailingSlash(env.CIRRUS_GATEWAY_URL || file.gatewayUrl || DEFAULT_GATEWAY_URL),
    credentialStorage: env.CIRRUS_CREDENTIAL_STORAGE
      ? parseStorageMode(env.CIRRUS_CREDENTIAL_STORAGE)
      : file.credentialStorage ?? 'auto',
    keyringService: file.keyringService ?? DEFAULT_KEYRING_SERVICE,
    verbose: env.CIRRUS_VERBOSE !== undefined ? parseBoolean(env.CIRRUS_VERBOSE) : file.verbose ?? false,
    configDir,
  };
}
