import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AuthError, errorMessage } from '../types/auth-error';
import type { StoredCredential } from '../types';

/**
 * Name of the fallback credentials file inside the config directory.
 */
export const CREDENTIALS_FILENAME = 'credentials';

/**
 * A single place credentials can live.
 *
 * `retrieve()` returns `null` when nothing (or only an empty value) is
 * stored; it throws only for unexpected failures.
 */
export interface CredentialBackend {
  readonly name: string;
  store(credential: StoredCredential): Promise<void>;
  retrieve(): Promise<StoredCredential | null>;
  remove(): Promise<void>;
}

/**
 * The store as seen by commands: `retrieve()` fails with `NotLoggedIn`
 * instead of returning `null`.
 */
export interface CredentialStore {
  store(apiKey: string, projectId: string): Promise<void>;
  retrieve(): Promise<StoredCredential>;
  remove(): Promise<void>;
}

const StoredCredentialSchema = z.object({
  api_key: z.string(),
  project_id: z.string(),
});

/**
 * Serialize to the single-line JSON form shared by both backends.
 */
export function serializeCredential(credential: StoredCredential): string {
  return JSON.stringify({
    api_key: credential.apiKey,
    project_id: credential.projectId,
  });
}

/**
 * Parse the stored form. Never includes the stored text in error messages.
 */
export function parseCredential(raw: string, source: string): StoredCredential {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new AuthError('StorageFailed', `stored credentials in ${source} are malformed`);
  }

  const parsed = StoredCredentialSchema.safeParse(json);
  if (!parsed.success) {
    throw new AuthError('StorageFailed', `stored credentials in ${source} are malformed`);
  }
  if (parsed.data.api_key === '') {
    throw new AuthError('StorageFailed', `API key not found in ${source}`);
  }
  if (parsed.data.project_id === '') {
    throw new AuthError('StorageFailed', `project ID not found in ${source}`);
  }
  return { apiKey: parsed.data.api_key, projectId: parsed.data.project_id };
}

function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Owner-only credentials file under the config directory.
 */
export class FileCredentialBackend implements CredentialBackend {
  public readonly name = 'file';
  public readonly filePath: string;

  constructor(private readonly configDir: string) {
    this.filePath = path.join(configDir, CREDENTIALS_FILENAME);
  }

  /**
   * Write via a temp file created with mode 0600, then rename over the
   * target so the credentials are never readable by group or others.
   */
  async store(credential: StoredCredential): Promise<void> {
    await fs.promises.mkdir(this.configDir, { recursive: true, mode: 0o700 });

    const tempPath = path.join(
      this.configDir,
      `.${CREDENTIALS_FILENAME}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`
    );

    const handle = await fs.promises.open(tempPath, 'wx', 0o600);
    try {
      await handle.writeFile(serializeCredential(credential), 'utf-8');
    } finally {
      await handle.close();
    }

    try {
      await fs.promises.rename(tempPath, this.filePath);
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true });
      throw err;
    }
  }

  async retrieve(): Promise<StoredCredential | null> {
    let data: string;
    try {
      data = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) {
        return null;
      }
      throw new AuthError('StorageFailed', `failed to read credentials file: ${errorMessage(err)}`, err);
    }

    const trimmed = data.trim();
    if (trimmed === '') {
      return null;
    }
    return parseCredential(trimmed, this.filePath);
  }

  async remove(): Promise<void> {
    try {
      await fs.promises.unlink(this.filePath);
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) {
        return;
      }
      throw new AuthError('StorageFailed', `failed to remove credentials file: ${errorMessage(err)}`, err);
    }
  }
}

export interface FallbackCredentialStoreOptions {
  /** Called with a diagnostic line whenever the primary backend is skipped */
  onDiagnostic?: (message: string) => void;
}

/**
 * Composes a primary backend (OS secret store) with a fallback (file).
 *
 * - store: primary first, fallback only when the primary fails
 * - retrieve: first non-empty value wins, primary first
 * - remove: both; primary failures are ignored
 */
export class FallbackCredentialStore implements CredentialStore {
  constructor(
    private readonly primary: CredentialBackend,
    private readonly fallback: CredentialBackend | null,
    private readonly options: FallbackCredentialStoreOptions = {}
  ) {}

  async store(apiKey: string, projectId: string): Promise<void> {
    const credential: StoredCredential = { apiKey, projectId };
    const fallback = this.fallback;

    try {
      await this.primary.store(credential);
      return;
    } catch (err) {
      if (!fallback) {
        throw new AuthError(
          'StorageFailed',
          `failed to write ${this.primary.name}: ${errorMessage(err)}`,
          err
        );
      }
      this.diagnostic(`${this.primary.name} unavailable (${errorMessage(err)}), using ${fallback.name}`);
    }

    try {
      await fallback.store(credential);
    } catch (err) {
      throw new AuthError(
        'StorageFailed',
        `failed to write ${fallback.name}: ${errorMessage(err)}`,
        err
      );
    }
  }

  async retrieve(): Promise<StoredCredential> {
    try {
      const fromPrimary = await this.primary.retrieve();
      if (fromPrimary) {
        return fromPrimary;
      }
    } catch (err) {
      if (!this.fallback) {
        throw err;
      }
      this.diagnostic(`${this.primary.name} read failed (${errorMessage(err)}), trying ${this.fallback.name}`);
    }

    const fromFallback = this.fallback ? await this.fallback.retrieve() : null;
    if (fromFallback) {
      return fromFallback;
    }
    throw new AuthError('NotLoggedIn', 'not logged in');
  }

  async remove(): Promise<void> {
    if (!this.fallback) {
      await this.primary.remove();
      return;
    }

    try {
      await this.primary.remove();
    } catch (err) {
      this.diagnostic(`${this.primary.name} delete skipped (${errorMessage(err)})`);
    }
    await this.fallback.remove();
  }

  private diagnostic(message: string): void {
    this.options.onDiagnostic?.(message);
  }
}
