import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  FallbackCredentialStore,
  FileCredentialBackend,
  parseCredential,
  serializeCredential,
  type CredentialBackend,
} from './credential-store';
import { AuthError } from '../types/auth-error';
import type { StoredCredential } from '../types';

/**
 * In-memory backend that can be told to fail.
 */
class MemoryBackend implements CredentialBackend {
  public value: StoredCredential | null = null;
  public failWith: Error | null = null;
  public readonly store = vi.fn(async (credential: StoredCredential) => {
    this.check();
    this.value = credential;
  });
  public readonly retrieve = vi.fn(async () => {
    this.check();
    return this.value;
  });
  public readonly remove = vi.fn(async () => {
    this.check();
    this.value = null;
  });

  constructor(public readonly name: string) {}

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

describe('serializeCredential / parseCredential', () => {
  it('should serialize to single-line JSON', () => {
    expect(serializeCredential({ apiKey: 'pub:test-secret', projectId: 'proj-1' })).toBe(
      '{"api_key":"pub:test-secret","project_id":"proj-1"}'
    );
  });

  it('should parse the stored form', () => {
    expect(parseCredential('{"api_key":"pub:test-secret","project_id":"proj-1"}', 'the file')).toEqual({
      apiKey: 'pub:test-secret',
      projectId: 'proj-1',
    });
  });

  it('should not echo malformed content', () => {
    expect(() => parseCredential('pub:test-secret', 'the file')).toThrow(
      'stored credentials in the file are malformed'
    );
  });

  it('should reject an empty project id', () => {
    expect(() => parseCredential('{"api_key":"pub:test-secret","project_id":""}', 'the file')).toThrow(
      'project ID not found in the file'
    );
  });
});

describe('FileCredentialBackend', () => {
  let tempDir: string;
  let configDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cirrus-creds-test-'));
    configDir = path.join(tempDir, 'config');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return what was stored', async () => {
    const backend = new FileCredentialBackend(configDir);

    await backend.store({ apiKey: 'pub:test-secret', projectId: 'proj-1' });

    expect(await backend.retrieve()).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });
    expect(fs.readFileSync(path.join(configDir, 'credentials'), 'utf-8')).toBe(
      '{"api_key":"pub:test-secret","project_id":"proj-1"}'
    );
  });

  it('should create the file with mode 0600', async () => {
    const backend = new FileCredentialBackend(configDir);

    await backend.store({ apiKey: 'pub:test-secret', projectId: 'proj-1' });

    expect(fs.existsSync(backend.filePath)).toBe(true);
    // Windows has no POSIX permission bits
    if (process.platform !== 'win32') {
      expect(fs.statSync(backend.filePath).mode & 0o777).toBe(0o600);
    }
  });

  it('should tighten permissions when replacing an existing file', async () => {
    fs.mkdirSync(configDir, { recursive: true });
    fs.writeFileSync(path.join(configDir, 'credentials'), 'old', { mode: 0o644 });
    const backend = new FileCredentialBackend(configDir);

    await backend.store({ apiKey: 'pub:test-secret', projectId: 'proj-2' });

    if (process.platform !== 'win32') {
      expect(fs.statSync(backend.filePath).mode & 0o777).toBe(0o600);
    }
    expect(await backend.retrieve()).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-2' });
  });

  it('should leave no temporary files behind', async () => {
    const backend = new FileCredentialBackend(configDir);

    await backend.store({ apiKey: 'pub:test-secret', projectId: 'proj-1' });

    expect(fs.readdirSync(configDir)).toEqual(['credentials']);
  });

  it('should return null when the file is missing or blank', async () => {
    const backend = new FileCredentialBackend(configDir);
    expect(await backend.retrieve()).toBeNull();

    fs.mkdirSync(configDir, { recursive: true });
    fs.writeFileSync(backend.filePath, '  \n');
    expect(await backend.retrieve()).toBeNull();
  });

  it('should treat removing a missing file as success', async () => {
    const backend = new FileCredentialBackend(configDir);

    await expect(backend.remove()).resolves.toBeUndefined();
  });
});

describe('FallbackCredentialStore', () => {
  let primary: MemoryBackend;
  let fallback: MemoryBackend;
  let diagnostics: string[];
  let store: FallbackCredentialStore;

  beforeEach(() => {
    primary = new MemoryBackend('OS keyring');
    fallback = new MemoryBackend('file');
    diagnostics = [];
    store = new FallbackCredentialStore(primary, fallback, { onDiagnostic: (line) => diagnostics.push(line) });
  });

  it('should return the values that were stored', async () => {
    await store.store('pub:test-secret', 'proj-1');

    expect(await store.retrieve()).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });
  });

  it('should leave the fallback untouched after a successful primary write', async () => {
    await store.store('pub:test-secret', 'proj-1');

    expect(primary.value).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });
    expect(fallback.store).not.toHaveBeenCalled();
    expect(fallback.value).toBeNull();
  });

  it('should write to the fallback when the primary fails', async () => {
    primary.failWith = new Error('no secret service');

    await store.store('pub:test-secret', 'proj-1');

    expect(fallback.value).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });
    expect(diagnostics).toEqual(['OS keyring unavailable (no secret service), using file']);
  });

  it('should read from the fallback when the primary errors', async () => {
    fallback.value = { apiKey: 'pub:test-secret', projectId: 'proj-1' };
    primary.failWith = new Error('locked');

    expect(await store.retrieve()).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });
  });

  it('should prefer a non-empty primary value', async () => {
    primary.value = { apiKey: 'pub:primary-secret', projectId: 'proj-1' };
    fallback.value = { apiKey: 'pub:fallback-secret', projectId: 'proj-2' };

    expect(await store.retrieve()).toEqual({ apiKey: 'pub:primary-secret', projectId: 'proj-1' });
    expect(fallback.retrieve).not.toHaveBeenCalled();
  });

  it('should fail with NotLoggedIn when nothing is stored', async () => {
    await expect(store.retrieve()).rejects.toMatchObject({ kind: 'NotLoggedIn', message: 'not logged in' });
  });

  it('should yield NotLoggedIn after remove', async () => {
    await store.store('pub:test-secret', 'proj-1');
    await store.remove();

    await expect(store.retrieve()).rejects.toBeInstanceOf(AuthError);
    await expect(store.retrieve()).rejects.toMatchObject({ kind: 'NotLoggedIn' });
  });

  it('should succeed removing an empty store and still yield NotLoggedIn', async () => {
    await expect(store.remove()).resolves.toBeUndefined();

    await expect(store.retrieve()).rejects.toMatchObject({ kind: 'NotLoggedIn', message: 'not logged in' });
    expect(primary.remove).toHaveBeenCalledTimes(1);
    expect(fallback.remove).toHaveBeenCalledTimes(1);
  });

  it('should remove and report NotLoggedIn with real files when nothing was stored', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cirrus-empty-store-'));
    try {
      const fileStore = new FallbackCredentialStore(new FileCredentialBackend(dir), null);

      await expect(fileStore.remove()).resolves.toBeUndefined();
      await expect(fileStore.retrieve()).rejects.toMatchObject({ kind: 'NotLoggedIn' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should ignore primary errors on remove', async () => {
    fallback.value = { apiKey: 'pub:test-secret', projectId: 'proj-1' };
    primary.failWith = new Error('locked');

    await store.remove();

    expect(fallback.value).toBeNull();
    expect(diagnostics).toEqual(['OS keyring delete skipped (locked)']);
  });

  it('should surface fallback errors on remove', async () => {
    fallback.failWith = new Error('permission denied');

    await expect(store.remove()).rejects.toThrow('permission denied');
  });

  it('should surface primary write errors when there is no fallback', async () => {
    const single = new FallbackCredentialStore(primary, null);
    primary.failWith = new Error('no secret service');

    await expect(single.store('pub:test-secret', 'proj-1')).rejects.toMatchObject({
      kind: 'StorageFailed',
      message: 'failed to write OS keyring: no secret service',
    });
  });

  it('should round-trip through a real file fallback', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cirrus-fallback-test-'));
    try {
      primary.failWith = new Error('no secret service');
      const withFile = new FallbackCredentialStore(primary, new FileCredentialBackend(tempDir));

      await withFile.store('pub:test-secret', 'proj-1');
      expect(await withFile.retrieve()).toEqual({ apiKey: 'pub:test-secret', projectId: 'proj-1' });

      await withFile.remove();
      await expect(withFile.retrieve()).rejects.toMatchObject({ kind: 'NotLoggedIn' });
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
