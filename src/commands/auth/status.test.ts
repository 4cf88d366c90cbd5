import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatAuthInfo, statusCommand } from './status';
import type { AuthInfo } from '../../services/api-client';
import type { OutputSink } from '../../services/console-output';
import type { StoredCredential } from '../../types';
import { AuthError } from '../../types/auth-error';

const authInfo: AuthInfo = {
  apiKey: {
    publicKey: 'test-public',
    name: 'Cirrus CLI - dev-laptop',
    created: '2026-01-15T10:00:00Z',
    project: { id: 'proj-1', name: 'Demo', planType: 'PAY_AS_YOU_GO' },
    issuingUser: { name: 'Test User', email: 'user@example.com' },
  },
};

describe('formatAuthInfo', () => {
  it('should list every known field in order', () => {
    expect(formatAuthInfo(authInfo)).toEqual([
      ['Status', 'Logged in'],
      ['Credential Name', 'Cirrus CLI - dev-laptop'],
      ['Public Key', 'test-public'],
      ['Created At', '2026-01-15T10:00:00Z'],
      ['Project', 'Demo (proj-1)'],
      ['Plan Type', 'Pay As You Go'],
      ['Issuing User', 'Test User (user@example.com)'],
    ]);
  });

  it('should leave out optional fields', () => {
    expect(formatAuthInfo({ apiKey: { publicKey: 'test-public', project: { id: 'proj-1' } } })).toEqual([
      ['Status', 'Logged in'],
      ['Credential Name', '-'],
      ['Public Key', 'test-public'],
      ['Project', 'proj-1'],
    ]);
  });
});

describe('statusCommand', () => {
  let configDir: string;
  let output: OutputSink;
  let warn: Mock<[string], void>;
  let retrieve: Mock<[], Promise<StoredCredential>>;
  let validate: Mock<[string], Promise<AuthInfo>>;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cirrus-status-test-'));
    warn = vi.fn<[string], void>();
    output = { info: vi.fn(), warn, progress: (_message, task) => task() };
    retrieve = vi.fn<[], Promise<StoredCredential>>(async () => ({
      apiKey: 'test-public:test-secret',
      projectId: 'proj-1',
    }));
    validate = vi.fn<[string], Promise<AuthInfo>>(async () => authInfo);

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should validate the stored key and print its details', async () => {
    await statusCommand({ configDir }, { store: { retrieve }, validator: { validate }, output });

    expect(validate).toHaveBeenCalledWith('test-public:test-secret');
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Project:'), 'Demo (proj-1)');
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Status:'), 'Logged in');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should exit with 4 when not logged in', async () => {
    retrieve.mockRejectedValueOnce(new AuthError('NotLoggedIn', 'not logged in'));

    await expect(
      statusCommand({ configDir }, { store: { retrieve }, validator: { validate }, output })
    ).rejects.toThrow('process.exit(4)');

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Error: not logged in'));
    expect(validate).not.toHaveBeenCalled();
  });

  it('should mask the stored key in validation errors', async () => {
    validate.mockRejectedValueOnce(new AuthError('ValidationFailed', 'rejected test-public:test-secret'));

    await expect(
      statusCommand({ configDir }, { store: { retrieve }, validator: { validate }, output })
    ).rejects.toThrow('process.exit(4)');

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Error: failed to get auth information: rejected ********')
    );
  });

  it('should mask the secret half when an error echoes it alone', async () => {
    validate.mockRejectedValueOnce(new AuthError('ValidationFailed', 'bad secret test-secret'));

    await expect(
      statusCommand({ configDir }, { store: { retrieve }, validator: { validate }, output })
    ).rejects.toThrow('process.exit(4)');

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Error: failed to get auth information: bad secret ********')
    );
  });

  it('should warn when the stored project differs from the key project', async () => {
    retrieve.mockResolvedValueOnce({ apiKey: 'test-public:test-secret', projectId: 'proj-2' });

    await statusCommand({ configDir }, { store: { retrieve }, validator: { validate }, output });

    expect(warn).toHaveBeenCalledWith(
      "Stored project proj-2 does not match the key's project proj-1; run cirrus auth login again"
    );
  });
});
