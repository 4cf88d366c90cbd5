import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';
import { loginCommand, registerAuthLoginCommand, NEXT_STEPS_MESSAGE } from './login';
import type { OutputSink } from '../../services/console-output';
import type { AuthInfo } from '../../services/api-client';
import { AuthError } from '../../types/auth-error';

describe('loginCommand', () => {
  let configDir: string;
  let output: OutputSink;
  let store: { store: Mock<[string, string], Promise<void>> };
  let validator: { validate: Mock<[string], Promise<AuthInfo>> };

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cirrus-login-test-'));
    output = { info: vi.fn(), warn: vi.fn(), progress: (_message, task) => task() };
    store = { store: vi.fn<[string, string], Promise<void>>(async () => undefined) };
    validator = {
      validate: vi.fn<[string], Promise<AuthInfo>>(async () => ({
        apiKey: { publicKey: 'test-public', project: { id: 'proj-1' } },
      })),
    };

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

  it('should log in with explicit keys and print next steps', async () => {
    await loginCommand(
      { configDir, publicKey: 'test-public', secretKey: 'test-secret', projectId: 'proj-1' },
      { store, validator, output, env: {} }
    );

    expect(store.store).toHaveBeenCalledWith('test-public:test-secret', 'proj-1');
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Successfully logged in (project: proj-1)'));
    expect(console.log).toHaveBeenCalledWith(NEXT_STEPS_MESSAGE);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should exit with 4 when validation fails', async () => {
    validator.validate.mockRejectedValueOnce(
      new AuthError('ValidationFailed', 'invalid API key: authentication failed')
    );

    await expect(
      loginCommand(
        { configDir, publicKey: 'test-public', secretKey: 'test-secret', projectId: 'proj-1' },
        { store, validator, output, env: {} }
      )
    ).rejects.toThrow('process.exit(4)');

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Error: API key validation failed: invalid API key: authentication failed')
    );
    expect(store.store).not.toHaveBeenCalled();
  });

  it('should exit with 3 when keys are missing without a terminal', async () => {
    await expect(
      loginCommand({ configDir, publicKey: 'test-public' }, { store, validator, output, env: {}, isTTY: () => false })
    ).rejects.toThrow('process.exit(3)');

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('TTY not detected'));
  });

  it('should remove its SIGINT handler when finished', async () => {
    const before = process.listenerCount('SIGINT');

    await loginCommand(
      { configDir, publicKey: 'test-public', secretKey: 'test-secret', projectId: 'proj-1' },
      { store, validator, output, env: {} }
    );

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});

describe('registerAuthLoginCommand', () => {
  it('should add login under the auth group with key options', () => {
    const program = new Command();

    registerAuthLoginCommand(program);

    const auth = program.commands.find((cmd) => cmd.name() === 'auth');
    const login = auth?.commands.find((cmd) => cmd.name() === 'login');
    expect(login?.options.map((option) => option.long)).toEqual(['--public-key', '--secret-key', '--project-id']);
  });
});
