/**
 * cirrus auth logout
 *
 * Purpose:
 *   Remove the stored API key and project ID from both the OS keyring and
 *   the fallback credentials file. Succeeds when nothing is stored.
 *
 * Local Config Read/Write:
 *   - Reads: <configDir>/config.json
 *   - Writes: deletes the OS keyring entry and <configDir>/credentials
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { loadCliConfig } from '../../services/config-loader';
import { createCredentialStore } from '../../services/create-credential-store';
import type { CredentialStore } from '../../services/credential-store';
import { wrapAuthError } from '../../types/auth-error';
import { exitWithError, getAuthCommand, type GlobalOptions } from './shared';

export type LogoutCommandOptions = GlobalOptions;

export async function logoutCommand(
  options: LogoutCommandOptions,
  store?: Pick<CredentialStore, 'remove'>
): Promise<void> {
  try {
    const credentials = store ?? createCredentialStore(loadCliConfig({ configDir: options.configDir }));
    try {
      await credentials.remove();
    } catch (error) {
      throw wrapAuthError('failed to remove credentials', error, 'StorageFailed');
    }
    console.log(chalk.green('Successfully logged out and removed stored credentials'));
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Register the `auth logout` command with the CLI program
 */
export function registerAuthLogoutCommand(program: Command): Command {
  getAuthCommand(program)
    .command('logout')
    .description('Remove stored credentials')
    .action(async (_options: LogoutCommandOptions, command: Command) => {
      await logoutCommand(command.optsWithGlobals<LogoutCommandOptions>());
    });

  return program;
}
