/**
 * cirrus auth status
 *
 * Purpose:
 *   Show whether stored credentials exist and are accepted by the API,
 *   along with the key's name, project, plan and issuing user.
 *
 * Sub-APIs:
 *   - REST API: GET /auth/info
 *
 * Security:
 *   - Only the public key is displayed; the secret never is
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { loadCliConfig } from '../../services/config-loader';
import { createCredentialStore } from '../../services/create-credential-store';
import type { CredentialStore } from '../../services/credential-store';
import { RestApiClient, type ApiKeyValidator, type AuthInfo } from '../../services/api-client';
import { createConsoleOutput, type OutputSink } from '../../services/console-output';
import { redactSecrets } from '../../services/redact';
import { AuthError, errorMessage, isAuthError } from '../../types/auth-error';
import { secretKeyOf } from '../../types';
import { USER_AGENT } from '../../version';
import { exitWithError, getAuthCommand, type GlobalOptions } from './shared';

export type StatusCommandOptions = GlobalOptions;

export interface StatusDependencies {
  store: Pick<CredentialStore, 'retrieve'>;
  validator: ApiKeyValidator;
  output: OutputSink;
}

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split(/[\s_-]+/)
    .filter((word) => word !== '')
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

function withDetail(primary: string | undefined, detail: string | undefined): string {
  if (primary && detail) return `${primary} (${detail})`;
  return primary ?? detail ?? '-';
}

/**
 * Label/value rows describing an authenticated key.
 */
export function formatAuthInfo(info: AuthInfo): Array<[string, string]> {
  const { apiKey } = info;
  const rows: Array<[string, string]> = [
    ['Status', 'Logged in'],
    ['Credential Name', apiKey.name ?? '-'],
    ['Public Key', apiKey.publicKey],
  ];
  if (apiKey.created) {
    rows.push(['Created At', apiKey.created]);
  }
  rows.push(['Project', withDetail(apiKey.project.name, apiKey.project.id)]);
  if (apiKey.project.planType) {
    rows.push(['Plan Type', titleCase(apiKey.project.planType)]);
  }
  if (apiKey.issuingUser) {
    rows.push(['Issuing User', withDetail(apiKey.issuingUser.name, apiKey.issuingUser.email)]);
  }
  return rows;
}

export async function statusCommand(
  options: StatusCommandOptions,
  overrides: Partial<StatusDependencies> = {}
): Promise<void> {
  try {
    const config = loadCliConfig({ configDir: options.configDir });
    const deps: StatusDependencies = {
      store: overrides.store ?? createCredentialStore(config),
      validator: overrides.validator ?? new RestApiClient({ apiUrl: config.apiUrl, userAgent: USER_AGENT }),
      output: overrides.output ?? createConsoleOutput(),
    };

    const stored = await deps.store.retrieve();

    let info: AuthInfo;
    try {
      info = await deps.output.progress('Checking credentials...', () => deps.validator.validate(stored.apiKey));
    } catch (error) {
      const kind = isAuthError(error) ? error.kind : 'ValidationFailed';
      const secrets = [stored.apiKey, secretKeyOf(stored.apiKey)];
      throw new AuthError(
        kind,
        `failed to get auth information: ${redactSecrets(errorMessage(error), secrets)}`,
        error
      );
    }

    const rows = formatAuthInfo(info);
    const width = Math.max(...rows.map(([label]) => label.length)) + 1;
    for (const [label, value] of rows) {
      console.log(chalk.green(`${label}:`.padEnd(width)), value);
    }

    if (info.apiKey.project.id !== stored.projectId) {
      deps.output.warn(
        `Stored project ${stored.projectId} does not match the key's project ${info.apiKey.project.id}; run cirrus auth login again`
      );
    }
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Register the `auth status` command with the CLI program
 */
export function registerAuthStatusCommand(program: Command): Command {
  getAuthCommand(program)
    .command('status')
    .description('Show current authentication status and project')
    .action(async (_options: StatusCommandOptions, command: Command) => {
      await statusCommand(command.optsWithGlobals<StatusCommandOptions>());
    });

  return program;
}
