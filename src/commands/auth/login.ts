/**
 * cirrus auth login
 *
 * Purpose:
 *   Authenticate with the Cirrus platform using predefined keys or an
 *   interactive OAuth flow in the browser, then store the resulting API key
 *   and project ID.
 *
 * Sub-APIs:
 *   - Identity gateway: token exchange, project listing, user lookup, key issuance
 *   - REST API: GET /auth/info to validate the key before it is stored
 *
 * Local Config Read/Write:
 *   - Reads: <configDir>/config.json
 *   - Writes: OS keyring entry, or <configDir>/credentials (mode 0600)
 *
 * Security:
 *   - The secret key is never printed
 *   - Keys are validated before anything is written
 */

import * as os from 'os';
import chalk from 'chalk';
import { Command } from 'commander';
import { OAUTH_CLIENT_ID, resolveOAuthEndpoints } from '../../config/endpoints';
import { loadCliConfig } from '../../services/config-loader';
import { createCredentialStore } from '../../services/create-credential-store';
import { GraphQLIdentityClient } from '../../services/identity-client';
import { RestApiClient } from '../../services/api-client';
import { openBrowser } from '../../services/browser';
import { selectProjectInteractively } from '../../services/project-selector';
import { promptForCredentials } from '../../services/credential-prompt';
import { createConsoleOutput } from '../../services/console-output';
import { LoginOrchestrator, type LoginDependencies } from '../../services/login-orchestrator';
import { USER_AGENT } from '../../version';
import { exitWithError, getAuthCommand, type GlobalOptions } from './shared';

export type LoginCommandOptions = GlobalOptions & {
  publicKey?: string;
  secretKey?: string;
  projectId?: string;
};

export const NEXT_STEPS_MESSAGE = `
Next steps:
  • Check the stored credentials: cirrus auth status
  • Remove them again: cirrus auth logout
`;

export async function loginCommand(
  options: LoginCommandOptions,
  overrides: Partial<LoginDependencies> = {}
): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const config = loadCliConfig({ configDir: options.configDir });
    const endpoints = resolveOAuthEndpoints(config);

    if (config.verbose) {
      console.log(chalk.gray(`Console: ${config.consoleUrl}`));
      console.log(chalk.gray(`Gateway: ${config.gatewayUrl}`));
      console.log(chalk.gray(`API: ${config.apiUrl}`));
    }

    const orchestrator = new LoginOrchestrator({
      store: createCredentialStore(config),
      identity: new GraphQLIdentityClient({
        clientId: OAUTH_CLIENT_ID,
        tokenUrl: endpoints.tokenUrl,
        graphqlUrl: endpoints.graphqlUrl,
        userAgent: USER_AGENT,
        signal: controller.signal,
      }),
      validator: new RestApiClient({ apiUrl: config.apiUrl, userAgent: USER_AGENT, signal: controller.signal }),
      endpoints,
      clientId: OAUTH_CLIENT_ID,
      openBrowser,
      selectProject: (projects) => selectProjectInteractively(projects),
      promptForCredentials,
      isTTY: () => process.stdin.isTTY === true,
      hostname: () => os.hostname(),
      env: process.env,
      output: createConsoleOutput(),
      signal: controller.signal,
      ...overrides,
    });

    const result = await orchestrator.login({
      publicKey: options.publicKey,
      secretKey: options.secretKey,
      projectId: options.projectId,
    });

    console.log(chalk.green(`Successfully logged in (project: ${result.projectId})`));
    console.log(NEXT_STEPS_MESSAGE);
  } catch (error) {
    exitWithError(error);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/**
 * Register the `auth login` command with the CLI program
 */
export function registerAuthLoginCommand(program: Command): Command {
  getAuthCommand(program)
    .command('login')
    .description('Authenticate with Cirrus using API keys or the browser OAuth flow')
    .option('--public-key <key>', 'Public key (or CIRRUS_PUBLIC_KEY)')
    .option('--secret-key <key>', 'Secret key (or CIRRUS_SECRET_KEY)')
    .option('--project-id <id>', 'Project ID (or CIRRUS_PROJECT_ID)')
    .action(async (_options: LoginCommandOptions, command: Command) => {
      await loginCommand(command.optsWithGlobals<LoginCommandOptions>());
    });

  return program;
}
