#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { registerAuthLoginCommand } from './commands/auth/login';
import { registerAuthLogoutCommand } from './commands/auth/logout';
import { registerAuthStatusCommand } from './commands/auth/status';
import { CLI_VERSION } from './version';

const program = new Command();

program
  .name('cirrus')
  .description('Command-line client for the Cirrus cloud platform')
  .version(CLI_VERSION)
  .option('--config-dir <path>', 'Configuration directory (default: ~/.config/cirrus, or CIRRUS_CONFIG_DIR)');

registerAuthLoginCommand(program);
registerAuthLogoutCommand(program);
registerAuthStatusCommand(program);

// Show help if no command provided
if (process.argv.length <= 2) {
  console.log(chalk.blue(`Cirrus CLI v${CLI_VERSION}`));
  console.log('Usage: cirrus [--config-dir <path>] <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  auth login   - Log in with API keys or through the browser');
  console.log('  auth logout  - Remove stored credentials');
  console.log('  auth status  - Show the stored credentials and their project');
  console.log('');
  console.log('Use \'cirrus <command> --help\' for more information');
  process.exit(0);
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
