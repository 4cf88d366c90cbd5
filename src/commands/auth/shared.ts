import chalk from 'chalk';
import { Command } from 'commander';
import { errorMessage, exitCodeFor } from '../../types/auth-error';

/**
 * Options every command sees from the root program.
 */
export type GlobalOptions = {
  configDir?: string;
};

/**
 * Find the `auth` group on the program, creating it on first use.
 */
export function getAuthCommand(program: Command): Command {
  return (
    program.commands.find((cmd) => cmd.name() === 'auth') ??
    program.command('auth').description('Manage authentication and credentials')
  );
}

/**
 * Print the error and exit with the code for its kind.
 */
export function exitWithError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(exitCodeFor(error));
}
