import chalk from 'chalk';
import ora from 'ora';

/**
 * Where the login flow reports progress. Commands use the console
 * implementation; tests capture lines.
 */
export interface OutputSink {
  info(message: string): void;
  warn(message: string): void;
  /** Run `task` behind a progress indicator labelled `message` */
  progress<T>(message: string, task: () => Promise<T>): Promise<T>;
}

export function createConsoleOutput(): OutputSink {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.log(chalk.yellow(message)),
    progress: async (message, task) => {
      const spinner = ora(message).start();
      try {
        const result = await task();
        spinner.succeed(message);
        return result;
      } catch (error) {
        spinner.fail(message);
        throw error;
      }
    },
  };
}
