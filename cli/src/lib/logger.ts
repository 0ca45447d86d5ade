// cli/src/lib/logger.ts
import chalk from "chalk";

export interface Logger {
  step(index: number, total: number, message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Echo an az invocation. Only printed in verbose mode. */
  command(args: readonly string[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false } = options;

  return {
    step(index, total, message) {
      console.log(`${chalk.cyan(`[${index}/${total}]`)} ${message}`);
    },
    info(message) {
      console.log(chalk.blue(message));
    },
    success(message) {
      console.log(chalk.green(`✓ ${message}`));
    },
    warn(message) {
      console.log(chalk.yellow(`⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`✗ ${message}`));
    },
    command(args) {
      if (verbose) {
        console.log(chalk.gray(`$ az ${args.join(" ")}`));
      }
    },
  };
}

/** Logger that prints nothing; for callers that only want the result. */
export const silentLogger: Logger = {
  step: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  command: () => {},
};
