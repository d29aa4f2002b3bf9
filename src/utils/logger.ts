import chalk from "chalk";

const DEBUG = process.env.DEBUG === "true";

export const logger = {
  debug(message: string, ...rest: unknown[]): void {
    if (DEBUG) console.log(chalk.gray(`[debug] ${message}`), ...rest);
  },
  info(message: string, ...rest: unknown[]): void {
    console.log(message, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    console.warn(chalk.yellow(message), ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    console.error(chalk.red(message), ...rest);
  },
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
