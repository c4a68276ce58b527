import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

function timestamp(): string {
  return chalk.gray(`[${new Date().toISOString().slice(11, 23)}]`);
}

export const consoleLogger: Logger = {
  info(message) {
    console.log(`${timestamp()} ${message}`);
  },
  warn(message) {
    console.warn(`${timestamp()} ${chalk.yellow(message)}`);
  },
};

export const silentLogger: Logger = {
  info() {},
  warn() {},
};
