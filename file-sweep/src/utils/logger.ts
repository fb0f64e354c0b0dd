import chalk from 'chalk';

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  /** Plain console output, used to mirror report lines */
  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(message), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(message), ...args);
  }
}

export const logger = new Logger();
