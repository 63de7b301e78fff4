/**
 * Logger utility with colored output
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export class Logger {
  private static instance: Logger;
  private verbose: boolean;
  private quiet: boolean;
  private warningsOnly = false;

  constructor(verbose = false, quiet = false) {
    this.verbose = verbose;
    this.quiet = quiet;
  }

  static getInstance(verbose = false): Logger {
    if (!Logger.instance) {
      const level = process.env.LOG_LEVEL?.trim().toLowerCase();
      Logger.instance = new Logger(verbose || level === 'debug', level === 'silent');
    }
    return Logger.instance;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  /**
   * Keep warnings and errors but hide progress messages (info, success, debug)
   */
  setWarningsOnly(warningsOnly: boolean): void {
    this.warningsOnly = warningsOnly;
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet && !this.warningsOnly) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.quiet || this.warningsOnly) return;
    console.log(chalk.blue(`[INFO] ${message}`));
  }

  warn(message: string): void {
    if (this.quiet) return;
    console.log(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string, error?: Error): void {
    if (this.quiet) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error && this.verbose) {
      console.error(chalk.red(error.stack || error.message));
    }
  }

  success(message: string): void {
    if (this.quiet || this.warningsOnly) return;
    console.log(chalk.green(`[SUCCESS] ${message}`));
  }
}

export const logger = Logger.getInstance();
