import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS',
  SILENT = 'SILENT'
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SUCCESS,
  LogLevel.SILENT,
];

class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel) {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    if (!this.log(LogLevel.ERROR, message, ...args)) {
      return;
    }
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string, ...args: unknown[]) {
    this.log(LogLevel.SUCCESS, message, ...args);
  }

  /**
   * Step trace lines: `OUT` in green, `ERR` in red, the agent's final answer in blue.
   */
  trace(kind: 'out' | 'err' | 'agent', message: string) {
    const label =
      kind === 'out' ? chalk.green('OUT') : kind === 'err' ? chalk.red('ERR') : chalk.blue('AGENT');
    this.log(LogLevel.INFO, `${label}: ${message}`);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): boolean {
    if (this.logLevel === LogLevel.SILENT) {
      return false;
    }

    const currentLevelIndex = LEVEL_ORDER.indexOf(this.logLevel);
    const messageLevelIndex = LEVEL_ORDER.indexOf(level);

    if (messageLevelIndex < currentLevelIndex && level !== LogLevel.SUCCESS) {
      return false;
    }

    const timestamp = new Date().toISOString();
    const prefix = this.getPrefix(level);
    const formattedMessage = `${chalk.gray(timestamp)} ${prefix} ${message}`;

    console.log(formattedMessage, ...args);
    return true;
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return chalk.gray('[DEBUG]');
      case LogLevel.INFO:
        return chalk.blue('[INFO]');
      case LogLevel.WARN:
        return chalk.yellow('[WARN]');
      case LogLevel.ERROR:
        return chalk.red('[ERROR]');
      case LogLevel.SUCCESS:
        return chalk.green('[SUCCESS]');
      default:
        return '';
    }
  }
}

export const logger = Logger.getInstance();
