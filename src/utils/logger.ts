import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerLike {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export class Logger implements LoggerLike {
  private level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? (process.env.VERBOSE ? 'debug' : 'info');
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(chalk.blue('[INFO]'), message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow('[WARN]'), message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red('[ERROR]'), message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray('[DEBUG]'), message, ...args);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }
}

export default new Logger();
