import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { getAuthBridgePath } from './paths.js';
import { sanitizeLogArgs } from './sanitize.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

class Logger {
  private logFilePath: string | null = null;
  private logFileInitialized = false;
  private writeStream: fs.WriteStream | null = null;
  private verbose = false;

  /**
   * Initialize log file path and create write stream
   * Log file format: $AUTHBRIDGE_HOME/logs/proxy-YYYY-MM-DD.log
   */
  private initializeLogFile(): void {
    if (this.logFileInitialized) return;

    try {
      const logsDir = getAuthBridgePath('logs');

      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      const today = new Date().toISOString().split('T')[0];
      this.logFilePath = path.join(logsDir, `proxy-${today}.log`);
      this.writeStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.writeStream.on('error', () => {
        // Disk went away mid-run: stop writing, keep console output
        this.writeStream = null;
      });
      this.logFileInitialized = true;
    } catch {
      // No writable home directory: console-only logging
      this.logFilePath = null;
      this.writeStream = null;
      this.logFileInitialized = true;
    }
  }

  /**
   * Append one entry to the log file
   * Format: [ISO timestamp] [LEVEL] event {json}
   */
  private writeToLogFile(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }

    if (!this.writeStream) return;

    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    this.writeStream.write(`[${timestamp}] [${level.toUpperCase()}] ${message}${argsStr}\n`);
  }

  /**
   * Flush and close the write stream
   */
  close(): void {
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Debug output reaches the console only with --verbose or AUTHBRIDGE_DEBUG=true|1
   */
  isDebugMode(): boolean {
    return this.verbose || process.env.AUTHBRIDGE_DEBUG === 'true' || process.env.AUTHBRIDGE_DEBUG === '1';
  }

  getLogFilePath(): string | null {
    if (!this.logFileInitialized) {
      this.initializeLogFile();
    }
    return this.logFilePath;
  }

  debug(message: string, ...args: unknown[]): void {
    const sanitized = sanitizeLogArgs(...args);
    this.writeToLogFile(LogLevel.DEBUG, message, sanitized);

    if (this.isDebugMode()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...sanitized.map(formatArg));
    }
  }

  info(message: string, ...args: unknown[]): void {
    const sanitized = sanitizeLogArgs(...args);
    this.writeToLogFile(LogLevel.INFO, message, sanitized);
    console.log(chalk.cyan(`[INFO] ${message}`), ...sanitized.map(formatArg));
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    const sanitized = sanitizeLogArgs(...args);
    this.writeToLogFile(LogLevel.WARN, message, sanitized);
    console.warn(chalk.yellow(`⚠ ${message}`), ...sanitized.map(formatArg));
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    let errorDetails = '';
    if (error instanceof Error) {
      errorDetails = `${error.name}: ${error.message}`;
      if (error.stack) {
        errorDetails += `\n${error.stack}`;
      }
    } else if (error !== undefined) {
      errorDetails = String(error);
    }

    const sanitized = data ? sanitizeLogArgs(data) : [];
    this.writeToLogFile(LogLevel.ERROR, message, errorDetails ? [...sanitized, errorDetails] : sanitized);

    console.error(chalk.red(`✗ ${message}`), ...sanitized.map(formatArg));
    if (error instanceof Error) {
      console.error(chalk.red(error.message));
      if (error.stack && this.isDebugMode()) {
        console.error(chalk.white(error.stack));
      }
    } else if (error !== undefined) {
      console.error(chalk.red(String(error)));
    }
  }
}

function formatArg(arg: unknown): string {
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg);
}

export const logger = new Logger();
