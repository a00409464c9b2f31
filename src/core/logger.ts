/**
 * Logger utilities using chalk for colored output, with an optional
 * append-only file sink for hook runs.
 */

import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'ERROR' | 'SUCCESS' | 'INFO' | 'WARN' | 'DEBUG' | 'LOG';

export interface LoggerOptions {
  verbose?: boolean;
  /** Absolute path of the append-only log file. */
  logFile?: string;
  /** Tag written in every file line, e.g. `subagent-stop`. */
  scope?: string;
  /** Suppress console output; file lines are still written. */
  quiet?: boolean;
}

export function formatLogLine(level: LogLevel, scope: string, message: string, at: Date): string {
  const flat = message.replace(/\r?\n/g, ' ');
  return `[${at.toISOString()}] [${scope}] ${level} ${flat}\n`;
}

export class Logger {
  private verbose: boolean;
  private logFile: string | undefined;
  private scope: string;
  private quiet: boolean;
  private dirReady = false;

  constructor(options: boolean | LoggerOptions = false) {
    const resolved: LoggerOptions = typeof options === 'boolean' ? { verbose: options } : options;
    this.verbose = resolved.verbose ?? false;
    this.logFile = resolved.logFile;
    this.scope = resolved.scope ?? 'learnings-capture';
    this.quiet = resolved.quiet ?? false;
  }

  get filePath(): string | undefined {
    return this.logFile;
  }

  error(message: string, error?: Error): void {
    this.write('ERROR', message);
    if (!this.quiet) console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      const detail = error.stack || error.message;
      this.write('ERROR', detail);
      if (!this.quiet) console.error(chalk.gray(detail));
    }
  }

  success(message: string): void {
    this.write('SUCCESS', message);
    if (!this.quiet) console.log(chalk.green(`✓ ${message}`));
  }

  info(message: string): void {
    this.write('INFO', message);
    if (!this.quiet) console.log(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    this.write('WARN', message);
    if (!this.quiet) console.log(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.write('DEBUG', message);
    if (!this.quiet) console.log(chalk.gray(`[DEBUG] ${message}`));
  }

  log(message: string): void {
    this.write('LOG', message);
    if (!this.quiet) console.log(message);
  }

  private write(level: LogLevel, message: string): void {
    const target = this.logFile;
    if (!target) return;
    try {
      if (!this.dirReady) {
        fs.mkdirSync(path.dirname(target), { recursive: true });
        this.dirReady = true;
      }
      fs.appendFileSync(target, formatLogLine(level, this.scope, message, new Date()), 'utf-8');
    } catch (error) {
      // One report, then console only.
      this.logFile = undefined;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.gray(`log file disabled (${target}): ${reason}`));
    }
  }
}

// Default logger instance
export const logger = new Logger();

// File-only logger used by hook runs, whose stdout belongs to the host
export function createHookLogger(logFile: string, scope: string = 'subagent-stop'): Logger {
  return new Logger({ logFile, scope, quiet: true });
}
