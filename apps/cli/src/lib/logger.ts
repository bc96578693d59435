/**
 * Structured logging for bootstrap steps
 * Redacts credential-looking values and colours by level
 */

import chalk from 'chalk';
import type { Logger as CoreLogger } from '@runbox/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Values following these markers are replaced before printing
const SENSITIVE_PATTERNS = [
  /(password[=:]\s*)[^\s]+/gi,
  /(secret[=:]\s*)[^\s]+/gi,
  /(token[=:]\s*)[^\s]+/gi,
  /(key[=:]\s*)[^\s]+/gi,
  /(:\/\/[^:/\s]+:)[^@\s]+(?=@)/g, // credentials in index URLs
];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
 * Redact sensitive information from log messages
 */
export function redactSensitive(message: string): string {
  let redacted = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, '$1[REDACTED]');
  }
  return redacted;
}

export type LogSink = (line: string, level: LogLevel) => void;

const consoleSink: LogSink = (line, level) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Keeps stdout clean for json and yaml output
const stderrSink: LogSink = (line) => {
  console.error(line);
};

export class Logger implements CoreLogger {
  constructor(
    private readonly logLevel: LogLevel = 'info',
    private readonly context: Record<string, unknown> = {},
    private readonly sink: LogSink = consoleSink
  ) {}

  private formatMessage(level: LogLevel, message: string, context: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = Object.keys(context).length > 0
      ? ` ${redactSensitive(JSON.stringify(context))}`
      : '';
    return this.getLevelColor(level)(`[${timestamp}] ${level.toUpperCase()} ${redactSensitive(message)}${contextStr}`);
  }

  private getLevelColor(level: LogLevel): (text: string) => string {
    switch (level) {
      case 'debug': return chalk.gray;
      case 'info': return chalk.blue;
      case 'warn': return chalk.yellow;
      case 'error': return chalk.red;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, { ...this.context, ...meta }), level);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.logLevel, { ...this.context, ...additionalContext }, this.sink);
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }
}

/**
 * Logger for a command run. RUNBOX_LOG_LEVEL sets the level; --verbose
 * lowers it to debug and --quiet raises it to error.
 */
export function createLogger(
  options: { verbose?: boolean; quiet?: boolean; stderr?: boolean },
  env: Record<string, string | undefined> = process.env
): Logger {
  const fromEnv = env.RUNBOX_LOG_LEVEL;
  let level: LogLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
  if (options.verbose) level = 'debug';
  if (options.quiet) level = 'error';
  return new Logger(level, {}, options.stderr ? stderrSink : consoleSink);
}
