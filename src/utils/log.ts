/**
 * Component-scoped logging
 *
 * `debug` and `info` lines are diagnostics and only print when the logger is
 * verbose; `warn` and `error` always print. Everything goes to stderr so the
 * host program's stdout stays untouched.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ComponentLogger {
  readonly component: string;
  readonly verbose: boolean;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO'),
  warn: chalk.yellow('WARN'),
  error: chalk.red('ERROR'),
};

export function formatLogLine(level: LogLevel, component: string, message: string): string {
  return `${chalk.dim(new Date().toISOString())} ${LEVEL_LABELS[level]} ${chalk.bold(`[${component}]`)} ${message}`;
}

export function createComponentLogger(
  component: string,
  options: LoggerOptions = {},
): ComponentLogger {
  const verbose = options.verbose ?? false;

  function emit(level: LogLevel, message: string, args: unknown[]): void {
    if (!verbose && (level === 'debug' || level === 'info')) return;
    // eslint-disable-next-line no-console
    console.error(formatLogLine(level, component, message), ...args);
  }

  return {
    component,
    verbose,
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
  };
}

/**
 * Shortens a value for a single diagnostic line
 */
export function truncateForLog(value: unknown, maxLength = 200): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
