/**
 * Terminal styling shared by log output and command reports
 */

import chalk from 'chalk';

export const theme = {
  title: chalk.white.bold,
  muted: chalk.gray,
  dim: chalk.dim,

  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,

  command: chalk.cyan,
  path: chalk.white,
} as const;

export const symbols = {
  success: theme.success('✓'),
  error: theme.error('✗'),
  warning: theme.warning('!'),
  bullet: theme.muted('•'),
  inactive: theme.muted('○'),
} as const;

/** Format a CLI command */
export function command(cmd: string): string {
  return theme.command(cmd);
}

/** Format a file path */
export function path(p: string): string {
  return theme.path(p);
}

export function muted(text: string): string {
  return theme.muted(text);
}

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${message}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

export const ui = {
  theme,
  symbols,
  command,
  path,
  muted,
  success,
  error,
  warning,
};
