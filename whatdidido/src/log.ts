/**
 * CLI Logging
 *
 * - stdout: results/data only (can be piped)
 * - stderr: status, errors, debug
 *
 * Levels: error and warn always shown, info by default,
 * debug only with --verbose or DEBUG=1.
 */

import { ui } from './ui.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

function setLevel(level: LogLevel): void {
  currentLevel = level;
}

function setVerbose(verbose: boolean): void {
  currentLevel = verbose ? 'debug' : 'info';
}

function getLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/**
 * Print raw output to stdout
 */
function print(message: string): void {
  console.log(message);
}

function debug(message: string): void {
  if (shouldLog('debug')) {
    console.error(ui.theme.dim(`[debug] ${message}`));
  }
}

function info(message: string): void {
  if (shouldLog('info')) {
    console.error(message);
  }
}

function warn(message: string): void {
  if (shouldLog('warn')) {
    console.error(ui.warning(message));
  }
}

function error(message: string): void {
  console.error(ui.error(message));
}

function success(message: string): void {
  if (shouldLog('info')) {
    console.error(ui.success(message));
  }
}

export const log = {
  setLevel,
  setVerbose,
  getLevel,

  print,
  debug,
  info,
  warn,
  error,
  success,
};
