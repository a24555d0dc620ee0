import chalk from 'chalk';

/**
 * Leveled console logging. Every call writes one complete line immediately;
 * nothing is buffered, so output over a remote exec shows progress as it happens.
 */

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4
}

let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const level = parseInt(value, 10);
  if (isNaN(level) || level < LogLevel.NONE || level > LogLevel.DEBUG) return undefined;
  return level;
}

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function error(message: string): void {
  if (currentLogLevel >= LogLevel.ERROR) {
    console.error(chalk.red(`❌ ${message}`));
  }
}

export function warn(message: string): void {
  if (currentLogLevel >= LogLevel.WARN) {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  }
}

export function info(message: string): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(message);
  }
}

export function success(message: string): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(chalk.green(`✅ ${message}`));
  }
}

export function debug(message: string): void {
  if (currentLogLevel >= LogLevel.DEBUG) {
    console.log(chalk.dim(`[DEBUG] ${message}`));
  }
}

// Step banners: "▶ [3/9] fetch_source"
export function step(index: number, total: number, name: string): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(chalk.cyan(`▶ [${index}/${total}] ${name}`));
  }
}

// Raw command output, indented under the running step.
export function output(line: string): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(chalk.dim(`    ${line}`));
  }
}
