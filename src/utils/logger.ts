/**
 * Structured console logger with chalk colors and log levels.
 *
 * `forRequest()` returns a logger whose lines carry a short request id,
 * so the classifier and agent lines of one invocation can be grouped.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer for consistent logging output
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warn,
    error: LogLevel.Error,
    silent: LogLevel.Silent,
};

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Get the current global log level. */
export function getLogLevel(): LogLevel {
    return currentLevel;
}

/** Map a configured level name onto a LogLevel. */
export function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVELS_BY_NAME[name];
}

/** Log a debug message (grey, only shown at Debug level). */
export function debug(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Debug) {
        console.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
}

/** Log an info message (blue). */
export function info(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.blue(`[INFO]  ${message}`), ...args);
    }
}

/** Log a success message (green). */
export function success(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.green(`✔ ${message}`), ...args);
    }
}

/** Log a warning message (yellow). */
export function warn(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Warn) {
        console.warn(chalk.yellow(`[WARN]  ${message}`), ...args);
    }
}

/** Log an error message (red). */
export function error(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Error) {
        console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
}

/** Log a step in a process (cyan, with step number). */
export function step(stepNumber: number, total: number, message: string): void {
    if (currentLevel <= LogLevel.Debug) {
        console.debug(chalk.cyan(`[${stepNumber}/${total}] ${message}`));
    }
}

/** Log a header/banner (bold white). */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
        console.log(chalk.bold.white(message));
        console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

/** Logger methods that can be scoped to a request. */
export interface ScopedLogger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

/** Create a logger that prefixes every line with the first 8 chars of a request id. */
export function forRequest(requestId: string): ScopedLogger {
    const prefix = `[req:${requestId.slice(0, 8)}]`;
    return {
        debug: (message, ...args) => debug(`${prefix} ${message}`, ...args),
        info: (message, ...args) => info(`${prefix} ${message}`, ...args),
        warn: (message, ...args) => warn(`${prefix} ${message}`, ...args),
        error: (message, ...args) => error(`${prefix} ${message}`, ...args),
    };
}

export const logger = {
    debug,
    info,
    success,
    warn,
    error,
    step,
    header,
    forRequest,
    setLogLevel,
    getLogLevel,
};
