/**
 * Logger Utility
 *
 * Levelled logging for the first-boot configurator. Every record is printed
 * to stdout and, once `configureLogging()` names a log file, appended to it.
 *
 * Record format (plain text in the file, level coloured on a TTY):
 *
 *   2026-10-19T08:00:00.000Z - [metadata] - WARNING - Unable to get 'user-data'
 *
 *   | Level   | Labels shown             |
 *   |---------|--------------------------|
 *   | error   | CRITICAL, ERROR          |
 *   | warn    | + WARNING                |
 *   | info    | + INFO                   |
 *   | verbose | + VERBOSE                |
 *   | debug   | + DEBUG                  |
 *   | silent  | nothing                  |
 *
 * The level is determined by:
 *   1. `configureLogging({ level })` (CLI --log-level)
 *   2. LOG_LEVEL env var
 *   3. Fallback: info
 *
 * Logging never terminates the process; callers return failures and the
 * orchestrator decides the exit code.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import chalk from 'chalk';

// =============================================================================
// Log Levels
// =============================================================================

export enum LogLevel {
    SILENT = -1,
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    VERBOSE = 3,
    DEBUG = 4,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    info: LogLevel.INFO,
    verbose: LogLevel.VERBOSE,
    debug: LogLevel.DEBUG,
};

export type Severity = 'CRITICAL' | 'ERROR' | 'WARNING' | 'INFO' | 'VERBOSE' | 'DEBUG';

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
    CRITICAL: (text) => chalk.bold.red(text),
    ERROR: (text) => chalk.red(text),
    WARNING: (text) => chalk.yellow(text),
    INFO: (text) => chalk.blue(text),
    VERBOSE: (text) => chalk.gray(text),
    DEBUG: (text) => chalk.dim(text),
};

/** Parse a level name (case-insensitive); undefined when unknown */
export function parseLogLevel(value: string): LogLevel | undefined {
    const key = value.trim().toLowerCase();
    return Object.hasOwn(LOG_LEVEL_MAP, key) ? LOG_LEVEL_MAP[key] : undefined;
}

function resolveLogLevel(): LogLevel {
    const explicit = process.env.LOG_LEVEL;
    const parsed = explicit ? parseLogLevel(explicit) : undefined;
    return parsed ?? LogLevel.INFO;
}

let currentLevel = resolveLogLevel();
let logFilePath: string | undefined;

// =============================================================================
// Sinks
// =============================================================================

export interface LoggingOptions {
    level?: LogLevel;
    /** File every record is appended to; its directory is created if missing */
    logFile?: string;
}

/**
 * Configure the process-wide sinks. Call once, early in main().
 *
 * Throws when the log file cannot be created, so an unusable log location
 * is reported before any step runs.
 */
export function configureLogging(options: LoggingOptions): void {
    if (options.level !== undefined) {
        currentLevel = options.level;
    }
    if (options.logFile) {
        mkdirSync(dirname(options.logFile), { recursive: true });
        appendFileSync(options.logFile, '');
        logFilePath = options.logFile;
    }
}

/** Drop the file sink and fall back to the environment level */
export function resetLogging(): void {
    currentLevel = resolveLogLevel();
    logFilePath = undefined;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Format one record as it is written to the log file.
 */
export function formatLogLine(timestamp: Date, module: string, severity: Severity, message: string): string {
    return `${timestamp.toISOString()} - [${module}] - ${severity} - ${message}`;
}

function emit(level: LogLevel, severity: Severity, module: string, message: string): void {
    if (currentLevel < level) return;

    const timestamp = new Date();
    console.log(
        `${chalk.dim(timestamp.toISOString())} - [${module}] - ${SEVERITY_COLORS[severity](severity)} - ${message}`,
    );
    if (logFilePath) {
        appendFileSync(logFilePath, `${formatLogLine(timestamp, module, severity, message)}\n`);
    }
}

// =============================================================================
// Logger
// =============================================================================

export interface Logger {
    /** Failure that stops the run */
    fatal: (message: string) => void;
    error: (message: string) => void;
    warn: (message: string) => void;
    info: (message: string) => void;
    /** Extra detail for operators troubleshooting a boot */
    verbose: (message: string) => void;
    /** Raw data dumps and internal state */
    debug: (message: string) => void;
}

/**
 * Create a logger whose records carry `module` in brackets.
 */
export function createLogger(module: string): Logger {
    return {
        fatal: (message) => emit(LogLevel.ERROR, 'CRITICAL', module, message),
        error: (message) => emit(LogLevel.ERROR, 'ERROR', module, message),
        warn: (message) => emit(LogLevel.WARN, 'WARNING', module, message),
        info: (message) => emit(LogLevel.INFO, 'INFO', module, message),
        verbose: (message) => emit(LogLevel.VERBOSE, 'VERBOSE', module, message),
        debug: (message) => emit(LogLevel.DEBUG, 'DEBUG', module, message),
    };
}

const logger = createLogger('configurator');

export default logger;
