/**
 * watson CLI Logger
 * Leveled console logging; everything goes to stderr so stdout stays
 * reserved for command output.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface WatsonLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

export const DEFAULT_PREFIX = '[watson]';

let currentLevel: LogLevel = 'info';
let prefix = DEFAULT_PREFIX;

export function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Unknown level names are ignored and leave the current level in place.
 */
export function setLogLevel(level: string): void {
    const normalized = level.toLowerCase();
    if (isLogLevel(normalized)) {
        currentLevel = normalized;
    }
}

export function setLogPrefix(value: string): void {
    prefix = value;
}

class ConsoleLogger implements WatsonLogger {
    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
    }

    private format(message: string): string {
        return `${prefix} ${message}`;
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(this.format(message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) {
            console.warn(this.format(message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) {
            console.error(this.format(message), ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.error(this.format(message), ...args);
        }
    }

    trace(message: string, ...args: unknown[]): void {
        if (this.shouldLog('trace')) {
            console.error(this.format(message), ...args);
        }
    }
}

const loggerInstance = new ConsoleLogger();

export function getLogger(): WatsonLogger {
    return loggerInstance;
}
