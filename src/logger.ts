export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
    const value = process.env.LOG_LEVEL ?? '';
    return isLogLevel(value) ? value : 'info';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export interface Logger {
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`, e.g. `[Fetcher] GET ...`.
 * The level is process-wide and read from LOG_LEVEL on first import.
 */
export function createLogger(tag: string): Logger {
    const emit = (level: Exclude<LogLevel, 'silent'>, args: unknown[]): void => {
        if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[currentLevel]) return;

        const prefix = `[${tag}]`;
        switch (level) {
            case 'debug':
                console.debug(prefix, ...args);
                break;
            case 'info':
                console.log(prefix, ...args);
                break;
            case 'warn':
                console.warn(prefix, ...args);
                break;
            case 'error':
                console.error(prefix, ...args);
                break;
        }
    };

    return {
        debug: (...args) => emit('debug', args),
        info: (...args) => emit('info', args),
        warn: (...args) => emit('warn', args),
        error: (...args) => emit('error', args),
    };
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
