/**
 * Diagnostic logging for the request pipeline.
 *
 * Log output is diagnostic only; nothing in the pipeline branches on it.
 *
 * @module api-client/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
    /** Prepended to every line, e.g. "[MacroLens API]" */
    prefix?: string;

    /** Lowest level that is written. Default: 'debug' */
    level?: LogLevel;

    /** Default: true */
    enabled?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Logger that writes through `console`, filtered by level.
 *
 * @example
 * const logger = createConsoleLogger({ prefix: '[MacroLens API]', level: 'info' });
 * logger.info('Response: [200] GET https://…/food/logs/today - Size: 1.20 KB');
 * // [MacroLens API] [INFO] Response: [200] GET …
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const { prefix, level = 'debug', enabled = true } = options;
    const threshold = LEVEL_RANK[level];

    function write(lineLevel: LogLevel, message: string, meta?: Record<string, unknown>): void {
        if (!enabled || LEVEL_RANK[lineLevel] < threshold) return;

        const tag = `[${lineLevel.toUpperCase()}]`;
        const line = prefix ? `${prefix} ${tag} ${message}` : `${tag} ${message}`;
        const args: unknown[] = meta ? [line, meta] : [line];

        switch (lineLevel) {
            case 'debug':
                console.debug(...args);
                break;
            case 'info':
                console.info(...args);
                break;
            case 'warn':
                console.warn(...args);
                break;
            case 'error':
                console.error(...args);
                break;
        }
    }

    return {
        debug: (message, meta) => write('debug', message, meta),
        info: (message, meta) => write('info', message, meta),
        warn: (message, meta) => write('warn', message, meta),
        error: (message, meta) => write('error', message, meta),
    };
}

/** Discards everything. */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
