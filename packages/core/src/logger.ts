// =============================================================================
// Potluck — Logger
// =============================================================================
//
// Thin levelled wrapper over console. Every line is prefixed with its scope,
// e.g. "[Ledger] Rejected settle: ...".
//

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(scope: string, level: LogLevel = 'warn', sink: ConsoleSink = console): Logger {
    const enabled = (target: Exclude<LogLevel, 'silent'>) => LEVEL_RANK[target] >= LEVEL_RANK[level];
    const prefix = `[${scope}]`;

    return {
        debug(message, ...args) {
            if (enabled('debug')) sink.debug(`${prefix} ${message}`, ...args);
        },
        info(message, ...args) {
            if (enabled('info')) sink.info(`${prefix} ${message}`, ...args);
        },
        warn(message, ...args) {
            if (enabled('warn')) sink.warn(`${prefix} ${message}`, ...args);
        },
        error(message, ...args) {
            if (enabled('error')) sink.error(`${prefix} ${message}`, ...args);
        },
    };
}
