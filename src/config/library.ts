import type { LogLevel } from '../util/log';

export interface LibraryDefaults {
    readonly snapshotVersion: 1;
    readonly gamepadButtonThreshold: number;
    readonly eventQueueCapacity: number;
    readonly logLevel: LogLevel;
    readonly testLogLevel: LogLevel;
}

export const LIBRARY_DEFAULTS: LibraryDefaults = Object.freeze({
    snapshotVersion: 1,
    gamepadButtonThreshold: 0.5,
    eventQueueCapacity: 256,
    logLevel: 'warn',
    testLogLevel: 'error',
});

export const LOG_LEVEL_ENV_KEY = 'COGS_LOG_LEVEL';

type Environment = Readonly<Record<string, string | undefined>>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

const readProcessEnv = (): Environment => {
    if (typeof process === 'undefined' || !process.env) {
        return {};
    }
    return process.env;
};

/**
 * Minimum level for loggers created without an explicit one.
 * `COGS_LOG_LEVEL` wins when it names a known level.
 */
export const resolveLogLevel = (env: Environment = readProcessEnv()): LogLevel => {
    const requested = env[LOG_LEVEL_ENV_KEY]?.trim().toLowerCase();
    if (requested && isLogLevel(requested)) {
        return requested;
    }

    return env.NODE_ENV === 'test' ? LIBRARY_DEFAULTS.testLogLevel : LIBRARY_DEFAULTS.logLevel;
};
