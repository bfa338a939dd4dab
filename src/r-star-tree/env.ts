/**
 * Environment lookups. Values are read lazily so that a tree built with an
 * explicit logger never touches `process.env`.
 */

export type LogLevel = 'silent' | 'debug';

const logLevels: LogLevel[] = ['silent', 'debug'];

function optional(key: string, fallback: string): string {
    return process.env[key] ?? fallback;
}

function isLogLevel(value: string): value is LogLevel {
    return logLevels.some((level) => level === value);
}

export function logLevelFromEnv(): LogLevel {
    const value = optional('RSTAR_LOG_LEVEL', 'silent');
    if (!isLogLevel(value)) {
        throw new Error(
            `Invalid RSTAR_LOG_LEVEL: ${value}. ` +
            `Expected one of ${logLevels.join(', ')}.`
        );
    }
    return value;
}
