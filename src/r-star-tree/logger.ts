/**
 * Structured debug logging for tree maintenance events.
 *
 * `createJsonLogger` emits one JSON line per event, by default to stdout:
 * timestamp, level, message and any extra fields.
 */

import { type LogLevel, logLevelFromEnv } from './env';

export type LogFields = Record<string, string | number | boolean>;

export interface TreeLogger {
    debug(message: string, fields?: LogFields): void;
}

export const silentLogger: TreeLogger = {
    debug() {
        // Nothing is recorded.
    }
};

export function createJsonLogger(write: (line: string) => void = (line) => { process.stdout.write(line); }): TreeLogger {
    return {
        debug(message, fields = {}) {
            const entry = {
                ...fields,
                ts: new Date().toISOString(),
                level: 'debug',
                msg: message
            };
            write(JSON.stringify(entry) + '\n');
        }
    };
}

export function loggerForLevel(level: LogLevel): TreeLogger {
    return level === 'debug' ? createJsonLogger() : silentLogger;
}

export function loggerFromEnv(): TreeLogger {
    return loggerForLevel(logLevelFromEnv());
}
