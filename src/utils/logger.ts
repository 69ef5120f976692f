import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import type { LogLevel } from '../types/index.js';

interface LogStream {
    write(msg: string): unknown;
}

function prettyStream(): LogStream {
    return PinoPretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,app',
        sync: true,
    });
}

let destination: LogStream | null = null;

/**
 * Process-wide logger. Modules take it once at load time, so it is never
 * replaced: `initLogger()` changes its level and swaps the stream behind it.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * (Re)configure the logger. JSON lines when `jsonLogs` is set,
 * pino-pretty output otherwise.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    destination = jsonLogs ? pino.destination({ dest: 1, sync: true }) : prettyStream();

    const logger = getLogger();
    logger.level = level;
    return logger;
}

/**
 * Get the logger, creating an info-level pretty logger on first use.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino(
            { level: 'info', base: { app: 'genderscope' } },
            {
                write(msg: string) {
                    destination ??= prettyStream();
                    destination.write(msg);
                },
            }
        );
    }
    return loggerInstance;
}
