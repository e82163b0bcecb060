import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/** Logs go to stderr; stdout carries command output only. */
export const LOG_FD = 2;

export const PRETTY_OPTIONS = {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname,name',
    destination: LOG_FD,
} as const;

/**
 * Destination that forwards to a swappable target. Modules grab the logger
 * at import time, before the CLI has parsed its flags, so the output format
 * is switched here instead of by replacing the logger.
 */
class SwitchableDestination implements pino.DestinationStream {
    private target: pino.DestinationStream = pino.destination(LOG_FD);

    write(msg: string): void {
        this.target.write(msg);
    }

    use(target: pino.DestinationStream): void {
        this.target = target;
    }
}

const destination = new SwitchableDestination();

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable output for the CLI.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    const logger = getLogger();
    logger.level = level;

    if (jsonLogs) {
        destination.use(pino.destination(LOG_FD));
    } else {
        destination.use(
            pino.transport({
                target: 'pino-pretty',
                options: PRETTY_OPTIONS,
            })
        );
    }

    return logger;
}

/**
 * Get the logger instance.
 * If not initialized, logs JSON to stderr at BIBLIORAG_LOG_LEVEL (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino(
            {
                name: 'bibliorag',
                level: process.env['BIBLIORAG_LOG_LEVEL'] ?? 'info',
            },
            destination
        );
    }
    return loggerInstance;
}
