import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 * Logs go to stderr; stdout carries command output.
 *
 * Modules take the logger at import time, before the CLI has parsed its
 * flags, so `initLogger()` reconfigures the existing instance in place
 * instead of replacing it.
 */
let loggerInstance: Logger | null = null;

type Sink = ReturnType<typeof pino.destination> | ReturnType<typeof pino.transport>;

let sink: Sink | null = null;
let sinkJson = false;

function createSink(jsonLogs: boolean): Sink {
    if (jsonLogs) {
        return pino.destination(2);
    }
    return pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
        },
    });
}

/**
 * Sinks open on the first written line, so a logger that is reconfigured
 * before it logs never starts a transport worker.
 */
function write(msg: string): void {
    if (!sink) {
        sink = createSink(sinkJson);
    }
    sink.write(msg);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (sink && sinkJson !== jsonLogs) {
        sink.end();
        sink = null;
    }
    sinkJson = jsonLogs;

    if (loggerInstance) {
        loggerInstance.level = level;
        return loggerInstance;
    }

    loggerInstance = pino({ level }, { write });
    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
