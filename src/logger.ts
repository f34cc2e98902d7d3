import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string, destination?: DestinationStream): Logger {
    const options: LoggerOptions = {
        level,
        base: {
            service: 'xlsx-report-engine',
        },
    };

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Module logger used when an exporter is created without one
 */
export const logger = createLogger(process.env.LOG_LEVEL ?? 'warn');
