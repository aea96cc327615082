import winston from 'winston';
import { env } from '../config/env.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
    const scope = typeof component === 'string' ? ` [${component}]` : '';
    let msg = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

const logger = winston.createLogger({
    level: env.LOG_LEVEL ?? 'info',
    silent: env.NODE_ENV === 'test',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            // Keep stdout free for command output
            stderrLevels: ['error', 'warn', 'info', 'debug'],
            format: combine(colorize(), logFormat),
        }),
    ],
});

export interface LoggingOptions {
    level?: LogLevel;
    debug?: boolean;
    file?: string;
    maxSize?: number;
    maxFiles?: number;
}

/**
 * Applies the `logging` section of the config file.
 * `debug` beats `LOG_LEVEL`, which beats the file.
 */
export function configureLogging(options: LoggingOptions = {}): void {
    logger.level = options.debug ? 'debug' : env.LOG_LEVEL ?? options.level ?? 'info';

    if (options.file) {
        logger.add(
            new winston.transports.File({
                filename: options.file,
                maxsize: options.maxSize ?? 10 * 1024 * 1024,
                maxFiles: options.maxFiles ?? 5,
            })
        );
    }
}

export function createLogger(component: string): winston.Logger {
    return logger.child({ component });
}

export type { Logger } from 'winston';

export default logger;
