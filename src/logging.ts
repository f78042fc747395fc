import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LogContext {
    [key: string]: unknown;
}

const createLogger = (level: LogLevel = 'info'): winston.Logger => {

    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    );

    let transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(({ timestamp, level, message, ...meta }) => {
                    // Drop the default service tag from the printed metadata
                    const { service: _service, ...rest } = meta;
                    const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
                    return `${timestamp} ${level}: ${message}${metaStr}`;
                })
            )
        })
    ];

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
        );

        transports = [
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.printf(({ level, message }) => {
                        return `${level}: ${message}`;
                    })
                )
            })
        ];
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports,
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
