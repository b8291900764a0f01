import { createLogger, format, transports, Logger } from 'winston';
import fs from 'fs';
import path from 'path';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const consoleFormat = format.combine(
    format.colorize(),
    format.timestamp(),
    format.printf(({ timestamp, level, message, ...rest }) => {
        const meta = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
        return `${timestamp} [${level}]: ${message}${meta}`;
    })
);

// File logs are opt-in: the commands are run by hand and should not leave a logs/ dir behind.
function fileTransports(dir: string | undefined): transports.FileTransportInstance[] {
    if (!dir) return [];
    fs.mkdirSync(dir, { recursive: true });
    return [
        new transports.File({
            filename: path.join(dir, 'combined.log'),
            level: 'info',
            format: format.combine(format.timestamp(), format.json()),
        }),
        new transports.File({
            filename: path.join(dir, 'error.log'),
            level: 'error',
            format: format.combine(format.timestamp(), format.json()),
        }),
    ];
}

export const logger: Logger = createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test',
    transports: [
        // stdout carries the command report; diagnostics go to stderr
        new transports.Console({ format: consoleFormat, stderrLevels: LEVELS }),
        ...fileTransports(process.env.LOG_DIR),
    ],
});

export const logInfo = (message: string, meta?: Record<string, unknown>) => logger.info(message, meta);
export const logError = (message: string, meta?: Record<string, unknown>) => logger.error(message, meta);

// Child logger for components
export const childLogger = (component: string) => logger.child({ component });
