import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { getEnvVarOptional } from './config.js';

const logLevel = getEnvVarOptional(process.env, 'LOG_LEVEL', 'error');
const logDir = process.env.LOG_DIR;

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

const consoleTransport = new winston.transports.Console({
    // Keep stdout for the formatted weather output
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
});

// File rotation: 10MB per file, keep 5 files max
function fileTransports(dir: string): DailyRotateFile[] {
    return [
        new DailyRotateFile({
            filename: path.join(dir, 'combined-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: logLevel,
        }),
        // Separate error log
        new DailyRotateFile({
            filename: path.join(dir, 'error-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: 'error',
        }),
    ];
}

export const logger = winston.createLogger({
    level: logLevel,
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: logDir ? [consoleTransport, ...fileTransports(logDir)] : [consoleTransport],
});
