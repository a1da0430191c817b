import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logDir = process.env.LOG_DIR || 'logs';
const silent = process.env.NODE_ENV === 'test';

const { combine, timestamp, printf, colorize, align, json } = winston.format;

const errorFilter = winston.format((info) => {
    return info.level === 'error' ? info : false;
});

const infoFilter = winston.format((info) => {
    return info.level === 'info' ? info : false;
});

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent,
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        json()
    ),
    transports: [
        new winston.transports.Console({
            format: combine(
                colorize(),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                align(),
                printf((info) => `[${info.timestamp}] ${info.level}: ${info.message}${info.stack ? `\n${info.stack}` : ''}`)
            ),
            handleExceptions: true,
        }),
    ],
});

// File logs are skipped under test so runs leave nothing behind
if (!silent) {
    if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
    }
    // Info level only
    logger.add(new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        format: infoFilter(),
    }));
    logger.add(new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: errorFilter(),
        handleExceptions: true,
    }));
}

export function setLogLevel(level: string): void {
    logger.level = level;
}

export { logger };
