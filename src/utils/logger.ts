import winston from 'winston';

/**
 * Campaign Dispatcher - Centralized Logger
 *
 * Transports:
 * - Console: colorized for operators
 * - logs/error.log: errors only
 * - logs/combined.log: everything, for audit of past cycles
 *
 * Levels, colors and the emoji console line are the house format shared with
 * the rest of our tooling. Specific to the dispatcher: file transports are
 * skipped and the console is silenced under test runs unless LOG_LEVEL is set.
 */

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    success: 3,
    debug: 4,
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'blue',
    success: 'green',
    debug: 'white',
};

winston.addColors(colors);

const emojis: Record<string, string> = {
    error: '❌',
    warn: '⚠️',
    info: 'ℹ️',
    success: '✅',
    debug: '🔍',
};

const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.colorize({ all: true }),
    winston.format.printf((info) => {
        const levelBase = info.level.replace(/\x1B\[[0-9;]*m/g, '').toLowerCase();
        const emoji = emojis[levelBase] || '•';
        return `${emoji} [${info.timestamp}] ${info.level}: ${info.message}`;
    }),
);

const isTestRun = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

const fileTransports = isTestRun
    ? []
    : [
        new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error',
            format: winston.format.combine(winston.format.metadata(), winston.format.json()),
        }),
        new winston.transports.File({
            filename: 'logs/combined.log',
            format: winston.format.combine(winston.format.metadata(), winston.format.json()),
        }),
    ];

const transports = [
    new winston.transports.Console({
        format: consoleFormat,
        level: process.env.LOG_LEVEL || 'debug',
        silent: isTestRun && !process.env.LOG_LEVEL,
    }),
    ...fileTransports,
];

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels,
    transports,
});

// `success` is a custom level, so it has no typed method on the logger
export const logSuccess = (message: string, metadata?: unknown) => {
    logger.log('success', message, { metadata });
};

export default logger;
