import winston from 'winston';
import fs from 'fs';
import path from 'path';

const validLogLevels = ['fatal', 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'trace'];

let logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

if (!validLogLevels.includes(logLevel)) {
    console.warn(`Invalid LOG_LEVEL "${logLevel}" specified. Using "info" instead.`);
    console.warn(`Valid levels are: ${validLogLevels.join(', ')}`);
    logLevel = 'info';
}

// Console format with timestamp first
const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

const customLevels = {
    levels: {
        fatal: 0,
        error: 1,
        warn: 2,
        info: 3,
        http: 4,
        verbose: 5,
        debug: 6,
        trace: 7,
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        warn: 'yellow',
        info: 'green',
        http: 'cyan',
        verbose: 'blue',
        debug: 'white',
        trace: 'grey',
    },
};

winston.addColors(customLevels.colors);

const consoleTransport = new winston.transports.Console({ format: consoleFormat });

// File output is opt-in: LOG_FILE=/var/log/farm/output.log
const logFile = process.env.LOG_FILE;
if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
}

const transports = logFile
    ? [
          consoleTransport,
          new winston.transports.File({
              filename: logFile,
              level: logLevel,
              format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
          }),
      ]
    : [consoleTransport];

const logr = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.errors({ stack: true }),
    transports,
});

const logger = Object.assign(logr, {
    setLogLevel: (level: string) => {
        const newLevel = level.toLowerCase();
        if (!validLogLevels.includes(newLevel)) {
            logr.warn(`Invalid log level: ${newLevel}. Valid levels are: ${validLogLevels.join(', ')}`);
            return;
        }
        logr.level = newLevel;
        logr.info(`Log level changed to: ${newLevel}`);
    },
});

export default logger;
