import winston from 'winston';
import path from 'path';

const isDevelopment = process.env.NODE_ENV !== 'production';
const writeLogFiles = process.env.NODE_ENV !== 'test';

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    silent: process.env.LOG_SILENT === 'true',
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    defaultMeta: { service: 'path-velocity-limiter' },
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.printf(({ level, message, timestamp, ...meta }) => {
                    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
                    return `${timestamp} [${level}]: ${message} ${metaStr}`;
                })
            )
        }),
        ...(writeLogFiles
            ? [
                  new winston.transports.File({
                      filename: path.join('logs', 'error.log'),
                      level: 'error'
                  }),
                  new winston.transports.File({
                      filename: path.join('logs', 'combined.log')
                  })
              ]
            : [])
    ]
});

export default logger;
