/**
 * Winston-based logging.
 */

import winston from 'winston';
import { loadConfig, OwlBoxConfig } from './config.js';

export function createLogger(config: Pick<OwlBoxConfig, 'logLevel' | 'logFormat'> = loadConfig()): winston.Logger {
    const formats = [
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
    ];

    if (config.logFormat === 'json') {
        formats.push(winston.format.json());
    } else {
        formats.push(
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
                return `${timestamp} [${level}]: ${message}${metaStr}`;
            })
        );
    }

    return winston.createLogger({
        level: config.logLevel,
        format: winston.format.combine(...formats),
        defaultMeta: { service: 'owlbox' },
        transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] })],
    });
}

/** Shared logger for the package. */
export const logger = createLogger();
