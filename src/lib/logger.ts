// src/lib/logger.ts
import { createLogger as winstonCreateLogger, format, transports } from 'winston';
import type { Logger } from 'winston';
import { config } from './config/settings';
import * as path from 'path';
import * as fs from 'fs';

const logDir = path.resolve(process.cwd(), 'logs');

/**
 * Creates a Winston logger instance.
 * - Level comes from LOG_LEVEL (defaults to 'info').
 * - Console always; logs/app.log only when LOG_TO_FILE=true.
 * @param label - Logger label (e.g., 'engine', 'replay').
 */
export function createLogger(label: string): Logger {
    const logLevel = (config.log_level || 'info').toLowerCase();

    const logFormat = format.combine(
        format.label({ label }),
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.errors({ stack: true }),
        format.splat(),
        format.printf(({ level, message, label, timestamp, stack, ...meta }) => {
            let logMessage = `${timestamp} [${label}] ${level.toUpperCase()}: ${message}`;

            if (Object.keys(meta).length > 0) {
                logMessage += ` ${JSON.stringify(meta)}`;
            }
            if (stack) {
                logMessage += `\n${stack}`;
            }

            return logMessage;
        })
    );

    const targets: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
        new transports.Console(),
    ];
    if (config.logToFile) {
        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }
        targets.push(new transports.File({ filename: path.join(logDir, 'app.log') }));
    }

    return winstonCreateLogger({
        level: logLevel,
        format: logFormat,
        transports: targets,
    });
}
