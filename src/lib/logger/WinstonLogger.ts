import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { inject, injectable } from 'tsyringe';
import { ILogger } from './ILogger';
import { ClassifierConfig } from '../../Config/config';

@injectable()
export class WinstonLogger implements ILogger {
    private logger: Logger;

    constructor(@inject('ClassifierConfig') config: ClassifierConfig) {
        const sinks: Logger['transports'] = [
            new transports.Console({
                // Keep stdout free for the CLI's own output.
                stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
                format: format.combine(
                    format.colorize(),
                    format.simple()
                )
            })
        ];

        if (config.logging.directory) {
            sinks.push(new DailyRotateFile({
                filename: path.join(config.logging.directory, 'news-verdict-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
                format: format.json()
            }));
        }

        this.logger = createLogger({
            level: config.logging.level,
            format: format.combine(
                format.timestamp(),
                format.errors({ stack: true }),
                format.printf(({ timestamp, level, message, meta }) => {
                    const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
                    return `${timestamp} [${level}]: ${message}${metaStr}`;
                })
            ),
            transports: sinks
        });
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        this.logger.debug(message, { meta });
    }

    info(message: string, meta?: Record<string, unknown>): void {
        this.logger.info(message, { meta });
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        this.logger.warn(message, { meta });
    }

    error(message: string, meta?: Record<string, unknown>): void {
        this.logger.error(message, { meta });
    }
}
