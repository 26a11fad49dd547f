import fs from 'fs';
import path from 'path';
import { getLoggerConfig } from '../config';

/**
 * Centralized logging utility
 */
export const logLevels = {
    DEBUG: 0,
    INFO: 10,
    WARNING: 20,
    ERROR: 30
} as const;

export type LogLevel = keyof typeof logLevels;

export const isLogLevel = (value: string): value is LogLevel =>
    Object.prototype.hasOwnProperty.call(logLevels, value);

export interface LoggerOptions {
    level?: LogLevel;
    // Written under logs/; omit to log to the console only
    logFile?: string;
    // Console sink, stderr by default so stdout stays free for results
    write?: (line: string) => void;
}

export class Logger {
    private category: string;
    private consoleLevel: number;
    private logFilePath?: string;
    private write: (line: string) => void;

    constructor(category: string = 'App', options: LoggerOptions = {}) {
        const config = getLoggerConfig();
        this.category = category;
        const level = options.level ?? (isLogLevel(config.level) ? config.level : 'WARNING');
        this.consoleLevel = logLevels[level];
        this.write = options.write ?? (line => process.stderr.write(line + '\n'));

        const logFile = options.logFile ?? config.logFile;
        if (logFile) {
            this.logFilePath = path.join('logs', logFile);
            fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
        }
    }

    private formatMessage(level: LogLevel, message: string): string {
        const timestamp = new Date().toISOString();
        return `[${timestamp}] [${level}] [${this.category}] ${message}`;
    }

    info(message: string): void {
        this.log('INFO', message);
    }

    error(message: string, error?: Error): void {
        let formattedMessage = message;
        if (error) {
            formattedMessage += `\n${error.stack || error.message}`;
        }
        this.log('ERROR', formattedMessage);
    }

    warning(message: string): void {
        this.log('WARNING', message);
    }

    debug(message: string): void {
        this.log('DEBUG', message);
    }

    private log(level: LogLevel, message: string): void {
        const formattedMessage = this.formatMessage(level, message);

        // Console only gets messages at or above the configured level
        if (logLevels[level] >= this.consoleLevel) {
            this.write(formattedMessage);
        }
        if (this.logFilePath) {
            fs.appendFileSync(this.logFilePath, formattedMessage + '\n');
        }
    }
}

// Factory function to create logger instances
export const createLogger = (category: string, options?: LoggerOptions) => new Logger(category, options);

export default Logger;
