// ss2v2ray/src/lib/logger.ts
// winston logger shared by the CLI and the conversion pipeline.

import winston from 'winston';
import type { PipelineLogger } from 'libregion';

export type Logger = winston.Logger;

export interface LoggerOptions {
    level?: string;
    silent?: boolean;
}

/** `level: message` lines; warnings and errors go to stderr. */
export function createLogger(options: LoggerOptions = {}): Logger {
    return winston.createLogger({
        level: options.level ?? process.env.LOG_LEVEL ?? 'info',
        silent: options.silent ?? false,
        format: winston.format.printf(({ level, message }) => `${level}: ${String(message)}`),
        transports: [
            new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
        ],
    });
}

/** What the conversion needs from a logger; a winston Logger satisfies it. */
export interface RunLogger extends PipelineLogger {
    warn(message: string): unknown;
    error(message: string): unknown;
}
