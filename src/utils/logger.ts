/**
 * Pino logger shared by the CLI and the pipeline.
 *
 * Each processed file gets a child logger carrying `file`, so every line
 * about one PDF can be grepped together.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    transport: pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    } : undefined,
    base: {
      service: 'pdf-cover-renamer',
      version: '1.0.0',
    },
  });
}

/**
 * Create child logger bound to one input file
 */
export function createFileLogger(parent: Logger, file: string): Logger {
  return parent.child({ file });
}

export const silentLogger: Logger = pino({ level: 'silent' });
