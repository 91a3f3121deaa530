import fs from 'fs';
import path from 'path';
import winston from 'winston';
import config from '../config';
import type { LoggingConfig } from '../types/config.types';

const CONSOLE_OMITTED = new Set(['level', 'message', 'timestamp', 'service']);

/**
 * One console line: timestamp, level, message, then any metadata as JSON
 */
export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const meta = Object.fromEntries(Object.entries(info).filter(([key]) => !CONSOLE_OMITTED.has(key)));
  const suffix = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(info.timestamp)} ${info.level}: ${String(info.message)}${suffix}`;
}

export function createLogger({ level, directory }: LoggingConfig): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(formatConsoleLine),
      ),
    }),
  ];

  // kept apart from the logbook, which only ever holds flight rows
  if (directory) {
    fs.mkdirSync(directory, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(directory, 'error.log'),
        level: 'error',
      }),
      new winston.transports.File({
        filename: path.join(directory, 'sim-logbook.log'),
      }),
    );
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: 'sim-logbook' },
    transports,
  });
}

const logger = createLogger(config.logging);

export default logger;
