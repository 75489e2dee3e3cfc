/**
 * @cloudctl/logger - Structured Logging with Winston
 *
 * The dashboard owns the terminal while it runs, so its logs go to a file;
 * one-shot commands log to the console.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { createLogger as createWinstonLogger, format, transports, type Logger } from 'winston';
import type TransportStream from 'winston-transport';
import { maskSensitiveData } from './sanitizer.js';

export { maskSensitiveData, SENSITIVE_KEYS } from './sanitizer.js';

/** The subset of a logger that library code depends on. */
export interface LoggerLike {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: string;
  /** Write JSON lines to this file instead of the console. */
  file?: string;
  service?: string;
  /** Extra transports, replacing the default console/file one. */
  transports?: TransportStream[];
}

export function defaultLogFile(): string {
  return process.env.CLOUDCTL_LOG_FILE || join(homedir(), '.cloudctl', 'dashboard.log');
}

// ============================================================================
// Custom Formats
// ============================================================================

// masks the metadata as one record so top-level keys are checked too
const maskFormat = format((info) => {
  const meta: Record<string, unknown> = {};
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    meta[key] = info[key];
  }
  const masked = maskSensitiveData(meta);
  if (masked && typeof masked === 'object') {
    Object.assign(info, masked);
  }
  return info;
});

const consoleFormat = format.combine(
  format.timestamp({ format: 'HH:mm:ss' }),
  maskFormat(),
  format.colorize(),
  format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  }),
);

const jsonFormat = format.combine(format.timestamp(), maskFormat(), format.json());

// ============================================================================
// Factory
// ============================================================================

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info';

  const targets: TransportStream[] =
    options.transports ??
    (options.file
      ? [new transports.File({ filename: options.file, format: jsonFormat })]
      : [new transports.Console({ format: consoleFormat, stderrLevels: ['error', 'warn'] })]);

  return createWinstonLogger({
    level,
    format: jsonFormat,
    defaultMeta: { service: options.service || 'cloudctl' },
    transports: targets,
  });
}
