/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Structured logging with credential redaction.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { resolveLogLevel } from './config';

export type { Logger } from 'pino';

const REDACTION_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'req.headers.authorization',
  'req.headers.Authorization',
  'clientSecret',
  'body.clientSecret',
  'req.body.clientSecret',
  'apiKey',
  'body.apiKey',
  'res.body.apiKey',
];

/** Mask bearer tokens that end up inside free-form strings. */
export function redactBearer(value: string): string {
  return value.replace(/Bearer\s+[A-Za-z0-9._~+/=-]+/g, 'Bearer [REDACTED]');
}

function redactRecord(record: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    result[key] = redactStrings(inner);
  }
  return result;
}

function redactStrings(value: unknown): unknown {
  if (typeof value === 'string') return redactBearer(value);
  if (Array.isArray(value)) return value.map(redactStrings);
  if (value !== null && typeof value === 'object' && !(value instanceof Error) && !(value instanceof Date)) {
    return redactRecord(value);
  }
  return value;
}

/**
 * Create the SDK logger.
 *
 * Level comes from `LOG_LEVEL`, default `warn`. An unknown level throws
 * SDKConfigurationError.
 */
export function createLogger(options?: LoggerOptions, destination?: pino.DestinationStream): Logger {
  const settings: LoggerOptions = {
    name: 'pluggy-client',
    level: options?.level ?? resolveLogLevel(process.env.LOG_LEVEL),
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        return redactRecord(object);
      },
    },
    ...options,
  };

  return destination ? pino(settings, destination) : pino(settings);
}
