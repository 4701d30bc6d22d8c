/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Environment-driven client configuration.
 */

import { z } from 'zod';
import { SDKConfigurationError } from './errors';

export const DEFAULT_BASE_URL = 'https://api.pluggy.ai';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const STATUS_POLL_INTERVAL_MS = 3_000;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** `LOG_LEVEL` as a pino level; unset or empty means `warn`. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = z.enum(LOG_LEVELS).safeParse(value || 'warn');
  if (!parsed.success) {
    throw new SDKConfigurationError(`Invalid client configuration: LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return parsed.data;
}

const EnvSchema = z.object({
  PLUGGY_CLIENT_ID: z.string().trim().min(1, 'PLUGGY_CLIENT_ID is required'),
  PLUGGY_CLIENT_SECRET: z.string().trim().min(1, 'PLUGGY_CLIENT_SECRET is required'),
  PLUGGY_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  PLUGGY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  PLUGGY_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(STATUS_POLL_INTERVAL_MS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface ClientConfig {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  timeoutMs: number;
  pollIntervalMs: number;
  logLevel: LogLevel;
}

/** Read and validate client settings from the environment. */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  // Treat `FOO=` like an unset variable so defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SDKConfigurationError(`Invalid client configuration: ${problems.join('; ')}`);
  }

  const cfg = parsed.data;
  return {
    clientId: cfg.PLUGGY_CLIENT_ID,
    clientSecret: cfg.PLUGGY_CLIENT_SECRET,
    baseUrl: cfg.PLUGGY_BASE_URL,
    timeoutMs: cfg.PLUGGY_TIMEOUT_MS,
    pollIntervalMs: cfg.PLUGGY_POLL_INTERVAL_MS,
    logLevel: cfg.LOG_LEVEL,
  };
}
