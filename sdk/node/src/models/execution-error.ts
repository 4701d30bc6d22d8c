/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Failure detail attached to an item whose connection attempt did not succeed.
 */

import { z } from 'zod';

export const ExecutionErrorCode = {
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  INVALID_CREDENTIALS_MFA: 'INVALID_CREDENTIALS_MFA',
  ACCOUNT_CREDENTIALS_RESET: 'ACCOUNT_CREDENTIALS_RESET',
  ALREADY_LOGGED_IN: 'ALREADY_LOGGED_IN',
  ACCOUNT_LOCKED: 'ACCOUNT_LOCKED',
  SITE_NOT_AVAILABLE: 'SITE_NOT_AVAILABLE',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
  ACCOUNT_NEEDS_ACTION: 'ACCOUNT_NEEDS_ACTION',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  USER_AUTHORIZATION_PENDING: 'USER_AUTHORIZATION_PENDING',
  USER_AUTHORIZATION_NOT_GRANTED: 'USER_AUTHORIZATION_NOT_GRANTED',
  USER_INPUT_TIMEOUT: 'USER_INPUT_TIMEOUT',
} as const;

export type ExecutionErrorCode = (typeof ExecutionErrorCode)[keyof typeof ExecutionErrorCode];

export const ExecutionErrorSchema = z.object({
  // Kept open: the service adds codes faster than clients ship.
  code: z.string(),
  message: z.string(),
  /** Exact message returned by the institution, if it gave one. */
  providerMessage: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
  /** Unstructured, institution-specific context. */
  attributes: z.record(z.unknown()).nullish(),
});

export type ExecutionError = z.infer<typeof ExecutionErrorSchema>;
