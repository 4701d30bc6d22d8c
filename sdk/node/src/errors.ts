/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK error taxonomy and validation-error normalization.
 */

import type { ApiErrorBody, ApiFieldError } from './models/api-error';
import type { Item } from './models/item';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export class PluggyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SDKConfigurationError extends PluggyError {}

// ---------------------------------------------------------------------------
// Transport / API
// ---------------------------------------------------------------------------

/**
 * A request that did not produce a usable 2xx response.
 *
 * `statusCode` is null when no response was received at all (DNS, refused
 * connection, timeout). `apiError` is set when the body matched the API's
 * structured error shape; `body` always holds whatever was received.
 */
export class ApiError extends PluggyError {
  readonly statusCode: number | null;
  readonly body: unknown;
  readonly apiError: ApiErrorBody | null;

  constructor(
    message: string,
    details: { statusCode: number | null; body?: unknown; apiError?: ApiErrorBody | null },
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.statusCode = details.statusCode;
    this.body = details.body ?? null;
    this.apiError = details.apiError ?? null;
  }
}

/** The service rejected the request's input and said which fields were wrong. */
export class ValidationError extends ApiError {
  declare readonly statusCode: number;
  readonly errors: ApiFieldError[];

  constructor(statusCode: number, apiError: ApiErrorBody & { errors: ApiFieldError[] }, options?: ErrorOptions) {
    super(apiError.message, { statusCode, body: apiError, apiError }, options);
    this.errors = apiError.errors;
  }
}

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

export type PollingStopReason = 'timeout' | 'aborted';

export class ItemPollingError extends PluggyError {
  readonly reason: PollingStopReason;
  /** Last state observed before polling stopped. */
  readonly item: Item;

  constructor(reason: PollingStopReason, item: Item, options?: ErrorOptions) {
    super(
      reason === 'timeout'
        ? `Item ${item.id} did not finish in time (last status ${item.status})`
        : `Polling of item ${item.id} was aborted (last status ${item.status})`,
      options,
    );
    this.reason = reason;
    this.item = item;
  }
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Promote an ApiError carrying field-level errors to a ValidationError.
 * Anything else comes back untouched.
 */
export function toValidationError(error: unknown): unknown {
  if (
    error instanceof ApiError &&
    !(error instanceof ValidationError) &&
    error.statusCode !== null &&
    error.apiError?.errors !== undefined &&
    error.apiError.errors.length > 0
  ) {
    return new ValidationError(
      error.statusCode,
      { ...error.apiError, errors: error.apiError.errors },
      { cause: error },
    );
  }
  return error;
}

/** Run a mutating call, surfacing rejected input as ValidationError. */
export async function withValidationErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (e) {
    throw toValidationError(e);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
