/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * pluggy-client — public API surface.
 */

export const VERSION = '0.1.0';

// Client
export { PluggyClient, PluggyBuilder } from './client';
export type { PluggyClientOptions } from './client';

// Operations
export { ConnectorOperations } from './connectors';
export { ItemOperations } from './items';
export { AccountOperations } from './accounts';
export { TransactionOperations } from './transactions';
export { InvestmentOperations } from './investments';
export { CategoryOperations } from './categories';
export { WebhookOperations } from './webhooks';

// Errors
export {
  PluggyError,
  SDKConfigurationError,
  ApiError,
  ValidationError,
  ItemPollingError,
  toValidationError,
  withValidationErrors,
} from './errors';
export type { PollingStopReason } from './errors';

// Models
export * from './models';

// Infrastructure
export { ApiService, AUTH_PATH, apiErrorFromResponse } from './service';
export type { Credentials, RequestOptions } from './service';
export { TokenProvider } from './auth';
export { HookRegistry } from './hooks';
export type {
  InitializeCallback,
  BeforeRequestCallback,
  AfterResponseCallback,
  ErrorCallback,
  ItemPollCallback,
} from './hooks';
export type { PluggyExtension } from './extensions';
export { pollUntilFinished, sleep } from './polling';
export type { PollOptions } from './polling';
export { applySegment, buildQuery, formatDate } from './path';
export type { QueryParams, QueryValue } from './path';
export { loadClientConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, STATUS_POLL_INTERVAL_MS } from './config';
export type { ClientConfig } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';

// Adapters
export { BaseAdapter, HttpAdapter, MockAdapter } from './adapters';
export type { HttpMethod, SDKRequest, SDKResponse, FetchFn, MockResponse } from './adapters';
