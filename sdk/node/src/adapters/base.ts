/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Transport Adapter — base class and data structures.
 */

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** Outbound SDK request representation. Path segments are already substituted. */
export interface SDKRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: unknown;
  query?: Record<string, string>;
}

/** Inbound SDK response representation. */
export interface SDKResponse {
  statusCode: number;
  headers: Record<string, string>;
  /** Parsed JSON when the response declared it, raw text otherwise, null when empty. */
  body: unknown;
  elapsedMs: number;
}

/** Abstract base for all transport adapters. */
export abstract class BaseAdapter {
  abstract send(request: SDKRequest): Promise<SDKResponse>;
  abstract close(): void;
  abstract get isConnected(): boolean;
}
