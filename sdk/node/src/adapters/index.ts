/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Transport Adapters — re-exports.
 */

export { BaseAdapter } from './base';
export type { HttpMethod, SDKRequest, SDKResponse } from './base';
export { HttpAdapter } from './http';
export type { FetchFn } from './http';
export { MockAdapter } from './mock';
export type { MockResponse } from './mock';
