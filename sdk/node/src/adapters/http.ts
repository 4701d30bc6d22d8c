/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * HTTP/REST transport adapter (default).
 */

import { ApiError, PluggyError } from '../errors';
import { BaseAdapter, type SDKRequest, type SDKResponse } from './base';

export type FetchFn = typeof fetch;

export class HttpAdapter extends BaseAdapter {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchFn;
  private connected = false;

  constructor(options: {
    baseUrl: string;
    timeout?: number;
    fetchFn?: FetchFn;
  }) {
    super();
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30_000;
    this.fetchFn = options.fetchFn ?? fetch;
    this.connected = true;
  }

  /** Absolute URL for a request, query string included. */
  buildUrl(request: Pick<SDKRequest, 'path' | 'query'>): URL {
    const url = new URL(`${this.baseUrl}${request.path}`);
    if (request.query) {
      for (const [k, v] of Object.entries(request.query)) {
        url.searchParams.set(k, v);
      }
    }
    return url;
  }

  async send(request: SDKRequest): Promise<SDKResponse> {
    if (!this.connected) {
      throw new PluggyError('HttpAdapter is closed');
    }

    const url = this.buildUrl(request);
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    const hasBody = request.body !== undefined;
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    const start = performance.now();

    let resp: Response;
    try {
      resp = await this.fetchFn(url.toString(), {
        method: request.method,
        headers,
        body: hasBody ? JSON.stringify(request.body) : undefined,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ApiError(`${request.method} ${request.path} failed: ${reason}`, { statusCode: null }, { cause: e });
    }

    // The timeout signal also covers the body stream.
    let text: string;
    try {
      text = await resp.text();
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ApiError(
        `${request.method} ${request.path} failed while reading the response: ${reason}`,
        { statusCode: resp.status },
        { cause: e },
      );
    }
    const elapsed = performance.now() - start;

    return {
      statusCode: resp.status,
      headers: Object.fromEntries(resp.headers.entries()),
      body: parseBody(text, resp.headers.get('content-type')),
      elapsedMs: Math.round(elapsed * 100) / 100,
    };
  }

  close(): void {
    this.connected = false;
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

function parseBody(text: string, contentType: string | null): unknown {
  if (text === '') return null;
  if (!contentType?.includes('json')) return text;
  try {
    return JSON.parse(text);
  } catch {
    // Mislabelled payload; callers see the raw text and decide.
    return text;
  }
}
