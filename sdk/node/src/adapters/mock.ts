/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Mock transport adapter for testing.
 */

import { BaseAdapter, type SDKRequest, type SDKResponse } from './base';

export type MockResponse = Pick<SDKResponse, 'statusCode' | 'body'> & Partial<SDKResponse>;

export class MockAdapter extends BaseAdapter {
  private readonly responses = new Map<string, SDKResponse[]>();
  private readonly sent: SDKRequest[] = [];

  /**
   * Queue a mocked response keyed by `METHOD /path` (no query string).
   * Queued responses are served in order; the last one keeps answering.
   */
  mock(method: string, path: string, response: MockResponse): this {
    const key = `${method.toUpperCase()} ${path}`;
    const queue = this.responses.get(key) ?? [];
    queue.push({ headers: {}, elapsedMs: 0, ...response });
    this.responses.set(key, queue);
    return this;
  }

  async send(request: SDKRequest): Promise<SDKResponse> {
    this.sent.push(request);
    const key = `${request.method.toUpperCase()} ${request.path}`;
    const queue = this.responses.get(key);
    if (queue && queue.length > 0) {
      return queue.length > 1 ? queue.shift() ?? queue[0] : queue[0];
    }
    return {
      statusCode: 404,
      headers: {},
      body: { code: 404, message: `${key} is not mocked` },
      elapsedMs: 0,
    };
  }

  close(): void {
    this.responses.clear();
    this.sent.length = 0;
  }

  get isConnected(): boolean {
    return true;
  }

  /** All requests that have been sent through this adapter. */
  get sentRequests(): SDKRequest[] {
    return [...this.sent];
  }
}
