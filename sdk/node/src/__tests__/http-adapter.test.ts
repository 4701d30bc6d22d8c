import { describe, it, expect, vi } from 'vitest';
import { HttpAdapter, type FetchFn } from '../adapters/http';
import { ApiError, PluggyError } from '../errors';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
  });
}

function adapterWith(fetchFn: FetchFn, baseUrl = 'https://api.example.com') {
  return new HttpAdapter({ baseUrl, fetchFn });
}

describe('HttpAdapter.buildUrl', () => {
  it('joins base URL, path and query', () => {
    const adapter = adapterWith(vi.fn<FetchFn>(), 'https://api.example.com/v1/');
    const url = adapter.buildUrl({ path: '/transactions', query: { accountId: 'acc-1', from: '2026-01-01' } });

    expect(url.toString()).toBe('https://api.example.com/v1/transactions?accountId=acc-1&from=2026-01-01');
  });

  it('keeps an escaped path segment as sent', () => {
    const adapter = adapterWith(vi.fn<FetchFn>());

    expect(adapter.buildUrl({ path: '/items/a%2Fb' }).pathname).toBe('/items/a%2Fb');
  });
});

describe('HttpAdapter.send', () => {
  it('sends JSON bodies with the request headers', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(json({ id: 'item-1' }));
    const adapter = adapterWith(fetchFn);

    const res = await adapter.send({
      method: 'POST',
      path: '/items',
      headers: { Authorization: 'Bearer test-api-key' },
      body: { connectorId: 201 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ id: 'item-1' });
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.example.com/items');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"connectorId":201}');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-api-key',
      'Content-Type': 'application/json',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('omits body and content type on reads', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(json([]));
    const adapter = adapterWith(fetchFn);

    await adapter.send({ method: 'GET', path: '/categories', headers: {} });

    const init = fetchFn.mock.calls[0][1];
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({ Accept: 'application/json' });
  });

  it('returns null for an empty body', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response(null, { status: 204 }));

    const res = await adapterWith(fetchFn).send({ method: 'DELETE', path: '/webhooks/wh-1', headers: {} });

    expect(res.statusCode).toBe(204);
    expect(res.body).toBeNull();
  });

  it('returns non-JSON bodies as text', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      new Response('Bad gateway', { status: 502, headers: { 'Content-Type': 'text/plain' } }),
    );

    const res = await adapterWith(fetchFn).send({ method: 'GET', path: '/items/item-1', headers: {} });

    expect(res.statusCode).toBe(502);
    expect(res.body).toBe('Bad gateway');
  });

  it('falls back to text when a JSON body does not parse', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      new Response('<html>oops</html>', { status: 500, headers: { 'Content-Type': 'application/json' } }),
    );

    const res = await adapterWith(fetchFn).send({ method: 'GET', path: '/items/item-1', headers: {} });

    expect(res.body).toBe('<html>oops</html>');
  });

  it('wraps network failures in an ApiError without a status', async () => {
    const failure = new TypeError('fetch failed');
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(failure);

    const error = await adapterWith(fetchFn)
      .send({ method: 'GET', path: '/connectors', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: null, message: 'GET /connectors failed: fetch failed' });
    expect(error).toHaveProperty('cause', failure);
  });

  it('wraps a failed body read in an ApiError with the response status', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(timeout);
      },
    });
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      new Response(stream, { status: 200, headers: { 'Content-Type': 'application/json' } }),
    );

    const error = await adapterWith(fetchFn)
      .send({ method: 'GET', path: '/accounts', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      statusCode: 200,
      message: 'GET /accounts failed while reading the response: The operation was aborted due to timeout',
    });
    expect(error).toHaveProperty('cause', timeout);
  });

  it('rejects once closed', async () => {
    const fetchFn = vi.fn<FetchFn>();
    const adapter = adapterWith(fetchFn);
    adapter.close();

    expect(adapter.isConnected).toBe(false);
    await expect(adapter.send({ method: 'GET', path: '/connectors', headers: {} })).rejects.toThrow(PluggyError);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
