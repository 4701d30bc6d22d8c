/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Request pipeline shared by every resource operation:
 * path/query building, authentication, hooks, logging, error mapping
 * and response deserialization.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { BaseAdapter, HttpMethod, SDKRequest, SDKResponse } from './adapters/base';
import { TokenProvider } from './auth';
import { ApiError, toError } from './errors';
import type { HookRegistry } from './hooks';
import { ApiErrorBodySchema } from './models/api-error';
import { applySegment, buildQuery, type QueryParams } from './path';

export const AUTH_PATH = '/auth';

const AuthResponseSchema = z.object({ apiKey: z.string().min(1) });

export interface RequestOptions {
  /** Value for the `{id}` placeholder of the path template. */
  segment?: string | number;
  body?: unknown;
  query?: QueryParams;
}

export interface Credentials {
  clientId: string;
  clientSecret: string;
}

/** Map a non-2xx response to an ApiError, keeping the structured body when there is one. */
export function apiErrorFromResponse(res: SDKResponse, request: Pick<SDKRequest, 'method' | 'path'>): ApiError {
  const parsed = ApiErrorBodySchema.safeParse(res.body);
  const apiError = parsed.success ? parsed.data : null;
  const message = apiError?.message ?? `${request.method} ${request.path} failed with status ${res.statusCode}`;
  return new ApiError(message, { statusCode: res.statusCode, body: res.body, apiError });
}

function isSuccess(res: SDKResponse): boolean {
  return res.statusCode >= 200 && res.statusCode < 300;
}

export class ApiService {
  readonly hooks: HookRegistry;
  readonly logger: Logger;
  private readonly adapter: BaseAdapter;
  private readonly credentials: Credentials;
  private readonly tokens: TokenProvider;

  constructor(options: {
    adapter: BaseAdapter;
    hooks: HookRegistry;
    logger: Logger;
    credentials: Credentials;
  }) {
    this.adapter = options.adapter;
    this.hooks = options.hooks;
    this.logger = options.logger;
    this.credentials = options.credentials;
    this.tokens = new TokenProvider(() => this.exchangeToken());
  }

  // -- Verbs ---------------------------------------------------------------

  get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: RequestOptions): Promise<T> {
    return this.request('GET', path, schema, options);
  }

  post<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: RequestOptions): Promise<T> {
    return this.request('POST', path, schema, options);
  }

  patch<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: RequestOptions): Promise<T> {
    return this.request('PATCH', path, schema, options);
  }

  /** Whatever the service answers to a successful delete is discarded. */
  async delete(path: string, options?: RequestOptions): Promise<void> {
    await this.execute('DELETE', path, options ?? {});
  }

  async request<T>(
    method: HttpMethod,
    template: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const { request, response } = await this.execute(method, template, options);
    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw this.fail(
        new ApiError(
          `${request.method} ${request.path} returned an unexpected body`,
          { statusCode: response.statusCode, body: response.body },
          { cause: parsed.error },
        ),
      );
    }
    return parsed.data;
  }

  // -- Pipeline ------------------------------------------------------------

  private async execute(
    method: HttpMethod,
    template: string,
    options: RequestOptions,
  ): Promise<{ request: SDKRequest; response: SDKResponse }> {
    const path = options.segment === undefined ? template : applySegment(template, options.segment);
    const query = buildQuery(options.query);
    const build = (token: string): SDKRequest => ({
      method,
      path,
      headers: { Authorization: `Bearer ${token}` },
      body: options.body,
      query,
    });

    let token = await this.tokens.getToken();
    let request = build(token);
    let response = await this.dispatch(request);

    if (response.statusCode === 401) {
      // One re-authentication per request; a second 401 is the caller's problem.
      this.logger.info({ method, path }, 'access token rejected, re-authenticating');
      this.tokens.invalidate(token);
      token = await this.tokens.getToken();
      request = build(token);
      response = await this.dispatch(request);
    }

    if (!isSuccess(response)) {
      throw this.fail(apiErrorFromResponse(response, request));
    }
    return { request, response };
  }

  private async dispatch(request: SDKRequest): Promise<SDKResponse> {
    const prepared = await this.hooks.fireBeforeRequest(request);
    let response: SDKResponse;
    try {
      response = await this.adapter.send(prepared);
    } catch (e) {
      throw this.fail(toError(e), prepared);
    }
    this.hooks.fireAfterResponse(response, prepared);
    this.logger.debug(
      { method: prepared.method, path: prepared.path, statusCode: response.statusCode, elapsedMs: response.elapsedMs },
      'request completed',
    );
    return response;
  }

  private async exchangeToken(): Promise<string> {
    this.logger.debug('requesting access token');
    const request: SDKRequest = {
      method: 'POST',
      path: AUTH_PATH,
      headers: {},
      body: { clientId: this.credentials.clientId, clientSecret: this.credentials.clientSecret },
    };
    const response = await this.dispatch(request);
    if (!isSuccess(response)) {
      throw this.fail(apiErrorFromResponse(response, request));
    }

    const parsed = AuthResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw this.fail(
        new ApiError('Authentication response did not include an apiKey', { statusCode: response.statusCode }, { cause: parsed.error }),
      );
    }
    this.logger.info('access token obtained');
    return parsed.data.apiKey;
  }

  private fail<E extends Error>(error: E, request?: Pick<SDKRequest, 'method' | 'path'>): E {
    this.hooks.fireError(error);
    this.logger.warn({ err: error, method: request?.method, path: request?.path }, 'request failed');
    return error;
  }
}
