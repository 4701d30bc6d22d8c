/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Client & Builder.
 */

import type { Logger } from 'pino';
import { BaseAdapter } from './adapters/base';
import { HttpAdapter } from './adapters/http';
import { AccountOperations } from './accounts';
import { CategoryOperations } from './categories';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, STATUS_POLL_INTERVAL_MS, loadClientConfig } from './config';
import { ConnectorOperations } from './connectors';
import { SDKConfigurationError } from './errors';
import type { PluggyExtension } from './extensions';
import { HookRegistry } from './hooks';
import { InvestmentOperations } from './investments';
import { ItemOperations } from './items';
import { createLogger } from './logger';
import { ApiService } from './service';
import { TransactionOperations } from './transactions';
import { WebhookOperations } from './webhooks';

export interface PluggyClientOptions {
  clientId: string;
  clientSecret: string;
  baseUrl?: string;
  /** Transport override, e.g. a MockAdapter in tests. Defaults to HttpAdapter. */
  adapter?: BaseAdapter;
  /** Per-request HTTP timeout for the default adapter. */
  timeoutMs?: number;
  /** Default delay between status fetches in `items.executeAndWait`. */
  pollIntervalMs?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// PluggyClient
// ---------------------------------------------------------------------------

export class PluggyClient {
  readonly hooks: HookRegistry;
  readonly logger: Logger;
  private readonly _adapter: BaseAdapter;
  private readonly _service: ApiService;
  private readonly _pollIntervalMs: number;
  private readonly _extensions: PluggyExtension[] = [];

  private _connectors?: ConnectorOperations;
  private _items?: ItemOperations;
  private _accounts?: AccountOperations;
  private _transactions?: TransactionOperations;
  private _investments?: InvestmentOperations;
  private _categories?: CategoryOperations;
  private _webhooks?: WebhookOperations;

  constructor(options: PluggyClientOptions) {
    if (!options.clientId?.trim() || !options.clientSecret?.trim()) {
      throw new SDKConfigurationError('PluggyClient requires both clientId and clientSecret.');
    }
    const pollIntervalMs = options.pollIntervalMs ?? STATUS_POLL_INTERVAL_MS;
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
      throw new SDKConfigurationError(`pollIntervalMs must be a non-negative number, got ${pollIntervalMs}.`);
    }

    this.logger = options.logger ?? createLogger();
    this.hooks = new HookRegistry(this.logger);
    this._pollIntervalMs = pollIntervalMs;
    this._adapter = options.adapter ?? new HttpAdapter({
      baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    this._service = new ApiService({
      adapter: this._adapter,
      hooks: this.hooks,
      logger: this.logger,
      credentials: { clientId: options.clientId, clientSecret: options.clientSecret },
    });
  }

  /** Build a client from `PLUGGY_*` environment variables. */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides?: Pick<PluggyClientOptions, 'adapter' | 'logger'>): PluggyClient {
    const config = loadClientConfig(env);
    return new PluggyClient({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      pollIntervalMs: config.pollIntervalMs,
      logger: overrides?.logger ?? createLogger({ level: config.logLevel }),
      adapter: overrides?.adapter,
    });
  }

  /** Register an extension plugin. Returns `this` for chaining. */
  use(extension: PluggyExtension): this {
    extension.install(this.hooks);
    this._extensions.push(extension);
    this.logger.debug({ extension: extension.name, version: extension.version }, 'extension installed');
    return this;
  }

  get extensions(): readonly PluggyExtension[] {
    return this._extensions;
  }

  // -- Resource accessors (lazy) -------------------------------------------

  get connectors(): ConnectorOperations {
    if (!this._connectors) this._connectors = new ConnectorOperations(this._service);
    return this._connectors;
  }

  get items(): ItemOperations {
    if (!this._items) this._items = new ItemOperations(this._service, { pollIntervalMs: this._pollIntervalMs });
    return this._items;
  }

  get accounts(): AccountOperations {
    if (!this._accounts) this._accounts = new AccountOperations(this._service);
    return this._accounts;
  }

  get transactions(): TransactionOperations {
    if (!this._transactions) this._transactions = new TransactionOperations(this._service);
    return this._transactions;
  }

  get investments(): InvestmentOperations {
    if (!this._investments) this._investments = new InvestmentOperations(this._service);
    return this._investments;
  }

  get categories(): CategoryOperations {
    if (!this._categories) this._categories = new CategoryOperations(this._service);
    return this._categories;
  }

  get webhooks(): WebhookOperations {
    if (!this._webhooks) this._webhooks = new WebhookOperations(this._service);
    return this._webhooks;
  }

  /** Release all resources. */
  close(): void {
    this._adapter.close();
  }
}

// ---------------------------------------------------------------------------
// PluggyBuilder
// ---------------------------------------------------------------------------

export class PluggyBuilder {
  private _clientId?: string;
  private _clientSecret?: string;
  private _baseUrl = DEFAULT_BASE_URL;
  private _adapter?: BaseAdapter;
  private _logger?: Logger;
  private _pollIntervalMs?: number;
  private _extensions: PluggyExtension[] = [];

  setCredentials(clientId: string, clientSecret: string): this {
    this._clientId = clientId;
    this._clientSecret = clientSecret;
    return this;
  }

  setBaseUrl(url: string): this {
    this._baseUrl = url;
    return this;
  }

  setTransport(adapter: BaseAdapter): this {
    this._adapter = adapter;
    return this;
  }

  setLogger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  setPollInterval(ms: number): this {
    this._pollIntervalMs = ms;
    return this;
  }

  use(extension: PluggyExtension): this {
    this._extensions.push(extension);
    return this;
  }

  build(): PluggyClient {
    if (!this._clientId || !this._clientSecret) {
      throw new SDKConfigurationError('PluggyBuilder.build() requires setCredentials().');
    }

    const client = new PluggyClient({
      clientId: this._clientId,
      clientSecret: this._clientSecret,
      baseUrl: this._baseUrl,
      adapter: this._adapter,
      logger: this._logger,
      pollIntervalMs: this._pollIntervalMs,
    });

    for (const ext of this._extensions) {
      client.use(ext);
    }

    client.hooks.fireInitialize();
    return client;
  }
}
