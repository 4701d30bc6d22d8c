/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Item Operations.
 */

import { withValidationErrors } from './errors';
import { ItemSchema, type Item, type ItemParameters, type ItemUpdateParameters } from './models/item';
import { pollUntilFinished, type PollOptions } from './polling';
import type { ApiService } from './service';

const URL_ITEMS = '/items';

export class ItemOperations {
  constructor(
    private readonly service: ApiService,
    private readonly defaults: { pollIntervalMs: number },
  ) {}

  /** Start a connection attempt. The returned item is usually still in progress. */
  async create(params: ItemParameters): Promise<Item> {
    const body: Record<string, unknown> = {
      connectorId: params.connectorId,
      parameters: params.parameters,
    };
    if (params.webhookUrl) body.webhookUrl = params.webhookUrl;
    return withValidationErrors(() => this.service.post(URL_ITEMS, ItemSchema, { body }));
  }

  /**
   * Create an item and poll it until the connection attempt finishes.
   *
   * Resolves with the finished item whether it succeeded or not; inspect
   * `status` and `error`. Rejects with `ItemPollingError` on timeout or abort.
   */
  async executeAndWait(params: ItemParameters, options: PollOptions = {}): Promise<Item> {
    return withValidationErrors(async () => {
      const created = await this.create(params);
      this.service.logger.debug({ itemId: created.id, status: created.status }, 'item created, waiting');
      return pollUntilFinished(created, (id) => this.get(id), this.service, {
        ...options,
        pollIntervalMs: options.pollIntervalMs ?? this.defaults.pollIntervalMs,
      });
    });
  }

  async get(id: string): Promise<Item> {
    return this.service.get(`${URL_ITEMS}/{id}`, ItemSchema, { segment: id });
  }

  /** Send new credentials or a new webhook URL for an existing item. */
  async update(params: ItemUpdateParameters): Promise<Item> {
    const body: Record<string, unknown> = { id: params.id };
    if (params.parameters) body.parameters = params.parameters;
    if (params.webhookUrl) body.webhookUrl = params.webhookUrl;
    return withValidationErrors(() => this.service.patch(URL_ITEMS, ItemSchema, { body }));
  }

  async delete(id: string): Promise<void> {
    await this.service.delete(`${URL_ITEMS}/{id}`, { segment: id });
  }
}
