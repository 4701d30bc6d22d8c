/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Webhook Operations.
 */

import { withValidationErrors } from './errors';
import { pageResultsSchema, type PageResults } from './models/page';
import { WebhookSchema, type Webhook, type WebhookEvent } from './models/webhook';
import type { ApiService } from './service';

const URL_WEBHOOKS = '/webhooks';
const WebhookPageSchema = pageResultsSchema(WebhookSchema);

export class WebhookOperations {
  constructor(private readonly service: ApiService) {}

  async list(): Promise<PageResults<Webhook>> {
    return this.service.get(URL_WEBHOOKS, WebhookPageSchema);
  }

  async get(id: string): Promise<Webhook> {
    return this.service.get(`${URL_WEBHOOKS}/{id}`, WebhookSchema, { segment: id });
  }

  async create(url: string, event: WebhookEvent): Promise<Webhook> {
    return withValidationErrors(() =>
      this.service.post(URL_WEBHOOKS, WebhookSchema, { body: { url, event } }),
    );
  }

  async update(id: string, url: string, event: WebhookEvent): Promise<Webhook> {
    return withValidationErrors(() =>
      this.service.patch(`${URL_WEBHOOKS}/{id}`, WebhookSchema, { segment: id, body: { url, event } }),
    );
  }

  async delete(id: string): Promise<void> {
    await this.service.delete(`${URL_WEBHOOKS}/{id}`, { segment: id });
  }
}
