/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 */

import { z } from 'zod';
import { tolerantEnum } from './tolerant-enum';

export const WEBHOOK_EVENTS = [
  'all',
  'item/created',
  'item/updated',
  'item/error',
  'item/deleted',
  'item/waiting_user_input',
  'item/login_succeeded',
  'connector/status_updated',
] as const;

export type WebhookEvent = (typeof WEBHOOK_EVENTS)[number];

export const WebhookSchema = z.object({
  id: z.string(),
  url: z.string(),
  event: tolerantEnum(WEBHOOK_EVENTS),
  createdAt: z.coerce.date().nullish(),
  updatedAt: z.coerce.date().nullish(),
});

export type Webhook = z.infer<typeof WebhookSchema>;
