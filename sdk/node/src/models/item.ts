/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Items: one end-user connection against a connector.
 */

import { z } from 'zod';
import { ConnectorCredentialSchema, ConnectorSchema } from './connector';
import { ExecutionErrorSchema } from './execution-error';
import { tolerantEnum } from './tolerant-enum';

export const IN_PROGRESS_ITEM_STATUSES = ['CREATING', 'PENDING', 'UPDATING', 'WAITING_USER_INPUT'] as const;
export const FINISHED_ITEM_STATUSES = ['SUCCESS', 'UPDATED', 'ERROR', 'LOGIN_ERROR', 'OUTDATED'] as const;

export type ItemStatus =
  | (typeof IN_PROGRESS_ITEM_STATUSES)[number]
  | (typeof FINISHED_ITEM_STATUSES)[number];

// Polling treats statuses it does not know as in progress.
const ItemStatusSchema = tolerantEnum<ItemStatus>([...IN_PROGRESS_ITEM_STATUSES, ...FINISHED_ITEM_STATUSES]);

export const ItemSchema = z.object({
  id: z.string(),
  connector: ConnectorSchema,
  status: ItemStatusSchema,
  executionStatus: z.string().nullish(),
  error: ExecutionErrorSchema.nullable().default(null),
  /** Credential the institution is asking for while WAITING_USER_INPUT. */
  parameter: ConnectorCredentialSchema.nullish(),
  webhookUrl: z.string().nullish(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  lastUpdatedAt: z.coerce.date().nullish(),
});

export type Item = z.infer<typeof ItemSchema>;

const finished: ReadonlySet<string> = new Set(FINISHED_ITEM_STATUSES);

/** True once the item will make no further progress on its own. */
export function isItemFinished(item: Pick<Item, 'status'>): boolean {
  return finished.has(item.status);
}

export interface ItemParameters {
  connectorId: number;
  /** Credential values keyed by the connector's credential names. */
  parameters: Record<string, string>;
  webhookUrl?: string;
}

export interface ItemUpdateParameters {
  id: string;
  parameters?: Record<string, string>;
  webhookUrl?: string;
}
