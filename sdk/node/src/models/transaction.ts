/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 */

import { z } from 'zod';
import { tolerantEnum } from './tolerant-enum';

export const TRANSACTION_STATUSES = ['PENDING', 'POSTED'] as const;
export const TRANSACTION_TYPES = ['DEBIT', 'CREDIT'] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const TransactionSchema = z.object({
  id: z.string(),
  accountId: z.string(),
  description: z.string(),
  descriptionRaw: z.string().nullish(),
  currencyCode: z.string(),
  amount: z.number(),
  date: z.coerce.date(),
  balance: z.number().nullish(),
  category: z.string().nullish(),
  providerCode: z.string().nullish(),
  status: tolerantEnum(TRANSACTION_STATUSES).nullish(),
  type: tolerantEnum(TRANSACTION_TYPES).nullish(),
});

export type Transaction = z.infer<typeof TransactionSchema>;

export interface TransactionParameters {
  /** Inclusive lower bound on the transaction date. */
  from?: Date | string;
  to?: Date | string;
  pageSize?: number;
  page?: number;
}
