/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 */

import { z } from 'zod';
import { tolerantEnum } from './tolerant-enum';

export const INVESTMENT_TYPES = ['MUTUAL_FUND', 'SECURITY', 'EQUITY', 'COE', 'FIXED_INCOME', 'ETF', 'OTHER'] as const;
export type InvestmentType = (typeof INVESTMENT_TYPES)[number];

export const InvestmentSchema = z.object({
  id: z.string(),
  itemId: z.string(),
  name: z.string(),
  code: z.string().nullish(),
  number: z.string().nullish(),
  owner: z.string().nullish(),
  currencyCode: z.string(),
  type: tolerantEnum(INVESTMENT_TYPES),
  subtype: z.string().nullish(),
  balance: z.number(),
  amount: z.number().nullish(),
  value: z.number().nullish(),
  quantity: z.number().nullish(),
  date: z.coerce.date().nullish(),
  dueDate: z.coerce.date().nullish(),
  annualRate: z.number().nullish(),
  lastMonthRate: z.number().nullish(),
  lastTwelveMonthsRate: z.number().nullish(),
});

export type Investment = z.infer<typeof InvestmentSchema>;
