/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Paginated list envelope.
 */

import { z } from 'zod';

export interface PageResults<T> {
  results: T[];
  total: number;
  page: number;
  totalPages: number;
}

export function pageResultsSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
    total: z.number().int(),
    page: z.number().int(),
    totalPages: z.number().int(),
  });
}
