/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Structured error body returned by the API on non-2xx responses.
 */

import { z } from 'zod';

export const ApiFieldErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  parameter: z.string(),
});

export const ApiErrorBodySchema = z.object({
  code: z.number().int().optional(),
  message: z.string(),
  errors: z.array(ApiFieldErrorSchema).optional(),
});

export type ApiFieldError = z.infer<typeof ApiFieldErrorSchema>;
export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
