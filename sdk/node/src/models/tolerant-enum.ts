/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 */

import { z } from 'zod';

/** One of the known values, or a string the client has not been taught yet. */
export type Tolerant<T extends string> = T | (string & {});

/**
 * Schema for an upstream enum. Unknown values still parse so that one new
 * value does not reject a whole page; `values` only drives editor completion.
 */
export function tolerantEnum<T extends string>(_values: readonly T[]) {
  return z.custom<Tolerant<T>>((value) => typeof value === 'string');
}
