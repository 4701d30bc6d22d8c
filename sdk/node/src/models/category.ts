/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 */

import { z } from 'zod';

// parentId is a plain reference; the client does not enforce a tree.
export const CategorySchema = z.object({
  id: z.string(),
  description: z.string(),
  parentId: z.string().nullish(),
  parentDescription: z.string().nullish(),
});

export type Category = z.infer<typeof CategorySchema>;
