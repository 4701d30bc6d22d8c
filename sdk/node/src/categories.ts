/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Category Operations.
 */

import { CategorySchema, type Category } from './models/category';
import { pageResultsSchema, type PageResults } from './models/page';
import type { ApiService } from './service';

const URL_CATEGORIES = '/categories';
const CategoryPageSchema = pageResultsSchema(CategorySchema);

export class CategoryOperations {
  constructor(private readonly service: ApiService) {}

  /** Top-level categories, or the children of `parentId`. */
  async list(parentId?: string | null): Promise<PageResults<Category>> {
    return this.service.get(URL_CATEGORIES, CategoryPageSchema, { query: { parentId } });
  }

  async get(id: string): Promise<Category> {
    return this.service.get(`${URL_CATEGORIES}/{id}`, CategorySchema, { segment: id });
  }
}
