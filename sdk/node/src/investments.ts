/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Investment Operations.
 */

import { InvestmentSchema, type Investment, type InvestmentType } from './models/investment';
import { pageResultsSchema, type PageResults } from './models/page';
import type { ApiService } from './service';

const URL_INVESTMENTS = '/investments';
const InvestmentPageSchema = pageResultsSchema(InvestmentSchema);

export class InvestmentOperations {
  constructor(private readonly service: ApiService) {}

  async list(itemId: string, type?: InvestmentType | null): Promise<PageResults<Investment>> {
    return this.service.get(URL_INVESTMENTS, InvestmentPageSchema, { query: { itemId, type } });
  }

  async get(id: string): Promise<Investment> {
    return this.service.get(`${URL_INVESTMENTS}/{id}`, InvestmentSchema, { segment: id });
  }
}
