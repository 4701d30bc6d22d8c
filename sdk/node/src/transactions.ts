/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Transaction Operations.
 */

import { pageResultsSchema, type PageResults } from './models/page';
import { TransactionSchema, type Transaction, type TransactionParameters } from './models/transaction';
import type { ApiService } from './service';

const URL_TRANSACTIONS = '/transactions';
const TransactionPageSchema = pageResultsSchema(TransactionSchema);

export class TransactionOperations {
  constructor(private readonly service: ApiService) {}

  async list(accountId: string, params?: TransactionParameters): Promise<PageResults<Transaction>> {
    return this.service.get(URL_TRANSACTIONS, TransactionPageSchema, {
      query: {
        accountId,
        from: params?.from,
        to: params?.to,
        pageSize: params?.pageSize,
        page: params?.page,
      },
    });
  }

  async get(id: string): Promise<Transaction> {
    return this.service.get(`${URL_TRANSACTIONS}/{id}`, TransactionSchema, { segment: id });
  }
}
