/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Account Operations.
 */

import { AccountSchema, type Account, type AccountType } from './models/account';
import { pageResultsSchema, type PageResults } from './models/page';
import type { ApiService } from './service';

const URL_ACCOUNTS = '/accounts';
const AccountPageSchema = pageResultsSchema(AccountSchema);

export class AccountOperations {
  constructor(private readonly service: ApiService) {}

  /** Accounts of an item, optionally only one type. */
  async list(itemId: string, type?: AccountType | null): Promise<PageResults<Account>> {
    return this.service.get(URL_ACCOUNTS, AccountPageSchema, { query: { itemId, type } });
  }

  async get(id: string): Promise<Account> {
    return this.service.get(`${URL_ACCOUNTS}/{id}`, AccountSchema, { segment: id });
  }
}
