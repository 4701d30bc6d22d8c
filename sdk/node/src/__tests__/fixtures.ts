/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Shared test data and client wiring.
 */

import { MockAdapter } from '../adapters/mock';
import type { SDKRequest } from '../adapters/base';
import { PluggyClient, type PluggyClientOptions } from '../client';
import { createLogger } from '../logger';
import { AUTH_PATH } from '../service';

export const silentLogger = createLogger({ level: 'silent' });

export function connectorJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 201,
    name: 'Test Bank',
    institutionUrl: 'https://bank.example.com',
    imageUrl: null,
    primaryColor: '00aaff',
    type: 'PERSONAL_BANK',
    country: 'BR',
    credentials: [
      { label: 'User', name: 'user', type: 'text' },
      { label: 'Password', name: 'password', type: 'password' },
    ],
    hasMFA: false,
    ...overrides,
  };
}

export function itemJson(status: string, overrides: Record<string, unknown> = {}) {
  return {
    id: 'item-1',
    connector: connectorJson(),
    status,
    error: null,
    createdAt: '2026-01-10T10:00:00.000Z',
    updatedAt: '2026-01-10T10:00:05.000Z',
    ...overrides,
  };
}

export function transactionJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'tx-1',
    accountId: 'acc-1',
    description: 'Coffee shop',
    currencyCode: 'BRL',
    amount: -12.5,
    date: '2026-01-05T00:00:00.000Z',
    category: 'Food and drinks',
    ...overrides,
  };
}

export function bankAccountJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'acc-1',
    itemId: 'item-1',
    name: 'Checking',
    number: '0001/12345-0',
    balance: 1500.5,
    currencyCode: 'BRL',
    accountType: 'BANK',
    accountSubtype: 'CHECKINGS_ACCOUNT',
    bankData: { transferNumber: '0001/12345-0', closingBalance: 1500.5 },
    transactions: [transactionJson()],
    ...overrides,
  };
}

export function creditAccountJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'acc-2',
    itemId: 'item-1',
    name: 'Card',
    number: '1234',
    balance: -320,
    currencyCode: 'BRL',
    accountType: 'CREDIT',
    accountSubtype: 'CREDIT_CARD',
    creditData: {
      level: 'GOLD',
      brand: 'VISA',
      balanceDueDate: '2026-02-10T00:00:00.000Z',
      availableCreditLimit: 4680,
      minimumPayment: 32,
    },
    ...overrides,
  };
}

export function investmentJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'inv-1',
    itemId: 'item-1',
    name: 'Fixed income fund',
    currencyCode: 'BRL',
    type: 'MUTUAL_FUND',
    balance: 1000,
    ...overrides,
  };
}

export function categoryJson(overrides: Record<string, unknown> = {}) {
  return {
    id: '01000000',
    description: 'Income',
    parentId: null,
    ...overrides,
  };
}

export function webhookJson(overrides: Record<string, unknown> = {}) {
  return {
    id: 'wh-1',
    url: 'https://hooks.example.com/pluggy',
    event: 'item/updated',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function page<T>(results: T[]) {
  return { results, total: results.length, page: 1, totalPages: 1 };
}

export const fieldErrorBody = {
  code: 400,
  message: 'There were errors in the request',
  errors: [{ code: '001', message: 'user is required', parameter: 'user' }],
};

/** Client over a MockAdapter that already answers the credential exchange. */
export function createTestClient(options: Partial<PluggyClientOptions> = {}) {
  const adapter = new MockAdapter().mock('POST', AUTH_PATH, {
    statusCode: 200,
    body: { apiKey: 'test-api-key' },
  });
  const client = new PluggyClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    adapter,
    logger: silentLogger,
    ...options,
  });
  return { client, adapter };
}

/** Requests other than the credential exchange. */
export function resourceRequests(adapter: MockAdapter): SDKRequest[] {
  return adapter.sentRequests.filter((r) => r.path !== AUTH_PATH);
}

export function lastRequest(adapter: MockAdapter): SDKRequest | undefined {
  return adapter.sentRequests.at(-1);
}
