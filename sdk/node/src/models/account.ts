/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Accounts. BANK and CREDIT accounts carry mutually exclusive payloads,
 * so the model is a union discriminated on `accountType`, with a fallback
 * branch for account types the client does not know.
 */

import { z } from 'zod';
import { TransactionSchema } from './transaction';
import { tolerantEnum } from './tolerant-enum';

export const ACCOUNT_TYPES = ['BANK', 'CREDIT'] as const;
export type AccountType = (typeof ACCOUNT_TYPES)[number];

export const ACCOUNT_SUBTYPES = ['CHECKINGS_ACCOUNT', 'SAVINGS_ACCOUNT', 'CREDIT_CARD'] as const;
export type AccountSubtype = (typeof ACCOUNT_SUBTYPES)[number];

export const BankDataSchema = z.object({
  transferNumber: z.string().nullish(),
  closingBalance: z.number().nullish(),
});

export const CreditDataSchema = z.object({
  level: z.string().nullish(),
  brand: z.string().nullish(),
  balanceCloseDate: z.coerce.date().nullish(),
  balanceDueDate: z.coerce.date().nullish(),
  availableCreditLimit: z.number().nullish(),
  balanceForeignCurrency: z.number().nullish(),
  minimumPayment: z.number().nullish(),
});

const AccountBaseSchema = z.object({
  id: z.string(),
  itemId: z.string(),
  name: z.string(),
  marketingName: z.string().nullish(),
  number: z.string(),
  balance: z.number(),
  owner: z.string().nullish(),
  taxNumber: z.string().nullish(),
  currencyCode: z.string(),
  accountSubtype: tolerantEnum(ACCOUNT_SUBTYPES),
  transactions: z.array(TransactionSchema).default([]),
});

export const BankAccountSchema = AccountBaseSchema.extend({
  accountType: z.literal('BANK'),
  bankData: BankDataSchema.nullish(),
});

export const CreditAccountSchema = AccountBaseSchema.extend({
  accountType: z.literal('CREDIT'),
  creditData: CreditDataSchema.nullish(),
});

const KnownAccountSchema = z.discriminatedUnion('accountType', [BankAccountSchema, CreditAccountSchema]);

const known: ReadonlySet<string> = new Set(ACCOUNT_TYPES);

export const OtherAccountSchema = AccountBaseSchema.extend({
  // Known types must match their own branch, so a malformed BANK row still fails.
  accountType: z.string().refine((type) => !known.has(type), { message: 'Known account type did not match its schema' }),
  bankData: BankDataSchema.nullish(),
  creditData: CreditDataSchema.nullish(),
});

export const AccountSchema = z.union([KnownAccountSchema, OtherAccountSchema]);

export type BankData = z.infer<typeof BankDataSchema>;
export type CreditData = z.infer<typeof CreditDataSchema>;
export type BankAccount = z.infer<typeof BankAccountSchema>;
export type CreditAccount = z.infer<typeof CreditAccountSchema>;
export type OtherAccount = z.infer<typeof OtherAccountSchema>;
export type Account = z.infer<typeof AccountSchema>;

export function isBankAccount(account: Account): account is BankAccount {
  return account.accountType === 'BANK';
}

export function isCreditAccount(account: Account): account is CreditAccount {
  return account.accountType === 'CREDIT';
}
