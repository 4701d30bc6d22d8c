/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Institution / integration definitions.
 */

import { z } from 'zod';
import { tolerantEnum } from './tolerant-enum';

export const CONNECTOR_TYPES = [
  'PERSONAL_BANK',
  'BUSINESS_BANK',
  'INVOICE',
  'INVESTMENT',
  'TELECOMMUNICATION',
  'DIGITAL_ECONOMY',
  'PAYMENT_ACCOUNT',
  'OTHER',
] as const;

export type ConnectorType = (typeof CONNECTOR_TYPES)[number];

export const ConnectorCredentialSchema = z.object({
  label: z.string(),
  name: z.string(),
  type: z.string().nullish(),
  placeholder: z.string().nullish(),
  validation: z.string().nullish(),
  validationMessage: z.string().nullish(),
  optional: z.boolean().nullish(),
  mfa: z.boolean().nullish(),
});

export const ConnectorSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  institutionUrl: z.string().nullish(),
  imageUrl: z.string().nullish(),
  primaryColor: z.string().nullish(),
  type: tolerantEnum(CONNECTOR_TYPES),
  country: z.string(),
  credentials: z.array(ConnectorCredentialSchema).default([]),
  hasMFA: z.boolean().default(false),
  products: z.array(z.string()).nullish(),
  createdAt: z.coerce.date().nullish(),
});

export type ConnectorCredential = z.infer<typeof ConnectorCredentialSchema>;
export type Connector = z.infer<typeof ConnectorSchema>;

/** Filters for listing connectors. */
export interface ConnectorParameters {
  name?: string;
  countries?: string[];
  types?: ConnectorType[];
  sandbox?: boolean;
}
