/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * URL path templating and query-string building.
 */

import { SDKConfigurationError } from './errors';

export const SEGMENT_PLACEHOLDER = '{id}';

export type QueryValue = string | number | boolean | Date | readonly string[];
export type QueryParams = Record<string, QueryValue | null | undefined>;

/**
 * Substitute `value` for the `{id}` placeholder of `template`, once.
 * The value is URI-encoded, so an identifier that looks like a placeholder
 * cannot leave template syntax behind.
 */
export function applySegment(template: string, value: string | number): string {
  const at = template.indexOf(SEGMENT_PLACEHOLDER);
  if (at === -1) {
    throw new SDKConfigurationError(`Path template "${template}" has no ${SEGMENT_PLACEHOLDER} placeholder`);
  }
  return (
    template.slice(0, at) +
    encodeURIComponent(String(value)) +
    template.slice(at + SEGMENT_PLACEHOLDER.length)
  );
}

/** `YYYY-MM-DD` in UTC. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Turn optional filters into wire query parameters.
 * Absent values are skipped outright, never stringified.
 */
export function buildQuery(params?: QueryParams): Record<string, string> {
  const query: Record<string, string> = {};
  if (!params) return query;

  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;

    let serialized: string;
    if (value instanceof Date) {
      serialized = formatDate(value);
    } else if (typeof value === 'string') {
      serialized = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      serialized = String(value);
    } else {
      serialized = value.join(',');
    }

    if (serialized === '') continue;
    query[key] = serialized;
  }
  return query;
}
