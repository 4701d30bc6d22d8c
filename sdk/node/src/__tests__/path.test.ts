import { describe, it, expect } from 'vitest';
import { SDKConfigurationError } from '../errors';
import { applySegment, buildQuery, formatDate } from '../path';

describe('applySegment', () => {
  it('substitutes the identifier into the template', () => {
    expect(applySegment('/items/{id}', 'abc-123')).toBe('/items/abc-123');
    expect(applySegment('/connectors/{id}', 201)).toBe('/connectors/201');
  });

  it('substitutes an identifier that is itself the placeholder exactly once', () => {
    const path = applySegment('/items/{id}', '{id}');
    expect(path).toBe('/items/%7Bid%7D');
    expect(path).not.toContain('{');
  });

  it('encodes characters that would change the path', () => {
    expect(applySegment('/webhooks/{id}', 'a/b?c')).toBe('/webhooks/a%2Fb%3Fc');
    expect(applySegment('/webhooks/{id}', '$&')).toBe('/webhooks/%24%26');
  });

  it('rejects a template without a placeholder', () => {
    expect(() => applySegment('/items', 'abc')).toThrow(SDKConfigurationError);
  });
});

describe('buildQuery', () => {
  it('omits null and undefined values instead of stringifying them', () => {
    expect(buildQuery({ itemId: 'item-1', type: null, parentId: undefined })).toEqual({ itemId: 'item-1' });
  });

  it('omits empty strings and empty arrays', () => {
    expect(buildQuery({ name: '', countries: [] })).toEqual({});
  });

  it('serializes numbers, booleans, dates and arrays', () => {
    expect(
      buildQuery({
        page: 0,
        sandbox: false,
        from: new Date('2026-01-05T23:30:00.000Z'),
        countries: ['BR', 'AR'],
      }),
    ).toEqual({ page: '0', sandbox: 'false', from: '2026-01-05', countries: 'BR,AR' });
  });

  it('passes strings through untouched', () => {
    expect(buildQuery({ to: '2026-02-01' })).toEqual({ to: '2026-02-01' });
  });

  it('returns an empty query without params', () => {
    expect(buildQuery()).toEqual({});
  });
});

describe('formatDate', () => {
  it('formats in UTC', () => {
    expect(formatDate(new Date(Date.UTC(2026, 0, 31, 23, 59)))).toBe('2026-01-31');
  });
});
