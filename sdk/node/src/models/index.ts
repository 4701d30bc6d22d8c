/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Data model re-exports.
 */

export * from './api-error';
export * from './page';
export * from './execution-error';
export * from './connector';
export * from './item';
export * from './account';
export * from './transaction';
export * from './investment';
export * from './category';
export * from './webhook';
export * from './tolerant-enum';
