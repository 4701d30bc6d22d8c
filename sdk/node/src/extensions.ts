/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Client plugins.
 */

import type { HookRegistry } from './hooks';

/**
 * A plugin for `PluggyClient`: tag outgoing requests, export timings, or
 * report progress while `items.executeAndWait` polls.
 *
 * ```ts
 * const progress: PluggyExtension = {
 *   name: 'progress',
 *   version: '1.0.0',
 *   install(hooks) {
 *     hooks.onItemPoll((item, attempt) => console.log(`#${attempt} ${item.status}`));
 *   },
 * };
 * client.use(progress);
 * ```
 */
export interface PluggyExtension {
  readonly name: string;
  readonly version: string;
  /** Runs once, from `client.use()` or `PluggyBuilder.build()`. Hooks cannot be removed later. */
  install(hooks: HookRegistry): void;
}
