/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * SDK Lifecycle Hook Registry.
 */

import type { Logger } from 'pino';
import type { SDKRequest, SDKResponse } from './adapters/base';
import { toError } from './errors';
import type { Item } from './models/item';

// ---------------------------------------------------------------------------
// Callback types
// ---------------------------------------------------------------------------

export type InitializeCallback = () => void;
export type BeforeRequestCallback = (req: SDKRequest) => SDKRequest | Promise<SDKRequest>;
export type AfterResponseCallback = (res: SDKResponse, req: SDKRequest) => void;
export type ErrorCallback = (err: Error) => void;
/** Fired after every status fetch of `items.executeAndWait`, with the 1-based attempt number. */
export type ItemPollCallback = (item: Item, attempt: number) => void;

// ---------------------------------------------------------------------------
// HookRegistry
// ---------------------------------------------------------------------------

export class HookRegistry {
  private initializeCallbacks: InitializeCallback[] = [];
  private beforeRequestCallbacks: BeforeRequestCallback[] = [];
  private afterResponseCallbacks: AfterResponseCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];
  private itemPollCallbacks: ItemPollCallback[] = [];

  constructor(private readonly logger?: Logger) {}

  // -- Registration --------------------------------------------------------

  onInitialize(cb: InitializeCallback): void {
    this.initializeCallbacks.push(cb);
  }

  onBeforeRequest(cb: BeforeRequestCallback): void {
    this.beforeRequestCallbacks.push(cb);
  }

  onAfterResponse(cb: AfterResponseCallback): void {
    this.afterResponseCallbacks.push(cb);
  }

  onError(cb: ErrorCallback): void {
    this.errorCallbacks.push(cb);
  }

  onItemPoll(cb: ItemPollCallback): void {
    this.itemPollCallbacks.push(cb);
  }

  // -- Firing --------------------------------------------------------------

  fireInitialize(): void {
    for (const cb of this.initializeCallbacks) {
      try { cb(); } catch (e) { this.fireError(toError(e)); }
    }
  }

  async fireBeforeRequest(request: SDKRequest): Promise<SDKRequest> {
    let current = request;
    for (const cb of this.beforeRequestCallbacks) {
      try { current = await cb(current); } catch (e) { this.fireError(toError(e)); }
    }
    return current;
  }

  fireAfterResponse(response: SDKResponse, request: SDKRequest): void {
    for (const cb of this.afterResponseCallbacks) {
      try { cb(response, request); } catch (e) { this.fireError(toError(e)); }
    }
  }

  fireItemPoll(item: Item, attempt: number): void {
    for (const cb of this.itemPollCallbacks) {
      try { cb(item, attempt); } catch (e) { this.fireError(toError(e)); }
    }
  }

  fireError(error: Error): void {
    for (const cb of this.errorCallbacks) {
      try {
        cb(error);
      } catch (e) {
        // Not re-fired: an error callback that throws would recurse.
        this.logger?.warn({ err: toError(e) }, 'onError hook threw');
      }
    }
  }
}
