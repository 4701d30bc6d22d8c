/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Access token cache.
 */

export type TokenExchange = () => Promise<string>;

/**
 * Caches the API key obtained from the credential exchange.
 *
 * Callers that arrive while an exchange is running share its promise, so a
 * refresh cycle performs one exchange and nobody observes a half-set token.
 */
export class TokenProvider {
  private token: string | null = null;
  private pending: Promise<string> | null = null;

  constructor(private readonly exchange: TokenExchange) {}

  get cached(): string | null {
    return this.token;
  }

  getToken(): Promise<string> {
    if (this.token !== null) return Promise.resolve(this.token);
    if (this.pending) return this.pending;

    const pending = this.exchange().then(
      (token) => {
        this.token = token;
        this.pending = null;
        return token;
      },
      (error: unknown) => {
        this.pending = null;
        throw error;
      },
    );
    this.pending = pending;
    return pending;
  }

  /**
   * Drop `staleToken` if it is still the cached one. A caller holding an
   * older token cannot evict a fresher one another caller already fetched.
   */
  invalidate(staleToken: string): void {
    if (this.token === staleToken) {
      this.token = null;
    }
  }
}
