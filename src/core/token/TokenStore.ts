// src/core/token/TokenStore.ts

import { EventEmitter } from 'events';
import type { Token, TokenReplacedEvent } from './types';
import type { Logger } from '../../observability/Logger';
import { tokenExpiresAt } from './Token';

/**
 * Holds the current token of one client.
 *
 * Writes go through compareAndSet only: concurrent refreshes are reconciled
 * by comparing against the token each caller started from, never by holding
 * a lock across the network call.
 */
export class TokenStore extends EventEmitter {
  private current?: Token;
  private currentVersion = 0;

  constructor(private logger: Logger) {
    super();
  }

  get(): Token | undefined {
    return this.current;
  }

  get version(): number {
    return this.currentVersion;
  }

  /**
   * Install `next` only if the store still holds `expected` (by identity).
   */
  compareAndSet(expected: Token | undefined, next: Token): boolean {
    if (this.current !== expected) {
      this.logger.debug('Token install lost race', { version: this.currentVersion });
      return false;
    }

    this.current = next;
    this.currentVersion += 1;

    const event: TokenReplacedEvent = {
      version: this.currentVersion,
      expiresAt: tokenExpiresAt(next),
    };
    this.logger.debug('Token installed', {
      version: event.version,
      expiresAt: event.expiresAt?.toISOString(),
    });
    this.emit('tokenReplaced', event);
    return true;
  }

  clear(): void {
    if (!this.current) return;

    this.current = undefined;
    this.currentVersion += 1;
    this.logger.debug('Token cleared', { version: this.currentVersion });
    this.emit('tokenCleared', { version: this.currentVersion });
  }
}
