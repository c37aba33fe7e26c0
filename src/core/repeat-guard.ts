/**
 * In-memory repeat suppression: remembers when each (provider, target, ticket)
 * was last answered.
 */

import type { RepeatGuard, SentKey } from './types';

export function sentKeyString(key: SentKey): string {
  return `${key.provider}\u0000${key.target.toLowerCase()}\u0000${key.ticketId}`;
}

export class MemoryRepeatGuard implements RepeatGuard {
  private lastSent = new Map<string, number>();

  wasSentSince(key: SentKey, sinceMs: number): boolean {
    const at = this.lastSent.get(sentKeyString(key));
    return at !== undefined && at >= sinceMs;
  }

  record(key: SentKey, atMs: number): void {
    this.lastSent.set(sentKeyString(key), atMs);
  }

  forget(key: SentKey): void {
    this.lastSent.delete(sentKeyString(key));
  }

  prune(beforeMs: number): number {
    let removed = 0;
    for (const [key, at] of this.lastSent) {
      if (at < beforeMs) {
        this.lastSent.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.lastSent.size;
  }
}
