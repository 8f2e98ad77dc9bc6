/**
 * Bounded in-memory cache of suggestion lists
 */

import { SearchSuggestion, SuggestionType } from '../../database/models';

interface Slot {
  suggestions: SearchSuggestion[];
  storedAt: number;
}

export const SUGGESTION_TTL_MS = 30 * 60 * 1000;
export const MAX_SUGGESTION_KEYS = 100;

export const suggestionCacheKey = (
  userId: string,
  prefix: string,
  types?: SuggestionType[],
): string =>
  `${userId}_${prefix}_${types && types.length > 0 ? types.join(',') : 'all'}`;

export class SuggestionCache {
  private slots = new Map<string, Slot>();

  constructor(
    private readonly ttlMs = SUGGESTION_TTL_MS,
    private readonly maxKeys = MAX_SUGGESTION_KEYS,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: string): SearchSuggestion[] | null {
    const slot = this.slots.get(key);
    if (!slot) return null;
    if (this.now() - slot.storedAt >= this.ttlMs) {
      this.slots.delete(key);
      return null;
    }
    return slot.suggestions;
  }

  /**
   * Stores a list; past maxKeys the oldest slot is evicted
   */
  set(key: string, suggestions: SearchSuggestion[]): void {
    this.slots.set(key, { suggestions, storedAt: this.now() });

    if (this.slots.size > this.maxKeys) {
      let oldestKey: string | null = null;
      let oldest = Infinity;
      for (const [slotKey, slot] of this.slots) {
        if (slot.storedAt < oldest) {
          oldest = slot.storedAt;
          oldestKey = slotKey;
        }
      }
      if (oldestKey !== null) {
        this.slots.delete(oldestKey);
      }
    }
  }

  has(key: string): boolean {
    return this.get(key) !== null;
  }

  get size(): number {
    return this.slots.size;
  }

  clear(): void {
    this.slots.clear();
  }
}
