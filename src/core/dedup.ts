/**
 * Whale event deduplication.
 *
 * Exact identifier equality against the seen registry. Nothing here persists;
 * callers mark inside StateStore.commit().
 */

import type { SeenRegistry, WhaleEvent } from './types.js';

export function isNew(eventId: string, registry: SeenRegistry): boolean {
  return !registry.has(eventId);
}

/**
 * Returns a registry that also contains `eventId`.
 * With a positive `limit`, the oldest ids are dropped to keep the size bounded.
 */
export function markSeen(eventId: string, registry: SeenRegistry, limit: number = 0): SeenRegistry {
  if (registry.has(eventId)) return registry;

  const next = new Set(registry);
  next.add(eventId);

  if (limit > 0 && next.size > limit) {
    for (const oldest of next) {
      if (next.size <= limit) break;
      next.delete(oldest);
    }
  }

  return next;
}

/**
 * Unseen events, first occurrence only, in input order.
 */
export function filterNew(events: readonly WhaleEvent[], registry: SeenRegistry): WhaleEvent[] {
  const batch = new Set<string>();
  return events.filter(event => {
    if (!isNew(event.id, registry) || batch.has(event.id)) return false;
    batch.add(event.id);
    return true;
  });
}
