/**
 * Diversity Selector
 *
 * Picks analysis candidates round-robin across topic categories, starting with
 * the category that was analyzed least recently, so one busy topic cannot take
 * the whole daily quota.
 */

import type { Candidate, Category, TopicHistory } from './types.js';

export interface Selection {
  selected: Candidate[];
  topicHistory: TopicHistory;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Index of the last time each category was chosen; -1 when never.
 */
function lastChosenIndex(history: TopicHistory): Map<Category, number> {
  const index = new Map<Category, number>();
  history.forEach((category, i) => index.set(category, i));
  return index;
}

/**
 * Group candidates by category, each group ordered by score descending.
 */
export function groupByCategory(candidates: readonly Candidate[]): Map<Category, Candidate[]> {
  const groups = new Map<Category, Candidate[]>();

  for (const candidate of candidates) {
    const group = groups.get(candidate.category);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(candidate.category, [candidate]);
    }
  }

  for (const group of groups.values()) {
    group.sort((a, b) => b.score - a.score || compareIds(a.id, b.id));
  }

  return groups;
}

/**
 * Categories ordered least-recently-chosen first; ties by category id.
 */
export function rankCategories(categories: Iterable<Category>, history: TopicHistory): Category[] {
  const recency = lastChosenIndex(history);
  return [...categories].sort(
    (a, b) => (recency.get(a) ?? -1) - (recency.get(b) ?? -1) || compareIds(a, b)
  );
}

/**
 * Append chosen categories, keeping only the newest `windowSize` entries.
 */
export function recordTopics(
  history: TopicHistory,
  categories: readonly Category[],
  windowSize: number
): TopicHistory {
  const next = [...history, ...categories];
  return windowSize > 0 ? next.slice(-windowSize) : [];
}

/**
 * Choose up to `k` candidates. Never throws; returns fewer when the pool is short.
 */
export function selectNext(
  candidates: readonly Candidate[],
  history: TopicHistory,
  k: number,
  windowSize: number
): Selection {
  const groups = groupByCategory(candidates);
  const ranked = rankCategories(groups.keys(), history);
  const selected: Candidate[] = [];

  for (let round = 0; selected.length < k; round++) {
    let pickedThisRound = false;

    for (const category of ranked) {
      if (selected.length >= k) break;
      const pick = groups.get(category)?.[round];
      if (pick) {
        selected.push(pick);
        pickedThisRound = true;
      }
    }

    if (!pickedThisRound) break;
  }

  return {
    selected,
    topicHistory: recordTopics(history, selected.map(c => c.category), windowSize),
  };
}
