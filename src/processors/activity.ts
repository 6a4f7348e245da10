/**
 * Market Activity Processor
 *
 * Summarizes the recent trades of a market and turns interesting markets into
 * analysis candidates.
 */

import type { ActivitySummary, Candidate, RawMarketActivity, RawTrade } from '../core/index.js';
import { formatCurrency } from '../utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

const MIN_INTERESTING_VOLUME = 5000;   // USDC in the fetched window
const MIN_INTERESTING_MOVE = 0.05;     // 5 cents
const PRICE_MOVE_WEIGHT = 10_000;      // score points per 1.00 of price change

// =============================================================================
// ACTIVITY SUMMARY
// =============================================================================

/**
 * Summarize trades of one market. Returns null when there is nothing notable.
 */
export function summarizeActivity(trades: readonly RawTrade[]): ActivitySummary | null {
  if (trades.length === 0) return null;

  const ordered = [...trades].sort((a, b) => a.timestamp - b.timestamp);
  const startPrice = ordered[0].price;
  const endPrice = ordered[ordered.length - 1].price;
  const priceChange = endPrice - startPrice;

  let totalVolume = 0;
  let buyVolume = 0;
  let sellVolume = 0;

  for (const trade of trades) {
    const value = trade.price * trade.size;
    if (!Number.isFinite(value)) continue;
    totalVolume += value;
    if (trade.side === 'BUY') {
      buyVolume += value;
    } else {
      sellVolume += value;
    }
  }

  const reasons: string[] = [];

  if (totalVolume > MIN_INTERESTING_VOLUME) {
    reasons.push(`High volume (${formatCurrency(totalVolume)})`);
  }

  if (Math.abs(priceChange) > MIN_INTERESTING_MOVE) {
    const direction = priceChange > 0 ? '📈 Rising' : '📉 Falling';
    const signed = `${priceChange > 0 ? '+' : ''}${priceChange.toFixed(2)}`;
    reasons.push(`${direction} (${signed})`);
  }

  if (reasons.length === 0) return null;

  return {
    totalVolume,
    buyVolume,
    sellVolume,
    startPrice,
    endPrice,
    priceChange,
    tradeCount: trades.length,
    reasons,
  };
}

// =============================================================================
// CANDIDATES
// =============================================================================

/**
 * Priority of a candidate: traded volume plus a bonus for price movement.
 */
export function scoreActivity(activity: ActivitySummary): number {
  return activity.totalVolume + Math.abs(activity.priceChange) * PRICE_MOVE_WEIGHT;
}

export function toCandidate(market: RawMarketActivity): Candidate {
  return {
    id: market.marketId,
    category: market.category,
    score: scoreActivity(market.activity),
    question: market.question,
    eventTitle: market.eventTitle,
    eventSlug: market.eventSlug,
    activity: market.activity,
  };
}

/**
 * Key of the analysis log. Markets of one event share a cooldown; a market
 * without an event slug stands alone.
 */
export function cooldownKey(candidate: Pick<Candidate, 'id' | 'eventSlug'>): string {
  return candidate.eventSlug || candidate.id;
}

/**
 * Candidates whose event was not analyzed within the cooldown window.
 */
export function eligibleCandidates(
  markets: readonly RawMarketActivity[],
  analyzed: Readonly<Record<string, number>>,
  now: number,
  cooldownMs: number
): Candidate[] {
  return markets
    .map(toCandidate)
    .filter(candidate => {
      const last = analyzed[cooldownKey(candidate)];
      return last === undefined || now - last >= cooldownMs;
    });
}

/**
 * Drop analysis log entries older than `retentionMs`.
 */
export function pruneAnalyzed(
  analyzed: Readonly<Record<string, number>>,
  now: number,
  retentionMs: number
): Record<string, number> {
  const kept: Record<string, number> = {};
  for (const [id, at] of Object.entries(analyzed)) {
    if (now - at < retentionMs) {
      kept[id] = at;
    }
  }
  return kept;
}
