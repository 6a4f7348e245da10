/**
 * Whale Trade Detector
 *
 * Flags single trades whose notional (price x size) reaches the configured
 * threshold and gives each one a stable identifier for deduplication.
 */

import type { RawTrade, WhaleEvent } from '../core/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Notional above threshold x this multiple is reported as a mega whale. */
export const MEGA_WHALE_MULTIPLE = 5;

// =============================================================================
// DETECTION
// =============================================================================

/**
 * Unique key of a trade: the venue's match id, else its trade id, else a
 * composite of market, timestamp and size.
 */
export function tradeIdentifier(trade: RawTrade): string {
  return trade.matchId || trade.tradeId || `${trade.marketId}-${trade.timestamp}-${trade.size}`;
}

export function notionalOf(trade: RawTrade): number {
  return trade.price * trade.size;
}

export function toWhaleEvent(trade: RawTrade): WhaleEvent {
  return {
    id: tradeIdentifier(trade),
    marketId: trade.marketId,
    marketTitle: trade.marketTitle,
    eventTitle: trade.eventTitle,
    eventSlug: trade.eventSlug,
    side: trade.side,
    price: trade.price,
    size: trade.size,
    notional: notionalOf(trade),
    timestamp: trade.timestamp,
    category: trade.category,
  };
}

/**
 * Whale events among `trades`, oldest first.
 */
export function detectWhales(trades: readonly RawTrade[], threshold: number): WhaleEvent[] {
  return trades
    .filter(trade => Number.isFinite(notionalOf(trade)) && notionalOf(trade) >= threshold)
    .map(toWhaleEvent)
    .sort((a, b) => a.timestamp - b.timestamp);
}

export function isMegaWhale(event: WhaleEvent, threshold: number): boolean {
  return event.notional > threshold * MEGA_WHALE_MULTIPLE;
}
