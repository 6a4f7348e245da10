/**
 * Polymarket Data Source
 *
 * Pulls events that expire soon from the Gamma API and the latest trades of
 * their markets from the Data API. One snapshot is taken per tick and shared
 * by the whale scan and the candidate pass through a short-lived cache.
 * A snapshot never outlives `timeoutMs`: trade requests still pending at the
 * deadline are aborted and their markets left out.
 */

import { z } from 'zod';
import {
  TransientDataError,
  TtlCache,
  describeError,
  type Category,
  type MarketDataSource,
  type RawMarketActivity,
  type RawTrade,
} from '../core/index.js';
import { summarizeActivity } from '../processors/activity.js';
import { createLogger } from '../utils/index.js';

const logger = createLogger('polymarket');

// =============================================================================
// CONFIGURATION
// =============================================================================

export const POLYMARKET_API = {
  gamma: 'https://gamma-api.polymarket.com',
  data: 'https://data-api.polymarket.com',
};

const EVENTS_PAGE_SIZE = 100;
const TRADES_PER_MARKET = 50;
/** Trade requests in flight at once */
const TRADE_REQUEST_BATCH = 8;

export interface PolymarketSourceOptions {
  trackedCategories: string[];
  expiryWindowHours: number;
  /** Budget for one whole snapshot, events and trades together */
  timeoutMs: number;
  /** How long one snapshot is reused; keep it below the tick interval. */
  snapshotTtlMs: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

// =============================================================================
// API SCHEMAS
// =============================================================================

const idSchema = z.union([z.string(), z.number()]).transform(String);

const tagSchema = z.union([
  z.string(),
  z.object({
    label: z.string().nullish(),
    slug: z.string().nullish(),
  }),
]);

const gammaMarketSchema = z.object({
  id: idSchema,
  question: z.string().nullish(),
  conditionId: z.string().nullish(),
});

const gammaEventSchema = z.object({
  id: idSchema,
  title: z.string().nullish(),
  slug: z.string().nullish(),
  endDate: z.string().nullish(),
  tags: z.array(tagSchema).nullish(),
  markets: z.array(gammaMarketSchema).nullish(),
});

const tradeSchema = z.object({
  id: idSchema.nullish(),
  matchId: idSchema.nullish(),
  transactionHash: z.string().nullish(),
  asset: z.string().nullish(),
  side: z.string().nullish(),
  price: z.coerce.number(),
  size: z.coerce.number(),
  timestamp: z.coerce.number(),
});

type GammaEvent = z.infer<typeof gammaEventSchema>;
type GammaMarket = z.infer<typeof gammaMarketSchema>;
type ApiTrade = z.infer<typeof tradeSchema>;

interface MarketSnapshot {
  trades: RawTrade[];
  markets: RawMarketActivity[];
}

interface MarketJob {
  event: GammaEvent;
  market: GammaMarket;
  category: Category;
}

// =============================================================================
// SOURCE
// =============================================================================

export class PolymarketSource implements MarketDataSource {
  private readonly options: PolymarketSourceOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly snapshots: TtlCache<MarketSnapshot>;

  constructor(options: PolymarketSourceOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.snapshots = new TtlCache(options.snapshotTtlMs, this.now);
  }

  async fetchRecentTrades(): Promise<RawTrade[]> {
    return (await this.snapshot()).trades;
  }

  async fetchCandidates(): Promise<RawMarketActivity[]> {
    return (await this.snapshot()).markets;
  }

  private snapshot(): Promise<MarketSnapshot> {
    return this.snapshots.getOrCompute('snapshot', () => this.loadSnapshot());
  }

  private async loadSnapshot(): Promise<MarketSnapshot> {
    const deadline = AbortSignal.timeout(this.options.timeoutMs);
    const events = await this.fetchExpiringEvents(deadline);
    const trades: RawTrade[] = [];
    const markets: RawMarketActivity[] = [];

    const jobs: MarketJob[] = events.flatMap(event => {
      const category = categorizeEvent(event, this.options.trackedCategories);
      return (event.markets ?? []).map(market => ({ event, market, category }));
    });

    for (let i = 0; i < jobs.length; i += TRADE_REQUEST_BATCH) {
      if (deadline.aborted) {
        logger.warn(`Snapshot budget spent, trades of ${jobs.length - i} markets skipped`);
        break;
      }

      const batch = jobs.slice(i, i + TRADE_REQUEST_BATCH);
      const results = await Promise.allSettled(
        batch.map(job => this.fetchMarketTrades(job, deadline))
      );

      for (const [j, job] of batch.entries()) {
        const result = results[j];
        if (result.status === 'rejected') {
          logger.warn(`Trades for market ${job.market.id} unavailable: ${describeError(result.reason)}`);
          continue;
        }

        trades.push(...result.value);

        const activity = summarizeActivity(result.value);
        if (activity) {
          markets.push({
            marketId: job.market.id,
            question: job.market.question ?? 'Unknown Market',
            eventTitle: job.event.title ?? 'Unknown Event',
            eventSlug: job.event.slug ?? '',
            category: job.category,
            activity,
          });
        }
      }
    }

    logger.info(
      `Polymarket snapshot: ${events.length} expiring events, ${trades.length} trades, ` +
      `${markets.length} active markets`
    );
    return { trades, markets };
  }

  // ===========================================================================
  // API CALLS
  // ===========================================================================

  /**
   * Open events ending within the expiry window whose tags match a tracked category.
   */
  async fetchExpiringEvents(
    signal: AbortSignal = AbortSignal.timeout(this.options.timeoutMs)
  ): Promise<GammaEvent[]> {
    const params = new URLSearchParams({
      closed: 'false',
      limit: String(EVENTS_PAGE_SIZE),
      offset: '0',
      order: 'endDate',
      ascending: 'true',
    });
    const body = await this.getJson(`${POLYMARKET_API.gamma}/events?${params}`, signal);
    const rows = Array.isArray(body) ? body : extractDataArray(body);

    const now = this.now();
    const windowEnd = now + this.options.expiryWindowHours * 60 * 60 * 1000;
    const events: GammaEvent[] = [];

    for (const row of rows) {
      const parsed = gammaEventSchema.safeParse(row);
      if (!parsed.success) continue;

      const event = parsed.data;
      const endsAt = event.endDate ? Date.parse(event.endDate) : NaN;
      if (Number.isNaN(endsAt) || endsAt <= now) continue;
      // Sorted by end date: everything after this is outside the window too
      if (endsAt > windowEnd) break;

      if (matchesTrackedCategory(event, this.options.trackedCategories)) {
        events.push(event);
      }
    }

    return events;
  }

  private async fetchMarketTrades(
    { event, market, category }: MarketJob,
    signal: AbortSignal
  ): Promise<RawTrade[]> {
    const marketKey = market.conditionId ?? market.id;
    const params = new URLSearchParams({ market: marketKey, limit: String(TRADES_PER_MARKET) });
    const body = await this.getJson(`${POLYMARKET_API.data}/trades?${params}`, signal);
    const rows = Array.isArray(body) ? body : [];

    const trades: RawTrade[] = [];
    for (const row of rows) {
      const parsed = tradeSchema.safeParse(row);
      if (parsed.success) {
        trades.push(toRawTrade(parsed.data, event, market, category));
      }
    }
    return trades;
  }

  private async getJson(url: string, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal,
      });
    } catch (error) {
      throw new TransientDataError(`Request to ${url} failed`, error);
    }

    if (!response.ok) {
      throw new TransientDataError(`Request to ${url} returned HTTP ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new TransientDataError(`Response from ${url} is not JSON`, error);
    }
  }
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function extractDataArray(body: unknown): unknown[] {
  if (typeof body === 'object' && body !== null && 'data' in body && Array.isArray(body.data)) {
    return body.data;
  }
  return [];
}

/**
 * Lower-cased labels and slugs of an event's tags.
 */
export function eventTags(event: Pick<GammaEvent, 'tags'>): string[] {
  const tags: string[] = [];
  for (const tag of event.tags ?? []) {
    if (typeof tag === 'string') {
      tags.push(tag.toLowerCase());
    } else {
      if (tag.label) tags.push(tag.label.toLowerCase());
      if (tag.slug) tags.push(tag.slug.toLowerCase());
    }
  }
  return tags.filter(tag => tag.length > 0);
}

/**
 * Loose match: "us politics" matches "politics" and vice versa.
 */
export function matchesTrackedCategory(event: Pick<GammaEvent, 'tags'>, tracked: string[]): boolean {
  if (tracked.length === 0) return true;
  const tags = eventTags(event);
  return tracked.some(category => tags.some(tag => tag.includes(category) || category.includes(tag)));
}

/**
 * First tag that is exactly a tracked category, else `other`.
 */
export function categorizeEvent(event: Pick<GammaEvent, 'tags'>, tracked: string[]): Category {
  return eventTags(event).find(tag => tracked.includes(tag)) ?? 'other';
}

function toRawTrade(
  trade: ApiTrade,
  event: GammaEvent,
  market: GammaMarket,
  category: Category
): RawTrade {
  const fillId = trade.transactionHash
    ? `${trade.transactionHash}:${trade.asset ?? ''}:${trade.size}`
    : undefined;

  return {
    matchId: trade.matchId ?? undefined,
    tradeId: trade.id ?? fillId,
    marketId: market.id,
    marketTitle: market.question ?? 'Unknown Market',
    eventTitle: event.title ?? 'Unknown Event',
    eventSlug: event.slug ?? '',
    category,
    side: trade.side?.toUpperCase() === 'SELL' ? 'SELL' : 'BUY',
    price: trade.price,
    size: trade.size,
    // The Data API reports seconds
    timestamp: trade.timestamp < 1e12 ? trade.timestamp * 1000 : trade.timestamp,
  };
}
