/**
 * Polymarket Source Unit Tests
 *
 * Gamma and Data API responses are served by a fake fetch.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  POLYMARKET_API,
  PolymarketSource,
  categorizeEvent,
  matchesTrackedCategory,
} from '../../../src/sources/polymarket.js';
import { TransientDataError } from '../../../src/core/index.js';
import { sleep } from '../../../src/utils/timeout.js';

const NOW = Date.parse('2024-03-10T12:00:00Z');

const EVENTS = [
  {
    id: 1,
    title: 'Who wins the runoff?',
    slug: 'runoff',
    endDate: '2024-03-10T20:00:00Z',
    tags: [{ label: 'Politics', slug: 'politics' }],
    markets: [{ id: '101', question: 'Will X win?', conditionId: '0xc1' }],
  },
  { title: 42 },
  {
    id: 2,
    title: 'Cup final',
    slug: 'cup-final',
    endDate: '2024-03-10T22:00:00Z',
    tags: [{ label: 'Sports' }],
    markets: [{ id: '201', question: 'Will Y score?' }],
  },
  {
    id: 3,
    title: 'Rate decision',
    slug: 'rates',
    endDate: '2024-03-20T18:00:00Z',
    tags: ['finance'],
    markets: [{ id: '301', question: 'Will rates rise?' }],
  },
];

const TRADES = [
  { transactionHash: '0xaaa', asset: 'tok1', side: 'BUY', price: '0.5', size: '30000', timestamp: 1_710_072_000 },
  { transactionHash: '0xbbb', asset: 'tok1', side: 'SELL', price: 0.55, size: 200, timestamp: 1_710_072_060 },
  { price: 'n/a', size: 1, timestamp: 1 },
];

interface Routes {
  events?: () => Response;
  trades?: () => Response;
}

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function fakeApi(routes: Routes = {}) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = String(input);
    if (url.startsWith(`${POLYMARKET_API.gamma}/events`)) {
      return routes.events ? routes.events() : json(EVENTS);
    }
    if (url.startsWith(`${POLYMARKET_API.data}/trades`)) {
      return routes.trades ? routes.trades() : json(TRADES);
    }
    return json({ error: 'not found' }, 404);
  });
}

function createSource(fetchImpl: ReturnType<typeof fakeApi>, timeoutMs: number = 1000): PolymarketSource {
  return new PolymarketSource({
    trackedCategories: ['politics', 'finance'],
    expiryWindowHours: 24,
    timeoutMs,
    snapshotTtlMs: 30_000,
    fetchImpl,
    now: () => NOW,
  });
}

describe('PolymarketSource', () => {
  it('should return trades of tracked events expiring within the window', async () => {
    const fetchImpl = fakeApi();
    const trades = await createSource(fetchImpl).fetchRecentTrades();

    expect(trades).toHaveLength(2);
    expect(trades[0]).toEqual({
      matchId: undefined,
      tradeId: '0xaaa:tok1:30000',
      marketId: '101',
      marketTitle: 'Will X win?',
      eventTitle: 'Who wins the runoff?',
      eventSlug: 'runoff',
      category: 'politics',
      side: 'BUY',
      price: 0.5,
      size: 30_000,
      timestamp: 1_710_072_000_000,
    });
    expect(trades[1].side).toBe('SELL');
  });

  it('should query trades by condition id', async () => {
    const fetchImpl = fakeApi();
    await createSource(fetchImpl).fetchRecentTrades();

    const urls = fetchImpl.mock.calls.map(call => String(call[0]));
    expect(urls).toEqual([
      `${POLYMARKET_API.gamma}/events?closed=false&limit=100&offset=0&order=endDate&ascending=true`,
      `${POLYMARKET_API.data}/trades?market=0xc1&limit=50`,
    ]);
  });

  it('should share one snapshot between trades and candidates', async () => {
    const fetchImpl = fakeApi();
    const source = createSource(fetchImpl);

    await source.fetchRecentTrades();
    const markets = await source.fetchCandidates();

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(markets).toHaveLength(1);
    expect(markets[0].marketId).toBe('101');
    expect(markets[0].category).toBe('politics');
    expect(markets[0].activity.tradeCount).toBe(2);
  });

  it('should throw TransientDataError when the events API fails, without caching it', async () => {
    let healthy = false;
    const fetchImpl = fakeApi({ events: () => (healthy ? json(EVENTS) : json({}, 503)) });
    const source = createSource(fetchImpl);

    await expect(source.fetchRecentTrades()).rejects.toBeInstanceOf(TransientDataError);

    healthy = true;
    expect(await source.fetchRecentTrades()).toHaveLength(2);
  });

  it('should throw TransientDataError when the network is down', async () => {
    const fetchImpl = fakeApi({
      events: () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(createSource(fetchImpl).fetchCandidates()).rejects.toBeInstanceOf(TransientDataError);
  });

  it('should skip a market whose trades cannot be fetched', async () => {
    const fetchImpl = fakeApi({ trades: () => json({}, 500) });
    const source = createSource(fetchImpl);

    expect(await source.fetchRecentTrades()).toEqual([]);
    expect(await source.fetchCandidates()).toEqual([]);
  });
});

describe('PolymarketSource snapshot budget', () => {
  function ladderEvent(markets: Array<{ id: string; question: string; conditionId?: string }>) {
    return [{ id: 9, title: 'Ladder', slug: 'ladder', endDate: '2024-03-10T20:00:00Z', tags: ['politics'], markets }];
  }

  it('should fetch market trades in parallel batches', async () => {
    const strikes = Array.from({ length: 12 }, (_, i) => ({ id: String(500 + i), question: `Strike ${i}?` }));
    const events = ladderEvent(strikes);
    let inFlight = 0;
    let peak = 0;
    const fetchImpl = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
      if (String(input).startsWith(`${POLYMARKET_API.gamma}/events`)) return json(events);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
      return json([]);
    });

    await createSource(fetchImpl).fetchRecentTrades();

    expect(peak).toBe(8);
    expect(fetchImpl).toHaveBeenCalledTimes(13);
  });

  it('should leave out markets whose trades miss the snapshot deadline', async () => {
    const events = ladderEvent([
      { id: '601', question: 'Fast?', conditionId: '0xfast' },
      { id: '602', question: 'Slow?', conditionId: '0xslow' },
    ]);
    const fetchImpl = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = String(input);
      if (url.startsWith(`${POLYMARKET_API.gamma}/events`)) return json(events);
      if (url.includes('0xslow')) {
        return new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }
      return json(TRADES);
    });

    const trades = await createSource(fetchImpl, 50).fetchRecentTrades();

    expect(trades.map(trade => trade.marketId)).toEqual(['601', '601']);
  });
});

describe('matchesTrackedCategory', () => {
  it('should match tags loosely in either direction', () => {
    expect(matchesTrackedCategory({ tags: [{ label: 'US Politics' }] }, ['politics'])).toBe(true);
    expect(matchesTrackedCategory({ tags: ['crypto'] }, ['crypto prices'])).toBe(true);
    expect(matchesTrackedCategory({ tags: ['sports'] }, ['politics'])).toBe(false);
  });

  it('should not match on empty tags', () => {
    expect(matchesTrackedCategory({ tags: [{ label: '', slug: '' }] }, ['politics'])).toBe(false);
  });
});

describe('categorizeEvent', () => {
  it('should use the first exactly tracked tag, else other', () => {
    expect(categorizeEvent({ tags: [{ label: 'Trending' }, { slug: 'crypto' }] }, ['crypto'])).toBe('crypto');
    expect(categorizeEvent({ tags: [{ label: 'US Politics' }] }, ['politics'])).toBe('other');
  });
});
