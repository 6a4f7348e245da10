/**
 * Shared test fixtures: factories and in-process collaborators.
 */

import {
  MemoryStorageBackend,
  type ActivitySummary,
  type AnalysisEngine,
  type AnalysisResult,
  type Candidate,
  type Category,
  type DeliveryReport,
  type MarketDataSource,
  type NotificationTransport,
  type OutboundMessage,
  type RawMarketActivity,
  type RawTrade,
  type SchedulerConfig,
} from '../src/core/index.js';

// =============================================================================
// FACTORIES
// =============================================================================

export function makeActivity(overrides: Partial<ActivitySummary> = {}): ActivitySummary {
  return {
    totalVolume: 6000,
    buyVolume: 4000,
    sellVolume: 2000,
    startPrice: 0.5,
    endPrice: 0.55,
    priceChange: 0.05,
    tradeCount: 10,
    reasons: ['High volume ($6.0K)'],
    ...overrides,
  };
}

export function makeCandidate(id: string, category: Category, score: number): Candidate {
  return {
    id,
    category,
    score,
    question: `Will ${id} happen?`,
    eventTitle: `Event ${id}`,
    eventSlug: `event-${id}`,
    activity: makeActivity(),
  };
}

export function makeMarket(
  marketId: string,
  category: Category,
  totalVolume: number = 6000
): RawMarketActivity {
  return {
    marketId,
    question: `Will ${marketId} happen?`,
    eventTitle: `Event ${marketId}`,
    eventSlug: `event-${marketId}`,
    category,
    activity: makeActivity({ totalVolume, priceChange: 0 }),
  };
}

export function makeTrade(overrides: Partial<RawTrade> = {}): RawTrade {
  return {
    tradeId: 't-1',
    marketId: 'm-1',
    marketTitle: 'Will it rain in Paris?',
    eventTitle: 'Paris weather',
    eventSlug: 'paris-weather',
    category: 'world',
    side: 'BUY',
    price: 0.5,
    size: 30_000,
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

export const TEST_CONFIG: SchedulerConfig = {
  timezone: 'UTC',
  whaleThreshold: 10_000,
  maxDailyCalls: 13,
  minSecondsBetweenCalls: 30,
  burstCount: 13,
  diversityWindow: 20,
  seenRegistryLimit: 0,
  candidateCooldownMs: 6 * 60 * 60 * 1000,
  externalTimeoutMs: 1000,
};

// =============================================================================
// COLLABORATORS
// =============================================================================

export class ScriptedSource implements MarketDataSource {
  trades: RawTrade[] = [];
  markets: RawMarketActivity[] = [];
  failTrades = false;
  failCandidates = false;
  tradeFetches = 0;
  candidateFetches = 0;

  async fetchRecentTrades(): Promise<RawTrade[]> {
    this.tradeFetches++;
    if (this.failTrades) throw new Error('trades endpoint down');
    return this.trades;
  }

  async fetchCandidates(): Promise<RawMarketActivity[]> {
    this.candidateFetches++;
    if (this.failCandidates) throw new Error('events endpoint down');
    return this.markets;
  }
}

export class RecordingEngine implements AnalysisEngine {
  calls: Candidate[] = [];
  fail = false;

  async analyze(candidate: Candidate): Promise<AnalysisResult> {
    this.calls.push(candidate);
    if (this.fail) throw new Error('model unavailable');
    return {
      candidateId: candidate.id,
      summary: `Summary for ${candidate.id}`,
      recommendation: 'BUY YES',
      risk: 'medium',
      confidence: 0.6,
    };
  }
}

export class RecordingTransport implements NotificationTransport {
  messages: OutboundMessage[] = [];
  failing = false;

  async broadcast(message: OutboundMessage): Promise<DeliveryReport> {
    this.messages.push(message);
    const results = new Map([['test-destination', !this.failing]]);
    return {
      results,
      delivered: this.failing ? 0 : 1,
      failed: this.failing ? ['test-destination'] : [],
    };
  }

  ofKind(kind: OutboundMessage['kind']): OutboundMessage[] {
    return this.messages.filter(message => message.kind === kind);
  }
}

/**
 * Memory backend whose writes can be made to fail.
 */
export class FlakyBackend extends MemoryStorageBackend {
  failWrites = false;

  override replace(blob: string): void {
    if (this.failWrites) throw new Error('disk full');
    super.replace(blob);
  }
}
