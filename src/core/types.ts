/**
 * Core Types for the Whale Watcher
 *
 * Domain records, persisted state and the collaborator contracts the
 * scheduler consumes. Implementations of the contracts live in sources/,
 * analysis/, output/ and state-store.ts.
 */

import type { TransportError } from './errors.js';

// =============================================================================
// MARKET TYPES
// =============================================================================

/**
 * Topic category of an event. Free-form: taken from the venue's tags and
 * matched against the tracked categories, `other` when nothing matches.
 */
export type Category = string;

export type TradeSide = 'BUY' | 'SELL';

/**
 * A trade as delivered by the market data source, already flattened with
 * the metadata of the market and event it belongs to.
 */
export interface RawTrade {
  matchId?: string;
  tradeId?: string;
  marketId: string;
  marketTitle: string;
  eventTitle: string;
  eventSlug: string;
  category: Category;
  side: TradeSide;
  price: number;      // 0-1
  size: number;       // shares
  timestamp: number;  // epoch ms
}

/**
 * Summary of recent trading on one market.
 */
export interface ActivitySummary {
  totalVolume: number;
  buyVolume: number;
  sellVolume: number;
  startPrice: number;
  endPrice: number;
  priceChange: number;
  tradeCount: number;
  reasons: string[];
}

/**
 * A market with enough recent activity to be considered for AI analysis.
 */
export interface RawMarketActivity {
  marketId: string;
  question: string;
  eventTitle: string;
  eventSlug: string;
  category: Category;
  activity: ActivitySummary;
}

// =============================================================================
// DOMAIN RECORDS
// =============================================================================

export type WhaleEvent = Readonly<{
  id: string;
  marketId: string;
  marketTitle: string;
  eventTitle: string;
  eventSlug: string;
  side: TradeSide;
  price: number;
  size: number;
  notional: number;   // USDC
  timestamp: number;
  category: Category;
}>;

export interface Candidate {
  id: string;
  category: Category;
  score: number;
  question: string;
  eventTitle: string;
  eventSlug: string;
  activity: ActivitySummary;
}

// =============================================================================
// PERSISTED STATE
// =============================================================================

export type SeenRegistry = ReadonlySet<string>;

export interface QuotaState {
  callsUsedToday: number;
  dayKey: string;       // YYYY-MM-DD in the reference timezone
  lastCallAt: number;   // epoch ms, 0 = never
}

/** Oldest first. */
export type TopicHistory = readonly Category[];

export interface PersistedState {
  version: 1;
  seen: SeenRegistry;
  quota: QuotaState;
  topicHistory: TopicHistory;
  /** event slug (market id when the event has none) -> epoch ms of its last analysis */
  analyzed: Record<string, number>;
}

export interface QuotaLimits {
  maxDaily: number;
  minSecondsBetweenCalls: number;
}

// =============================================================================
// ANALYSIS
// =============================================================================

export type Recommendation = 'BUY YES' | 'BUY NO' | 'HOLD';
export type RiskLevel = 'high' | 'medium' | 'low';

export interface AnalysisResult {
  candidateId: string;
  summary: string;
  recommendation: Recommendation;
  risk: RiskLevel;
  confidence: number;  // 0-1
  costUsd?: number;
}

// =============================================================================
// COLLABORATOR CONTRACTS
// =============================================================================

export interface MarketDataSource {
  fetchRecentTrades(): Promise<RawTrade[]>;
  fetchCandidates(): Promise<RawMarketActivity[]>;
}

export interface AnalysisEngine {
  /** Rejects with AnalysisError (a TransientDataError) on failure. */
  analyze(candidate: Candidate): Promise<AnalysisResult>;
}

export type MessageKind = 'whale' | 'insight' | 'status' | 'test';

export interface OutboundMessage {
  kind: MessageKind;
  content: string;
}

export interface DeliveryReport {
  results: Map<string, boolean>;
  delivered: number;
  failed: string[];
  /** Set when at least one destination failed. */
  error?: TransportError;
}

export interface NotificationTransport {
  broadcast(message: OutboundMessage): Promise<DeliveryReport>;
}

/**
 * Durable medium holding one serialized state blob.
 */
export interface StorageBackend {
  /** Returns null when nothing has been stored yet. */
  read(): string | null;
  /** Atomically replaces the stored blob. */
  replace(blob: string): void;
  describe(): string;
}
