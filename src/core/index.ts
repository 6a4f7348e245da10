/**
 * Core Module Exports for the Whale Watcher
 */

// Types
export type {
  Category,
  TradeSide,
  RawTrade,
  ActivitySummary,
  RawMarketActivity,
  WhaleEvent,
  Candidate,
  SeenRegistry,
  QuotaState,
  QuotaLimits,
  TopicHistory,
  PersistedState,
  Recommendation,
  RiskLevel,
  AnalysisResult,
  MarketDataSource,
  AnalysisEngine,
  MessageKind,
  OutboundMessage,
  DeliveryReport,
  NotificationTransport,
  StorageBackend,
} from './types.js';

// Errors
export {
  WatcherError,
  TransientDataError,
  AnalysisError,
  CorruptStateError,
  QuotaExhaustedError,
  TransportError,
  StatePersistError,
  ConfigurationError,
  describeError,
  type WatcherErrorCode,
} from './errors.js';

// State
export {
  StateStore,
  FileStorageBackend,
  MemoryStorageBackend,
  type StateStoreOptions,
  type ResetOptions,
} from './state-store.js';

// Dedup, quota, diversity
export { isNew, markSeen, filterNew } from './dedup.js';
export {
  dayKeyFor,
  createQuota,
  remaining,
  msLeftInDay,
  steadySpacingMs,
  canSpend,
  spend,
  rollDay,
  type SpendOptions,
  type RollResult,
} from './quota.js';
export { selectNext, groupByCategory, rankCategories, recordTopics, type Selection } from './diversity.js';

// Scheduler
export {
  Scheduler,
  type AnalysisMode,
  type SchedulerState,
  type AnalysisOutcome,
  type SchedulerConfig,
  type SchedulerDeps,
  type TickReport,
  type SchedulerStatus,
} from './scheduler.js';

// Cache
export { TtlCache } from './cache.js';
