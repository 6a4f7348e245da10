/**
 * Wires configuration to the scheduler: state file, market source, analysis
 * engine and destinations.
 */

import {
  FileStorageBackend,
  Scheduler,
  StateStore,
  type AnalysisEngine,
  type MarketDataSource,
  type NotificationTransport,
  type StorageBackend,
} from './core/index.js';
import { ClaudeAnalysisEngine } from './analysis/index.js';
import { PolymarketSource } from './sources/polymarket.js';
import { createTransport } from './output/index.js';
import type { WatcherConfig } from './config.js';

export interface Watcher {
  store: StateStore;
  scheduler: Scheduler;
  transport: NotificationTransport;
}

/** Replace any collaborator, for tests and dry runs. */
export interface WatcherOverrides {
  backend?: StorageBackend;
  source?: MarketDataSource;
  engine?: AnalysisEngine;
  transport?: NotificationTransport;
  clock?: () => Date;
  /** HTTP client for the market source and the destinations */
  fetchImpl?: typeof fetch;
}

/** Share of the per-tick data budget a snapshot may use, so it settles before the scheduler gives up. */
const SNAPSHOT_BUDGET_SHARE = 0.8;

export function createWatcher(config: WatcherConfig, overrides: WatcherOverrides = {}): Watcher {
  const clock = overrides.clock ?? (() => new Date());

  const store = new StateStore(overrides.backend ?? new FileStorageBackend(config.stateFile), {
    timezone: config.timezone,
    clock,
  });

  const source = overrides.source ?? new PolymarketSource({
    trackedCategories: config.trackedCategories,
    expiryWindowHours: config.expiryWindowHours,
    timeoutMs: Math.floor(config.externalTimeoutMs * SNAPSHOT_BUDGET_SHARE),
    snapshotTtlMs: Math.floor(config.tickIntervalMs / 2),
    fetchImpl: overrides.fetchImpl,
  });

  const engine = overrides.engine ?? new ClaudeAnalysisEngine({
    model: config.analysisModel,
    maxTurns: config.analysisMaxTurns,
    timeoutMs: config.externalTimeoutMs,
  });

  const transport = overrides.transport ?? createTransport(config, overrides.fetchImpl);

  const scheduler = new Scheduler({ store, source, engine, transport, config, clock });

  return { store, scheduler, transport };
}
