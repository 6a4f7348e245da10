/**
 * Burst/Cadence Scheduler
 *
 * Tick-driven state machine. Every tick runs a whale scan; independently, the
 * analysis pass spends the daily AI quota:
 *
 *   BURST_ANALYSIS  --burst used, quota left-->  STEADY_ANALYSIS
 *   BURST_ANALYSIS  --quota hits 0----------->  QUOTA_EXHAUSTED
 *   STEADY_ANALYSIS --quota hits 0----------->  QUOTA_EXHAUSTED
 *   any             --new calendar day------->  BURST_ANALYSIS
 *
 * Burst calls go back to back; steady calls spread what is left over the rest
 * of the day. Market data for one tick shares a single `externalTimeoutMs`
 * budget, so the candidate pass never uses a snapshot the whale scan gave up on.
 *
 * Ticks, status reads and resets run one at a time on an internal queue.
 * Bookkeeping for an alert or a spend is persisted before the external call
 * it stands for.
 */

import { createLogger } from '../utils/index.js';
import { withTimeout } from '../utils/timeout.js';
import { detectWhales } from '../detectors/whale.js';
import { cooldownKey, eligibleCandidates, pruneAnalyzed } from '../processors/activity.js';
import { formatInsight, formatWhaleAlert } from '../output/format.js';
import { filterNew, markSeen } from './dedup.js';
import { recordTopics, selectNext } from './diversity.js';
import { canSpend, dayKeyFor, remaining, rollDay, spend, steadySpacingMs } from './quota.js';
import { TransientDataError, describeError } from './errors.js';
import type { ResetOptions, StateStore } from './state-store.js';
import type {
  AnalysisEngine,
  AnalysisResult,
  Candidate,
  Category,
  MarketDataSource,
  NotificationTransport,
  OutboundMessage,
  QuotaLimits,
  RawMarketActivity,
  RawTrade,
  WhaleEvent,
} from './types.js';

const logger = createLogger('scheduler');

// =============================================================================
// TYPES
// =============================================================================

export type AnalysisMode = 'BURST_ANALYSIS' | 'STEADY_ANALYSIS' | 'QUOTA_EXHAUSTED';
export type SchedulerState = 'IDLE' | 'WHALE_SCAN' | AnalysisMode;

export type AnalysisOutcome =
  | 'analyzed'       // quota spent, result delivered
  | 'failed'         // quota spent, engine failed
  | 'no-quota'
  | 'spacing'        // steady mode, too soon since the last call
  | 'no-data'        // candidate fetch failed
  | 'no-candidates'
  | 'stopped';

export interface SchedulerConfig {
  timezone: string;
  whaleThreshold: number;
  maxDailyCalls: number;
  minSecondsBetweenCalls: number;
  burstCount: number;
  diversityWindow: number;
  seenRegistryLimit: number;
  candidateCooldownMs: number;
  externalTimeoutMs: number;
}

export interface SchedulerDeps {
  store: StateStore;
  source: MarketDataSource;
  engine: AnalysisEngine;
  transport: NotificationTransport;
  config: SchedulerConfig;
  clock?: () => Date;
}

export interface TickReport {
  skipped: boolean;
  dayKey: string;
  dayRolled: boolean;
  whaleAlerts: WhaleEvent[];
  analyzedCandidate: Candidate | null;
  analysisOutcome: AnalysisOutcome;
  mode: AnalysisMode;
  remaining: number;
}

export interface SchedulerStatus {
  state: SchedulerState;
  mode: AnalysisMode;
  dayKey: string;
  callsUsedToday: number;
  maxDaily: number;
  remaining: number;
  lastCallAt: number;
  burstSpent: number;
  burstCount: number;
  seenCount: number;
  topicHistory: Category[];
}

interface AnalysisPass {
  outcome: AnalysisOutcome;
  candidate: Candidate | null;
}

/** Analysis log entries are kept this long. */
const ANALYZED_RETENTION_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// SCHEDULER
// =============================================================================

export class Scheduler {
  private readonly store: StateStore;
  private readonly source: MarketDataSource;
  private readonly engine: AnalysisEngine;
  private readonly transport: NotificationTransport;
  private readonly config: SchedulerConfig;
  private readonly limits: QuotaLimits;
  private readonly clock: () => Date;

  private analysisMode: AnalysisMode = 'BURST_ANALYSIS';
  private activity: 'IDLE' | 'WHALE_SCAN' | 'ANALYSIS' = 'IDLE';
  private burstSpent = 0;
  private stopping = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: SchedulerDeps) {
    this.store = deps.store;
    this.source = deps.source;
    this.engine = deps.engine;
    this.transport = deps.transport;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
    this.limits = {
      maxDaily: deps.config.maxDailyCalls,
      minSecondsBetweenCalls: deps.config.minSecondsBetweenCalls,
    };
  }

  get mode(): AnalysisMode {
    return this.analysisMode;
  }

  get state(): SchedulerState {
    if (this.activity === 'IDLE') return 'IDLE';
    if (this.activity === 'WHALE_SCAN') return 'WHALE_SCAN';
    return this.analysisMode;
  }

  /**
   * Run one tick. Rejects only when state could not be persisted.
   */
  tick(now?: Date): Promise<TickReport> {
    return this.enqueue(() => this.runTick(now ?? this.clock()));
  }

  status(): Promise<SchedulerStatus> {
    return this.enqueue(async () => this.buildStatus());
  }

  /**
   * Operator re-scan: clears seen whales and today's quota, re-enters burst mode.
   */
  reset(options: ResetOptions = {}): Promise<SchedulerStatus> {
    return this.enqueue(async () => {
      this.store.reset(options);
      this.enterBurst('reset');
      return this.buildStatus();
    });
  }

  /**
   * Refuse new ticks and wait for the in-flight one to persist.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.queue;
  }

  // ===========================================================================
  // TICK
  // ===========================================================================

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runTick(now: Date): Promise<TickReport> {
    const dayKey = dayKeyFor(now, this.config.timezone);

    if (this.stopping) {
      logger.debug('Scheduler stopping, tick skipped');
      return this.report(dayKey, false, [], { outcome: 'stopped', candidate: null });
    }

    const dataDeadline = Date.now() + this.config.externalTimeoutMs;

    try {
      const dayRolled = this.rollDayIfNeeded(dayKey, now.getTime());

      this.activity = 'WHALE_SCAN';
      const whaleAlerts = await this.scanWhales(dataDeadline);

      this.activity = 'ANALYSIS';
      const analysis = await this.runAnalysis(now.getTime(), dataDeadline);

      return this.report(dayKey, dayRolled, whaleAlerts, analysis);
    } finally {
      this.activity = 'IDLE';
    }
  }

  private report(
    dayKey: string,
    dayRolled: boolean,
    whaleAlerts: WhaleEvent[],
    analysis: AnalysisPass
  ): TickReport {
    return {
      skipped: analysis.outcome === 'stopped',
      dayKey,
      dayRolled,
      whaleAlerts,
      analyzedCandidate: analysis.candidate,
      analysisOutcome: analysis.outcome,
      mode: this.analysisMode,
      remaining: remaining(this.store.snapshot().quota, this.limits),
    };
  }

  /**
   * Adopt today's key and prune the analysis log. Returns true on rollover.
   */
  private rollDayIfNeeded(todayKey: string, nowMs: number): boolean {
    const state = this.store.snapshot();
    const { rolled } = rollDay(state.quota, todayKey);
    const pruned = pruneAnalyzed(state.analyzed, nowMs, ANALYZED_RETENTION_MS);
    const prunedAny = Object.keys(pruned).length !== Object.keys(state.analyzed).length;

    if (rolled || prunedAny) {
      this.store.commit(draft => {
        draft.quota = rollDay(draft.quota, todayKey).quota;
        draft.analyzed = pruned;
      });
    }

    if (rolled) {
      logger.info(`New day ${todayKey} (was ${state.quota.dayKey}): AI quota reset`);
      this.enterBurst('day rollover');
    }

    return rolled;
  }

  // ===========================================================================
  // WHALE SCAN
  // ===========================================================================

  private async scanWhales(dataDeadline: number): Promise<WhaleEvent[]> {
    let trades: RawTrade[];
    try {
      trades = await this.fetchBefore(
        dataDeadline,
        () => this.source.fetchRecentTrades(),
        'fetchRecentTrades'
      );
    } catch (error) {
      logger.warn(`Whale scan skipped this tick: ${describeError(error)}`);
      return [];
    }

    const whales = detectWhales(trades, this.config.whaleThreshold);
    const novel = filterNew(whales, this.store.snapshot().seen);
    if (novel.length === 0) {
      logger.debug(`Whale scan: ${trades.length} trades, ${whales.length} whales, none new`);
      return [];
    }

    this.store.commit(draft => {
      for (const event of novel) {
        draft.seen = markSeen(event.id, draft.seen, this.config.seenRegistryLimit);
      }
    });

    for (const event of novel) {
      const delivered = await this.deliver({
        kind: 'whale',
        content: formatWhaleAlert(event, this.config.whaleThreshold),
      });
      logger.info(
        `Whale alert: $${event.notional.toFixed(0)} ${event.side} on "${event.eventTitle}" ` +
        `(${delivered} destinations)`
      );
    }

    return novel;
  }

  // ===========================================================================
  // ANALYSIS
  // ===========================================================================

  private async runAnalysis(nowMs: number, dataDeadline: number): Promise<AnalysisPass> {
    if (this.analysisMode === 'BURST_ANALYSIS' && this.burstSpent >= this.config.burstCount) {
      this.enterMode('STEADY_ANALYSIS', 'burst complete');
    }

    if (this.analysisMode === 'QUOTA_EXHAUSTED') {
      return { outcome: 'no-quota', candidate: null };
    }

    const state = this.store.snapshot();
    if (remaining(state.quota, this.limits) === 0) {
      this.enterMode('QUOTA_EXHAUSTED', 'no calls left today');
      return { outcome: 'no-quota', candidate: null };
    }

    const burst = this.analysisMode === 'BURST_ANALYSIS';
    const spacingMs = burst ? 0 : steadySpacingMs(state.quota, nowMs, this.limits, this.config.timezone);
    if (!canSpend(state.quota, nowMs, this.limits, { ignoreSpacing: burst, spacingMs })) {
      logger.debug(`Analysis deferred: steady spacing of ${Math.ceil(spacingMs / 1000)}s not yet elapsed`);
      return { outcome: 'spacing', candidate: null };
    }

    let markets: RawMarketActivity[];
    try {
      markets = await this.fetchBefore(
        dataDeadline,
        () => this.source.fetchCandidates(),
        'fetchCandidates'
      );
    } catch (error) {
      logger.warn(`Candidate fetch failed: ${describeError(error)}`);
      return { outcome: 'no-data', candidate: null };
    }

    const pool = eligibleCandidates(markets, state.analyzed, nowMs, this.config.candidateCooldownMs);
    const { selected } = selectNext(pool, state.topicHistory, 1, this.config.diversityWindow);
    const candidate = selected[0];
    if (!candidate) {
      logger.debug(`No eligible candidates (${markets.length} active markets)`);
      return { outcome: 'no-candidates', candidate: null };
    }

    // Committed before the call: a failed analysis keeps its unit spent.
    const quota = this.store.commit(draft => {
      draft.quota = spend(draft.quota, nowMs, this.limits);
      draft.topicHistory = recordTopics(draft.topicHistory, [candidate.category], this.config.diversityWindow);
      draft.analyzed = { ...draft.analyzed, [cooldownKey(candidate)]: nowMs };
      return draft.quota;
    });
    if (burst) this.burstSpent++;

    logger.info(
      `${burst ? 'BURST' : 'STEADY'}: analyzing "${candidate.question}" ` +
      `(topic ${candidate.category}, score ${candidate.score.toFixed(0)}, ` +
      `budget ${quota.callsUsedToday}/${this.limits.maxDaily})`
    );

    const result = await this.analyze(candidate);
    if (result) {
      await this.deliver({
        kind: 'insight',
        content: formatInsight(candidate, result, {
          used: quota.callsUsedToday,
          max: this.limits.maxDaily,
        }),
      });
    }

    if (remaining(quota, this.limits) === 0) {
      this.enterMode('QUOTA_EXHAUSTED', 'daily quota used');
    } else if (burst && this.burstSpent >= this.config.burstCount) {
      this.enterMode('STEADY_ANALYSIS', 'burst complete');
    }

    return { outcome: result ? 'analyzed' : 'failed', candidate };
  }

  private async analyze(candidate: Candidate): Promise<AnalysisResult | null> {
    try {
      return await withTimeout(
        this.engine.analyze(candidate),
        this.config.externalTimeoutMs,
        `analyze ${candidate.id}`
      );
    } catch (error) {
      logger.warn(`Analysis failed for ${candidate.id}, quota unit stays spent: ${describeError(error)}`);
      return null;
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /**
   * Market data call bounded by what is left of the tick's budget.
   */
  private fetchBefore<T>(deadline: number, fetchData: () => Promise<T>, label: string): Promise<T> {
    const leftMs = deadline - Date.now();
    if (leftMs <= 0) {
      return Promise.reject(new TransientDataError(`${label} skipped: market data budget spent`));
    }
    return withTimeout(fetchData(), leftMs, label);
  }

  /**
   * Broadcast; the transport reports per-destination failures. Returns the number reached.
   */
  private async deliver(message: OutboundMessage): Promise<number> {
    try {
      const report = await withTimeout(
        this.transport.broadcast(message),
        this.config.externalTimeoutMs,
        `broadcast ${message.kind}`
      );
      return report.delivered;
    } catch (error) {
      logger.error(`Broadcast of ${message.kind} failed: ${describeError(error)}`);
      return 0;
    }
  }

  private enterBurst(reason: string): void {
    this.burstSpent = 0;
    this.enterMode('BURST_ANALYSIS', reason);
  }

  private enterMode(mode: AnalysisMode, reason: string): void {
    if (mode === this.analysisMode) return;
    logger.info(`Scheduler: ${this.analysisMode} -> ${mode} (${reason})`);
    this.analysisMode = mode;
  }

  private buildStatus(): SchedulerStatus {
    const state = this.store.snapshot();
    return {
      state: this.state,
      mode: this.analysisMode,
      dayKey: state.quota.dayKey,
      callsUsedToday: state.quota.callsUsedToday,
      maxDaily: this.limits.maxDaily,
      remaining: remaining(state.quota, this.limits),
      lastCallAt: state.quota.lastCallAt,
      burstSpent: this.burstSpent,
      burstCount: this.config.burstCount,
      seenCount: state.seen.size,
      topicHistory: [...state.topicHistory],
    };
  }
}
