/**
 * Persistent State Store
 *
 * Owns the single in-memory PersistedState and its durable copy. Every
 * mutation goes through commit(): the change is applied to a draft, the draft
 * is written with the backend's atomic replace, and only then does it become
 * the current state. A failed write leaves both disk and memory untouched.
 *
 * Uses JSON file storage (temp file + rename) by default.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/index.js';
import { CorruptStateError, StatePersistError, describeError } from './errors.js';
import { createQuota, dayKeyFor } from './quota.js';
import type { PersistedState, StorageBackend } from './types.js';

const logger = createLogger('state');

// =============================================================================
// STORAGE BACKENDS
// =============================================================================

/**
 * Single JSON file. Writes go to `<path>.tmp` and are renamed over the target,
 * so a crash mid-write leaves the previous snapshot intact.
 */
export class FileStorageBackend implements StorageBackend {
  constructor(private readonly path: string) {}

  read(): string | null {
    if (!existsSync(this.path)) return null;
    return readFileSync(this.path, 'utf-8');
  }

  replace(blob: string): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, blob, 'utf-8');
    renameSync(tmp, this.path);
  }

  describe(): string {
    return this.path;
  }
}

/**
 * In-process backend for tests and dry runs.
 */
export class MemoryStorageBackend implements StorageBackend {
  writes = 0;

  constructor(private blob: string | null = null) {}

  read(): string | null {
    return this.blob;
  }

  replace(blob: string): void {
    this.blob = blob;
    this.writes++;
  }

  describe(): string {
    return 'memory';
  }
}

// =============================================================================
// SERIALIZED FORMAT
// =============================================================================

const storedStateSchema = z.object({
  version: z.literal(1),
  seen: z.array(z.string()),
  quota: z.object({
    callsUsedToday: z.number().int().nonnegative(),
    dayKey: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    lastCallAt: z.number().nonnegative(),
  }),
  topicHistory: z.array(z.string()).default([]),
  analyzed: z.record(z.string(), z.number()).default({}),
});

type StoredState = z.infer<typeof storedStateSchema>;

function serialize(state: PersistedState): string {
  const stored: StoredState = {
    version: state.version,
    seen: [...state.seen],
    quota: { ...state.quota },
    topicHistory: [...state.topicHistory],
    analyzed: { ...state.analyzed },
  };
  return JSON.stringify(stored, null, 2);
}

function deserialize(blob: string): PersistedState {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    throw new CorruptStateError('State blob is not valid JSON', error);
  }

  const parsed = storedStateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new CorruptStateError(`State blob failed validation: ${issues.join('; ')}`, parsed.error);
  }

  return {
    version: 1,
    seen: new Set(parsed.data.seen),
    quota: parsed.data.quota,
    topicHistory: parsed.data.topicHistory,
    analyzed: parsed.data.analyzed,
  };
}

// =============================================================================
// STATE STORE
// =============================================================================

export interface StateStoreOptions {
  /** Reference timezone for the day key of a fresh quota. */
  timezone: string;
  clock?: () => Date;
}

export interface ResetOptions {
  clearTopicHistory?: boolean;
}

export class StateStore {
  private state: PersistedState | null = null;
  private readonly timezone: string;
  private readonly clock: () => Date;

  constructor(
    private readonly backend: StorageBackend,
    options: StateStoreOptions
  ) {
    this.timezone = options.timezone;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Empty-but-valid state for the current day.
   */
  defaultState(): PersistedState {
    return {
      version: 1,
      seen: new Set(),
      quota: createQuota(dayKeyFor(this.clock(), this.timezone)),
      topicHistory: [],
      analyzed: {},
    };
  }

  /**
   * Read and validate the durable snapshot. Throws CorruptStateError.
   */
  load(): PersistedState {
    let blob: string | null;
    try {
      blob = this.backend.read();
    } catch (error) {
      throw new CorruptStateError(`Cannot read state from ${this.backend.describe()}`, error);
    }
    return blob === null ? this.defaultState() : deserialize(blob);
  }

  /**
   * Startup path: load, falling back to defaults when the snapshot is corrupt.
   */
  open(): PersistedState {
    try {
      this.state = this.load();
    } catch (error) {
      if (!(error instanceof CorruptStateError)) throw error;
      logger.error(`CORRUPT STATE at ${this.backend.describe()}: ${describeError(error)}`);
      logger.error('Starting from an empty state; previously alerted whales may be re-announced');
      this.state = this.defaultState();
    }

    logger.info(
      `Loaded state: ${this.state.seen.size} seen whales, ` +
      `${this.state.quota.callsUsedToday} AI calls on ${this.state.quota.dayKey}`
    );
    return this.snapshot();
  }

  /**
   * Deep copy of the current state.
   */
  snapshot(): PersistedState {
    return structuredClone(this.current());
  }

  /**
   * Atomically replace the durable snapshot, then adopt `state` in memory.
   * Throws StatePersistError when the backend write fails.
   */
  save(state: PersistedState): void {
    try {
      this.backend.replace(serialize(state));
    } catch (error) {
      throw new StatePersistError(`Failed to persist state to ${this.backend.describe()}`, error);
    }
    this.state = structuredClone(state);
  }

  /**
   * Apply `mutate` to a draft and persist it. If `mutate` throws or the save
   * fails, the current state is unchanged.
   */
  commit<R>(mutate: (draft: PersistedState) => R): R {
    const draft = structuredClone(this.current());
    const result = mutate(draft);
    this.save(draft);
    return result;
  }

  /**
   * Operator-triggered re-scan: forget alerted whales, quota and the analysis
   * log; topic history only when asked.
   */
  reset(options: ResetOptions = {}): PersistedState {
    const fresh = this.defaultState();
    this.commit(draft => {
      draft.seen = fresh.seen;
      draft.quota = fresh.quota;
      draft.analyzed = {};
      if (options.clearTopicHistory) {
        draft.topicHistory = [];
      }
    });
    logger.info(`State reset${options.clearTopicHistory ? ' (including topic history)' : ''}`);
    return this.snapshot();
  }

  private current(): PersistedState {
    if (this.state === null) {
      return this.open();
    }
    return this.state;
  }
}
