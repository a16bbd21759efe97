/**
 * Preference store
 *
 * Durable, confidence-weighted facts about a user's taste, one row per
 * (user, type, value). Persistence is delegated to the StorageProvider; this
 * module owns the merge arithmetic.
 *
 * Every write may carry a signal id (the turn that produced it). A row whose
 * last signal id equals the incoming one is left untouched, so re-running the
 * same turn never double-counts.
 */

import type { StorageProvider } from '../storage/storage-provider.js';
import type {
  Preference,
  PreferenceType,
  UpsertPreferenceOptions,
} from '../types/preference.js';
import { reinforce, weaken, clampConfidence } from './confidence.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('PreferenceStore');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DecayOptions {
  /** Rows not updated within this window decay */
  horizonMs: number;
  /** Multiplier applied to stale rows */
  factor: number;
}

export interface PreferenceStoreOptions {
  /** Clock, replaceable in tests */
  now?: () => number;
  decay?: DecayOptions;
}

/** Default decay: rows idle for 30 days lose 20% */
export const DEFAULT_DECAY: DecayOptions = {
  horizonMs: 30 * DAY_MS,
  factor: 0.8,
};

function normalizeValue(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

function sameValue(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class PreferenceStore {
  private readonly now: () => number;
  private readonly decayOptions: DecayOptions;

  constructor(
    private readonly storage: StorageProvider,
    options: PreferenceStoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.decayOptions = options.decay ?? DEFAULT_DECAY;
  }

  /**
   * All current preferences, ordered by type then confidence desc.
   * An unknown user has none.
   */
  async getPreferences(userId: string): Promise<Preference[]> {
    return this.storage.listPreferences(userId);
  }

  /** Rows of one type, highest confidence first */
  async getByType(userId: string, type: PreferenceType): Promise<Preference[]> {
    return this.storage.listPreferences(userId, type);
  }

  /** The highest-confidence row of a type, or null */
  async current(userId: string, type: PreferenceType): Promise<Preference | null> {
    const rows = await this.storage.listPreferences(userId, type);
    return rows[0] ?? null;
  }

  /**
   * Insert or merge the (user, type, value) row.
   *
   * New rows start at `confidenceDelta`. Existing rows are reinforced
   * (`mode: 'reinforce'`, the default) or set to `confidenceDelta`
   * (`mode: 'reset'`). Values match case-insensitively and keep the stored
   * spelling.
   */
  async upsertPreference(
    userId: string,
    type: PreferenceType,
    value: string,
    confidenceDelta: number,
    options: UpsertPreferenceOptions = {},
  ): Promise<Preference> {
    const mode = options.mode ?? 'reinforce';
    const normalized = normalizeValue(value);
    const now = this.now();
    let unchanged: Preference | null = null;

    const written = await this.storage.updatePreferences(userId, type, (rows) => {
      const existing = rows.find((row) => sameValue(row.value, normalized));

      if (existing && options.signalId !== undefined && existing.lastSignalId === options.signalId) {
        unchanged = existing;
        return [];
      }

      const confidence = !existing
        ? clampConfidence(confidenceDelta)
        : mode === 'reset'
          ? clampConfidence(confidenceDelta)
          : reinforce(existing.confidence, confidenceDelta);

      return [{
        value: existing?.value ?? normalized,
        confidence,
        lastSignalId: options.signalId,
        now,
      }];
    });

    const result = written[0] ?? unchanged;
    if (!result) {
      // updatePreferences returned nothing and no row was matched
      throw new Error(`Preference upsert produced no row: ${type}=${normalized}`);
    }

    log.debug(
      { userId, type, value: result.value, confidence: result.confidence, mode, skipped: written.length === 0 },
      'preference upserted',
    );
    return result;
  }

  /**
   * Scale down rows of a type. With `except`, every value but that one is
   * weakened; with `only`, just that value. Rows already written by the same
   * signal are skipped.
   */
  async weaken(
    userId: string,
    type: PreferenceType,
    factor: number,
    selector: { except?: string; only?: string; signalId?: string },
  ): Promise<Preference[]> {
    const now = this.now();

    const written = await this.storage.updatePreferences(userId, type, (rows) =>
      rows
        .filter((row) => selector.except === undefined || !sameValue(row.value, selector.except))
        .filter((row) => selector.only === undefined || sameValue(row.value, selector.only))
        .filter((row) => selector.signalId === undefined || row.lastSignalId !== selector.signalId)
        .map((row) => ({
          value: row.value,
          confidence: weaken(row.confidence, factor),
          lastSignalId: selector.signalId ?? row.lastSignalId,
          now,
        })),
    );

    if (written.length > 0) {
      log.debug({ userId, type, count: written.length, factor }, 'preferences weakened');
    }
    return written;
  }

  /**
   * Lower the confidence of rows of a type not updated within the horizon.
   *
   * Decayed rows get a fresh updatedAt, so each row decays at most once per
   * horizon. Returns the decayed rows.
   */
  async decay(userId: string, type: PreferenceType, options: Partial<DecayOptions> = {}): Promise<Preference[]> {
    const horizonMs = options.horizonMs ?? this.decayOptions.horizonMs;
    const factor = options.factor ?? this.decayOptions.factor;
    const now = this.now();

    const written = await this.storage.updatePreferences(userId, type, (rows) =>
      rows
        .filter((row) => now - row.updatedAt >= horizonMs)
        .map((row) => ({
          value: row.value,
          confidence: weaken(row.confidence, factor),
          lastSignalId: row.lastSignalId,
          now,
        })),
    );

    if (written.length > 0) {
      log.info({ userId, type, count: written.length }, 'stale preferences decayed');
    }
    return written;
  }
}
