/**
 * Preference extractor
 *
 * Derives preference signals from one completed turn and merges them into the
 * preference store:
 *
 * - explicit: "I love thrillers", "I only watch films rated 8 or more"
 * - negative: "I don't like horror"
 * - corrective: "no, something with a higher rating"
 * - implicit: the genres, actors and rating thresholds the turn searched for
 * - name: "my name is Ada"
 *
 * Every write carries the turn id as its signal id, so extracting the same
 * turn twice changes nothing the second time. Extraction never throws.
 */

import type { CatalogVocabulary } from '../types/film.js';
import { isExclusiveType, type Preference, type PreferenceType } from '../types/preference.js';
import type { ToolPlan } from '../types/tool.js';
import type { PreferenceStore } from '../memory/preference-store.js';
import { CONFIDENCE_POLICY } from '../memory/confidence.js';
import type { UserStore } from './user-store.js';
import { ExtractionFailureError, toError } from './errors.js';
import {
  analyzeUtterance,
  formatScore,
  hasCorrectionCue,
  hasStandardCue,
  parseName,
  raiseThreshold,
} from './intent-parser.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('PreferenceExtractor');

export type SignalKind = 'explicit' | 'negative' | 'corrective' | 'implicit';

/** One preference signal found in a turn */
export interface PreferenceSignal {
  kind: SignalKind;
  type: PreferenceType;
  value: string;
}

export interface ExtractionInput {
  userId: string;
  /** Signal id for every write */
  turnId: string;
  utterance: string;
  /** The plan that was executed, or null when no tool ran */
  plan: ToolPlan | null;
  /** Preferences as they were when the turn started */
  preferences: readonly Preference[];
}

export interface ExtractionResult {
  signals: PreferenceSignal[];
  /** Rows as they stand after each write (a repeated signal leaves them unchanged) */
  written: Preference[];
  displayName?: string;
  /** Set when extraction failed part-way */
  error?: ExtractionFailureError;
}

function currentRatingMin(preferences: readonly Preference[]): Preference | null {
  return preferences
    .filter((p) => p.type === 'rating_min')
    .reduce<Preference | null>((best, p) => (best === null || p.confidence > best.confidence ? p : best), null);
}

function parseThreshold(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number.parseFloat(value);
  return Number.isNaN(n) ? null : n;
}

function sameValue(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class PreferenceExtractor {
  private vocabulary: CatalogVocabulary;

  constructor(
    private readonly preferences: PreferenceStore,
    private readonly users: UserStore,
    vocabulary: CatalogVocabulary,
  ) {
    this.vocabulary = vocabulary;
  }

  setVocabulary(vocabulary: CatalogVocabulary): void {
    this.vocabulary = vocabulary;
  }

  /** Signals in a turn, without writing anything */
  detect(input: ExtractionInput): PreferenceSignal[] {
    const signals: PreferenceSignal[] = [];
    const seen = new Set<string>();
    const add = (signal: PreferenceSignal): void => {
      const key = `${signal.type}\u0000${signal.value.toLowerCase()}`;
      if (seen.has(key)) return;
      seen.add(key);
      signals.push(signal);
    };

    const current = currentRatingMin(input.preferences);
    const clauses = analyzeUtterance(input.utterance, this.vocabulary);
    let ratingStated = false;

    for (const clause of clauses) {
      if (clause.polarity === 'negative') {
        clause.genres.forEach((value) => add({ kind: 'negative', type: 'genre', value }));
        clause.actors.forEach((value) => add({ kind: 'negative', type: 'actor', value }));
        continue;
      }

      if (clause.polarity === 'positive') {
        clause.genres.forEach((value) => add({ kind: 'explicit', type: 'genre', value }));
        clause.actors.forEach((value) => add({ kind: 'explicit', type: 'actor', value }));
      }

      const rating = clause.rating;
      if (!rating || ratingStated) continue;

      if (rating.source === 'corrective' && (hasCorrectionCue(input.utterance) || hasCorrectionCue(clause.text))) {
        const raised = raiseThreshold(parseThreshold(current?.value));
        add({ kind: 'corrective', type: 'rating_min', value: formatScore(raised) });
        ratingStated = true;
      } else if (rating.min !== undefined && hasStandardCue(clause.text)) {
        add({ kind: 'explicit', type: 'rating_min', value: formatScore(rating.min) });
        ratingStated = true;
      }
    }

    for (const call of input.plan?.calls ?? []) {
      switch (call.name) {
        case 'search_by_genre':
          add({ kind: 'implicit', type: 'genre', value: call.args.genre });
          break;
        case 'search_by_actor':
          add({ kind: 'implicit', type: 'actor', value: call.args.actor_name });
          break;
        case 'search_by_rating':
          if (!ratingStated && call.args.min_rating > 0) {
            add({ kind: 'implicit', type: 'rating_min', value: formatScore(call.args.min_rating) });
          }
          break;
        case 'search_films':
          if (call.args.genre !== undefined) add({ kind: 'implicit', type: 'genre', value: call.args.genre });
          if (call.args.actor_name !== undefined) add({ kind: 'implicit', type: 'actor', value: call.args.actor_name });
          if (!ratingStated && call.args.min_rating !== undefined && call.args.min_rating > 0) {
            add({ kind: 'implicit', type: 'rating_min', value: formatScore(call.args.min_rating) });
          }
          break;
        case 'search_by_title':
          break;
      }
    }

    // Negative mentions win over implicit ones from the same turn
    const negatives = signals.filter((s) => s.kind === 'negative');
    return signals.filter((s) =>
      s.kind !== 'implicit' || !negatives.some((n) => n.type === s.type && sameValue(n.value, s.value)),
    );
  }

  /**
   * Detect and merge the signals of one turn.
   *
   * Failures are logged and reported on the result, never thrown.
   */
  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const result: ExtractionResult = { signals: [], written: [] };

    try {
      const displayName = parseName(input.utterance);
      if (displayName) {
        await this.users.setDisplayName(input.userId, displayName);
        result.displayName = displayName;
      }

      result.signals = this.detect(input);
      const current = currentRatingMin(input.preferences);

      for (const signal of result.signals) {
        const rows = await this.apply(input, signal, current);
        result.written.push(...rows);
      }

      if (result.signals.length > 0) {
        log.debug(
          { userId: input.userId, turnId: input.turnId, signals: result.signals.length, written: result.written.length },
          'preferences extracted',
        );
      }
    } catch (err) {
      const error = new ExtractionFailureError(input.userId, { cause: toError(err) });
      log.warn({ err: error, userId: input.userId, turnId: input.turnId }, 'preference extraction failed');
      result.error = error;
    }

    return result;
  }

  private async apply(
    input: ExtractionInput,
    signal: PreferenceSignal,
    current: Preference | null,
  ): Promise<Preference[]> {
    const { userId, turnId: signalId } = input;
    const { type, value } = signal;

    switch (signal.kind) {
      case 'negative':
        return this.preferences.weaken(userId, type, CONFIDENCE_POLICY.negativeFactor, { only: value, signalId });

      case 'explicit':
      case 'corrective':
        if (isExclusiveType(type)) {
          // Older thresholds stay, at lower confidence
          const weakened = await this.preferences.weaken(
            userId,
            type,
            CONFIDENCE_POLICY.contradictionFactor,
            { except: value, signalId },
          );
          const row = await this.preferences.upsertPreference(
            userId,
            type,
            value,
            CONFIDENCE_POLICY.explicitExclusive,
            { mode: 'reset', signalId },
          );
          return [...weakened, row];
        }
        return [
          await this.preferences.upsertPreference(userId, type, value, CONFIDENCE_POLICY.explicitAdditive, { signalId }),
        ];

      case 'implicit':
        if (isExclusiveType(type)) {
          // Implicit signals never move the current value
          if (current !== null && !sameValue(current.value, value)) return [];
        }
        return [
          await this.preferences.upsertPreference(userId, type, value, CONFIDENCE_POLICY.implicit, { signalId }),
        ];
    }
  }
}
