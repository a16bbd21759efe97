/**
 * Intent router
 *
 * Maps an utterance (plus the user's current preferences) to an ordered plan
 * of catalog tool calls. The router is a pure function of its inputs: the same
 * utterance and context always produce the same plan.
 *
 * Compound utterances become either one `search_films` call (`compound`) or a
 * chain of single-criterion calls ordered by selectivity, title > actor >
 * genre > rating (`chain`).
 */

import type { CatalogVocabulary } from '../types/film.js';
import type { Preference } from '../types/preference.js';
import type { SearchFilmsArgs, ToolCall, ToolPlan } from '../types/tool.js';
import type { RouterConfig } from '../types/config.js';
import { NoToolMatchError } from './errors.js';
import { analyzeUtterance, raiseThreshold } from './intent-parser.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('IntentRouter');

export type CompoundStrategy = RouterConfig['compoundStrategy'];

export interface RouteContext {
  preferences: readonly Preference[];
}

/** A resolved rating bound */
export interface RatingBound {
  min: number;
  max?: number;
  exclusive: boolean;
}

/** Search criteria found in an utterance, each list in text order */
export interface SearchCriteria {
  titles: string[];
  actors: string[];
  genres: string[];
  rating: RatingBound | null;
}

export interface IntentRouterOptions {
  compoundStrategy?: CompoundStrategy;
}

function pushUnique(target: string[], values: string[]): void {
  for (const value of values) {
    if (!target.some((v) => v.toLowerCase() === value.toLowerCase())) {
      target.push(value);
    }
  }
}

function currentRatingMin(preferences: readonly Preference[]): number | null {
  const row = preferences
    .filter((p) => p.type === 'rating_min')
    .reduce<Preference | null>((best, p) => (best === null || p.confidence > best.confidence ? p : best), null);
  if (!row) return null;
  const value = Number.parseFloat(row.value);
  return Number.isNaN(value) ? null : value;
}

function criterionCount(criteria: SearchCriteria): number {
  return criteria.titles.length + criteria.actors.length + criteria.genres.length + (criteria.rating ? 1 : 0);
}

function ratingCall(rating: RatingBound): ToolCall {
  return {
    name: 'search_by_rating',
    args: {
      min_rating: rating.min,
      ...(rating.max !== undefined ? { max_rating: rating.max } : {}),
      ...(rating.exclusive ? { exclusive: true } : {}),
    },
  };
}

/** One call per criterion, most selective first */
function singleCriterionCalls(criteria: SearchCriteria): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const title of criteria.titles) {
    calls.push({ name: 'search_by_title', args: { title } });
  }
  for (const actor of criteria.actors) {
    calls.push({ name: 'search_by_actor', args: { actor_name: actor } });
  }
  for (const genre of criteria.genres) {
    calls.push({ name: 'search_by_genre', args: { genre } });
  }
  if (criteria.rating) {
    calls.push(ratingCall(criteria.rating));
  }
  return calls;
}

function compoundCall(criteria: SearchCriteria): ToolCall {
  const args: SearchFilmsArgs = {};
  const [title] = criteria.titles;
  const [actor] = criteria.actors;
  const [genre] = criteria.genres;
  if (title !== undefined) args.title = title;
  if (actor !== undefined) args.actor_name = actor;
  if (genre !== undefined) args.genre = genre;
  if (criteria.rating) {
    args.min_rating = criteria.rating.min;
    if (criteria.rating.max !== undefined) args.max_rating = criteria.rating.max;
    if (criteria.rating.exclusive) args.exclusive = true;
  }
  return { name: 'search_films', args };
}

export class IntentRouter {
  private vocabulary: CatalogVocabulary;
  private readonly compoundStrategy: CompoundStrategy;

  constructor(vocabulary: CatalogVocabulary, options: IntentRouterOptions = {}) {
    this.vocabulary = vocabulary;
    this.compoundStrategy = options.compoundStrategy ?? 'compound';
  }

  /** Replace the catalog names used for matching (after seeding) */
  setVocabulary(vocabulary: CatalogVocabulary): void {
    this.vocabulary = vocabulary;
  }

  /**
   * Criteria the utterance asks for. Clauses with a negative cue
   * ("I don't like horror") do not contribute.
   */
  extractCriteria(utterance: string, context: RouteContext): SearchCriteria {
    const criteria: SearchCriteria = { titles: [], actors: [], genres: [], rating: null };

    for (const clause of analyzeUtterance(utterance, this.vocabulary)) {
      if (clause.polarity === 'negative') continue;

      pushUnique(criteria.titles, clause.titles);
      pushUnique(criteria.actors, clause.actors);
      pushUnique(criteria.genres, clause.genres);

      if (!criteria.rating && clause.rating) {
        const { rating } = clause;
        if (rating.source === 'corrective') {
          criteria.rating = {
            min: raiseThreshold(currentRatingMin(context.preferences)),
            exclusive: false,
          };
        } else if (rating.min !== undefined || rating.max !== undefined) {
          criteria.rating = {
            min: rating.min ?? 0,
            ...(rating.max !== undefined ? { max: rating.max } : {}),
            exclusive: rating.exclusive,
          };
        }
      }
    }

    return criteria;
  }

  /**
   * Plan the tool calls for an utterance.
   *
   * @throws NoToolMatchError when the utterance names no searchable criterion
   */
  route(utterance: string, context: RouteContext): ToolPlan {
    const criteria = this.extractCriteria(utterance, context);
    const count = criterionCount(criteria);

    if (count === 0) {
      log.debug({ utterance: utterance.slice(0, 80) }, 'no tool match');
      throw new NoToolMatchError(utterance);
    }

    let plan: ToolPlan;
    if (count === 1) {
      plan = { calls: singleCriterionCalls(criteria), mode: 'independent' };
    } else {
      const fitsOneCall = criteria.titles.length <= 1
        && criteria.actors.length <= 1
        && criteria.genres.length <= 1;

      plan = this.compoundStrategy === 'compound' && fitsOneCall
        ? { calls: [compoundCall(criteria)], mode: 'independent' }
        : { calls: singleCriterionCalls(criteria), mode: 'chain' };
    }

    log.debug(
      { tools: plan.calls.map((c) => c.name), mode: plan.mode },
      'utterance routed',
    );
    return plan;
  }
}
