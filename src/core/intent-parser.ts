/**
 * Utterance parsing
 *
 * Pattern matching shared by the intent router and the preference extractor:
 * catalog names (titles, actors, genres and genre aliases), rating thresholds,
 * preference cues and name introductions. Everything here is pure.
 */

import type { CatalogVocabulary } from '../types/film.js';

/** Rating threshold used for "highly rated", "top rated", "best" */
export const HIGH_RATING_THRESHOLD = 8;

/** Assumed current threshold when a correction has nothing to raise */
export const DEFAULT_RATING_THRESHOLD = 7;

/** Step applied by "something with a higher rating" */
export const CORRECTION_STEP = 1;

/** Alias → genre name (matched case-insensitively against the catalog) */
const GENRE_ALIASES: Record<string, string> = {
  'science fiction': 'sci-fi',
  'sci fi': 'sci-fi',
  'scifi': 'sci-fi',
  'comedies': 'comedy',
  'funny': 'comedy',
  'scary': 'horror',
  'suspense': 'thriller',
  'romantic': 'romance',
  'romances': 'romance',
  'animated': 'animation',
  'cartoons': 'animation',
  'action-packed': 'action',
};

export type RatingSource = 'numeric' | 'qualitative' | 'corrective';

export interface RatingCriterion {
  min?: number;
  max?: number;
  /** min is a strict bound ("above 8") */
  exclusive: boolean;
  source: RatingSource;
}

export interface ClauseMatches {
  text: string;
  polarity: 'positive' | 'negative' | 'neutral';
  titles: string[];
  actors: string[];
  genres: string[];
  rating: RatingCriterion | null;
}

// ─── Text helpers ───

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Match `phrase` as a whole word (hyphens count as word characters) */
function phrasePattern(phrase: string, flags: string, plural = false): RegExp {
  const body = escapeRegExp(phrase).replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![\\w-])${body}${plural ? '(?:s|es)?' : ''}(?![\\w-])`, flags);
}

/** Replace a matched span with spaces so later matchers skip it */
function blank(text: string, index: number, length: number): string {
  return text.slice(0, index) + ' '.repeat(length) + text.slice(index + length);
}

function parseScore(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = Number.parseFloat(raw);
  if (Number.isNaN(value) || value < 0 || value > 10) return null;
  return value;
}

// ─── Names ───

interface NameHit {
  name: string;
  index: number;
}

/**
 * Find catalog titles in text, longest first. Single-word titles must match
 * case-sensitively ("Speed" but not "speed"); quoted text is always a title.
 * Returns the titles and the text with matched spans blanked.
 */
export function matchTitles(text: string, titles: readonly string[]): { titles: string[]; rest: string } {
  const hits: NameHit[] = [];
  let rest = text;

  for (const quoted of text.matchAll(/["“]([^"”]+)["”]/g)) {
    const inner = quoted[1]?.trim();
    if (inner && quoted.index !== undefined) {
      hits.push({ name: inner, index: quoted.index });
      rest = blank(rest, quoted.index, quoted[0].length);
    }
  }

  const byLength = [...titles].sort((a, b) => b.length - a.length);
  for (const title of byLength) {
    const singleWord = !/\s/.test(title.trim());
    const match = phrasePattern(title, singleWord ? '' : 'i').exec(rest);
    if (match) {
      hits.push({ name: title, index: match.index });
      rest = blank(rest, match.index, match[0].length);
    }
  }

  hits.sort((a, b) => a.index - b.index);
  return { titles: hits.map((h) => h.name), rest };
}

/** Find catalog actors, plus capitalized names after "starring"/"featuring" */
export function matchActors(text: string, actors: readonly string[]): { actors: string[]; rest: string } {
  const hits: NameHit[] = [];
  let rest = text;

  const byLength = [...actors].sort((a, b) => b.length - a.length);
  for (const actor of byLength) {
    const match = phrasePattern(actor, 'i').exec(rest);
    if (match) {
      hits.push({ name: actor, index: match.index });
      rest = blank(rest, match.index, match[0].length);
    }
  }

  const cue = /\b(?:starring|featuring)\s+([A-Z][\w'.-]*(?:\s+[A-Z][\w'.-]*)*)/g;
  for (const match of rest.matchAll(cue)) {
    const name = match[1];
    if (name && match.index !== undefined) {
      hits.push({ name, index: match.index });
      rest = blank(rest, match.index, match[0].length);
    }
  }

  hits.sort((a, b) => a.index - b.index);
  return { actors: hits.map((h) => h.name), rest };
}

/** Find catalog genres and their aliases (plurals allowed), in text order */
export function matchGenres(text: string, genres: readonly string[]): { genres: string[]; rest: string } {
  const canonical = new Map(genres.map((g) => [g.toLowerCase(), g]));
  const hits: NameHit[] = [];
  let rest = text;

  const candidates: Array<[phrase: string, target: string]> = [
    ...Object.entries(GENRE_ALIASES),
    ...genres.map((g): [string, string] => [g, g.toLowerCase()]),
  ].sort((a, b) => b[0].length - a[0].length);

  for (const [phrase, target] of candidates) {
    const genre = canonical.get(target);
    if (!genre) continue;

    const pattern = phrasePattern(phrase, 'gi', true);
    for (const match of rest.matchAll(pattern)) {
      if (match.index === undefined) continue;
      if (!hits.some((h) => h.name === genre)) {
        hits.push({ name: genre, index: match.index });
      }
      rest = blank(rest, match.index, match[0].length);
    }
  }

  hits.sort((a, b) => a.index - b.index);
  return { genres: hits.map((h) => h.name), rest };
}

// ─── Ratings ───

const NUM = '(\\d+(?:\\.\\d+)?)';
/** Keeps "more than" out of "no more than" (and "less than" likewise) */
const NOT_NEGATED = '(?<!\\b(?:no|not) )';
const RATING_CONTEXT = /\b(?:rat(?:ed|ing|ings)|scor(?:e|ed|es|ing)|stars?|imdb)\b|\d\s*\/\s*10\b/i;

/**
 * Parse a rating threshold.
 *
 * Numeric bounds need a rating word nearby ("rated", "rating", "score", "x/10").
 * "above 8" is strict, "at least 8", "8+" and "nothing below 8" are inclusive,
 * "below 6"/"at most 6" set an inclusive maximum. "no more than 6" is a
 * maximum only and "no less than 7" a minimum only.
 */
export function parseRating(text: string): RatingCriterion | null {
  const lower = text.toLowerCase();

  if (RATING_CONTEXT.test(lower)) {
    const floor = new RegExp(
      `\\b(?:nothing|no films?|no movies?|never anything)\\s+(?:rated\\s+)?(?:below|under|lower than|less than)\\s*${NUM}`,
    ).exec(lower);
    const floorScore = parseScore(floor?.[1]);
    if (floorScore !== null) {
      return { min: floorScore, exclusive: false, source: 'numeric' };
    }

    const result: RatingCriterion = { exclusive: false, source: 'numeric' };

    const strict = new RegExp(`${NOT_NEGATED}(?:above|over|greater than|higher than|more than|better than|>(?!=))\\s*${NUM}`).exec(lower);
    const inclusive = new RegExp(`(?:at least|minimum(?: of)?|(?:no|not) less than|>=)\\s*${NUM}`).exec(lower)
      ?? new RegExp(`${NUM}\\s*(?:\\+|or (?:more|higher|above|better))`).exec(lower);
    const max = new RegExp(`${NOT_NEGATED}(?:below|under|less than|lower than|at most|(?:no|not) more than|up to|<=?)\\s*${NUM}`).exec(lower);

    const strictScore = parseScore(strict?.[1]);
    const inclusiveScore = parseScore(inclusive?.[1]);
    if (strictScore !== null && (inclusive === null || (strict?.index ?? 0) <= inclusive.index)) {
      result.min = strictScore;
      result.exclusive = true;
    } else if (inclusiveScore !== null) {
      result.min = inclusiveScore;
    }

    const maxScore = parseScore(max?.[1]);
    if (maxScore !== null) {
      result.max = maxScore;
    }

    if (result.min !== undefined || result.max !== undefined) {
      return result;
    }
  }

  if (/\b(?:higher|better)[- ]rat(?:ed|ing)\b/.test(lower)) {
    return { exclusive: false, source: 'corrective' };
  }

  if (/\b(?:highly[- ]rated|high[- ]rated|top[- ]rated|high ratings?|best)\b/.test(lower)) {
    return { min: HIGH_RATING_THRESHOLD, exclusive: false, source: 'qualitative' };
  }

  return null;
}

/** Threshold after "something with a higher rating" */
export function raiseThreshold(current: number | null): number {
  return Math.min(10, (current ?? DEFAULT_RATING_THRESHOLD) + CORRECTION_STEP);
}

/** Canonical text for a numeric preference value */
export function formatScore(value: number): string {
  return String(Math.round(value * 100) / 100);
}

// ─── Cues ───

const NEGATIVE_CUE =
  /\b(?:i\s+(?:really\s+)?(?:don'?t|do not|never)\s+(?:like|enjoy|love|watch|want)|i\s+(?:hate|dislike|can'?t stand)|not a fan of)\b/i;

const POSITIVE_CUE =
  /\b(?:i\s+(?:really\s+|absolutely\s+|just\s+|also\s+)?(?:love|like|enjoy|adore|prefer)|i'?m\s+(?:a\s+(?:big\s+|huge\s+)?fan\s+of|into)|i\s+am\s+(?:a\s+(?:big\s+|huge\s+)?fan\s+of|into)|my\s+fav(?:ou?rite)?s?|(?:big|huge)\s+fan\s+of)\b/i;

/** A statement about the user's own standards, as opposed to a one-off search */
const STANDARD_CUE =
  /\b(?:i\s+(?:only|usually|always|generally|mostly)\s+(?:watch|want|like|prefer)|i\s+prefer|nothing\s+(?:rated\s+)?(?:below|under|lower than|less than)|never anything|my\s+(?:minimum|threshold|standard))\b/i;

/** A correction of the previous answer */
const CORRECTION_CUE = /^\s*(?:no|nope|not that|actually)\b|\binstead\b/i;

export function hasNegativeCue(text: string): boolean {
  return NEGATIVE_CUE.test(text);
}

export function hasPositiveCue(text: string): boolean {
  return POSITIVE_CUE.test(text);
}

export function hasStandardCue(text: string): boolean {
  return STANDARD_CUE.test(text);
}

export function hasCorrectionCue(text: string): boolean {
  return CORRECTION_CUE.test(text);
}

/** "my name is Ada" / "call me Ada" */
export function parseName(text: string): string | null {
  const match = /\b(?:my name is|call me|i am called)\s+([A-Za-z][\w'-]*)/i.exec(text);
  const raw = match?.[1];
  if (!raw) return null;
  return raw.charAt(0).toUpperCase() + raw.slice(1).toLowerCase();
}

// ─── Clauses ───

/** Split on sentence punctuation, semicolons and "but" (decimal points excepted) */
export function splitClauses(text: string): string[] {
  return text
    .split(/(?:[;!?]|\.(?!\d))+|,?\s+\bbut\b\s+/i)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/** Everything the parsers find in one clause */
export function analyzeClause(text: string, vocabulary: CatalogVocabulary): ClauseMatches {
  const titleHits = matchTitles(text, vocabulary.titles);
  const actorHits = matchActors(titleHits.rest, vocabulary.actors);
  const genreHits = matchGenres(actorHits.rest, vocabulary.genres);

  const polarity = hasNegativeCue(text) ? 'negative' : hasPositiveCue(text) ? 'positive' : 'neutral';

  return {
    text,
    polarity,
    titles: titleHits.titles,
    actors: actorHits.actors,
    genres: genreHits.genres,
    rating: parseRating(genreHits.rest),
  };
}

/** Analyze every clause of an utterance */
export function analyzeUtterance(text: string, vocabulary: CatalogVocabulary): ClauseMatches[] {
  return splitClauses(text).map((clause) => analyzeClause(clause, vocabulary));
}
