/**
 * Tool result formatting
 *
 * Renders plans and film lists as text for the completion request and for
 * tool turns in the conversation log.
 */

import type { Film } from '../types/film.js';
import type { ToolCall, ToolOutcome, PlanResult } from '../types/tool.js';

/** Films listed per outcome */
const MAX_LISTED = 10;

/** Actors listed per film */
const MAX_ACTORS = 3;

function ratingBound(min: number, exclusive: boolean | undefined, max: number | undefined): string {
  const lower = exclusive ? `above ${min}` : `at least ${min}`;
  return max !== undefined && max < 10 ? `${lower} and at most ${max}` : lower;
}

/** Human-readable description of what a call searched for */
export function describeCall(call: ToolCall): string {
  switch (call.name) {
    case 'search_by_title':
      return `title '${call.args.title}'`;
    case 'search_by_genre':
      return `genre '${call.args.genre}'`;
    case 'search_by_rating':
      return `rating ${ratingBound(call.args.min_rating, call.args.exclusive, call.args.max_rating)}`;
    case 'search_by_actor':
      return `actor '${call.args.actor_name}'`;
    case 'search_films': {
      const parts: string[] = [];
      if (call.args.title !== undefined) parts.push(`title '${call.args.title}'`);
      if (call.args.genre !== undefined) parts.push(`genre '${call.args.genre}'`);
      if (call.args.actor_name !== undefined) parts.push(`actor '${call.args.actor_name}'`);
      if (call.args.min_rating !== undefined) {
        parts.push(`rating ${ratingBound(call.args.min_rating, call.args.exclusive, call.args.max_rating)}`);
      } else if (call.args.max_rating !== undefined) {
        parts.push(`rating at most ${call.args.max_rating}`);
      }
      return parts.join(', ');
    }
  }
}

export function formatFilm(film: Film, index: number): string {
  const actors = film.actors.slice(0, MAX_ACTORS).join(', ');
  return [
    `${index}. ${film.title} (${film.year}) - Rating: ${film.rating}/10`,
    `   Genres: ${film.genres.join(', ')}`,
    `   Starring: ${actors}`,
  ].join('\n');
}

export function formatFilms(films: Film[], searchedFor: string): string {
  if (films.length === 0) {
    return `No films found for ${searchedFor}.`;
  }

  const lines = [`Found ${films.length} film(s) for ${searchedFor}:`];
  films.slice(0, MAX_LISTED).forEach((film, i) => {
    lines.push(formatFilm(film, i + 1));
  });
  return lines.join('\n');
}

export function formatOutcome(outcome: ToolOutcome): string {
  return formatFilms(outcome.films, describeCall(outcome.call));
}

/**
 * Render a whole plan for the completion request.
 *
 * For chains only the final intersected list is listed. A failed call adds a
 * note naming the skipped calls.
 */
export function formatPlanResult(result: PlanResult, chained: boolean): string {
  const parts: string[] = [];

  if (chained && result.outcomes.length > 0) {
    const criteria = result.outcomes.map((o) => describeCall(o.call)).join(' + ');
    parts.push(formatFilms(result.films, criteria));
  } else {
    for (const outcome of result.outcomes) {
      parts.push(formatOutcome(outcome));
    }
  }

  if (result.failure) {
    const skipped = result.failure.skipped.map(describeCall);
    parts.push(
      `Note: the search for ${describeCall(result.failure.call)} failed (${result.failure.message})` +
        (skipped.length > 0 ? `; skipped: ${skipped.join(', ')}.` : '.') +
        ' Results above may be incomplete.',
    );
  }

  return parts.length > 0 ? parts.join('\n\n') : 'No catalog results.';
}
