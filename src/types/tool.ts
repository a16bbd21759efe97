/**
 * Tool system types
 */

import type { Film } from './film.js';

/** The closed set of catalog tools */
export type ToolName =
  | 'search_by_title'
  | 'search_by_genre'
  | 'search_by_rating'
  | 'search_by_actor'
  | 'search_films';

export const TOOL_NAMES: readonly ToolName[] = [
  'search_by_title',
  'search_by_genre',
  'search_by_rating',
  'search_by_actor',
  'search_films',
];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

export interface SearchByTitleArgs {
  title: string;
}

export interface SearchByGenreArgs {
  genre: string;
}

export interface SearchByRatingArgs {
  min_rating: number;
  max_rating?: number;
  exclusive?: boolean;
}

export interface SearchByActorArgs {
  actor_name: string;
}

export interface SearchFilmsArgs {
  title?: string;
  genre?: string;
  actor_name?: string;
  min_rating?: number;
  max_rating?: number;
  exclusive?: boolean;
}

/** Argument shape of each tool */
export interface ToolArgsMap {
  search_by_title: SearchByTitleArgs;
  search_by_genre: SearchByGenreArgs;
  search_by_rating: SearchByRatingArgs;
  search_by_actor: SearchByActorArgs;
  search_films: SearchFilmsArgs;
}

/** A (tool name, arguments) pair produced by the intent router */
export type ToolCall = {
  [K in ToolName]: { name: K; args: ToolArgsMap[K] };
}[ToolName];

/** How a multi-call plan combines its results */
export type PlanMode = 'independent' | 'chain';

/** Ordered tool plan for one turn */
export interface ToolPlan {
  calls: ToolCall[];
  mode: PlanMode;
}

/** Tool execution context */
export interface ToolContext {
  userId: string;
  /** Restrict results to these film ids (set for chained calls after the first) */
  candidateIds?: readonly number[];
  /** Return every match; set for chained calls that feed a later call */
  uncapped?: boolean;
}

/** Tool interface */
export interface Tool {
  name: ToolName;
  description: string;
  /** Validate raw arguments; throws InvalidToolArgsError */
  parse(params: Record<string, unknown>): ToolCall;
  /** Run against the catalog */
  execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]>;
}

/** Outcome of one executed call */
export interface ToolOutcome {
  call: ToolCall;
  films: Film[];
}

/** Outcome of a whole plan */
export interface PlanResult {
  outcomes: ToolOutcome[];
  /** Final candidates: the last outcome for chains, the de-duplicated union otherwise */
  films: Film[];
  /** Set when a call failed and the rest of the plan was skipped */
  failure?: {
    call: ToolCall;
    message: string;
    skipped: ToolCall[];
  };
}
