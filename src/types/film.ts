/**
 * Catalog types
 */

export interface Film {
  id: number;
  title: string;
  year: number;
  rating: number;
  description: string;
  genres: string[];
  actors: string[];
}

/** Film as it appears in a seed file (no id yet) */
export type NewFilm = Omit<Film, 'id'>;

/**
 * Conjunctive catalog query. Omitted criteria do not filter.
 *
 * Results are always ordered by rating desc, then title asc.
 */
export interface FilmQuery {
  /** Case-insensitive substring of the title */
  title?: string;
  /** Case-insensitive exact genre name */
  genre?: string;
  /** Case-insensitive substring of an actor name */
  actor?: string;
  minRating?: number;
  /** When true, minRating is a strict lower bound */
  minRatingExclusive?: boolean;
  maxRating?: number;
  /** Restrict to these film ids (used when chaining tool calls) */
  filmIds?: readonly number[];
  limit?: number;
  /** Ignore the result cap (intermediate calls of a chain) */
  uncapped?: boolean;
}

/** Names known to the catalog, used for intent matching */
export interface CatalogVocabulary {
  genres: string[];
  actors: string[];
  titles: string[];
}
