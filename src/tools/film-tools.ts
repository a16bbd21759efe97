/**
 * Film catalog tools
 *
 * The closed set of structured queries the intent router can plan:
 * - search_by_title: title substring
 * - search_by_genre: exact genre
 * - search_by_rating: rating range
 * - search_by_actor: actor name substring
 * - search_films: any conjunction of the above
 *
 * Arguments are validated with strict zod schemas; unknown or malformed
 * arguments raise InvalidToolArgsError. An empty result is not an error.
 * Results keep the catalog order (rating desc, title asc).
 */

import { z } from 'zod';
import type { Film, FilmQuery } from '../types/film.js';
import type {
  Tool,
  ToolCall,
  ToolContext,
  SearchByTitleArgs,
  SearchByGenreArgs,
  SearchByRatingArgs,
  SearchByActorArgs,
  SearchFilmsArgs,
} from '../types/tool.js';
import type { CatalogStore } from '../storage/storage-provider.js';
import { InvalidToolArgsError } from '../core/errors.js';

const text = z.string().trim().min(1);
const rating = z.number().min(0).max(10);

const SearchByTitleSchema = z.object({ title: text }).strict();

const SearchByGenreSchema = z.object({ genre: text }).strict();

const SearchByRatingSchema = z
  .object({
    min_rating: rating,
    max_rating: rating.optional(),
    exclusive: z.boolean().optional(),
  })
  .strict()
  .refine((a) => a.max_rating === undefined || a.max_rating >= a.min_rating, {
    message: 'max_rating must be >= min_rating',
  });

const SearchByActorSchema = z.object({ actor_name: text }).strict();

const SearchFilmsSchema = z
  .object({
    title: text.optional(),
    genre: text.optional(),
    actor_name: text.optional(),
    min_rating: rating.optional(),
    max_rating: rating.optional(),
    exclusive: z.boolean().optional(),
  })
  .strict()
  .refine((a) => Object.values(a).some((v) => v !== undefined && typeof v !== 'boolean'), {
    message: 'at least one criterion is required',
  })
  .refine(
    (a) => a.min_rating === undefined || a.max_rating === undefined || a.max_rating >= a.min_rating,
    { message: 'max_rating must be >= min_rating' },
  );

/** Validate raw arguments against a tool schema */
function validateArgs<T>(
  toolName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>,
): T {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new InvalidToolArgsError(
      toolName,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
}

function withContext(query: FilmQuery, context: ToolContext): FilmQuery {
  const scoped = context.candidateIds ? { ...query, filmIds: context.candidateIds } : query;
  return context.uncapped ? { ...scoped, uncapped: true } : scoped;
}

export class SearchByTitleTool implements Tool {
  readonly name = 'search_by_title';
  readonly description = 'Search films by title. Partial, case-insensitive matches.';

  constructor(private readonly catalog: CatalogStore) {}

  parse(params: Record<string, unknown>): ToolCall {
    return { name: this.name, args: validateArgs<SearchByTitleArgs>(this.name, SearchByTitleSchema, params) };
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]> {
    const args = validateArgs<SearchByTitleArgs>(this.name, SearchByTitleSchema, params);
    return this.catalog.queryFilms(withContext({ title: args.title }, context));
  }
}

export class SearchByGenreTool implements Tool {
  readonly name = 'search_by_genre';
  readonly description = 'List films of one genre (e.g. Action, Sci-Fi, Drama, Thriller).';

  constructor(private readonly catalog: CatalogStore) {}

  parse(params: Record<string, unknown>): ToolCall {
    return { name: this.name, args: validateArgs<SearchByGenreArgs>(this.name, SearchByGenreSchema, params) };
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]> {
    const args = validateArgs<SearchByGenreArgs>(this.name, SearchByGenreSchema, params);
    return this.catalog.queryFilms(withContext({ genre: args.genre }, context));
  }
}

export class SearchByRatingTool implements Tool {
  readonly name = 'search_by_rating';
  readonly description =
    'List films within a rating range on a 0-10 scale. max_rating defaults to 10; ' +
    'exclusive makes min_rating a strict lower bound.';

  constructor(private readonly catalog: CatalogStore) {}

  parse(params: Record<string, unknown>): ToolCall {
    return { name: this.name, args: validateArgs<SearchByRatingArgs>(this.name, SearchByRatingSchema, params) };
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]> {
    const args = validateArgs<SearchByRatingArgs>(this.name, SearchByRatingSchema, params);
    return this.catalog.queryFilms(withContext({
      minRating: args.min_rating,
      minRatingExclusive: args.exclusive ?? false,
      maxRating: args.max_rating ?? 10,
    }, context));
  }
}

export class SearchByActorTool implements Tool {
  readonly name = 'search_by_actor';
  readonly description = 'List films featuring an actor. Partial, case-insensitive name matches.';

  constructor(private readonly catalog: CatalogStore) {}

  parse(params: Record<string, unknown>): ToolCall {
    return { name: this.name, args: validateArgs<SearchByActorArgs>(this.name, SearchByActorSchema, params) };
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]> {
    const args = validateArgs<SearchByActorArgs>(this.name, SearchByActorSchema, params);
    return this.catalog.queryFilms(withContext({ actor: args.actor_name }, context));
  }
}

export class SearchFilmsTool implements Tool {
  readonly name = 'search_films';
  readonly description =
    'Search films matching every given criterion: title, genre, actor_name, min_rating, max_rating.';

  constructor(private readonly catalog: CatalogStore) {}

  parse(params: Record<string, unknown>): ToolCall {
    return { name: this.name, args: validateArgs<SearchFilmsArgs>(this.name, SearchFilmsSchema, params) };
  }

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<Film[]> {
    const args = validateArgs<SearchFilmsArgs>(this.name, SearchFilmsSchema, params);
    const query: FilmQuery = {};
    if (args.title !== undefined) query.title = args.title;
    if (args.genre !== undefined) query.genre = args.genre;
    if (args.actor_name !== undefined) query.actor = args.actor_name;
    if (args.min_rating !== undefined) {
      query.minRating = args.min_rating;
      query.minRatingExclusive = args.exclusive ?? false;
    }
    if (args.max_rating !== undefined) query.maxRating = args.max_rating;
    return this.catalog.queryFilms(withContext(query, context));
  }
}

/** Every catalog tool, bound to one catalog */
export function createFilmTools(catalog: CatalogStore): Tool[] {
  return [
    new SearchByTitleTool(catalog),
    new SearchByGenreTool(catalog),
    new SearchByRatingTool(catalog),
    new SearchByActorTool(catalog),
    new SearchFilmsTool(catalog),
  ];
}
