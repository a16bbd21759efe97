/**
 * Catalog seeding
 *
 * Loads films from a JSON seed file into an empty catalog.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { NewFilm } from '../types/film.js';
import type { CatalogStore } from './storage-provider.js';
import { ConfigError, toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('CatalogSeed');

const SeedFilmSchema = z.object({
  title: z.string().min(1),
  year: z.number().int(),
  rating: z.number().min(0).max(10),
  description: z.string().default(''),
  genres: z.array(z.string().min(1)).default([]),
  actors: z.array(z.string().min(1)).default([]),
});

const SeedFileSchema = z.array(SeedFilmSchema);

/** Read and validate a seed file */
export async function loadSeedFile(path: string): Promise<NewFilm[]> {
  const absolutePath = resolve(path);

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(absolutePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read seed file: ${absolutePath}`, { path: absolutePath }, { cause: toError(err) });
  }

  const parsed = SeedFileSchema.safeParse(raw);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Seed file validation failed', { path: absolutePath, errors });
  }
  return parsed.data;
}

/**
 * Add films to the catalog unless it already holds some.
 *
 * Returns the number of films added.
 */
export async function seedCatalog(
  catalog: CatalogStore,
  films: NewFilm[],
  options: { force?: boolean } = {},
): Promise<number> {
  const existing = await catalog.countFilms();
  if (existing > 0 && !options.force) {
    log.debug({ existing }, 'catalog already seeded');
    return 0;
  }

  for (const film of films) {
    await catalog.addFilm(film);
  }

  log.info({ added: films.length }, 'catalog seeded');
  return films.length;
}
