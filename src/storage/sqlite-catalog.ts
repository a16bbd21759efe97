/**
 * SQLite film catalog
 *
 * CatalogStore on better-sqlite3. Films relate to genres and actors through
 * join tables; every query returns films ordered by rating desc, title asc.
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import type { Film, FilmQuery, NewFilm, CatalogVocabulary } from '../types/film.js';
import type { CatalogStore } from './storage-provider.js';
import { StoreUnavailableError, toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('SqliteCatalog');

const DEFAULT_LIMIT = 20;

export interface SqliteCatalogConfig {
  /** Database file path, or `:memory:` */
  dbPath: string;
  /** Limit applied when a query sets none */
  resultLimit?: number;
}

interface FilmRow {
  id: number;
  title: string;
  year: number;
  rating: number;
  description: string | null;
}

/** Escape LIKE wildcards so user text matches literally */
function likePattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export class SqliteCatalogStore implements CatalogStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly resultLimit: number;

  constructor(config: SqliteCatalogConfig) {
    this.dbPath = config.dbPath;
    this.resultLimit = config.resultLimit ?? DEFAULT_LIMIT;
  }

  async init(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    try {
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.createTables(this.db);
    } catch (err) {
      throw new StoreUnavailableError('catalog', 'init', { cause: toError(err) });
    }

    log.info({ dbPath: this.dbPath }, 'catalog initialized');
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async queryFilms(query: FilmQuery): Promise<Film[]> {
    return this.guard('queryFilms', (db) => {
      const where: string[] = [];
      const params: Array<string | number> = [];

      if (query.title !== undefined) {
        where.push("LOWER(f.title) LIKE LOWER(?) ESCAPE '\\'");
        params.push(likePattern(query.title));
      }
      if (query.genre !== undefined) {
        where.push(`EXISTS (
          SELECT 1 FROM film_genres fg JOIN genres g ON g.id = fg.genre_id
          WHERE fg.film_id = f.id AND LOWER(g.name) = LOWER(?)
        )`);
        params.push(query.genre);
      }
      if (query.actor !== undefined) {
        where.push(`EXISTS (
          SELECT 1 FROM film_actors fa JOIN actors a ON a.id = fa.actor_id
          WHERE fa.film_id = f.id AND LOWER(a.name) LIKE LOWER(?) ESCAPE '\\'
        )`);
        params.push(likePattern(query.actor));
      }
      if (query.minRating !== undefined) {
        where.push(query.minRatingExclusive ? 'f.rating > ?' : 'f.rating >= ?');
        params.push(query.minRating);
      }
      if (query.maxRating !== undefined) {
        where.push('f.rating <= ?');
        params.push(query.maxRating);
      }
      if (query.filmIds !== undefined) {
        if (query.filmIds.length === 0) return [];
        where.push(`f.id IN (${query.filmIds.map(() => '?').join(', ')})`);
        params.push(...query.filmIds);
      }

      const sql = `
        SELECT f.id, f.title, f.year, f.rating, f.description
        FROM films f
        ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY f.rating DESC, f.title ASC
        ${query.uncapped ? '' : 'LIMIT ?'}
      `;
      if (!query.uncapped) params.push(query.limit ?? this.resultLimit);

      const rows = db.prepare(sql).all(...params) as FilmRow[];
      return this.attachPeople(db, rows);
    });
  }

  async vocabulary(): Promise<CatalogVocabulary> {
    return this.guard('vocabulary', (db) => {
      const pluck = (sql: string): string[] =>
        (db.prepare(sql).all() as Array<{ name: string }>).map((r) => r.name);

      return {
        genres: pluck('SELECT name FROM genres ORDER BY name'),
        actors: pluck('SELECT name FROM actors ORDER BY name'),
        titles: pluck('SELECT DISTINCT title AS name FROM films ORDER BY title'),
      };
    });
  }

  async addFilm(film: NewFilm): Promise<number> {
    return this.guard('addFilm', (db) => {
      const insert = db.transaction((f: NewFilm): number => {
        const info = db.prepare(
          'INSERT INTO films (title, year, rating, description) VALUES (?, ?, ?, ?)',
        ).run(f.title, f.year, f.rating, f.description);
        const filmId = Number(info.lastInsertRowid);

        for (const genre of f.genres) {
          db.prepare('INSERT OR IGNORE INTO genres (name) VALUES (?)').run(genre);
          const { id } = db.prepare('SELECT id FROM genres WHERE name = ?').get(genre) as { id: number };
          db.prepare('INSERT OR IGNORE INTO film_genres (film_id, genre_id) VALUES (?, ?)').run(filmId, id);
        }

        for (const actor of f.actors) {
          db.prepare('INSERT OR IGNORE INTO actors (name) VALUES (?)').run(actor);
          const { id } = db.prepare('SELECT id FROM actors WHERE name = ?').get(actor) as { id: number };
          db.prepare('INSERT OR IGNORE INTO film_actors (film_id, actor_id) VALUES (?, ?)').run(filmId, id);
        }

        return filmId;
      });

      return insert(film);
    });
  }

  async countFilms(): Promise<number> {
    return this.guard('countFilms', (db) => {
      const row = db.prepare('SELECT COUNT(*) AS n FROM films').get() as { n: number };
      return row.n;
    });
  }

  /** Attach genre names (sorted) and actor names (billing order) */
  private attachPeople(db: Database.Database, rows: FilmRow[]): Film[] {
    if (rows.length === 0) return [];

    const ids = rows.map((r) => r.id);
    const placeholders = ids.map(() => '?').join(', ');

    const genres = db.prepare(`
      SELECT fg.film_id AS filmId, g.name AS name
      FROM film_genres fg JOIN genres g ON g.id = fg.genre_id
      WHERE fg.film_id IN (${placeholders})
      ORDER BY g.name
    `).all(...ids) as Array<{ filmId: number; name: string }>;

    const actors = db.prepare(`
      SELECT fa.film_id AS filmId, a.name AS name
      FROM film_actors fa JOIN actors a ON a.id = fa.actor_id
      WHERE fa.film_id IN (${placeholders})
      ORDER BY fa.rowid
    `).all(...ids) as Array<{ filmId: number; name: string }>;

    const group = (list: Array<{ filmId: number; name: string }>): Map<number, string[]> => {
      const map = new Map<number, string[]>();
      for (const { filmId, name } of list) {
        const names = map.get(filmId) ?? [];
        names.push(name);
        map.set(filmId, names);
      }
      return map;
    };

    const genresByFilm = group(genres);
    const actorsByFilm = group(actors);

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      year: row.year,
      rating: row.rating,
      description: row.description ?? '',
      genres: genresByFilm.get(row.id) ?? [],
      actors: actorsByFilm.get(row.id) ?? [],
    }));
  }

  private guard<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StoreUnavailableError('catalog', operation, {
        cause: new Error('catalog is not initialized'),
      });
    }
    try {
      return fn(this.db);
    } catch (err) {
      throw new StoreUnavailableError('catalog', operation, { cause: toError(err) });
    }
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS films (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        year INTEGER NOT NULL,
        rating REAL NOT NULL,
        description TEXT
      );

      CREATE TABLE IF NOT EXISTS genres (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL
      );

      CREATE TABLE IF NOT EXISTS film_genres (
        film_id INTEGER NOT NULL REFERENCES films(id) ON DELETE CASCADE,
        genre_id INTEGER NOT NULL REFERENCES genres(id) ON DELETE CASCADE,
        PRIMARY KEY (film_id, genre_id)
      );

      CREATE TABLE IF NOT EXISTS actors (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL
      );

      CREATE TABLE IF NOT EXISTS film_actors (
        film_id INTEGER NOT NULL REFERENCES films(id) ON DELETE CASCADE,
        actor_id INTEGER NOT NULL REFERENCES actors(id) ON DELETE CASCADE,
        PRIMARY KEY (film_id, actor_id)
      );

      CREATE INDEX IF NOT EXISTS idx_films_rating ON films(rating);
      CREATE INDEX IF NOT EXISTS idx_films_title ON films(title);
    `);
  }
}
