/**
 * Persistence abstraction
 *
 * Contracts for the two durable stores the agent relies on:
 * - StorageProvider: read-write memory store (users, conversation turns, preferences)
 * - CatalogStore: read-mostly film catalog (films, genres, actors)
 *
 * Methods follow business semantics rather than generic CRUD. All methods are
 * async even where the backend is synchronous (better-sqlite3), and every
 * persistence failure surfaces as StoreUnavailableError.
 */

import type { ConversationTurn, NewTurn } from '../types/message.js';
import type { User } from '../types/user.js';
import type { Preference, PreferenceType } from '../types/preference.js';
import type { Film, FilmQuery, NewFilm, CatalogVocabulary } from '../types/film.js';

/** A preference row to insert or overwrite within one (user, type) */
export interface PreferenceWrite {
  value: string;
  confidence: number;
  lastSignalId?: string;
  now: number;
}

/**
 * Memory store
 *
 * Safe for concurrent use keyed by user id; no method touches another user's rows.
 */
export interface StorageProvider {
  // ─── Lifecycle ───

  init(): Promise<void>;
  close(): Promise<void>;

  // ─── Users ───

  /** Insert the user if unseen, refresh lastActiveAt otherwise */
  touchUser(userId: string, now: number): Promise<User>;
  getUser(userId: string): Promise<User | null>;
  setDisplayName(userId: string, displayName: string): Promise<void>;

  // ─── Conversation turns ───

  /** Append one immutable turn; seq is assigned here */
  appendTurn(userId: string, turn: NewTurn, now: number): Promise<ConversationTurn>;

  /** The latest `limit` turns, oldest first */
  recentTurns(userId: string, limit: number): Promise<ConversationTurn[]>;

  countTurns(userId: string): Promise<number>;

  // ─── Preferences ───

  /** All rows for a user, ordered by type, then confidence desc, then updatedAt desc */
  listPreferences(userId: string, type?: PreferenceType): Promise<Preference[]>;

  /**
   * Read-modify-write of every row of one (user, type), atomically.
   *
   * `merge` receives the current rows and returns the rows to insert or
   * overwrite (matched on value); rows it does not return are left as they are.
   * Returns the written rows.
   */
  updatePreferences(
    userId: string,
    type: PreferenceType,
    merge: (rows: Preference[]) => PreferenceWrite[],
  ): Promise<Preference[]>;
}

/** Film catalog */
export interface CatalogStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Conjunctive query, ordered by rating desc, title asc, with genres and actors attached */
  queryFilms(query: FilmQuery): Promise<Film[]>;

  vocabulary(): Promise<CatalogVocabulary>;

  addFilm(film: NewFilm): Promise<number>;

  countFilms(): Promise<number>;
}
