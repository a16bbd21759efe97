/**
 * SQLite memory store
 *
 * StorageProvider on better-sqlite3 (synchronous API). Methods are exposed as
 * async to keep the interface backend-neutral.
 *
 * Tables:
 *   users        - one row per identity key
 *   turns        - append-only conversation log (seq orders turns)
 *   preferences  - one row per (user, type, value)
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import type { ConversationTurn, NewTurn, TurnRole } from '../types/message.js';
import type { User } from '../types/user.js';
import type { Preference, PreferenceType } from '../types/preference.js';
import type { StorageProvider, PreferenceWrite } from './storage-provider.js';
import { StoreUnavailableError, toError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('SqliteStorage');

export interface SqliteStorageConfig {
  /** Database file path, or `:memory:` */
  dbPath: string;
}

interface UserRow {
  id: string;
  display_name: string | null;
  created_at: number;
  last_active_at: number;
}

interface TurnRow {
  seq: number;
  user_id: string;
  turn_id: string;
  role: TurnRole;
  content: string;
  tool_name: string | null;
  created_at: number;
}

interface PreferenceRow {
  user_id: string;
  type: string;
  value: string;
  confidence: number;
  created_at: number;
  updated_at: number;
  last_signal_id: string | null;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    displayName: row.display_name ?? undefined,
    createdAt: row.created_at,
    lastActiveAt: row.last_active_at,
  };
}

function toTurn(row: TurnRow): ConversationTurn {
  return {
    seq: row.seq,
    userId: row.user_id,
    turnId: row.turn_id,
    role: row.role,
    content: row.content,
    toolName: row.tool_name ?? undefined,
    createdAt: row.created_at,
  };
}

function toPreference(row: PreferenceRow): Preference {
  return {
    userId: row.user_id,
    type: row.type,
    value: row.value,
    confidence: row.confidence,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastSignalId: row.last_signal_id ?? undefined,
  };
}

export class SqliteStorageProvider implements StorageProvider {
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(config: SqliteStorageConfig) {
    this.dbPath = config.dbPath;
  }

  // ─── Lifecycle ───

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
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.createTables(this.db);
    } catch (err) {
      throw new StoreUnavailableError('memory', 'init', { cause: toError(err) });
    }

    log.info({ dbPath: this.dbPath }, 'memory store initialized');
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.info('memory store closed');
    }
  }

  // ─── Users ───

  async touchUser(userId: string, now: number): Promise<User> {
    return this.guard('touchUser', (db) => {
      db.prepare(`
        INSERT INTO users (id, display_name, created_at, last_active_at)
        VALUES (?, NULL, ?, ?)
        ON CONFLICT(id) DO UPDATE SET last_active_at = MAX(users.last_active_at, excluded.last_active_at)
      `).run(userId, now, now);

      const row = db.prepare('SELECT * FROM users WHERE id = ?').get(userId) as UserRow;
      return toUser(row);
    });
  }

  async getUser(userId: string): Promise<User | null> {
    return this.guard('getUser', (db) => {
      const row = db.prepare('SELECT * FROM users WHERE id = ?').get(userId) as UserRow | undefined;
      return row ? toUser(row) : null;
    });
  }

  async setDisplayName(userId: string, displayName: string): Promise<void> {
    this.guard('setDisplayName', (db) => {
      db.prepare('UPDATE users SET display_name = ? WHERE id = ?').run(displayName, userId);
    });
  }

  // ─── Conversation turns ───

  async appendTurn(userId: string, turn: NewTurn, now: number): Promise<ConversationTurn> {
    return this.guard('appendTurn', (db) => {
      const append = db.transaction((): TurnRow => {
        this.ensureUser(db, userId, now);

        // createdAt never goes backwards within a user's log
        const last = db.prepare(
          'SELECT MAX(created_at) AS last FROM turns WHERE user_id = ?',
        ).get(userId) as { last: number | null };
        const createdAt = Math.max(now, last.last ?? 0);

        const info = db.prepare(`
          INSERT INTO turns (user_id, turn_id, role, content, tool_name, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `).run(
          userId,
          turn.turnId,
          turn.role,
          turn.content,
          turn.role === 'tool' ? (turn.toolName ?? 'unknown') : null,
          createdAt,
        );

        return db.prepare('SELECT * FROM turns WHERE seq = ?').get(info.lastInsertRowid) as TurnRow;
      });

      return toTurn(append());
    });
  }

  async recentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    return this.guard('recentTurns', (db) => {
      // Served from idx_turns_user_seq, reading only `limit` rows
      const rows = db.prepare(
        'SELECT * FROM turns WHERE user_id = ? ORDER BY seq DESC LIMIT ?',
      ).all(userId, limit) as TurnRow[];

      return rows.reverse().map(toTurn);
    });
  }

  async countTurns(userId: string): Promise<number> {
    return this.guard('countTurns', (db) => {
      const row = db.prepare('SELECT COUNT(*) AS n FROM turns WHERE user_id = ?').get(userId) as { n: number };
      return row.n;
    });
  }

  // ─── Preferences ───

  async listPreferences(userId: string, type?: PreferenceType): Promise<Preference[]> {
    return this.guard('listPreferences', (db) => this.selectPreferences(db, userId, type));
  }

  async updatePreferences(
    userId: string,
    type: PreferenceType,
    merge: (rows: Preference[]) => PreferenceWrite[],
  ): Promise<Preference[]> {
    return this.guard('updatePreferences', (db) => {
      const update = db.transaction((): Preference[] => {
        const current = this.selectPreferences(db, userId, type);
        const writes = merge(current);
        if (writes.length === 0) return [];

        const now = writes[0]?.now ?? Date.now();
        this.ensureUser(db, userId, now);

        const upsert = db.prepare(`
          INSERT INTO preferences (user_id, type, value, confidence, created_at, updated_at, last_signal_id)
          VALUES (?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(user_id, type, value) DO UPDATE SET
            confidence = excluded.confidence,
            updated_at = excluded.updated_at,
            last_signal_id = excluded.last_signal_id
        `);
        const select = db.prepare(
          'SELECT * FROM preferences WHERE user_id = ? AND type = ? AND value = ?',
        );

        return writes.map((write) => {
          upsert.run(
            userId,
            type,
            write.value,
            write.confidence,
            write.now,
            write.now,
            write.lastSignalId ?? null,
          );
          return toPreference(select.get(userId, type, write.value) as PreferenceRow);
        });
      });

      return update();
    });
  }

  // ─── Internals ───

  private selectPreferences(db: Database.Database, userId: string, type?: PreferenceType): Preference[] {
    const order = 'ORDER BY type ASC, confidence DESC, updated_at DESC, value ASC';
    const rows = type === undefined
      ? db.prepare(`SELECT * FROM preferences WHERE user_id = ? ${order}`).all(userId)
      : db.prepare(`SELECT * FROM preferences WHERE user_id = ? AND type = ? ${order}`).all(userId, type);
    return (rows as PreferenceRow[]).map(toPreference);
  }

  private ensureUser(db: Database.Database, userId: string, now: number): void {
    db.prepare(`
      INSERT OR IGNORE INTO users (id, display_name, created_at, last_active_at)
      VALUES (?, NULL, ?, ?)
    `).run(userId, now, now);
  }

  /** Run against the open database, mapping driver failures to StoreUnavailableError */
  private guard<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StoreUnavailableError('memory', operation, {
        cause: new Error('memory store is not initialized'),
      });
    }
    try {
      return fn(this.db);
    } catch (err) {
      throw new StoreUnavailableError('memory', operation, { cause: toError(err) });
    }
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        display_name TEXT,
        created_at INTEGER NOT NULL,
        last_active_at INTEGER NOT NULL
      );

      -- seq is the log order; turns are never updated
      CREATE TABLE IF NOT EXISTS turns (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        turn_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'tool')),
        content TEXT NOT NULL,
        tool_name TEXT,
        created_at INTEGER NOT NULL,
        CHECK ((role = 'tool') = (tool_name IS NOT NULL))
      );
      CREATE INDEX IF NOT EXISTS idx_turns_user_seq ON turns(user_id, seq);

      CREATE TABLE IF NOT EXISTS preferences (
        user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        type TEXT NOT NULL,
        value TEXT NOT NULL,
        confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        last_signal_id TEXT,
        PRIMARY KEY (user_id, type, value)
      );
    `);
  }
}
