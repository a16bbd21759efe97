import { fileURLToPath } from "node:url";
import { ConfigSchema, type Config } from "../../src/types/config.js";
import type { LLMProvider, LLMRequestOptions, LLMResponse } from "../../src/types/provider.js";
import type { ConversationTurn, NewTurn } from "../../src/types/message.js";
import type { Preference, PreferenceType } from "../../src/types/preference.js";
import type { User } from "../../src/types/user.js";
import type { CatalogVocabulary, Film } from "../../src/types/film.js";
import type { PreferenceWrite, StorageProvider } from "../../src/storage/storage-provider.js";
import { SqliteStorageProvider } from "../../src/storage/sqlite-provider.js";
import { SqliteCatalogStore } from "../../src/storage/sqlite-catalog.js";
import { loadSeedFile, seedCatalog } from "../../src/storage/catalog-seed.js";
import { StoreUnavailableError } from "../../src/core/errors.js";
import { FilmAgentApp } from "../../src/core/app.js";

export const SEED_FILE = fileURLToPath(new URL("../../data/films.json", import.meta.url));

/** Names from the seed catalog used by the parser and router tests */
export const VOCABULARY: CatalogVocabulary = {
  genres: ["Action", "Adventure", "Animation", "Comedy", "Crime", "Drama", "Horror", "Romance", "Sci-Fi", "Thriller"],
  actors: ["Keanu Reeves", "Tom Hanks", "Tom Hardy", "Ryan Gosling", "Morgan Freeman"],
  titles: ["The Matrix", "Speed", "Inception", "Toy Story", "Blade Runner 2049", "John Wick"],
};

export async function createMemoryStorage(): Promise<SqliteStorageProvider> {
  const storage = new SqliteStorageProvider({ dbPath: ":memory:" });
  await storage.init();
  return storage;
}

export async function createSeededCatalog(resultLimit = 20): Promise<SqliteCatalogStore> {
  const catalog = new SqliteCatalogStore({ dbPath: ":memory:", resultLimit });
  await catalog.init();
  await seedCatalog(catalog, await loadSeedFile(SEED_FILE));
  return catalog;
}

/** A mutable clock for stores that take `now` */
export function createClock(start = 1_000_000): { now: () => number; advance: (ms: number) => void; set: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (ms) => {
      current = ms;
    },
  };
}

export function film(title: string, rating: number, overrides: Partial<Film> = {}): Film {
  return {
    id: overrides.id ?? 1,
    title,
    year: overrides.year ?? 2000,
    rating,
    description: overrides.description ?? "",
    genres: overrides.genres ?? [],
    actors: overrides.actors ?? [],
  };
}

export function turn(seq: number, role: ConversationTurn["role"], content: string, toolName?: string): ConversationTurn {
  return { seq, userId: "u1", turnId: `t${seq}`, role, content, toolName, createdAt: seq };
}

export function preference(type: PreferenceType, value: string, confidence: number): Preference {
  return { userId: "u1", type, value, confidence, createdAt: 0, updatedAt: 0 };
}

// ─── Completion oracle fakes ───

export type Responder = (options: LLMRequestOptions) => Promise<string | null> | string | null;

/** In-process completion oracle that records every request */
export class FakeProvider implements LLMProvider {
  readonly name = "fake";
  readonly calls: LLMRequestOptions[] = [];

  constructor(private readonly respond: Responder = () => "Here is what I found.") {}

  async chat(options: LLMRequestOptions): Promise<LLMResponse> {
    this.calls.push(options);
    const content = await this.respond(options);
    return {
      content,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      finishReason: "stop",
    };
  }
}

/** Never answers; rejects once the request is aborted */
export function hangUntilAborted(options: LLMRequestOptions): Promise<string> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Storage fakes ───

export type StorageMethod = Exclude<keyof StorageProvider, "init" | "close">;

/** Delegates to a real store, failing the listed methods with StoreUnavailableError */
export class FailingStorage implements StorageProvider {
  constructor(
    private readonly inner: StorageProvider,
    readonly failing: Set<StorageMethod>,
  ) {}

  private check(operation: StorageMethod): void {
    if (this.failing.has(operation)) {
      throw new StoreUnavailableError("memory", operation, { cause: new Error("simulated outage") });
    }
  }

  init(): Promise<void> {
    return this.inner.init();
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  async touchUser(userId: string, now: number): Promise<User> {
    this.check("touchUser");
    return this.inner.touchUser(userId, now);
  }

  async getUser(userId: string): Promise<User | null> {
    this.check("getUser");
    return this.inner.getUser(userId);
  }

  async setDisplayName(userId: string, displayName: string): Promise<void> {
    this.check("setDisplayName");
    return this.inner.setDisplayName(userId, displayName);
  }

  async appendTurn(userId: string, newTurn: NewTurn, now: number): Promise<ConversationTurn> {
    this.check("appendTurn");
    return this.inner.appendTurn(userId, newTurn, now);
  }

  async recentTurns(userId: string, limit: number): Promise<ConversationTurn[]> {
    this.check("recentTurns");
    return this.inner.recentTurns(userId, limit);
  }

  async countTurns(userId: string): Promise<number> {
    this.check("countTurns");
    return this.inner.countTurns(userId);
  }

  async listPreferences(userId: string, type?: PreferenceType): Promise<Preference[]> {
    this.check("listPreferences");
    return this.inner.listPreferences(userId, type);
  }

  async updatePreferences(
    userId: string,
    type: PreferenceType,
    merge: (rows: Preference[]) => PreferenceWrite[],
  ): Promise<Preference[]> {
    this.check("updatePreferences");
    return this.inner.updatePreferences(userId, type, merge);
  }
}

// ─── App ───

export function testConfig(overrides: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({
    logLevel: "silent",
    agent: { provider: "fake", oracleTimeoutMs: 200 },
    memory: { dbPath: ":memory:" },
    catalog: { dbPath: ":memory:", seedFile: SEED_FILE },
    ...overrides,
  });
}

export interface TestAppOptions {
  provider?: LLMProvider;
  storage?: StorageProvider;
  config?: Config;
  now?: () => number;
}

/** A started app on in-memory stores with the seed catalog */
export async function createTestApp(options: TestAppOptions = {}): Promise<FilmAgentApp> {
  const app = new FilmAgentApp(options.config ?? testConfig(), {
    provider: options.provider ?? new FakeProvider(),
    storage: options.storage ?? new SqliteStorageProvider({ dbPath: ":memory:" }),
    ...(options.now ? { now: options.now } : {}),
  });
  await app.start();
  return app;
}
