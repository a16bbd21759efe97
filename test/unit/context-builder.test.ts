import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  ContextBuilder,
  compressTurns,
  estimateTokens,
  formatProfile,
  summarizeTurns,
  type ContextOptions,
  type ContextWindow,
} from "../../src/core/context-builder.js";
import { ConversationLog } from "../../src/memory/conversation-log.js";
import { PreferenceStore } from "../../src/memory/preference-store.js";
import { UserStore } from "../../src/core/user-store.js";
import { SqliteStorageProvider } from "../../src/storage/sqlite-provider.js";
import type { StorageProvider } from "../../src/storage/storage-provider.js";
import { FailingStorage, type StorageMethod, createMemoryStorage, preference, turn } from "../helpers/fixtures.js";

const history = [
  turn(1, "user", "recommend a thriller"),
  turn(2, "tool", "Found 3 film(s) for genre 'Thriller':", "search_by_genre"),
  turn(3, "assistant", "Try Se7en."),
  turn(4, "user", "recommend a thriller"),
  turn(5, "user", "and   something\n funny"),
  turn(6, "assistant", "Groundhog Day."),
];

describe("compression", () => {
  it("estimates four characters per token", () => {
    expect(estimateTokens([turn(1, "user", "abcdefghi")])).toBe(2);
    expect(estimateTokens([])).toBe(0);
  });

  it("leaves a window within budget untouched", () => {
    expect(compressTurns(history, 1000, 2)).toEqual({ turns: history });
  });

  it("leaves a window no longer than the kept tail untouched", () => {
    expect(compressTurns(history, 1, 6)).toEqual({ turns: history });
  });

  it("folds older turns into a summary", () => {
    const result = compressTurns(history, 5, 2);
    expect(result.turns.map((t) => t.seq)).toEqual([5, 6]);
    expect(result.summary).toBe("User asked about: recommend a thriller. Tools used: search_by_genre");
  });

  it("collapses whitespace, truncates and caps the quoted questions", () => {
    const turns = [
      turn(1, "user", "and   something\n funny"),
      turn(2, "user", "a".repeat(100)),
      ...[3, 4, 5, 6, 7].map((seq) => turn(seq, "user", `question ${seq}`)),
    ];
    expect(summarizeTurns(turns)).toBe(
      `User asked about: and something funny, ${"a".repeat(80)}, question 3, question 4, question 5`,
    );
  });

  it("falls back to a generic summary", () => {
    expect(summarizeTurns([turn(1, "assistant", "Hello!")])).toBe("General film discussion");
  });
});

describe("formatProfile", () => {
  it("lists the name and preferences grouped by type", () => {
    const user = { id: "cli:ada", displayName: "Ada", createdAt: 0, lastActiveAt: 0 };
    const prefs = [
      preference("genre", "Thriller", 0.84),
      preference("genre", "Action", 0.15),
      preference("rating_min", "8", 0.9),
    ];
    expect(formatProfile(user, prefs)).toBe(
      [
        "User name: Ada",
        "",
        "User preferences (confidence):",
        "  - genre: Thriller (0.84), Action (0.15)",
        "  - rating_min: 8 (0.90)",
      ].join("\n"),
    );
  });

  it("says when there is nothing to show", () => {
    expect(formatProfile(null, [])).toBe("No user context available.");
  });
});

describe("ContextBuilder", () => {
  const options: ContextOptions = { contextTurns: 20, tokenBudget: 3000, keepRecentTurns: 6 };
  let storage: SqliteStorageProvider;

  function builderOn(store: StorageProvider, overrides: Partial<ContextOptions> = {}): ContextBuilder {
    return new ContextBuilder(
      new ConversationLog(store),
      new PreferenceStore(store),
      new UserStore(store),
      { ...options, ...overrides },
    );
  }

  beforeEach(async () => {
    storage = await createMemoryStorage();
  });

  afterEach(async () => {
    await storage.close();
  });

  it("assembles the user, recent turns and preferences", async () => {
    const log = new ConversationLog(storage);
    await log.append("u1", "user", "first", { turnId: "a" });
    await log.append("u1", "assistant", "reply", { turnId: "a" });
    await log.append("u1", "user", "second", { turnId: "b" });
    await new PreferenceStore(storage).upsertPreference("u1", "genre", "Drama", 0.6);

    const window = await builderOn(storage, { contextTurns: 2 }).assemble("u1");

    expect(window.user?.id).toBe("u1");
    expect(window.turns.map((t) => t.content)).toEqual(["reply", "second"]);
    expect(window.preferences.map((p) => p.value)).toEqual(["Drama"]);
    expect(window.summary).toBeUndefined();
    expect(window.warnings).toEqual([]);
  });

  it("degrades each unavailable part to empty with a warning", async () => {
    const failing: Set<StorageMethod> = new Set(["touchUser", "listPreferences"]);
    const window = await builderOn(new FailingStorage(storage, failing)).assemble("u1");

    expect(window.user).toBeNull();
    expect(window.preferences).toEqual([]);
    expect(window.turns).toEqual([]);
    expect(window.warnings).toEqual(["user unavailable", "preferences unavailable"]);
  });

  it("frames the completion request", () => {
    const window: ContextWindow = {
      user: null,
      turns: [
        turn(1, "user", "hi"),
        turn(2, "tool", "Found 1 film(s)", "search_by_genre"),
        turn(3, "assistant", "Hello"),
      ],
      preferences: [],
      summary: "User asked about: x",
      warnings: [],
    };

    const completion = builderOn(storage).buildCompletion(window, "BASE", "more please", "RESULTS");

    expect(completion.systemPrompt).toBe(
      "BASE\n\nNo user context available.\n\nPrevious conversation summary: User asked about: x",
    );
    expect(completion.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "system", content: "Result of search_by_genre:\nFound 1 film(s)" },
      { role: "assistant", content: "Hello" },
      { role: "system", content: "Catalog results for the next message:\nRESULTS" },
      { role: "user", content: "more please" },
    ]);
  });

  it("omits the catalog message when no tool ran", () => {
    const window: ContextWindow = { user: null, turns: [], preferences: [], warnings: [] };
    expect(builderOn(storage).buildCompletion(window, "BASE", "hello", null).messages).toEqual([
      { role: "user", content: "hello" },
    ]);
  });
});
