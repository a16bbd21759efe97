import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ToolRegistry } from "../../src/core/tool-registry.js";
import { createFilmTools } from "../../src/tools/film-tools.js";
import { SqliteCatalogStore } from "../../src/storage/sqlite-catalog.js";
import { InvalidToolArgsError, ToolNotFoundError } from "../../src/core/errors.js";
import type { Tool, ToolCall } from "../../src/types/tool.js";
import type { Film } from "../../src/types/film.js";
import { createSeededCatalog } from "../helpers/fixtures.js";

const context = { userId: "u1" };

/** A genre tool whose catalog is gone */
const brokenGenreTool: Tool = {
  name: "search_by_genre",
  description: "always fails",
  parse: (params) => ({ name: "search_by_genre", args: { genre: String(params["genre"]) } }),
  execute: async (): Promise<Film[]> => {
    throw new Error("catalog offline");
  },
};

describe("ToolRegistry", () => {
  let catalog: SqliteCatalogStore;
  let registry: ToolRegistry;

  beforeAll(async () => {
    catalog = await createSeededCatalog();
    registry = new ToolRegistry(createFilmTools(catalog));
  });

  afterAll(async () => {
    await catalog.close();
  });

  it("registers the five catalog tools", () => {
    expect(registry.size).toBe(5);
    expect(registry.has("search_films")).toBe(true);
    expect(registry.has("delete_films")).toBe(false);
  });

  describe("validation", () => {
    it("rejects an unknown tool", () => {
      expect(() => registry.validate("delete_films", {})).toThrow(ToolNotFoundError);
    });

    it("rejects a missing or mistyped argument", () => {
      expect(() => registry.validate("search_by_genre", {})).toThrow(InvalidToolArgsError);
      expect(() => registry.validate("search_by_rating", { min_rating: "eight" })).toThrow(InvalidToolArgsError);
    });

    it("rejects unknown keys and out-of-range ratings", () => {
      expect(() => registry.validate("search_by_actor", { actor_name: "Keanu", limit: 3 })).toThrow(
        InvalidToolArgsError,
      );
      expect(() => registry.validate("search_by_rating", { min_rating: 11 })).toThrow(InvalidToolArgsError);
    });

    it("rejects an inverted rating range", () => {
      expect(() => registry.validate("search_by_rating", { min_rating: 8, max_rating: 6 })).toThrow(
        "max_rating must be >= min_rating",
      );
    });

    it("rejects a search_films call with no criterion", () => {
      expect(() => registry.validate("search_films", { exclusive: true })).toThrow(
        "at least one criterion is required",
      );
    });

    it("trims text arguments", () => {
      expect(registry.validate("search_by_genre", { genre: "  Drama " })).toEqual({
        name: "search_by_genre",
        args: { genre: "Drama" },
      });
    });

    it("carries the tool-not-found code", () => {
      try {
        registry.get("delete_films");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidToolArgsError);
        expect(err).toMatchObject({ code: "TOOL_NOT_FOUND", toolName: "delete_films" });
      }
    });
  });

  describe("executePlan", () => {
    it("chains calls through the previous call's films", async () => {
      const result = await registry.executePlan(
        {
          mode: "chain",
          calls: [
            { name: "search_by_actor", args: { actor_name: "Keanu Reeves" } },
            { name: "search_by_genre", args: { genre: "Thriller" } },
          ],
        },
        context,
      );

      expect(result.outcomes.map((o) => o.films.length)).toEqual([3, 2]);
      expect(result.films.map((f) => f.title)).toEqual(["John Wick", "Speed"]);
      expect(result.failure).toBeUndefined();
    });

    it("unions independent calls in catalog order", async () => {
      const result = await registry.executePlan(
        {
          mode: "independent",
          calls: [
            { name: "search_by_genre", args: { genre: "Animation" } },
            { name: "search_by_actor", args: { actor_name: "Tom Hanks" } },
          ],
        },
        context,
      );

      expect(result.films.map((f) => f.title)).toEqual(["Forrest Gump", "Spirited Away", "Toy Story", "Cast Away"]);
    });

    it("keeps partial results when a call fails", async () => {
      const broken = new ToolRegistry(createFilmTools(catalog));
      broken.register(brokenGenreTool);

      const rating: ToolCall = { name: "search_by_rating", args: { min_rating: 7 } };
      const result = await broken.executePlan(
        {
          mode: "chain",
          calls: [
            { name: "search_by_actor", args: { actor_name: "Keanu Reeves" } },
            { name: "search_by_genre", args: { genre: "Thriller" } },
            rating,
          ],
        },
        context,
      );

      expect(result.outcomes).toHaveLength(1);
      expect(result.films.map((f) => f.title)).toEqual(["The Matrix", "John Wick", "Speed"]);
      expect(result.failure).toEqual({
        call: { name: "search_by_genre", args: { genre: "Thriller" } },
        message: "Tool failed: search_by_genre (catalog offline)",
        skipped: [rating],
      });
    });

    it("applies the result limit only to the last call of a chain", async () => {
      const small = new SqliteCatalogStore({ dbPath: ":memory:", resultLimit: 3 });
      await small.init();
      const add = (title: string, rating: number, genres: string[]) =>
        small.addFilm({ title, year: 2001, rating, description: "", genres, actors: [] });
      await add("A1", 9.0, ["Action"]);
      await add("A2", 8.9, ["Action"]);
      await add("A3", 8.8, ["Action"]);
      await add("AC", 7.0, ["Action", "Comedy"]);
      const limited = new ToolRegistry(createFilmTools(small));

      const chained = await limited.executePlan(
        {
          mode: "chain",
          calls: [
            { name: "search_by_genre", args: { genre: "Action" } },
            { name: "search_by_genre", args: { genre: "Comedy" } },
          ],
        },
        context,
      );
      const single = await limited.executePlan(
        { mode: "independent", calls: [{ name: "search_by_genre", args: { genre: "Action" } }] },
        context,
      );
      await small.close();

      expect(chained.outcomes.map((o) => o.films.length)).toEqual([4, 1]);
      expect(chained.films.map((f) => f.title)).toEqual(["AC"]);
      expect(single.films.map((f) => f.title)).toEqual(["A1", "A2", "A3"]);
    });

    it("treats an empty result as success", async () => {
      const result = await registry.executePlan(
        { mode: "independent", calls: [{ name: "search_by_genre", args: { genre: "Western" } }] },
        context,
      );
      expect(result.films).toEqual([]);
      expect(result.failure).toBeUndefined();
    });
  });
});
