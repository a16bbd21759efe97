import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { SqliteCatalogStore } from "../../src/storage/sqlite-catalog.js";
import { loadSeedFile, seedCatalog } from "../../src/storage/catalog-seed.js";
import { ConfigError, StoreUnavailableError } from "../../src/core/errors.js";
import { SEED_FILE, createSeededCatalog } from "../helpers/fixtures.js";

describe("SqliteCatalogStore", () => {
  let catalog: SqliteCatalogStore;

  beforeAll(async () => {
    catalog = await createSeededCatalog();
  });

  afterAll(async () => {
    await catalog.close();
  });

  it("orders by rating desc, then title asc", async () => {
    const films = await catalog.queryFilms({ minRating: 8.6, maxRating: 8.6 });
    expect(films.map((f) => f.title)).toEqual([
      "Interstellar",
      "Se7en",
      "Spirited Away",
      "The Silence of the Lambs",
    ]);
  });

  it("applies the default limit and an explicit one", async () => {
    expect(await catalog.queryFilms({})).toHaveLength(20);
    const top = await catalog.queryFilms({ limit: 2 });
    expect(top.map((f) => f.title)).toEqual(["The Shawshank Redemption", "The Godfather"]);
  });

  it("combines genre and a strict minimum rating", async () => {
    const films = await catalog.queryFilms({ genre: "action", minRating: 8, minRatingExclusive: true });
    expect(films.map((f) => f.title)).toEqual([
      "The Dark Knight",
      "Inception",
      "The Matrix",
      "Gladiator",
      "Mad Max: Fury Road",
    ]);
  });

  it("treats a minimum rating as inclusive by default", async () => {
    const films = await catalog.queryFilms({ genre: "Action", minRating: 8 });
    expect(films.map((f) => f.title)).toContain("The Terminator");
  });

  it("matches actors by case-insensitive substring", async () => {
    const films = await catalog.queryFilms({ actor: "keanu" });
    expect(films.map((f) => f.title)).toEqual(["The Matrix", "John Wick", "Speed"]);
  });

  it("matches titles literally", async () => {
    expect((await catalog.queryFilms({ title: "matrix" })).map((f) => f.title)).toEqual(["The Matrix"]);
    expect(await catalog.queryFilms({ title: "%" })).toEqual([]);
  });

  it("restricts to film ids and returns nothing for an empty list", async () => {
    const matrix = await catalog.queryFilms({ title: "The Matrix" });
    const ids = matrix.map((f) => f.id);

    expect((await catalog.queryFilms({ filmIds: ids, genre: "Sci-Fi" })).map((f) => f.title)).toEqual(["The Matrix"]);
    expect(await catalog.queryFilms({ filmIds: [] })).toEqual([]);
  });

  it("attaches sorted genres and billed actors", async () => {
    const [matrix] = await catalog.queryFilms({ title: "The Matrix" });
    expect(matrix).toMatchObject({
      title: "The Matrix",
      year: 1999,
      rating: 8.7,
      genres: ["Action", "Sci-Fi"],
      actors: ["Keanu Reeves", "Laurence Fishburne", "Carrie-Anne Moss"],
    });
  });

  it("lists its vocabulary", async () => {
    const vocabulary = await catalog.vocabulary();
    expect(vocabulary.genres).toEqual([
      "Action",
      "Adventure",
      "Animation",
      "Comedy",
      "Crime",
      "Drama",
      "Horror",
      "Romance",
      "Sci-Fi",
      "Thriller",
    ]);
    expect(vocabulary.titles).toHaveLength(26);
    expect(vocabulary.actors).toContain("Morgan Freeman");
  });

  it("does not reseed a populated catalog unless forced", async () => {
    expect(await seedCatalog(catalog, await loadSeedFile(SEED_FILE))).toBe(0);
    expect(await catalog.countFilms()).toBe(26);
  });
});

describe("catalog seeding and failures", () => {
  it("rejects a missing seed file with ConfigError", async () => {
    await expect(loadSeedFile("/nonexistent/films.json")).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects queries on a closed catalog", async () => {
    const catalog = await createSeededCatalog();
    await catalog.close();
    await expect(catalog.queryFilms({})).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
