import { describe, it, expect } from "vitest";
import { IntentRouter } from "../../src/core/intent-router.js";
import { NoToolMatchError } from "../../src/core/errors.js";
import { VOCABULARY, preference } from "../helpers/fixtures.js";

const noPreferences = { preferences: [] };

describe("IntentRouter", () => {
  const router = new IntentRouter(VOCABULARY);
  const chainRouter = new IntentRouter(VOCABULARY, { compoundStrategy: "chain" });

  it("routes a single criterion to its tool", () => {
    expect(router.route("is The Matrix any good?", noPreferences)).toEqual({
      mode: "independent",
      calls: [{ name: "search_by_title", args: { title: "The Matrix" } }],
    });
  });

  it("routes a compound query to one search_films call", () => {
    expect(router.route("find action movies with rating above 8", noPreferences)).toEqual({
      mode: "independent",
      calls: [{ name: "search_films", args: { genre: "Action", min_rating: 8, exclusive: true } }],
    });
  });

  it("chains single-criterion calls in chain mode", () => {
    expect(chainRouter.route("find action movies with rating above 8", noPreferences)).toEqual({
      mode: "chain",
      calls: [
        { name: "search_by_genre", args: { genre: "Action" } },
        { name: "search_by_rating", args: { min_rating: 8, exclusive: true } },
      ],
    });
  });

  it("orders chained calls title, actor, genre, rating", () => {
    const plan = chainRouter.route('"Speed" with Keanu Reeves rated at least 7', noPreferences);
    expect(plan.calls).toEqual([
      { name: "search_by_title", args: { title: "Speed" } },
      { name: "search_by_actor", args: { actor_name: "Keanu Reeves" } },
      { name: "search_by_rating", args: { min_rating: 7 } },
    ]);
  });

  it("chains when one kind appears twice, even in compound mode", () => {
    expect(router.route("sci-fi thrillers", noPreferences)).toEqual({
      mode: "chain",
      calls: [
        { name: "search_by_genre", args: { genre: "Sci-Fi" } },
        { name: "search_by_genre", args: { genre: "Thriller" } },
      ],
    });
  });

  it("raises the stored threshold on a correction", () => {
    const context = { preferences: [preference("rating_min", "7", 0.9), preference("rating_min", "6", 0.3)] };
    expect(router.route("no, something with a higher rating", context).calls).toEqual([
      { name: "search_by_rating", args: { min_rating: 8 } },
    ]);
  });

  it("caps a raised threshold at ten", () => {
    const context = { preferences: [preference("rating_min", "9.5", 0.9)] };
    expect(router.route("no, something with a higher rating", context).calls).toEqual([
      { name: "search_by_rating", args: { min_rating: 10 } },
    ]);
  });

  it("ignores negative clauses", () => {
    expect(router.route("I love thrillers but I don't like horror", noPreferences).calls).toEqual([
      { name: "search_by_genre", args: { genre: "Thriller" } },
    ]);
  });

  it("throws NoToolMatchError when nothing is searchable", () => {
    expect(() => router.route("tell me a joke", noPreferences)).toThrow(NoToolMatchError);
    expect(() => router.route("I don't like horror", noPreferences)).toThrow(NoToolMatchError);
  });

  it("is deterministic", () => {
    const utterance = "Keanu Reeves thrillers";
    expect(router.route(utterance, noPreferences)).toEqual(router.route(utterance, noPreferences));
    expect(router.route(utterance, noPreferences).calls).toEqual([
      { name: "search_films", args: { actor_name: "Keanu Reeves", genre: "Thriller" } },
    ]);
  });
});
