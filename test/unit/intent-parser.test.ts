import { describe, it, expect } from "vitest";
import {
  analyzeClause,
  formatScore,
  hasCorrectionCue,
  hasStandardCue,
  matchActors,
  matchGenres,
  matchTitles,
  parseName,
  parseRating,
  raiseThreshold,
  splitClauses,
} from "../../src/core/intent-parser.js";
import { VOCABULARY } from "../helpers/fixtures.js";

describe("parseRating", () => {
  it("reads a strict minimum", () => {
    expect(parseRating("movies rated above 8")).toEqual({ min: 8, exclusive: true, source: "numeric" });
  });

  it("reads inclusive minimums", () => {
    expect(parseRating("rated 7 or more")).toEqual({ min: 7, exclusive: false, source: "numeric" });
    expect(parseRating("nothing below 7.5 rating")).toEqual({ min: 7.5, exclusive: false, source: "numeric" });
  });

  it("reads a maximum", () => {
    expect(parseRating("films rated under 6")).toEqual({ max: 6, exclusive: false, source: "numeric" });
  });

  it("reads negated comparisons as a single bound", () => {
    expect(parseRating("films rated no more than 6")).toEqual({ max: 6, exclusive: false, source: "numeric" });
    expect(parseRating("films rated not more than 6")).toEqual({ max: 6, exclusive: false, source: "numeric" });
    expect(parseRating("films rated no less than 7")).toEqual({ min: 7, exclusive: false, source: "numeric" });
    expect(parseRating("films rated not less than 7")).toEqual({ min: 7, exclusive: false, source: "numeric" });
  });

  it("needs a rating word for numeric bounds", () => {
    expect(parseRating("anything above 8")).toBeNull();
  });

  it("ignores scores outside the scale", () => {
    expect(parseRating("rated 11 or more")).toBeNull();
  });

  it("recognizes corrections and qualitative wording", () => {
    expect(parseRating("something with a higher rating")).toEqual({ exclusive: false, source: "corrective" });
    expect(parseRating("highly rated comedies")).toEqual({ min: 8, exclusive: false, source: "qualitative" });
  });
});

describe("name matching", () => {
  it("matches single-word titles case-sensitively", () => {
    expect(matchTitles("is speed any good", VOCABULARY.titles).titles).toEqual([]);
    expect(matchTitles("is Speed any good", VOCABULARY.titles)).toEqual({
      titles: ["Speed"],
      rest: "is       any good",
    });
  });

  it("treats quoted text as a title and keeps text order", () => {
    expect(matchTitles('"Heat" or the matrix', VOCABULARY.titles).titles).toEqual(["Heat", "The Matrix"]);
  });

  it("finds catalog actors and cued names", () => {
    expect(matchActors("films featuring Sandra Bullock and keanu reeves", VOCABULARY.actors).actors).toEqual([
      "Sandra Bullock",
      "Keanu Reeves",
    ]);
  });

  it("maps genre aliases and plurals in text order", () => {
    expect(matchGenres("scary movies or sci fi comedies", VOCABULARY.genres).genres).toEqual([
      "Horror",
      "Sci-Fi",
      "Comedy",
    ]);
    expect(matchGenres("sci-fi thrillers", VOCABULARY.genres).genres).toEqual(["Sci-Fi", "Thriller"]);
  });
});

describe("clauses and cues", () => {
  it("splits on punctuation and 'but', keeping decimals", () => {
    expect(splitClauses("I love thrillers but I hate horror. Rated 7.5 or more!")).toEqual([
      "I love thrillers",
      "I hate horror",
      "Rated 7.5 or more",
    ]);
  });

  it("gives a clause its polarity", () => {
    expect(analyzeClause("I don't like horror", VOCABULARY)).toMatchObject({
      polarity: "negative",
      genres: ["Horror"],
      rating: null,
    });
    expect(analyzeClause("I love Tom Hanks", VOCABULARY)).toMatchObject({
      polarity: "positive",
      actors: ["Tom Hanks"],
    });
  });

  it("detects corrections and personal standards", () => {
    expect(hasCorrectionCue("No, something else")).toBe(true);
    expect(hasCorrectionCue("I know nothing about it")).toBe(false);
    expect(hasStandardCue("I only watch films rated 7 or more")).toBe(true);
    expect(hasStandardCue("show me films rated 7 or more")).toBe(false);
  });

  it("parses a name introduction", () => {
    expect(parseName("hi, my name is ADA")).toBe("Ada");
    expect(parseName("hello there")).toBeNull();
  });
});

describe("thresholds", () => {
  it("raises the current threshold by one, capped at ten", () => {
    expect(raiseThreshold(null)).toBe(8);
    expect(raiseThreshold(7.5)).toBe(8.5);
    expect(raiseThreshold(9.5)).toBe(10);
  });

  it("formats scores without trailing zeros", () => {
    expect(formatScore(8)).toBe("8");
    expect(formatScore(7.456)).toBe("7.46");
  });
});
