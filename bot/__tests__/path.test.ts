import { describe, expect, test } from "vitest";
import { getPath, getString } from "../utils/path";

describe("getPath", () => {
  const event = {
    league: { name: "Serie A" },
    bookmakers: [{ bets: [{ values: [{ odd: "1.80" }, { odd: "4.50" }] }] }],
    empty: null,
  };

  test("reads nested object keys", () => {
    expect(getPath(event, ["league", "name"], "")).toBe("Serie A");
  });

  test("reads through array indices", () => {
    expect(getPath(event, ["bookmakers", 0, "bets", 0, "values", 1, "odd"], null)).toBe("4.50");
  });

  test("returns the fallback for a missing key", () => {
    expect(getPath(event, ["teams", "home", "name"], "Home")).toBe("Home");
  });

  test("returns the fallback for an out-of-range index", () => {
    expect(getPath(event, ["bookmakers", 3, "bets"], "none")).toBe("none");
    expect(getPath(event, ["bookmakers", -1], "none")).toBe("none");
  });

  test("returns the fallback when the shape is wrong", () => {
    // string key on an array, numeric index on an object
    expect(getPath(event, ["bookmakers", "0"], "x")).toBe("x");
    expect(getPath(event, ["league", 0], "x")).toBe("x");
    // walking into a primitive
    expect(getPath(event, ["league", "name", "length"], "x")).toBe("x");
  });

  test("treats null values as absent", () => {
    expect(getPath(event, ["empty"], "fallback")).toBe("fallback");
    expect(getPath(event, ["empty", "deeper"], "fallback")).toBe("fallback");
  });

  test("never throws on non-object sources", () => {
    expect(getPath(undefined, ["a"], 1)).toBe(1);
    expect(getPath(null, ["a", 0], 2)).toBe(2);
    expect(getPath(42, ["a"], 3)).toBe(3);
    expect(getPath("text", [0], 4)).toBe(4);
  });

  test("returns the source itself for an empty path", () => {
    expect(getPath(event, [], null)).toBe(event);
  });

  test("ignores inherited properties", () => {
    expect(getPath({}, ["toString"], "own only")).toBe("own only");
  });
});

describe("getString", () => {
  test("returns strings as found", () => {
    expect(getString({ teams: { home: { name: "Inter" } } }, ["teams", "home", "name"], "Home")).toBe("Inter");
  });

  test("falls back when the value is not a string", () => {
    expect(getString({ teams: { home: { name: 7 } } }, ["teams", "home", "name"], "Home")).toBe("Home");
    expect(getString({ teams: { home: { name: { first: "x" } } } }, ["teams", "home", "name"], "Home")).toBe("Home");
  });
});
