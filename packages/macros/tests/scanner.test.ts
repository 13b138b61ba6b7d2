import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { depthDelta, sliceTokens, splitTopLevel, tokenize } from "../src/index.js";

describe("tokenize", () => {
  it("emits each closing angle bracket separately", () => {
    expect(tokenize("Map<K, Set<V>>").map((t) => t.text)).toEqual([
      "Map",
      "<",
      "K",
      ",",
      "Set",
      "<",
      "V",
      ">",
      ">",
    ]);
  });

  it("drops whitespace and comments but keeps offsets", () => {
    const tokens = tokenize("  Shape /* note */ where");
    expect(tokens.map((t) => [t.text, t.start, t.end])).toEqual([
      ["Shape", 2, 7],
      ["where", 19, 24],
    ]);
  });

  it("scans arrows as one token", () => {
    expect(tokenize("() => T").map((t) => t.kind)).toEqual([
      ts.SyntaxKind.OpenParenToken,
      ts.SyntaxKind.CloseParenToken,
      ts.SyntaxKind.EqualsGreaterThanToken,
      ts.SyntaxKind.Identifier,
    ]);
  });
});

describe("token helpers", () => {
  it("sliceTokens recovers the source between the first and last token", () => {
    const source = "A< B ,C >";
    expect(sliceTokens(source, tokenize(source))).toBe("A< B ,C >");
    expect(sliceTokens(source, [])).toBe("");
  });

  it("depthDelta tracks every bracket kind", () => {
    expect(tokenize("<([{").map(depthDelta)).toEqual([1, 1, 1, 1]);
    expect(tokenize(">)]}").map(depthDelta)).toEqual([-1, -1, -1, -1]);
    expect(tokenize("a,").map(depthDelta)).toEqual([0, 0]);
  });

  it("splitTopLevel ignores nested separators", () => {
    const source = "A, Map<B, C>, (d: D, e: E) => F";
    const groups = splitTopLevel(tokenize(source), ts.SyntaxKind.CommaToken);
    expect(groups.map((g) => sliceTokens(source, g))).toEqual([
      "A",
      "Map<B, C>",
      "(d: D, e: E) => F",
    ]);
  });
});
