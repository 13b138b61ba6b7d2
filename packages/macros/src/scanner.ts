/**
 * Scanner wrapper for `eqInterface` invocations
 *
 * Wraps TypeScript's scanner. Trivia is dropped; every other token keeps its
 * source offsets so callers can slice the original text back out. The
 * scanner never merges `>` characters, so `Map<K, Set<V>>` yields two
 * separate closing tokens.
 */

import * as ts from "typescript";

export interface Token {
  kind: ts.SyntaxKind;
  text: string;
  start: number;
  end: number;
}

export function tokenize(source: string): Token[] {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, true, ts.LanguageVariant.Standard, source);

  const tokens: Token[] = [];

  while (scanner.scan() !== ts.SyntaxKind.EndOfFileToken) {
    const kind = scanner.getToken();
    const start = scanner.getTokenStart();
    const text = scanner.getTokenText();
    tokens.push({ kind, text, start, end: start + text.length });
  }

  return tokens;
}

/**
 * Source text covered by a run of tokens, from the first token's start to
 * the last token's end. Empty for an empty run.
 */
export function sliceTokens(source: string, tokens: readonly Token[]): string {
  if (tokens.length === 0) return "";
  return source.slice(tokens[0].start, tokens[tokens.length - 1].end);
}

const OPENERS = new Set([
  ts.SyntaxKind.LessThanToken,
  ts.SyntaxKind.OpenParenToken,
  ts.SyntaxKind.OpenBracketToken,
  ts.SyntaxKind.OpenBraceToken,
]);

const CLOSERS = new Set([
  ts.SyntaxKind.GreaterThanToken,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken,
]);

/** Change in bracket nesting caused by a token. */
export function depthDelta(token: Token): number {
  if (OPENERS.has(token.kind)) return 1;
  if (CLOSERS.has(token.kind)) return -1;
  return 0;
}

/**
 * Split a token run at commas that sit outside every bracket pair.
 */
export function splitTopLevel(tokens: readonly Token[], separator: ts.SyntaxKind): Token[][] {
  const groups: Token[][] = [[]];
  let depth = 0;

  for (const token of tokens) {
    if (depth === 0 && token.kind === separator) {
      groups.push([]);
      continue;
    }
    depth += depthDelta(token);
    groups[groups.length - 1].push(token);
  }

  return groups;
}
