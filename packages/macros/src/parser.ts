/**
 * Expansion state machine for `eqInterface` invocations.
 *
 * ```text
 * BEGIN ──`<`──▶ GENERICS ──`>`──▶ PATH ──`where`──▶ BOUNDS ──▶ IMPL
 *   └──────────────other─────────────▲  └────────────end────────────▲
 * ```
 *
 * The input is the text of the template literal, for example
 * `<T extends Item> Store<T> where T extends Comparable`.
 */

import * as ts from "typescript";
import {
  interpolate,
  TS9801,
  TS9802,
  TS9803,
  TS9804,
  type DiagnosticDescriptor,
} from "@polyeq/core";
import { depthDelta, sliceTokens, splitTopLevel, tokenize, type Token } from "./scanner.js";

// ============================================================================
// Types
// ============================================================================

export interface GenericParam {
  name: string;
  constraint?: string;
  default?: string;
}

export interface EqInvocation {
  /** Leading generic parameter list, empty when there is none */
  generics: GenericParam[];
  /** Full interface path as written, including type arguments */
  path: string;
  /** Dotted name segments of the path */
  segments: string[];
  /** Type-argument list as written (`<T>`), when present */
  typeArgs?: string;
  /** The last path segment */
  name: string;
}

type DiagnosticArgs = Record<string, string | number>;

/**
 * A malformed invocation. Carries the catalogued diagnostic so the macro can
 * report it against the source node.
 */
export class ExpansionError extends Error {
  constructor(
    readonly descriptor: DiagnosticDescriptor,
    readonly args: DiagnosticArgs,
    readonly help?: string
  ) {
    super(`TS${descriptor.code}: ${interpolate(descriptor.messageTemplate, args)}`);
    this.name = "ExpansionError";
  }
}

enum ParseState {
  Begin,
  Generics,
  Path,
  Bounds,
  Impl,
}

function isWhere(token: Token): boolean {
  return token.kind === ts.SyntaxKind.Identifier && token.text === "where";
}

// ============================================================================
// Generic parameters
// ============================================================================

function parseGenericParam(source: string, tokens: Token[], listText: string): GenericParam {
  const text = tokens.length > 0 ? sliceTokens(source, tokens) : listText;
  const fail = (): never => {
    throw new ExpansionError(
      TS9802,
      { param: text },
      "Write each parameter as `Name`, `Name extends Constraint` or `Name = Default`"
    );
  };

  const [head, ...rest] = tokens;
  if (head === undefined || head.kind !== ts.SyntaxKind.Identifier) return fail();

  const param: GenericParam = { name: head.text };
  if (rest.length === 0) return param;

  const [constraintPart, ...defaultParts] = splitTopLevel(rest, ts.SyntaxKind.EqualsToken);
  if (defaultParts.length > 1) return fail();

  if (constraintPart.length > 0) {
    const [keyword, ...constraint] = constraintPart;
    if (keyword.kind !== ts.SyntaxKind.ExtendsKeyword || constraint.length === 0) return fail();
    param.constraint = sliceTokens(source, constraint);
  }

  if (defaultParts.length === 1) {
    if (defaultParts[0].length === 0) return fail();
    param.default = sliceTokens(source, defaultParts[0]);
  }

  return param;
}

function parseGenericList(source: string, tokens: Token[], open: Token, close: Token): GenericParam[] {
  const listText = source.slice(open.start, close.end);
  const groups = splitTopLevel(tokens, ts.SyntaxKind.CommaToken);

  // `<T, U,>` is a valid parameter list
  if (groups.length > 1 && groups[groups.length - 1].length === 0) {
    groups.pop();
  }

  const params = groups.map((group) => parseGenericParam(source, group, listText));

  const seen = new Set<string>();
  for (const param of params) {
    if (seen.has(param.name)) {
      throw new ExpansionError(TS9802, { param: param.name }, "Generic parameter names must be unique");
    }
    seen.add(param.name);
  }

  return params;
}

// ============================================================================
// Path
// ============================================================================

function parsePath(source: string, tokens: Token[]): Omit<EqInvocation, "generics"> {
  const path = sliceTokens(source, tokens);
  const fail = (reason: string): never => {
    throw new ExpansionError(
      TS9803,
      { path, reason },
      "Name the interface, e.g. `Shape`, `geometry.Shape` or `Store<T>`"
    );
  };

  if (tokens.length === 0) return fail("expected an interface name");

  const segments: string[] = [];
  let i = 0;

  for (;;) {
    const token = tokens[i];
    if (token === undefined) return fail("expected a name after `.`");
    if (token.kind !== ts.SyntaxKind.Identifier) return fail(`unexpected token \`${token.text}\``);
    segments.push(token.text);
    i++;
    if (tokens[i]?.kind !== ts.SyntaxKind.DotToken) break;
    i++;
  }

  let typeArgs: string | undefined;
  const open = tokens[i];
  if (open !== undefined && open.kind === ts.SyntaxKind.LessThanToken) {
    let depth = 0;
    let closeIndex = -1;
    for (let j = i; j < tokens.length; j++) {
      depth += depthDelta(tokens[j]);
      if (depth === 0) {
        closeIndex = j;
        break;
      }
    }
    if (closeIndex === -1) return fail("unclosed type-argument list");
    if (closeIndex === i + 1) return fail("empty type-argument list");

    typeArgs = source.slice(open.start, tokens[closeIndex].end);
    i = closeIndex + 1;
  }

  const stray = tokens[i];
  if (stray !== undefined) return fail(`unexpected token \`${stray.text}\``);

  return { path, segments, typeArgs, name: segments[segments.length - 1] };
}

// ============================================================================
// Bounds
// ============================================================================

/**
 * Parenthesize a constraint before it joins an intersection, when a
 * top-level operator binds looser than `&`.
 */
export function wrapConstraint(constraint: string): string {
  let depth = 0;
  for (const token of tokenize(constraint)) {
    if (
      depth === 0 &&
      (token.kind === ts.SyntaxKind.BarToken ||
        token.kind === ts.SyntaxKind.EqualsGreaterThanToken ||
        token.kind === ts.SyntaxKind.QuestionToken)
    ) {
      return `(${constraint})`;
    }
    depth += depthDelta(token);
  }
  return constraint;
}

function applyBounds(source: string, tokens: Token[], generics: GenericParam[]): void {
  const fail = (bound: string, reason: string): never => {
    throw new ExpansionError(
      TS9804,
      { bound, reason },
      "Write bounds as `where T extends Constraint, U extends Other`"
    );
  };

  if (tokens.length === 0) return fail("", "expected at least one bound after `where`");

  const groups = splitTopLevel(tokens, ts.SyntaxKind.CommaToken);
  if (groups.length > 1 && groups[groups.length - 1].length === 0) {
    groups.pop();
  }

  for (const group of groups) {
    const bound = sliceTokens(source, group);
    const [name, keyword, ...constraint] = group;

    if (name === undefined) return fail(bound, "empty bound");
    if (
      name.kind !== ts.SyntaxKind.Identifier ||
      keyword === undefined ||
      keyword.kind !== ts.SyntaxKind.ExtendsKeyword ||
      constraint.length === 0
    ) {
      return fail(bound, "expected `Name extends Constraint`");
    }

    const param = generics.find((g) => g.name === name.text);
    if (!param) return fail(bound, `\`${name.text}\` is not a declared generic parameter`);

    const extra = sliceTokens(source, constraint);
    param.constraint =
      param.constraint === undefined
        ? extra
        : `${wrapConstraint(param.constraint)} & ${wrapConstraint(extra)}`;
  }
}

// ============================================================================
// State machine
// ============================================================================

/**
 * Parse an invocation into the parts code generation needs.
 *
 * @throws ExpansionError for every malformed input
 */
export function parseInvocation(source: string): EqInvocation {
  const tokens = tokenize(source);

  let state = ParseState.Begin;
  let index = 0;
  let generics: GenericParam[] = [];
  let parsedPath: Omit<EqInvocation, "generics"> | undefined;

  while (state !== ParseState.Impl) {
    switch (state) {
      case ParseState.Begin: {
        state = tokens[0]?.kind === ts.SyntaxKind.LessThanToken ? ParseState.Generics : ParseState.Path;
        break;
      }

      case ParseState.Generics: {
        const open = tokens[0];
        let depth = 0;
        let close = -1;
        for (let i = 0; i < tokens.length; i++) {
          depth += depthDelta(tokens[i]);
          if (depth === 0) {
            close = i;
            break;
          }
        }
        if (close === -1) {
          throw new ExpansionError(
            TS9801,
            { missing: depth },
            "Close every `<` in the generic parameter list before the interface path"
          );
        }
        if (close === 1) {
          throw new ExpansionError(
            TS9802,
            { param: "<>" },
            "Remove the empty `<>` or declare at least one parameter"
          );
        }
        generics = parseGenericList(source, tokens.slice(1, close), open, tokens[close]);
        index = close + 1;
        state = ParseState.Path;
        break;
      }

      case ParseState.Path: {
        let depth = 0;
        let end = index;
        while (end < tokens.length && !(depth === 0 && isWhere(tokens[end]))) {
          depth += depthDelta(tokens[end]);
          end++;
        }
        parsedPath = parsePath(source, tokens.slice(index, end));
        index = end;
        state = index < tokens.length ? ParseState.Bounds : ParseState.Impl;
        break;
      }

      case ParseState.Bounds: {
        applyBounds(source, tokens.slice(index + 1), generics);
        index = tokens.length;
        state = ParseState.Impl;
        break;
      }
    }
  }

  if (parsedPath === undefined) {
    throw new ExpansionError(TS9803, { path: source.trim(), reason: "expected an interface name" });
  }
  return { generics, ...parsedPath };
}
