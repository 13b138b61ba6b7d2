/**
 * AST helpers shared by macros and tests.
 */

import * as ts from "typescript";

/**
 * Recursively clear source positions so the printer generates fresh text
 * instead of slicing from the wrong source file.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  return ts.visitEachChild(
    node,
    (child) => stripPositions(child),
    undefined as unknown as ts.TransformationContext
  ) as T;
}

let sharedPrinter: ts.Printer | undefined;
let dummySourceFile: ts.SourceFile | undefined;

export function getPrinter(): ts.Printer {
  return (sharedPrinter ??= ts.createPrinter({ newLine: ts.NewLineKind.LineFeed }));
}

/** An empty source file for printing synthesized nodes. */
function getDummySourceFile(): ts.SourceFile {
  return (dummySourceFile ??= ts.createSourceFile(
    "__polyeq_print__.ts",
    "",
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.TS
  ));
}

export function printNode(node: ts.Node, sourceFile?: ts.SourceFile): string {
  const printer = getPrinter();
  const sf = sourceFile ?? getDummySourceFile();

  if (ts.isExpression(node)) {
    return printer.printNode(ts.EmitHint.Expression, node, sf);
  }
  return printer.printNode(ts.EmitHint.Unspecified, node, sf);
}

/**
 * Parse statements from code text, with positions stripped.
 * Throws when the text does not parse cleanly.
 */
export function parseStatements(code: string): ts.Statement[] {
  const tempSource = ts.createSourceFile(
    "__macro_temp__.ts",
    code,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );

  const diags = (tempSource as unknown as { parseDiagnostics?: readonly ts.Diagnostic[] })
    .parseDiagnostics;
  if (diags && diags.length > 0) {
    const first = ts.flattenDiagnosticMessageText(diags[0].messageText, "\n");
    throw new Error(`Failed to parse generated statements: ${first}`);
  }

  return Array.from(tempSource.statements).map((stmt) => stripPositions(stmt));
}
