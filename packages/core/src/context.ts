/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { MacroContext, MacroDiagnostic } from "./types.js";
import { DiagnosticBuilder, type DiagnosticDescriptor, type RichDiagnostic } from "./diagnostics.js";
import { parseStatements } from "./ast-utils.js";

/** `message (note: ...) (help: ...)` */
function withNotesAndHelp(d: RichDiagnostic): string {
  const notes = d.notes.map((note) => ` (note: ${note})`).join("");
  return d.help ? `${d.message}${notes} (help: ${d.help})` : `${d.message}${notes}`;
}

export class MacroContextImpl implements MacroContext {
  private readonly diagnostics: MacroDiagnostic[] = [];

  constructor(
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory = ts.factory
  ) {}

  parseStatements(code: string): ts.Statement[] {
    return parseStatements(code);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportError(node: ts.Node, message: string): void {
    this.diagnostics.push({ severity: "error", message, node });
  }

  reportWarning(node: ts.Node, message: string): void {
    this.diagnostics.push({ severity: "warning", message, node });
  }

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, this.sourceFile, (d: RichDiagnostic) => {
      this.diagnostics.push({
        severity: d.severity,
        message: withNotesAndHelp(d),
        code: d.code,
        node: d.primarySpan?.node,
      });
    });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }
}

/**
 * Create a macro context for one source file of a transformation.
 */
export function createMacroContext(
  sourceFile: ts.SourceFile,
  transformContext?: ts.TransformationContext
): MacroContextImpl {
  return new MacroContextImpl(sourceFile, transformContext?.factory ?? ts.factory);
}
