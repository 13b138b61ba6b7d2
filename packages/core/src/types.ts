/**
 * Core types for the polyeq macro system
 */

import * as ts from "typescript";
import type { DiagnosticBuilder, DiagnosticDescriptor } from "./diagnostics.js";

// ============================================================================
// Macro Kinds
// ============================================================================

/**
 * Expansion surfaces understood by the transformer.
 *
 * Only tagged templates are needed today: `eqInterface\`Shape\`` expands a
 * whole top-level statement into declarations.
 */
export type MacroKind = "tagged-template";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** Parse a code string into statements */
  parseStatements(code: string): ts.Statement[];

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a compile-time error */
  reportError(node: ts.Node, message: string): void;

  /** Report a compile-time warning */
  reportWarning(node: ts.Node, message: string): void;

  /** Start a catalogued diagnostic anchored in the current source file */
  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder.
   * When set, the macro is only activated when the user imports the
   * placeholder from this module.
   *
   * When undefined, the macro is activated by name alone.
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name` if not specified.
   */
  exportName?: string;
}

/**
 * Tagged template macro - replaces a top-level `tag\`...\`;` statement
 * with the statements it expands to.
 */
export interface TaggedTemplateMacroDef extends MacroDefinitionBase {
  kind: "tagged-template";

  /**
   * Expand a tagged template literal
   * @param ctx - The macro context
   * @param node - The tagged template expression
   */
  expand(ctx: MacroContext, node: ts.TaggedTemplateExpression): ts.Statement[];

  /**
   * Optional compile-time validation of the template
   * @returns true if valid, false to abort expansion
   */
  validate?(ctx: MacroContext, node: ts.TaggedTemplateExpression): boolean;
}

/** Union of all macro types */
export type MacroDefinition = TaggedTemplateMacroDef;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Get a tagged template macro by name */
  getTaggedTemplate(name: string): TaggedTemplateMacroDef | undefined;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Check whether a macro requires import-scoping */
  isImportScoped(name: string): boolean;

  /** Get all registered macros */
  getAll(): MacroDefinition[];

  /** Remove every registration (for testing) */
  clear(): void;
}

// ============================================================================
// Macro Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  /** Severity level */
  severity: "error" | "warning" | "info";

  /** Diagnostic message */
  message: string;

  /** Catalog code, when the diagnostic came from a descriptor */
  code?: number;

  /** Source node that caused the diagnostic */
  node?: ts.Node;
}
