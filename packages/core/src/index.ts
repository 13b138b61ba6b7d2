/**
 * Core module exports for @polyeq/core
 *
 * This package provides:
 * - Macro system infrastructure (types, registry, context)
 * - The diagnostics catalog used by the expander
 * - Configuration loading
 */

export type {
  MacroKind,
  MacroContext,
  MacroDefinition,
  MacroDefinitionBase,
  TaggedTemplateMacroDef,
  MacroRegistry,
  MacroDiagnostic,
} from "./types.js";

export {
  globalRegistry,
  createRegistry,
  defineTaggedTemplateMacro,
} from "./registry.js";

export { MacroContextImpl, createMacroContext } from "./context.js";

// Diagnostics System
export * from "./diagnostics.js";

// Configuration System
export {
  config,
  loadConfigFromEnv,
  DEFAULT_CONFIG,
  type PolyeqConfig,
  type EqExpansionConfig,
} from "./config.js";

// AST Utilities
export { getPrinter, printNode, parseStatements } from "./ast-utils.js";
