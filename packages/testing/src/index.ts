/**
 * @polyeq/testing - helpers for testing polyeq macros
 *
 * @example
 * ```typescript
 * import { createMacroTestContext, findTaggedTemplate } from "@polyeq/testing";
 *
 * const ctx = createMacroTestContext("eqInterface`Shape`;");
 * const node = findTaggedTemplate(ctx.sourceFile, "eqInterface");
 * ```
 */

export {
  TestMacroContext,
  createMacroTestContext,
  parseSource,
  findTaggedTemplate,
  printStatements,
  transformSource,
} from "./macro-context.js";
