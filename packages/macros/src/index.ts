/**
 * @polyeq/macros - the `eqInterface` expander
 *
 * Importing this module registers the macro with the global registry.
 */

import "./eq-interface.js";

export { eqInterface } from "./runtime-stubs.js";
export { eqInterfaceMacro, expandEqInterface } from "./eq-interface.js";
export { eqTransformerFactory, type EqTransformerConfig } from "./transformer.js";
export {
  parseInvocation,
  wrapConstraint,
  ExpansionError,
  type EqInvocation,
  type GenericParam,
} from "./parser.js";
export {
  renderEqImpls,
  resolveEqImplOptions,
  combinationSuffix,
  type EqImplOptions,
} from "./codegen.js";
export { tokenize, sliceTokens, splitTopLevel, depthDelta, type Token } from "./scanner.js";
