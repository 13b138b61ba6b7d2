/**
 * `eqInterface` - equality instances for an abstract interface
 *
 * ```typescript
 * import { eqInterface } from "@polyeq/macros";
 * import type { DynEq } from "@polyeq/eq";
 *
 * export interface Shape extends DynEq {
 *   area(): number;
 * }
 *
 * eqInterface`Shape`;
 * // → partialEqShape, eqBoxShape, eqShape and the marker variants
 * ```
 */

import * as ts from "typescript";
import {
  defineTaggedTemplateMacro,
  globalRegistry,
  TS9805,
  type MacroContext,
} from "@polyeq/core";
import { parseInvocation, ExpansionError } from "./parser.js";
import { renderEqImpls, resolveEqImplOptions, type EqImplOptions } from "./codegen.js";

/**
 * Expand invocation text to generated source, without the transformer.
 *
 * @throws ExpansionError when the invocation is malformed
 */
export function expandEqInterface(source: string, options: Partial<EqImplOptions> = {}): string {
  return renderEqImpls(parseInvocation(source), resolveEqImplOptions(options));
}

export const eqInterfaceMacro = defineTaggedTemplateMacro({
  name: "eqInterface",
  module: "@polyeq/macros",
  description: "Generate equality instances for an interface extending DynEq",

  validate(ctx: MacroContext, node: ts.TaggedTemplateExpression): boolean {
    if (ts.isNoSubstitutionTemplateLiteral(node.template)) return true;

    ctx
      .diagnostic(TS9805)
      .at(node)
      .withArgs({ macro: "eqInterface" })
      .note("the template contains `${}` substitutions")
      .emit();
    return false;
  },

  expand(ctx: MacroContext, node: ts.TaggedTemplateExpression): ts.Statement[] {
    const text = ts.isNoSubstitutionTemplateLiteral(node.template) ? node.template.text : "";

    try {
      return ctx.parseStatements(expandEqInterface(text));
    } catch (error) {
      if (!(error instanceof ExpansionError)) throw error;

      const builder = ctx.diagnostic(error.descriptor).at(node.template).withArgs(error.args);
      if (error.help) builder.help(error.help);
      builder.emit();

      return [ctx.factory.createExpressionStatement(node)];
    }
  },
});

globalRegistry.register(eqInterfaceMacro);
