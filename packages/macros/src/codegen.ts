/**
 * Code generation for `eqInterface`.
 *
 * For an interface `N` written as path `P`, every marker combination gets
 * three declarations (the box one only when box support is on):
 *
 * ```typescript
 * export const partialEqShape: __polyeq.PartialEq<Shape> = ...;
 * export const eqBoxShape: __polyeq.Eq<__polyeq.Box<Shape>> = ...;
 * export const eqShape: __polyeq.Eq<Shape> = __polyeq.assertTotal(partialEqShape);
 * ```
 *
 * Output order: every implementation, then every box comparison, then every
 * totality declaration.
 */

import { config } from "@polyeq/core";
import { MARKER_COMBINATIONS, markersOf, type MarkerCombination } from "@polyeq/eq";
import type { EqInvocation, GenericParam } from "./parser.js";

export interface EqImplOptions {
  /** Emit `Box` comparisons */
  box: boolean;
  /** Module specifier of the runtime */
  runtimeModule: string;
  /** Namespace alias the runtime is imported under */
  runtimeAlias: string;
}

/**
 * Fill unset options from `eq.*` configuration, then from defaults.
 */
export function resolveEqImplOptions(overrides: Partial<EqImplOptions> = {}): EqImplOptions {
  return {
    box: overrides.box ?? config.get<boolean>("eq.box") ?? true,
    runtimeModule: overrides.runtimeModule ?? config.get<string>("eq.runtimeModule") ?? "@polyeq/eq",
    runtimeAlias: overrides.runtimeAlias ?? config.get<string>("eq.runtimeAlias") ?? "__polyeq",
  };
}

/** Name suffix for a combination: "", "Transferable", "Shareable", "TransferableShareable". */
export function combinationSuffix(combination: MarkerCombination): string {
  return markersOf(combination).join("");
}

function renderParam(param: GenericParam): string {
  let text = param.name;
  if (param.constraint !== undefined) text += ` extends ${param.constraint}`;
  if (param.default !== undefined) text += ` = ${param.default}`;
  return text;
}

interface Declaration {
  name: string;
  type: string;
  init: string;
}

export function renderEqImpls(invocation: EqInvocation, options: EqImplOptions): string {
  const rt = options.runtimeAlias;
  const generic = invocation.generics.length > 0;
  const params = invocation.generics.map(renderParam).join(", ");
  const args = invocation.generics.map((p) => p.name).join(", ");

  const typeFor = (combination: MarkerCombination): string =>
    [invocation.path, ...markersOf(combination).map((m) => `${rt}.${m}`)].join(" & ");
  const ref = (name: string): string => (generic ? `${name}<${args}>()` : name);

  const partials: Declaration[] = [];
  const boxes: Declaration[] = [];
  const totals: Declaration[] = [];

  for (const combination of MARKER_COMBINATIONS) {
    const suffix = combinationSuffix(combination);
    const type = typeFor(combination);
    const partialName = `partialEq${invocation.name}${suffix}`;

    partials.push({
      name: partialName,
      type: `${rt}.PartialEq<${type}>`,
      init:
        `${rt}.partialEq<${type}>((a, b) => ` +
        `${rt}.typeIdOf(a) === ${rt}.typeIdOf(b) && ${rt}.dynEq(a, ${rt}.erase(b)))`,
    });

    if (options.box) {
      boxes.push({
        name: `eqBox${invocation.name}${suffix}`,
        type: `${rt}.Eq<${rt}.Box<${type}>>`,
        init: `${rt}.assertTotal(${rt}.Box.lift(${ref(partialName)}))`,
      });
    }

    totals.push({
      name: `eq${invocation.name}${suffix}`,
      type: `${rt}.Eq<${type}>`,
      init: `${rt}.assertTotal(${ref(partialName)})`,
    });
  }

  const render = (decl: Declaration): string =>
    generic
      ? `export function ${decl.name}<${params}>(): ${decl.type} {\n    return ${decl.init};\n}`
      : `export const ${decl.name}: ${decl.type} = ${decl.init};`;

  return [
    `import * as ${rt} from "${options.runtimeModule}";`,
    ...[...partials, ...boxes, ...totals].map(render),
  ].join("\n") + "\n";
}
