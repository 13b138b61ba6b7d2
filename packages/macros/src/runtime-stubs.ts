/**
 * Runtime placeholders for polyeq macros.
 *
 * The transformer replaces every use at compile time. The placeholders give
 * the type checker a signature and fail loudly when the transformer is not
 * configured.
 *
 * @module
 */

/**
 * Generate equality instances for an interface extending `DynEq`.
 *
 * @example
 * ```typescript
 * eqInterface`Shape`;
 * eqInterface`<T extends Item> Store<T> where T extends Comparable`;
 * ```
 */
export function eqInterface(_strings: TemplateStringsArray, ..._values: unknown[]): void {
  throw new Error(
    "eqInterface`...` ran without expansion. Add eqTransformerFactory from " +
      "@polyeq/macros to your build's transformers."
  );
}
