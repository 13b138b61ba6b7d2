import { describe, it, expect, afterEach } from "vitest";
import { config } from "@polyeq/core";
import { combinationSuffix, expandEqInterface, resolveEqImplOptions } from "../src/index.js";

const RT = "__polyeq";
const body = (type: string): string =>
  `${RT}.partialEq<${type}>((a, b) => ${RT}.typeIdOf(a) === ${RT}.typeIdOf(b) && ${RT}.dynEq(a, ${RT}.erase(b)))`;

function exportedNames(code: string): string[] {
  return [...code.matchAll(/^export (?:const|function) (\w+)/gm)].map((m) => m[1]);
}

afterEach(() => {
  config.reset();
});

describe("combinationSuffix", () => {
  it("joins the marker names", () => {
    expect(combinationSuffix("none")).toBe("");
    expect(combinationSuffix("transferable")).toBe("Transferable");
    expect(combinationSuffix("shareable")).toBe("Shareable");
    expect(combinationSuffix("both")).toBe("TransferableShareable");
  });
});

describe("resolveEqImplOptions", () => {
  it("uses configuration for unset options", () => {
    config.set({ eq: { box: false, runtimeAlias: "__eq" } });
    expect(resolveEqImplOptions({ runtimeModule: "./eq.js" })).toEqual({
      box: false,
      runtimeModule: "./eq.js",
      runtimeAlias: "__eq",
    });
  });
});

describe("expandEqInterface", () => {
  it("emits implementations, box comparisons and totality declarations in order", () => {
    expect(exportedNames(expandEqInterface("Shape"))).toEqual([
      "partialEqShape",
      "partialEqShapeTransferable",
      "partialEqShapeShareable",
      "partialEqShapeTransferableShareable",
      "eqBoxShape",
      "eqBoxShapeTransferable",
      "eqBoxShapeShareable",
      "eqBoxShapeTransferableShareable",
      "eqShape",
      "eqShapeTransferable",
      "eqShapeShareable",
      "eqShapeTransferableShareable",
    ]);
  });

  it("generates the exact text for a plain interface", () => {
    const lines = expandEqInterface("Shape").split("\n");
    expect(lines).toHaveLength(14);
    expect(lines[0]).toBe(`import * as ${RT} from "@polyeq/eq";`);
    expect(lines[1]).toBe(`export const partialEqShape: ${RT}.PartialEq<Shape> = ${body("Shape")};`);
    expect(lines[4]).toBe(
      `export const partialEqShapeTransferableShareable: ${RT}.PartialEq<Shape & ${RT}.Transferable & ${RT}.Shareable> = ` +
        `${body(`Shape & ${RT}.Transferable & ${RT}.Shareable`)};`
    );
    expect(lines[6]).toBe(
      `export const eqBoxShapeTransferable: ${RT}.Eq<${RT}.Box<Shape & ${RT}.Transferable>> = ` +
        `${RT}.assertTotal(${RT}.Box.lift(partialEqShapeTransferable));`
    );
    expect(lines[11]).toBe(
      `export const eqShapeShareable: ${RT}.Eq<Shape & ${RT}.Shareable> = ${RT}.assertTotal(partialEqShapeShareable);`
    );
    expect(lines[13]).toBe("");
  });

  it("omits box comparisons when box support is off", () => {
    const names = exportedNames(expandEqInterface("Shape", { box: false }));
    expect(names).toHaveLength(8);
    expect(names.some((n) => n.startsWith("eqBox"))).toBe(false);
  });

  it("reads box support from configuration", () => {
    config.set({ eq: { box: false } });
    expect(exportedNames(expandEqInterface("Shape"))).toHaveLength(8);
  });

  it("uses the configured runtime module and alias", () => {
    const code = expandEqInterface("Shape", { runtimeModule: "./runtime.js", runtimeAlias: "rt" });
    expect(code.split("\n")[0]).toBe('import * as rt from "./runtime.js";');
    expect(code).toContain("export const eqShape: rt.Eq<Shape> = rt.assertTotal(partialEqShape);");
  });

  it("names declarations after the last path segment", () => {
    const code = expandEqInterface("geometry.Shape", { box: false });
    expect(code.split("\n")[1]).toBe(
      `export const partialEqShape: ${RT}.PartialEq<geometry.Shape> = ${body("geometry.Shape")};`
    );
  });

  it("emits generic factories for generic interfaces", () => {
    const code = expandEqInterface("<T extends Item> Store<T> where T extends Comparable");
    const params = "<T extends Item & Comparable>";

    expect(code).toContain(
      `export function partialEqStore${params}(): ${RT}.PartialEq<Store<T>> {\n` +
        `    return ${body("Store<T>")};\n` +
        `}`
    );
    expect(code).toContain(
      `export function eqBoxStoreShareable${params}(): ${RT}.Eq<${RT}.Box<Store<T> & ${RT}.Shareable>> {\n` +
        `    return ${RT}.assertTotal(${RT}.Box.lift(partialEqStoreShareable<T>()));\n` +
        `}`
    );
    expect(code).toContain(
      `export function eqStore${params}(): ${RT}.Eq<Store<T>> {\n` +
        `    return ${RT}.assertTotal(partialEqStore<T>());\n` +
        `}`
    );
  });

  it("passes every parameter name to references", () => {
    const code = expandEqInterface("<K, V = string> Index<K, V>", { box: false });
    expect(code).toContain(`    return ${RT}.assertTotal(partialEqIndex<K, V>());\n`);
    expect(code).toContain("export function eqIndex<K, V = string>(): ");
  });

  it("propagates expansion errors", () => {
    expect(() => expandEqInterface("<T Shape")).toThrow(
      "TS9801: unbalanced generic parameter list: 1 unclosed `<`"
    );
  });
});
