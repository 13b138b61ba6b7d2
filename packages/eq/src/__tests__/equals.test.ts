import { describe, it, expect } from "vitest";
import {
  dynEqInstance,
  dynEquals,
  dynNotEquals,
  eqStrict,
  isTotal,
  structEq,
  type DynEq,
} from "../index.js";
import type { Labelled, Shape } from "./fixtures.js";
import { A, B, Circle, Square, TaggedCircle } from "./fixtures.js";

const samples: Labelled[] = [new A(1), new A(1), new A(2), new B(1), new B(2), new B(2)];

describe("equivalence laws", () => {
  it("is reflexive", () => {
    for (const x of samples) {
      expect(dynEquals(x, x)).toBe(true);
    }
  });

  it("is symmetric", () => {
    for (const x of samples) {
      for (const y of samples) {
        expect(dynEquals(x, y)).toBe(dynEquals(y, x));
      }
    }
  });

  it("agrees with native equality within one type", () => {
    const as = [new A(1), new A(1), new A(7)];
    for (const x of as) {
      for (const y of as) {
        expect(dynEquals<Labelled>(x, y)).toBe(x.equals(y));
      }
    }
  });

  it("is transitive", () => {
    for (const x of samples) {
      for (const y of samples) {
        for (const z of samples) {
          if (dynEquals(x, y) && dynEquals(y, z)) {
            expect(dynEquals(x, z)).toBe(true);
          }
        }
      }
    }
  });
});

describe("type discrimination", () => {
  it("A{5} equals A{5}", () => {
    expect(dynEquals<Labelled>(new A(5), new A(5))).toBe(true);
  });

  it("A{5} differs from A{10}", () => {
    expect(dynEquals<Labelled>(new A(5), new A(10))).toBe(false);
  });

  it("A{5} differs from B{5}", () => {
    expect(dynEquals<Labelled>(new A(5), new B(5))).toBe(false);
  });

  it("A{5} differs from B{10}", () => {
    expect(dynEquals<Labelled>(new A(5), new B(10))).toBe(false);
  });

  it("a subclass differs from its parent", () => {
    expect(dynEquals<Shape>(new Circle(1), new TaggedCircle(1))).toBe(false);
  });

  it("dynNotEquals is the negation", () => {
    expect(dynNotEquals<Labelled>(new A(5), new B(5))).toBe(true);
    expect(dynNotEquals<Labelled>(new A(5), new A(5))).toBe(false);
  });
});

describe("dynEqInstance", () => {
  const eqShape = dynEqInstance<Shape>();

  it("is total", () => {
    expect(isTotal(eqShape)).toBe(true);
  });

  it("compares through the interface", () => {
    expect(eqShape.equals(new Circle(1), new Circle(1))).toBe(true);
    expect(eqShape.equals(new Circle(1), new Square(1))).toBe(false);
    expect(eqShape.notEquals(new Circle(1), new Circle(2))).toBe(true);
  });
});

describe("aggregates with an interface-typed field", () => {
  interface Scene {
    name: string;
    shape: Shape;
  }

  const eqScene = structEq<Scene>({ name: eqStrict<string>(), shape: dynEqInstance<Shape>() });

  it("are equal iff the field comparisons are", () => {
    expect(eqScene.equals({ name: "s", shape: new Circle(1) }, { name: "s", shape: new Circle(1) })).toBe(true);
    expect(eqScene.equals({ name: "s", shape: new Circle(1) }, { name: "s", shape: new Circle(2) })).toBe(false);
    expect(eqScene.equals({ name: "s", shape: new Circle(1) }, { name: "s", shape: new Square(1) })).toBe(false);
    expect(eqScene.equals({ name: "s", shape: new Circle(1) }, { name: "t", shape: new Circle(1) })).toBe(false);
  });

  class Holder implements DynEq {
    constructor(readonly item: Labelled) {}
    equals(other: Holder): boolean {
      return dynEquals(this.item, other.item);
    }
  }

  it("work as concrete types of their own", () => {
    expect(dynEquals(new Holder(new A(5)), new Holder(new A(5)))).toBe(true);
    expect(dynEquals(new Holder(new A(5)), new Holder(new A(10)))).toBe(false);
    expect(dynEquals(new Holder(new A(5)), new Holder(new B(5)))).toBe(false);
    expect(dynEquals(new Holder(new A(5)), new Holder(new B(10)))).toBe(false);
  });
});
