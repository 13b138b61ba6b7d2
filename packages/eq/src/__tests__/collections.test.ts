import { describe, it, expect } from "vitest";
import { containsDyn, dedupDyn, groupByType, indexOfDyn } from "../index.js";
import type { Labelled } from "./fixtures.js";
import { A, B } from "./fixtures.js";

const items: Labelled[] = [new A(1), new B(1), new A(2), new A(1), new B(1), new B(3)];

describe("indexOfDyn / containsDyn", () => {
  it("finds the first equal value of the same type", () => {
    expect(indexOfDyn(items, new A(1))).toBe(0);
    expect(indexOfDyn(items, new B(1))).toBe(1);
    expect(indexOfDyn(items, new B(3))).toBe(5);
  });

  it("does not match across types", () => {
    expect(indexOfDyn(items, new B(2))).toBe(-1);
    expect(containsDyn(items, new A(3))).toBe(false);
    expect(containsDyn(items, new A(2))).toBe(true);
  });
});

describe("groupByType", () => {
  it("buckets values by class in first-seen order", () => {
    const groups = groupByType(items);
    expect([...groups.keys()]).toEqual([A.prototype, B.prototype]);
    expect(groups.get(A.prototype)?.map((x) => x.label())).toEqual(["A1", "A2", "A1"]);
    expect(groups.get(B.prototype)?.map((x) => x.label())).toEqual(["B1", "B1", "B3"]);
  });
});

describe("dedupDyn", () => {
  it("keeps the first occurrence of each value", () => {
    expect(dedupDyn(items).map((x) => x.label())).toEqual(["A1", "B1", "A2", "B3"]);
  });

  it("keeps equal-valued instances of different types", () => {
    const mixed: Labelled[] = [new A(5), new B(5)];
    expect(dedupDyn(mixed)).toHaveLength(2);
  });

  it("handles an empty list", () => {
    expect(dedupDyn<Labelled>([])).toEqual([]);
  });
});
