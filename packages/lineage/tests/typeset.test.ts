/**
 * Unit tests for the type set algebra.
 */
import { describe, expect, it } from "vitest";

import {
  EmptySelectionError,
  InvalidTypeSetError,
  OutOfRangeError,
} from "../src/errors";
import {
  assertTypeSet,
  at,
  back,
  concat,
  contains,
  dedup,
  emptyTypeSet,
  filter,
  findFirst,
  front,
  invert,
  isTypeSet,
  NOT_FOUND,
  popFront,
  pushBack,
  pushFront,
  removeAll,
  selectBest,
  selectFirstBest,
  size,
  typeSet,
} from "../src/typeset";
import { scenarioHierarchy } from "./test-utils";

describe("typeSet", () => {
  it("builds a frozen set in argument order", () => {
    const set = typeSet("A", "B", "A");
    expect(set).toEqual(["A", "B", "A"]);
    expect(Object.isFrozen(set)).toBe(true);
  });

  it("exposes a frozen empty set", () => {
    expect(emptyTypeSet).toEqual([]);
    expect(Object.isFrozen(emptyTypeSet)).toBe(true);
  });
});

describe("isTypeSet / assertTypeSet", () => {
  it("accepts arrays", () => {
    expect(isTypeSet([])).toBe(true);
    expect(isTypeSet(["A"])).toBe(true);
    expect(() => assertTypeSet(["A"], "test")).not.toThrow();
  });

  it("rejects everything else", () => {
    expect(isTypeSet(undefined)).toBe(false);
    expect(isTypeSet("AB")).toBe(false);
    expect(isTypeSet({ 0: "A", length: 1 })).toBe(false);
    expect(() => assertTypeSet(null, "test")).toThrow(InvalidTypeSetError);
  });

  it("names the operation and received type", () => {
    expect(() => assertTypeSet(42, "dedup")).toThrow(
      "dedup expects a type set (array), got number",
    );
  });

  it("validates sets coming from untyped sources", () => {
    const parsed = JSON.parse('{"0":"A"}');
    expect(() => size(parsed)).toThrow(InvalidTypeSetError);
    expect(() => invert(parsed)).toThrow(
      "invert expects a type set (array), got object",
    );
  });
});

describe("membership", () => {
  const set = typeSet("A", "B", "C", "B");

  it("finds the first occurrence", () => {
    expect(findFirst("B", set)).toBe(1);
    expect(findFirst("A", set)).toBe(0);
  });

  it("returns NOT_FOUND for absent descriptors", () => {
    expect(findFirst("Z", set)).toBe(NOT_FOUND);
    expect(NOT_FOUND).toBe(-1);
    expect(findFirst("A", emptyTypeSet)).toBe(-1);
  });

  it("reports containment", () => {
    expect(contains("C", set)).toBe(true);
    expect(contains("Z", set)).toBe(false);
    expect(contains("A", emptyTypeSet)).toBe(false);
  });

  it("uses a custom equality when given", () => {
    const ignoreCase = (a: string, b: string) =>
      a.toLowerCase() === b.toLowerCase();
    expect(contains("c", set, ignoreCase)).toBe(true);
    expect(findFirst("b", set, ignoreCase)).toBe(1);
  });

  it("compares object descriptors by identity", () => {
    const first = { name: "A" };
    const copy = { name: "A" };
    expect(contains(copy, typeSet(first))).toBe(false);
    expect(contains(first, typeSet(first))).toBe(true);
  });
});

describe("positional access", () => {
  const set = typeSet("A", "B", "C");

  it("reads by index", () => {
    expect(at(0, set)).toBe("A");
    expect(at(2, set)).toBe("C");
    expect(front(set)).toBe("A");
    expect(back(set)).toBe("C");
    expect(size(set)).toBe(3);
  });

  it("rejects out-of-range indexes", () => {
    expect(() => at(3, set)).toThrow(OutOfRangeError);
    expect(() => at(-1, set)).toThrow(OutOfRangeError);
    expect(() => at(1.5, set)).toThrow(OutOfRangeError);
    expect(() => at(3, set)).toThrow(
      "at: index 3 is out of range for a type set of size 3",
    );
  });

  it("rejects any access on an empty set", () => {
    expect(() => front(emptyTypeSet)).toThrow("front on an empty type set");
    expect(() => back(emptyTypeSet)).toThrow("back on an empty type set");
    expect(() => at(0, emptyTypeSet)).toThrow(OutOfRangeError);
  });

  it("returns falsy descriptors stored in the set", () => {
    expect(at(1, typeSet(1, 0, 2))).toBe(0);
  });
});

describe("structural operations", () => {
  it("concatenates in order", () => {
    expect(concat(typeSet("A", "B"), typeSet("C", "A"))).toEqual([
      "A",
      "B",
      "C",
      "A",
    ]);
    expect(concat(emptyTypeSet, typeSet("A"))).toEqual(["A"]);
  });

  it("inverts without touching the input", () => {
    const set = typeSet("A", "B", "C");
    expect(invert(set)).toEqual(["C", "B", "A"]);
    expect(set).toEqual(["A", "B", "C"]);
    expect(invert(invert(set))).toEqual(set);
  });

  it("pushes to either end", () => {
    const set = typeSet("B");
    expect(pushFront("A", set)).toEqual(["A", "B"]);
    expect(pushBack("C", set)).toEqual(["B", "C"]);
    expect(set).toEqual(["B"]);
  });

  it("pops the first descriptor", () => {
    expect(popFront(typeSet("A", "B", "C"))).toEqual(["B", "C"]);
    expect(popFront(typeSet("A"))).toEqual([]);
  });

  it("pops the empty set to the empty set", () => {
    expect(popFront(emptyTypeSet)).toEqual([]);
  });

  it("returns frozen sets", () => {
    expect(Object.isFrozen(concat(typeSet("A"), typeSet("B")))).toBe(true);
    expect(Object.isFrozen(pushBack("A", emptyTypeSet))).toBe(true);
  });
});

describe("filter / removeAll", () => {
  it("keeps matching descriptors in order", () => {
    const set = typeSet("A1", "B1", "A2", "B2");
    expect(filter(set, (item) => item.startsWith("A"))).toEqual(["A1", "A2"]);
  });

  it("passes the index to the predicate", () => {
    const set = typeSet("A", "B", "C", "D");
    expect(filter(set, (_, index) => index % 2 === 0)).toEqual(["A", "C"]);
  });

  it("removes every occurrence", () => {
    expect(removeAll("A", typeSet("A", "B", "A", "C", "A"))).toEqual([
      "B",
      "C",
    ]);
    expect(removeAll("Z", typeSet("A", "B"))).toEqual(["A", "B"]);
    expect(removeAll("A", emptyTypeSet)).toEqual([]);
  });
});

describe("dedup", () => {
  it("keeps each descriptor at its first appearance", () => {
    expect(dedup(typeSet("A", "B", "A", "C", "B"))).toEqual(["A", "B", "C"]);
    expect(dedup(typeSet("C", "A", "A", "B", "A"))).toEqual(["C", "A", "B"]);
  });

  it("handles empty and single-element sets", () => {
    expect(dedup(emptyTypeSet)).toEqual([]);
    expect(dedup(typeSet("A"))).toEqual(["A"]);
  });

  it("uses a custom equality when given", () => {
    const sameLetter = (a: string, b: string) => a[0] === b[0];
    expect(dedup(typeSet("A1", "B1", "A2"), sameLetter)).toEqual(["A1", "B1"]);
  });
});

describe("selectBest", () => {
  const smaller = (a: number, b: number) => a < b;

  it("returns the only element of a singleton", () => {
    expect(selectBest(typeSet(7), smaller)).toBe(7);
  });

  it("finds the best under a total order", () => {
    expect(selectBest(typeSet(5, 2, 8, 3), smaller)).toBe(2);
  });

  it("keeps the last element when nothing is preferred over it", () => {
    const never = () => false;
    expect(selectBest(typeSet("A", "B", "C"), never)).toBe("C");
  });

  it("picks the last of mutually incomparable siblings", () => {
    const { isAncestorOf } = scenarioHierarchy;
    expect(selectBest(typeSet("I", "J"), isAncestorOf)).toBe("J");
    expect(selectBest(typeSet("J", "I"), isAncestorOf)).toBe("I");
    expect(selectBest(typeSet("I", "H", "J"), isAncestorOf)).toBe("H");
  });

  it("folds from the back: an earlier element replaces the current best", () => {
    const always = () => true;
    expect(selectBest(typeSet("A", "B", "C"), always)).toBe("A");
  });

  it("throws on an empty set", () => {
    expect(() => selectBest(emptyTypeSet, smaller)).toThrow(EmptySelectionError);
    expect(() => selectBest(emptyTypeSet, smaller)).toThrow(
      "selectBest requires at least one candidate",
    );
  });
});

describe("selectFirstBest", () => {
  it("picks the earliest undominated element", () => {
    const never = () => false;
    expect(selectFirstBest(typeSet("A", "B", "C"), never)).toBe("A");
  });

  it("skips elements another element is preferred over", () => {
    const smaller = (a: number, b: number) => a < b;
    expect(selectFirstBest(typeSet(5, 2, 8, 2), smaller)).toBe(2);
  });

  it("falls back to the fold for a cyclic preference", () => {
    const always = () => true;
    expect(selectFirstBest(typeSet("A", "B", "C"), always)).toBe("A");
  });

  it("throws on an empty set", () => {
    expect(() => selectFirstBest(emptyTypeSet, () => true)).toThrow(
      "selectFirstBest requires at least one candidate",
    );
  });
});
