import { describe, expect, it } from "vitest";
import {
  array,
  bool,
  EMPTY_OBJECT,
  errorLeaf,
  formatValue,
  fromJson,
  isErrorLeaf,
  isSomething,
  NULL,
  num,
  object,
  str,
  toJson,
  valuesEqual,
} from "./Value";

describe("fromJson", () => {
  it("converts nested data and keeps key order", () => {
    const value = fromJson({ b: 1, a: [true, null, "x"], c: { d: 2.5 } });
    expect(value.kind).toBe("object");
    if (value.kind !== "object") return;
    expect([...value.entries.keys()]).toEqual(["b", "a", "c"]);
    expect(toJson(value)).toEqual({ b: 1, a: [true, null, "x"], c: { d: 2.5 } });
  });

  it("skips undefined properties and turns non-finite numbers into strings", () => {
    expect(toJson(fromJson({ a: undefined, b: NaN, c: Infinity }))).toEqual({
      b: "NaN",
      c: "Infinity",
    });
  });

  it("turns typed arrays into number arrays and maps into objects", () => {
    expect(toJson(fromJson(new Uint8Array([1, 2, 3])))).toEqual([1, 2, 3]);
    expect(toJson(fromJson(new Map<number, string>([[7, "seven"]])))).toEqual({ "7": "seven" });
  });

  it("rejects cyclic data", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(() => fromJson(cyclic)).toThrow("cyclic");
  });

  it("accepts shared, acyclic references", () => {
    const shared = { x: 1 };
    expect(toJson(fromJson({ a: shared, b: shared }))).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });
});

describe("valuesEqual", () => {
  it("compares objects regardless of key order", () => {
    expect(valuesEqual(fromJson({ a: 1, b: 2 }), fromJson({ b: 2, a: 1 }))).toBe(true);
  });

  it("compares arrays element by element, in order", () => {
    expect(valuesEqual(fromJson([1, 2]), fromJson([2, 1]))).toBe(false);
    expect(valuesEqual(fromJson([1, [2]]), fromJson([1, [2]]))).toBe(true);
  });

  it("never equates values of different kinds", () => {
    expect(valuesEqual(num(0), bool(false))).toBe(false);
    expect(valuesEqual(str(""), NULL)).toBe(false);
    expect(valuesEqual(array([]), EMPTY_OBJECT)).toBe(false);
  });
});

describe("isSomething", () => {
  it("is false for null and empty containers and strings", () => {
    expect(isSomething(NULL)).toBe(false);
    expect(isSomething(str(""))).toBe(false);
    expect(isSomething(array([]))).toBe(false);
    expect(isSomething(EMPTY_OBJECT)).toBe(false);
  });

  it("is true for every number and boolean", () => {
    expect(isSomething(num(0))).toBe(true);
    expect(isSomething(bool(false))).toBe(true);
    expect(isSomething(str("a"))).toBe(true);
    expect(isSomething(array([NULL]))).toBe(true);
  });
});

describe("error leaves", () => {
  it("recognises single-key error objects only", () => {
    expect(isErrorLeaf(errorLeaf("bad table"))).toBe(true);
    expect(isErrorLeaf(object([["error", num(1)]]))).toBe(false);
    expect(isErrorLeaf(object([["error", str("x")], ["other", NULL]]))).toBe(false);
  });

  it("formats as compact JSON", () => {
    expect(formatValue(errorLeaf("bad table"))).toBe('{"error":"bad table"}');
  });
});
