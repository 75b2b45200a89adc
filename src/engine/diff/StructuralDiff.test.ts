import { describe, expect, it } from "vitest";
import type { Value } from "../../types/value.types";
import { errorLeaf, fromJson, NULL, num, object, str, toJson } from "../value/Value";
import { asLeafPair, describeLeafPair, diff, isEmptyDiff } from "./StructuralDiff";

const tree = (data: unknown): Value => fromJson(data);

describe("diff", () => {
  it("finds no difference between a tree and itself", () => {
    const x = tree({ head: { unitsPerEm: 1000, flags: [1, 2] }, name: { "1": "Test" } });
    expect(isEmptyDiff(diff(x, x))).toBe(true);
  });

  it("reports a changed field as a nested leaf pair", () => {
    const left = tree({ hhea: { ascent: 800, descent: -200 }, maxp: { numGlyphs: 3 } });
    const right = tree({ hhea: { ascent: 850, descent: -200 }, maxp: { numGlyphs: 3 } });
    expect(toJson(diff(left, right))).toEqual({ hhea: { ascent: [800, 850] } });
  });

  it("orders left keys first, then right-only keys", () => {
    const left = tree({ b: 1, a: 1 });
    const right = tree({ c: 2, a: 2, b: 2 });
    const result = diff(left, right);
    expect(result.kind).toBe("object");
    if (result.kind !== "object") return;
    expect([...result.entries.keys()]).toEqual(["b", "a", "c"]);
  });

  it("reports a key absent on one side even when the other holds null", () => {
    expect(toJson(diff(tree({}), tree({ a: null })))).toEqual({ a: [null, null] });
    expect(toJson(diff(tree({ a: {} }), tree({})))).toEqual({ a: [{}, null] });
    expect(isEmptyDiff(diff(tree({ a: null }), tree({ a: null })))).toBe(true);
  });

  it("is symmetric up to leaf order", () => {
    const a = tree({ x: 1, y: { z: "p" }, only: true });
    const b = tree({ x: 2, y: { z: "q" } });
    expect(toJson(diff(a, b))).toEqual({ x: [1, 2], y: { z: ["p", "q"] }, only: [true, null] });
    expect(toJson(diff(b, a))).toEqual({ x: [2, 1], y: { z: ["q", "p"] }, only: [null, true] });
  });

  it("treats arrays as atomic leaves", () => {
    expect(toJson(diff(tree({ v: [1, 2, 3] }), tree({ v: [1, 9, 3] })))).toEqual({
      v: [
        [1, 2, 3],
        [1, 9, 3],
      ],
    });
  });

  it("pairs an object against a scalar", () => {
    expect(toJson(diff(tree({ a: { b: 1 } }), tree({ a: 5 })))).toEqual({ a: [{ b: 1 }, 5] });
  });

  it("treats the same decode failure on both sides as equal", () => {
    const failed = object([["GSUB", errorLeaf("offset out of range")]]);
    expect(isEmptyDiff(diff(failed, failed))).toBe(true);
  });

  it("reports differing decode failures on both sides", () => {
    const left = object([["GSUB", errorLeaf("offset out of range")]]);
    const right = object([["GSUB", errorLeaf("table too short")]]);
    expect(toJson(diff(left, right))).toEqual({
      GSUB: { error: "left: offset out of range; right: table too short" },
    });
  });

  it("turns an error leaf against a decoded table into an error leaf", () => {
    const failed = object([["GSUB", errorLeaf("offset out of range")]]);
    expect(toJson(diff(tree({ GSUB: { version: "1.0" } }), failed))).toEqual({
      GSUB: { error: "right: offset out of range" },
    });
  });

  it("returns a leaf pair for differing scalars at the root", () => {
    expect(asLeafPair(diff(num(1), num(2)))).toEqual([num(1), num(2)]);
    expect(isEmptyDiff(diff(str("a"), str("a")))).toBe(true);
  });
});

describe("describeLeafPair", () => {
  it("reports an empty side as absent in succinct mode", () => {
    expect(describeLeafPair(num(400), NULL, true)).toEqual({ left: "400", right: null });
    expect(describeLeafPair(str(""), str("Bold"), true)).toEqual({ left: null, right: '"Bold"' });
  });

  it("shows both sides otherwise", () => {
    expect(describeLeafPair(num(400), NULL, false)).toEqual({ left: "400", right: "null" });
    expect(describeLeafPair(NULL, str(""), true)).toEqual({ left: "null", right: '""' });
  });
});
