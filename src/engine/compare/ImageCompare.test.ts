import { describe, expect, it } from "vitest";
import type { GrayscaleImage, RenderResult } from "../../types/engine.types";
import { classifyRenders, percentDifference } from "./ImageCompare";

function image(width: number, height: number, lit: Array<[number, number]> = []): GrayscaleImage {
  const data = new Uint8Array(width * height);
  for (const [x, y] of lit) data[y * width + x] = 255;
  return { width, height, data };
}

function render(img: GrayscaleImage): RenderResult {
  return { trace: "gid=1,position=0,0", glyphIds: [1], image: img };
}

describe("percentDifference", () => {
  it("is zero for identical bitmaps", () => {
    expect(percentDifference(image(4, 4, [[1, 1]]), image(4, 4, [[1, 1]]))).toBe(0);
  });

  it("counts differing pixels over the whole extent", () => {
    expect(percentDifference(image(4, 5, [[0, 0]]), image(4, 5))).toBe(5);
  });

  it("counts pixels outside the smaller bitmap as differing", () => {
    // Union 5x4 = 20 pixels; column 4 exists only on the right: 4 pixels
    expect(percentDifference(image(4, 4), image(5, 4))).toBe(20);
  });

  it("counts the union corner outside both bitmaps", () => {
    // Union 3x3; the overlap is 2x2 and equal, the other 5 pixels differ
    const a = image(3, 2);
    const b = image(2, 3);
    expect(percentDifference(a, b)).toBeCloseTo((5 / 9) * 100, 10);
  });

  it("is symmetric", () => {
    const a = image(6, 3, [
      [0, 0],
      [5, 2],
    ]);
    const b = image(4, 4, [[0, 0]]);
    expect(percentDifference(a, b)).toBe(percentDifference(b, a));
  });

  it("is zero for two empty bitmaps", () => {
    expect(percentDifference(image(0, 12), image(0, 12))).toBe(0);
  });
});

describe("classifyRenders", () => {
  const blank = render(image(2, 2));
  const dot = render(image(2, 2, [[0, 0]]));

  it("emits nothing when neither font renders", () => {
    expect(classifyRenders(null, null)).toBeNull();
  });

  it("classifies one-sided renders", () => {
    expect(classifyRenders(null, blank)).toEqual({ category: "new", percent: 100 });
    expect(classifyRenders(blank, null)).toEqual({ category: "missing", percent: 100 });
  });

  it("drops identical renders", () => {
    expect(classifyRenders(blank, render(image(2, 2)))).toBeNull();
  });

  it("reports differing renders as modified", () => {
    expect(classifyRenders(blank, dot)).toEqual({ category: "modified", percent: 25 });
  });

  it("respects the threshold", () => {
    expect(classifyRenders(blank, dot, 25)).toBeNull();
    expect(classifyRenders(blank, dot, 24.9)).toEqual({ category: "modified", percent: 25 });
  });
});
