import { describe, expect, it } from "vitest";
import { boxPath } from "../../test-utils/fakeFont";
import type { GrayscaleImage, PathCommand } from "../../types/engine.types";
import { createImage, getPixel, outlineToSvgPath, rasterizeOutline } from "./Rasterizer";

function litPixels(image: GrayscaleImage): Array<[number, number, number]> {
  const lit: Array<[number, number, number]> = [];
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const value = getPixel(image, x, y);
      if (value > 0) lit.push([x, y, value]);
    }
  }
  return lit;
}

describe("outlineToSvgPath", () => {
  it("flips y and offsets to the pen position", () => {
    expect(outlineToSvgPath(boxPath([0, 0, 2, 3]), { scale: 1, originX: 1, originY: 10 })).toBe(
      "M1 10L3 10L3 7L1 7Z"
    );
  });

  it("scales curve control points", () => {
    const commands: PathCommand[] = [
      { type: "moveTo", x: 0, y: 0 },
      { type: "quadTo", cx: 1, cy: 2, x: 2, y: 0 },
      { type: "cubicTo", c1x: 2, c1y: 1, c2x: 3, c2y: 1, x: 3, y: 0 },
      { type: "close" },
    ];
    expect(outlineToSvgPath(commands, { scale: 2, originX: 0, originY: 8 })).toBe(
      "M0 8Q2 4 4 8C4 6 6 6 6 8Z"
    );
  });
});

describe("rasterizeOutline", () => {
  it("fills pixels fully inside a box", async () => {
    const image = createImage(20, 20);
    await rasterizeOutline(image, boxPath([2, 2, 6, 6]), { scale: 1, originX: 0, originY: 20 });

    const lit = litPixels(image);
    expect(lit).toHaveLength(16);
    expect(lit.every(([x, y, value]) => x >= 2 && x <= 5 && y >= 14 && y <= 17 && value === 255)).toBe(
      true
    );
  });

  it("scales outlines", async () => {
    const image = createImage(10, 10);
    await rasterizeOutline(image, boxPath([0, 0, 2, 2]), { scale: 2, originX: 1, originY: 10 });
    expect(litPixels(image).map(([x, y]) => [x, y])).toEqual([
      [1, 6],
      [2, 6],
      [3, 6],
      [4, 6],
      [1, 7],
      [2, 7],
      [3, 7],
      [4, 7],
      [1, 8],
      [2, 8],
      [3, 8],
      [4, 8],
      [1, 9],
      [2, 9],
      [3, 9],
      [4, 9],
    ]);
  });

  it("keeps mostly covered pixels and drops mostly empty ones", async () => {
    const image = createImage(3, 1);
    // Three quarters of pixel 1, a quarter of pixel 2
    await rasterizeOutline(image, boxPath([0, 0, 1.75, 1]), { scale: 1, originX: 0, originY: 1 });
    await rasterizeOutline(image, boxPath([2.75, 0, 3, 1]), { scale: 1, originX: 0, originY: 1 });
    expect(Array.from(image.data)).toEqual([255, 255, 0]);
  });

  it("saturates overlapping glyphs instead of wrapping", async () => {
    const image = createImage(4, 4);
    await rasterizeOutline(image, boxPath([0, 0, 2, 2]), { scale: 1, originX: 0, originY: 4 });
    await rasterizeOutline(image, boxPath([1, 0, 3, 2]), { scale: 1, originX: 0, originY: 4 });
    expect(getPixel(image, 1, 3)).toBe(255);
    expect(getPixel(image, 2, 3)).toBe(255);
    expect(getPixel(image, 3, 3)).toBe(0);
  });

  it("uses nonzero winding for nested contours", async () => {
    const image = createImage(6, 6);
    // Outer and inner box wound the same way: the inner area stays filled
    await rasterizeOutline(image, [...boxPath([0, 0, 6, 6]), ...boxPath([2, 2, 4, 4])], {
      scale: 1,
      originX: 0,
      originY: 6,
    });
    expect(litPixels(image)).toHaveLength(36);

    // Inner box wound the other way: a hole
    const holed = createImage(6, 6);
    const hole: PathCommand[] = [
      { type: "moveTo", x: 2, y: 2 },
      { type: "lineTo", x: 2, y: 4 },
      { type: "lineTo", x: 4, y: 4 },
      { type: "lineTo", x: 4, y: 2 },
      { type: "close" },
    ];
    await rasterizeOutline(holed, [...boxPath([0, 0, 6, 6]), ...hole], { scale: 1, originX: 0, originY: 6 });
    expect(litPixels(holed)).toHaveLength(32);
    expect(getPixel(holed, 2, 2)).toBe(0);
  });

  it("clips to the canvas without failing", async () => {
    const image = createImage(4, 4);
    await rasterizeOutline(image, boxPath([-5, -5, 2, 10]), { scale: 1, originX: 0, originY: 4 });
    expect(litPixels(image).map(([x, y]) => [x, y])).toEqual([
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
      [0, 2],
      [1, 2],
      [0, 3],
      [1, 3],
    ]);
  });

  it("fills curves", async () => {
    const image = createImage(10, 10);
    await rasterizeOutline(
      image,
      [
        { type: "moveTo", x: 0, y: 0 },
        { type: "lineTo", x: 10, y: 0 },
        { type: "quadTo", cx: 10, cy: 10, x: 0, y: 10 },
        { type: "close" },
      ],
      { scale: 1, originX: 0, originY: 10 }
    );
    expect(getPixel(image, 1, 5)).toBe(255);
    expect(getPixel(image, 9, 0)).toBe(0);
  });

  it("leaves the canvas alone for empty outlines and canvases", async () => {
    const image = createImage(2, 2);
    await rasterizeOutline(image, [], { scale: 1, originX: 0, originY: 2 });
    expect(Array.from(image.data)).toEqual([0, 0, 0, 0]);

    const empty = createImage(0, 12);
    await rasterizeOutline(empty, boxPath([0, 0, 1, 1]), { scale: 1, originX: 0, originY: 12 });
    expect(empty.data).toHaveLength(0);
  });
});
