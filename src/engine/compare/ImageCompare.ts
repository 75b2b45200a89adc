/**
 * Visual comparison of two renders of the same sample
 */

import type { GrayscaleImage, RenderResult } from "../../types/engine.types";
import type { GlyphCategory } from "../../types/value.types";

export interface RenderComparison {
  category: GlyphCategory;
  percent: number;
}

/**
 * Share of differing pixels over the union extent of both bitmaps, 0..100.
 * Both bitmaps are anchored at the top left; a pixel outside either bitmap differs.
 */
export function percentDifference(a: GrayscaleImage, b: GrayscaleImage): number {
  const width = Math.max(a.width, b.width);
  const height = Math.max(a.height, b.height);
  const total = width * height;
  if (total === 0) return 0;

  let differing = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const inA = x < a.width && y < a.height;
      const inB = x < b.width && y < b.height;
      if (!inA || !inB || a.data[y * a.width + x] !== b.data[y * b.width + x]) {
        differing++;
      }
    }
  }
  return (differing / total) * 100;
}

/**
 * Classify a pair of renders. Returns null when there is nothing to report:
 * neither font renders the sample, or the bitmaps differ by no more than `threshold` percent.
 */
export function classifyRenders(
  left: RenderResult | null,
  right: RenderResult | null,
  threshold = 0
): RenderComparison | null {
  if (left === null && right === null) return null;
  if (left === null) return { category: "new", percent: 100 };
  if (right === null) return { category: "missing", percent: 100 };

  const percent = percentDifference(left.image, right.image);
  return percent > threshold ? { category: "modified", percent } : null;
}
