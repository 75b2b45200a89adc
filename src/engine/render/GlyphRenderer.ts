/**
 * Text rendering for visual comparison
 * Shapes a sample string, lays the glyphs out on one line and composites their
 * outlines into a grayscale bitmap. Any precondition failure yields null:
 * the font cannot render this sample.
 */

import type {
  FontMetricsInfo,
  GlyphPosition,
  RenderResult,
  RenderSettings,
  RenderSource,
} from "../../types/engine.types";
import { engineLogger } from "../logging/logger";
import type { OutlineCache } from "./OutlineCache";
import { createImage, rasterizeOutline } from "./Rasterizer";

const LINE_HEIGHT_FACTOR = 1.2;

/**
 * Pixels per font unit: the point size spans ascender to descender
 */
export function scaleFactor(metrics: FontMetricsInfo, pointSize: number): number {
  const height = metrics.ascender - metrics.descender;
  return pointSize / (height > 0 ? height : metrics.unitsPerEm);
}

export function traceToken(position: GlyphPosition): string {
  return `gid=${position.glyphId},position=${position.xOffset},${position.yOffset}`;
}

export async function renderText(
  source: RenderSource,
  text: string,
  settings: RenderSettings,
  cache: OutlineCache
): Promise<RenderResult | null> {
  if (!cache.serves(source)) {
    throw new Error("Outline cache belongs to a different font");
  }

  for (const char of text) {
    const codepoint = char.codePointAt(0);
    if (codepoint === undefined || !source.hasCodepoint(codepoint)) return null;
  }

  let positions: GlyphPosition[];
  try {
    positions = source.shape(text, settings.direction, settings.scriptTag);
  } catch (error) {
    engineLogger.debug("GlyphRenderer", "Shaping failed", {
      text,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  if (positions.length === 0) return null;
  if (positions.some((position) => position.glyphId === 0)) return null;

  const factor = scaleFactor(source.metrics, settings.pointSize);
  const baseline = source.metrics.ascender * factor;

  // Start at the side bearing of the first spacing glyph, so leading marks stay on canvas
  const firstBase = positions.find((position) => position.xAdvance > 0);
  let cursor = firstBase ? (cache.get(firstBase.glyphId)?.leftSideBearing ?? 0) * factor : 0;

  const placed: Array<{ glyphId: number; x: number; y: number }> = [];
  const trace: string[] = [];
  for (const position of positions) {
    placed.push({
      glyphId: position.glyphId,
      x: cursor + position.xOffset * factor,
      y: baseline - position.yOffset * factor,
    });
    trace.push(traceToken(position));
    cursor += position.xAdvance * factor;
  }

  const last = placed[placed.length - 1];
  const lastAdvance =
    cache.get(last.glyphId)?.advanceWidth ?? positions[positions.length - 1].xAdvance;
  const width = Math.floor(last.x + lastAdvance * factor);
  const height = Math.floor(settings.pointSize * LINE_HEIGHT_FACTOR);

  const image = createImage(width, height);
  for (const glyph of placed) {
    const outline = cache.get(glyph.glyphId);
    if (!outline) continue;
    await rasterizeOutline(image, outline.commands, { scale: factor, originX: glyph.x, originY: glyph.y });
  }

  return {
    trace: trace.join("|"),
    glyphIds: positions.map((position) => position.glyphId),
    image,
  };
}
