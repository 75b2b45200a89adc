/**
 * Per-font, per-run outline cache keyed by glyph id.
 * Owned by the caller and passed into every render call for that font.
 */

import type { GlyphOutline, RenderSource } from "../../types/engine.types";

export class OutlineCache {
  private readonly outlines = new Map<number, GlyphOutline | null>();
  private misses = 0;

  constructor(private readonly source: RenderSource) {}

  get(glyphId: number): GlyphOutline | null {
    const cached = this.outlines.get(glyphId);
    if (cached !== undefined) return cached;

    this.misses++;
    const outline = this.source.outline(glyphId);
    this.outlines.set(glyphId, outline);
    return outline;
  }

  /** Whether this cache was built for `source` */
  serves(source: RenderSource): boolean {
    return this.source === source;
  }

  get size(): number {
    return this.outlines.size;
  }

  /** Number of outline extractions performed */
  get extractions(): number {
    return this.misses;
  }
}
