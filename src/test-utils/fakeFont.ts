/**
 * In-process font stand-in for rendering and aggregation tests.
 * Glyphs are axis-aligned boxes; shaping maps one character to one glyph.
 */

import { supportedScripts } from "../engine/scripts/ScriptSupport";
import { EMPTY_OBJECT } from "../engine/value/Value";
import type {
  AxisInfo,
  FontMetricsInfo,
  FontSource,
  GlyphOutline,
  GlyphPosition,
  NamedInstance,
  PathCommand,
  TextDirection,
} from "../types/engine.types";
import type { Value } from "../types/value.types";

export interface FakeGlyph {
  char: string;
  glyphId: number;
  name?: string;
  advance: number;
  /** [xMin, yMin, xMax, yMax] in font units, or null for an empty glyph */
  box: [number, number, number, number] | null;
}

export interface FakeFontOptions {
  metrics?: FontMetricsInfo;
  tables?: Value;
  /** Glyph ids the shaper returns for these characters, regardless of the cmap */
  shapeOverrides?: Record<string, number>;
}

/** Ten units from descender to ascender: one unit per pixel at point size 10 */
export const UNIT_METRICS: FontMetricsInfo = { unitsPerEm: 10, ascender: 8, descender: -2 };

export function boxPath([x0, y0, x1, y1]: [number, number, number, number]): PathCommand[] {
  return [
    { type: "moveTo", x: x0, y: y0 },
    { type: "lineTo", x: x1, y: y0 },
    { type: "lineTo", x: x1, y: y1 },
    { type: "lineTo", x: x0, y: y1 },
    { type: "close" },
  ];
}

export class FakeFont implements FontSource {
  readonly metrics: FontMetricsInfo;
  readonly shapeCalls: Array<{ text: string; direction: TextDirection; scriptTag: string | null }> = [];
  outlineCalls = 0;

  private readonly byChar = new Map<string, FakeGlyph>();
  private readonly byId = new Map<number, FakeGlyph>();
  private readonly codepoints: Set<number>;
  private readonly tables: Value;
  private readonly shapeOverrides: Record<string, number>;

  constructor(glyphs: FakeGlyph[], options: FakeFontOptions = {}) {
    this.metrics = options.metrics ?? UNIT_METRICS;
    this.tables = options.tables ?? EMPTY_OBJECT;
    this.shapeOverrides = options.shapeOverrides ?? {};
    for (const glyph of glyphs) {
      this.byChar.set(glyph.char, glyph);
      this.byId.set(glyph.glyphId, glyph);
    }
    this.codepoints = new Set(glyphs.map((glyph) => glyph.char.codePointAt(0) ?? 0));
  }

  tableTags(): string[] {
    return this.tables.kind === "object" ? [...this.tables.entries.keys()] : [];
  }

  decodeTables(): Value {
    return this.tables;
  }

  supportedCodepoints(): ReadonlySet<number> {
    return this.codepoints;
  }

  supportedScripts(): ReadonlySet<string> {
    return supportedScripts(this.codepoints);
  }

  axes(): AxisInfo[] {
    return [];
  }

  namedInstances(): NamedInstance[] {
    return [];
  }

  hasCodepoint(codepoint: number): boolean {
    return this.codepoints.has(codepoint);
  }

  shape(text: string, direction: TextDirection, scriptTag: string | null): GlyphPosition[] {
    this.shapeCalls.push({ text, direction, scriptTag });
    const chars = [...text];
    if (direction === "rtl") chars.reverse();
    return chars.map((char) => {
      const glyphId = this.shapeOverrides[char] ?? this.byChar.get(char)?.glyphId ?? 0;
      return {
        glyphId,
        xOffset: 0,
        yOffset: 0,
        xAdvance: this.byId.get(glyphId)?.advance ?? 0,
        yAdvance: 0,
      };
    });
  }

  outline(glyphId: number): GlyphOutline | null {
    this.outlineCalls++;
    const glyph = this.byId.get(glyphId);
    if (!glyph) return null;
    return {
      commands: glyph.box ? boxPath(glyph.box) : [],
      advanceWidth: glyph.advance,
      leftSideBearing: glyph.box ? glyph.box[0] : 0,
    };
  }

  glyphName(glyphId: number): string | null {
    return this.byId.get(glyphId)?.name ?? null;
  }
}
