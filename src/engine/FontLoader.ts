/**
 * Font loading
 * Sniffs the container, inflates WOFF to SFNT and opens the result with fontkit.
 * The SFNT bytes feed the table decoders; fontkit supplies shaping, outlines
 * and glyph names, at a design location when one is requested.
 */

import * as fontkit from "fontkit";
import type {
  AxisInfo,
  ComparisonOutcome,
  DesignLocation,
  FontMetricsInfo,
  FontSource,
  GlyphOutline,
  GlyphPosition,
  NamedInstance,
  PathCommand,
  TextDirection,
} from "../types/engine.types";
import type { Value } from "../types/value.types";
import { decompressFont, detectFontFormat, type FontFormat } from "../utils/woffDecompressor";
import { FatalComparisonError, fontOpenError } from "./errors/FatalComparisonError";
import { engineLogger } from "./logging/logger";
import { getTableDirectory } from "./parsers/RawTableParser";
import { resolveNameIDs } from "./parsers/tables/decoders";
import { decodeTables } from "./parsers/TableDecoder";
import { formatLocation, readDesignSpace, variationCoordinates } from "./resolvers/LocationResolver";
import { supportedScripts } from "./scripts/ScriptSupport";

const COLOR_TABLES = ["COLR", "SVG ", "CBDT", "sbix"];

export interface FontMetadata {
  format: FontFormat;
  familyName: string | null;
  styleName: string | null;
  isVariable: boolean;
  isColor: boolean;
  axes: AxisInfo[];
  instances: NamedInstance[];
}

interface FontkitPathCommand {
  command: string;
  args: readonly number[];
}

function toPathCommand({ command, args }: FontkitPathCommand): PathCommand | null {
  switch (command) {
    case "moveTo":
      return args.length >= 2 ? { type: "moveTo", x: args[0], y: args[1] } : null;
    case "lineTo":
      return args.length >= 2 ? { type: "lineTo", x: args[0], y: args[1] } : null;
    case "quadraticCurveTo":
      return args.length >= 4
        ? { type: "quadTo", cx: args[0], cy: args[1], x: args[2], y: args[3] }
        : null;
    case "bezierCurveTo":
      return args.length >= 6
        ? { type: "cubicTo", c1x: args[0], c1y: args[1], c2x: args[2], c2y: args[3], x: args[4], y: args[5] }
        : null;
    case "closePath":
      return { type: "close" };
    default:
      return null;
  }
}

/**
 * One opened font at one design location
 */
export class FontkitSource implements FontSource {
  readonly metrics: FontMetricsInfo;
  private readonly codepoints: ReadonlySet<number>;
  private scripts: ReadonlySet<string> | null = null;

  constructor(
    readonly label: string,
    private readonly sfnt: ArrayBuffer,
    private readonly font: fontkit.Font,
    private readonly info: FontMetadata,
    readonly location: DesignLocation | null = null
  ) {
    this.metrics = {
      unitsPerEm: font.unitsPerEm,
      ascender: font.ascent,
      descender: font.descent,
    };
    this.codepoints = new Set(font.characterSet);
  }

  /**
   * The same font instanced at `location`. An empty or null location is the default instance.
   */
  atLocation(location: DesignLocation | null): FontkitSource {
    if (location === null || Object.keys(location).length === 0) {
      return new FontkitSource(this.label, this.sfnt, this.font, this.info, null);
    }
    if (!this.info.isVariable) {
      throw new FatalComparisonError("configuration", `${this.label} is not a variable font`);
    }
    engineLogger.debug("FontLoader", "Instancing font", {
      font: this.label,
      location: formatLocation(location),
    });
    return new FontkitSource(
      this.label,
      this.sfnt,
      this.font.getVariation(variationCoordinates(location)),
      this.info,
      location
    );
  }

  metadata(): FontMetadata {
    return this.info;
  }

  tableTags(): string[] {
    return getTableDirectory(this.sfnt).map((entry) => entry.tag);
  }

  decodeTables(tags?: readonly string[]): Value {
    return decodeTables(this.sfnt, tags);
  }

  supportedCodepoints(): ReadonlySet<number> {
    return this.codepoints;
  }

  supportedScripts(): ReadonlySet<string> {
    this.scripts ??= supportedScripts(this.codepoints);
    return this.scripts;
  }

  axes(): AxisInfo[] {
    return this.info.axes;
  }

  namedInstances(): NamedInstance[] {
    return this.info.instances;
  }

  hasCodepoint(codepoint: number): boolean {
    return this.codepoints.has(codepoint);
  }

  shape(text: string, direction: TextDirection, scriptTag: string | null): GlyphPosition[] {
    const run = this.font.layout(text, undefined, scriptTag ?? undefined, undefined, direction);
    return run.glyphs.map((glyph, i) => {
      const position = run.positions[i];
      return {
        glyphId: glyph.id,
        xOffset: position?.xOffset ?? 0,
        yOffset: position?.yOffset ?? 0,
        xAdvance: position?.xAdvance ?? 0,
        yAdvance: position?.yAdvance ?? 0,
      };
    });
  }

  outline(glyphId: number): GlyphOutline | null {
    if (glyphId < 0 || glyphId >= this.font.numGlyphs) return null;
    try {
      const glyph = this.font.getGlyph(glyphId);
      const commands: PathCommand[] = [];
      for (const command of glyph.path.commands) {
        const converted = toPathCommand(command);
        if (converted) commands.push(converted);
      }
      const minX = glyph.bbox.minX;
      return {
        commands,
        advanceWidth: glyph.advanceWidth,
        leftSideBearing: Number.isFinite(minX) ? minX : 0,
      };
    } catch (error) {
      engineLogger.warn("FontLoader", "Glyph outline unreadable", {
        font: this.label,
        glyphId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  glyphName(glyphId: number): string | null {
    if (glyphId < 0 || glyphId >= this.font.numGlyphs) return null;
    try {
      return this.font.getGlyph(glyphId).name || null;
    } catch (error) {
      engineLogger.debug("FontLoader", "Glyph name unavailable", {
        font: this.label,
        glyphId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

function readMetadata(sfnt: ArrayBuffer, format: FontFormat): FontMetadata {
  const tags = new Set(getTableDirectory(sfnt).map((entry) => entry.tag));
  const names = resolveNameIDs(sfnt, [1, 2, 16, 17]);
  const { axes, instances } = readDesignSpace(sfnt);
  return {
    format,
    familyName: names.get(16) ?? names.get(1) ?? null,
    styleName: names.get(17) ?? names.get(2) ?? null,
    isVariable: tags.has("fvar") && axes.length > 0,
    isColor: COLOR_TABLES.some((tag) => tags.has(tag)),
    axes,
    instances,
  };
}

function openWithFontkit(sfnt: ArrayBuffer): fontkit.Font {
  const created = fontkit.create(Buffer.from(sfnt));
  if ("fonts" in created) {
    throw new Error("Font collections are not supported; extract a single font first");
  }
  return created;
}

/**
 * Open a TTF, OTF or WOFF binary at its default location.
 * Every failure is a font-open error.
 */
export function loadFont(bytes: Uint8Array, label = "font"): ComparisonOutcome<FontkitSource> {
  const startTime = Date.now();
  try {
    const format = detectFontFormat(bytes);
    const sfnt = decompressFont(bytes).slice().buffer;
    const info = readMetadata(sfnt, format);
    const font = openWithFontkit(sfnt);

    engineLogger.timed("info", "FontLoader", "Font loaded", startTime, {
      font: label,
      format,
      family: info.familyName,
      style: info.styleName,
      variable: info.isVariable,
    });
    return { success: true, data: new FontkitSource(label, sfnt, font, info) };
  } catch (error) {
    const fatal = fontOpenError(label, error);
    engineLogger.error("FontLoader", "Font could not be opened", {
      font: label,
      error: fatal.message,
    });
    return { success: false, error: fatal.message, kind: fatal.kind };
  }
}
