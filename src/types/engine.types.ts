/**
 * Type definitions for the comparison engine
 * Collaborator interfaces (decoder, shaper), results and log entries
 */

import type { Value } from "./value.types";

/**
 * Result pattern for engine boundaries
 * Fatal failures carry a kind so callers can tell a bad font from a bad request
 */
export type ComparisonOutcome<T> =
  | { success: true; data: T; warnings?: string[] }
  | { success: false; error: string; kind: FatalErrorKind };

export type FatalErrorKind = "font-open" | "configuration";

/**
 * Partial-success result used by loaders and decoders
 */
export interface ExtractionResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export type TextDirection = "ltr" | "rtl";

/**
 * Variation axis as declared in fvar
 */
export interface AxisInfo {
  tag: string;
  name: string;
  min: number;
  default: number;
  max: number;
}

export interface NamedInstance {
  name: string;
  coordinates: Record<string, number>;
}

/**
 * Axis tag -> user-space value
 */
export type DesignLocation = Record<string, number>;

/**
 * One shaped glyph, in font units
 */
export interface GlyphPosition {
  glyphId: number;
  xOffset: number;
  yOffset: number;
  xAdvance: number;
  yAdvance: number;
}

export type PathCommand =
  | { type: "moveTo"; x: number; y: number }
  | { type: "lineTo"; x: number; y: number }
  | { type: "quadTo"; cx: number; cy: number; x: number; y: number }
  | { type: "cubicTo"; c1x: number; c1y: number; c2x: number; c2y: number; x: number; y: number }
  | { type: "close" };

/**
 * Glyph outline in font units, y up
 */
export interface GlyphOutline {
  commands: PathCommand[];
  advanceWidth: number;
  leftSideBearing: number;
}

export interface FontMetricsInfo {
  unitsPerEm: number;
  ascender: number;
  descender: number;
}

/**
 * Shaping collaborator
 */
export interface Shaper {
  shape(text: string, direction: TextDirection, scriptTag: string | null): GlyphPosition[];
}

/**
 * Everything the renderer needs from one font
 */
export interface RenderSource extends Shaper {
  readonly metrics: FontMetricsInfo;
  hasCodepoint(codepoint: number): boolean;
  outline(glyphId: number): GlyphOutline | null;
  glyphName(glyphId: number): string | null;
}

/**
 * Decoder collaborator: one opened font at one design location
 */
export interface FontSource extends RenderSource {
  tableTags(): string[];
  decodeTables(tags?: readonly string[]): Value;
  supportedCodepoints(): ReadonlySet<number>;
  supportedScripts(): ReadonlySet<string>;
  axes(): AxisInfo[];
  namedInstances(): NamedInstance[];
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  action: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * 8-bit coverage bitmap, row major, origin top left
 */
export interface GrayscaleImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface RenderSettings {
  pointSize: number;
  direction: TextDirection;
  scriptTag: string | null;
}

/**
 * A successful render. `trace` lists the shaped glyphs as
 * `gid=<id>,position=<xoff>,<yoff>` tokens joined with `|`.
 */
export interface RenderResult {
  trace: string;
  glyphIds: number[];
  image: GrayscaleImage;
}
