/**
 * Comparison driver
 * Runs the table, glyph and word domains over two fonts and assembles the
 * report. Per-item failures are recorded as data; only font-open and
 * configuration problems end a run.
 */

import type { ComparisonOutcome, DesignLocation, FontSource } from "../../types/engine.types";
import type {
  DiffNode,
  DiffReport,
  GlyphDiff,
  GlyphDiffEntry,
  Value,
  WordDiffEntry,
} from "../../types/value.types";
import { classifyRenders } from "../compare/ImageCompare";
import { type ComparisonOptions, parseComparisonOptions } from "../config/options";
import { diff } from "../diff/StructuralDiff";
import { FatalComparisonError } from "../errors/FatalComparisonError";
import { type FontkitSource, loadFont } from "../FontLoader";
import { engineLogger } from "../logging/logger";
import { compareTags } from "../parsers/TableDecoder";
import { hexCodepoint } from "../parsers/tables/formatters";
import { renderText } from "../render/GlyphRenderer";
import { OutlineCache } from "../render/OutlineCache";
import { formatLocation, resolveLocation } from "../resolvers/LocationResolver";
import { getScriptInfo } from "../scripts/ScriptSupport";
import { array, fromJson, object } from "../value/Value";
import { createWordListSource, type WordListSource } from "../wordlists/WordListSource";

export const GLYPH_CATEGORIES = ["missing", "new", "modified"] as const;

export function emptyGlyphDiff(): GlyphDiff {
  return { missing: [], new: [], modified: [] };
}

/**
 * Table domain: every tag in either font, sorted
 */
export function diffTables(left: FontSource, right: FontSource): DiffNode {
  const startTime = Date.now();
  const result = diff(left.decodeTables(), right.decodeTables());
  if (result.kind !== "object") return result;

  const sorted = object([...result.entries].sort(([a], [b]) => compareTags(a, b)));
  engineLogger.timed("info", "DiffAggregator", "Tables compared", startTime, {
    changedTables: sorted.entries.size,
  });
  return sorted;
}

function fallbackGlyphName(codepoint: number): string {
  return codepoint > 0xffff
    ? `u${codepoint.toString(16).toUpperCase()}`
    : `uni${codepoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

/**
 * Glyph domain: every codepoint in either character map, in numeric order
 */
export async function diffGlyphs(
  left: FontSource,
  right: FontSource,
  options: Pick<ComparisonOptions, "pointSize" | "minPercent">
): Promise<GlyphDiff> {
  const startTime = Date.now();
  const leftCache = new OutlineCache(left);
  const rightCache = new OutlineCache(right);
  const settings = { pointSize: options.pointSize, direction: "ltr", scriptTag: null } as const;

  const codepoints = [
    ...new Set([...left.supportedCodepoints(), ...right.supportedCodepoints()]),
  ].sort((a, b) => a - b);

  const glyphs = emptyGlyphDiff();
  for (const codepoint of codepoints) {
    const text = String.fromCodePoint(codepoint);
    const leftRender = await renderText(left, text, settings, leftCache);
    const rightRender = await renderText(right, text, settings, rightCache);
    const comparison = classifyRenders(leftRender, rightRender, options.minPercent);
    if (!comparison) continue;

    // Named after the font that rendered it; the old one when both did
    const onlyRight = comparison.category === "new";
    const namingFont = onlyRight ? right : left;
    const glyphId = (onlyRight ? rightRender : leftRender)?.glyphIds[0];
    const name = glyphId !== undefined ? namingFont.glyphName(glyphId) : null;

    const entry: GlyphDiffEntry = {
      string: text,
      unicode: hexCodepoint(codepoint),
      name: name ?? fallbackGlyphName(codepoint),
      percent: comparison.percent,
      category: comparison.category,
    };
    glyphs[comparison.category].push(entry);
  }

  engineLogger.timed("info", "DiffAggregator", "Glyphs compared", startTime, {
    codepoints: codepoints.length,
    missing: glyphs.missing.length,
    new: glyphs.new.length,
    modified: glyphs.modified.length,
    outlinesExtracted: leftCache.extractions + rightCache.extractions,
  });
  return glyphs;
}

/**
 * Word domain: every word of every script either font supports.
 * Words only one font can render are skipped; the glyph domain reports those characters.
 */
export async function diffWords(
  left: FontSource,
  right: FontSource,
  wordlists: WordListSource,
  options: Pick<ComparisonOptions, "pointSize" | "minPercent" | "scripts" | "maxWordsPerScript">
): Promise<Record<string, WordDiffEntry[]>> {
  const startTime = Date.now();
  const leftCache = new OutlineCache(left);
  const rightCache = new OutlineCache(right);
  const allowed = options.scripts ? new Set(options.scripts) : null;

  const scripts = [...new Set([...left.supportedScripts(), ...right.supportedScripts()])]
    .filter((script) => allowed === null || allowed.has(script))
    .sort(compareTags);

  const words: Record<string, WordDiffEntry[]> = {};
  let compared = 0;
  for (const script of scripts) {
    const info = getScriptInfo(script);
    const list = wordlists.words(script);
    if (!info || !list) continue;

    const settings = { pointSize: options.pointSize, direction: info.direction, scriptTag: info.tag };
    const limit = options.maxWordsPerScript ?? list.length;
    const entries: WordDiffEntry[] = [];
    for (const word of list.slice(0, limit)) {
      compared++;
      const leftRender = await renderText(left, word, settings, leftCache);
      const rightRender = await renderText(right, word, settings, rightCache);
      if (!leftRender || !rightRender) continue;
      const comparison = classifyRenders(leftRender, rightRender, options.minPercent);
      if (comparison) entries.push({ word, percent: comparison.percent });
    }
    if (entries.length > 0) words[script] = entries;
  }

  engineLogger.timed("info", "DiffAggregator", "Words compared", startTime, {
    scripts: scripts.length,
    words: compared,
    changed: Object.values(words).reduce((sum, entries) => sum + entries.length, 0),
  });
  return words;
}

/**
 * Run the enabled domains over two already opened sources, one after the other
 */
export async function compareSources(
  left: FontSource,
  right: FontSource,
  options: ComparisonOptions,
  wordlists: WordListSource = createWordListSource(options.wordlistDir)
): Promise<DiffReport> {
  const tables = options.tables ? diffTables(left, right) : object([]);
  const glyphs = options.glyphs ? await diffGlyphs(left, right, options) : emptyGlyphDiff();
  const words = options.words ? await diffWords(left, right, wordlists, options) : {};
  return { tables, glyphs, words };
}

/**
 * The report as one Value Tree: { tables, glyphs: { missing, new, modified }, words }
 */
export function reportToValue(report: DiffReport): Value {
  const glyphs = object(
    GLYPH_CATEGORIES.map((category): [string, Value] => [
      category,
      array(report.glyphs[category].map((entry) => fromJson(entry))),
    ])
  );
  const words = object(
    Object.entries(report.words).map(([script, entries]): [string, Value] => [
      script,
      array(entries.map((entry) => fromJson(entry))),
    ])
  );
  return object([
    ["tables", report.tables],
    ["glyphs", glyphs],
    ["words", words],
  ]);
}

/**
 * Resolve the requested location in the first font, then check it holds in the second
 */
function resolveSharedLocation(
  options: ComparisonOptions,
  left: FontkitSource,
  right: FontkitSource
): DesignLocation | null {
  const request = { location: options.location, instance: options.instance };
  const location = resolveLocation(request, left.axes(), left.namedInstances(), left.label);
  if (location !== null) {
    resolveLocation(
      { location: formatLocation(location) },
      right.axes(),
      right.namedInstances(),
      right.label
    );
  }
  return location;
}

/**
 * Compare two font binaries. Font-open and configuration problems come back
 * as a failed outcome before any diffing starts. The requested log level holds
 * for this run only.
 */
export async function compareFonts(
  leftBytes: Uint8Array,
  rightBytes: Uint8Array,
  input: unknown = {},
  wordlists?: WordListSource
): Promise<ComparisonOutcome<DiffReport>> {
  const parsed = parseComparisonOptions(input);
  if (!parsed.success || !parsed.data) {
    return { success: false, error: parsed.error ?? "Invalid options", kind: "configuration" };
  }
  const options = parsed.data;
  const previousLevel = engineLogger.getLevel();
  engineLogger.setLevel(options.logLevel);

  try {
    const left = loadFont(leftBytes, "font A");
    if (!left.success) return left;
    const right = loadFont(rightBytes, "font B");
    if (!right.success) return right;

    const location = resolveSharedLocation(options, left.data, right.data);
    const startTime = Date.now();
    const report = await compareSources(
      left.data.atLocation(location),
      right.data.atLocation(location),
      options,
      wordlists
    );
    engineLogger.timed("info", "DiffAggregator", "Comparison finished", startTime);
    return { success: true, data: report };
  } catch (error) {
    if (error instanceof FatalComparisonError) {
      engineLogger.error("DiffAggregator", "Comparison aborted", { error: error.message });
      return { success: false, error: error.message, kind: error.kind };
    }
    throw error;
  } finally {
    engineLogger.setLevel(previousLevel);
  }
}
