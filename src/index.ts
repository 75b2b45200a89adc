/**
 * fontdiff-engine
 * Table, glyph and word level regression diffs between two versions of a font
 */

export {
  compareFonts,
  compareSources,
  diffGlyphs,
  diffTables,
  diffWords,
  reportToValue,
} from "./engine/aggregate/DiffAggregator";
export { classifyRenders, percentDifference } from "./engine/compare/ImageCompare";
export type { RenderComparison } from "./engine/compare/ImageCompare";
export { comparisonOptionsSchema, parseComparisonOptions } from "./engine/config/options";
export type { ComparisonOptions, ComparisonOptionsInput } from "./engine/config/options";
export { asLeafPair, describeLeafPair, diff, isEmptyDiff } from "./engine/diff/StructuralDiff";
export type { LeafPairDescription } from "./engine/diff/StructuralDiff";
export { FatalComparisonError } from "./engine/errors/FatalComparisonError";
export { FontkitSource, loadFont } from "./engine/FontLoader";
export type { FontMetadata } from "./engine/FontLoader";
export { EngineLogger, engineLogger } from "./engine/logging/logger";
export { decodeTables } from "./engine/parsers/TableDecoder";
export { renderText } from "./engine/render/GlyphRenderer";
export { OutlineCache } from "./engine/render/OutlineCache";
export { parseLocation, resolveLocation } from "./engine/resolvers/LocationResolver";
export { getScriptInfo, knownScripts, supportedScripts } from "./engine/scripts/ScriptSupport";
export type { ScriptInfo } from "./engine/scripts/ScriptSupport";
export {
  array,
  bool,
  EMPTY_OBJECT,
  errorLeaf,
  formatValue,
  fromJson,
  isErrorLeaf,
  isSomething,
  NULL,
  num,
  object,
  str,
  toJson,
  valuesEqual,
} from "./engine/value/Value";
export {
  createWordListSource,
  DirectoryWordListSource,
  LayeredWordListSource,
} from "./engine/wordlists/WordListSource";
export type { WordListSource } from "./engine/wordlists/WordListSource";
export type * from "./types/engine.types";
export type * from "./types/value.types";
