/**
 * Value Tree and diff result types
 * Shared by the table decoders, the structural diff and the visual comparison
 */

/**
 * Generic tree value. Objects keep insertion order; keys are unique per node.
 */
export type Value =
  | { readonly kind: "null" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly items: readonly Value[] }
  | { readonly kind: "object"; readonly entries: ReadonlyMap<string, Value> };

export type ValueKind = Value["kind"];

export type ObjectValue = Extract<Value, { kind: "object" }>;
export type ArrayValue = Extract<Value, { kind: "array" }>;

/**
 * Plain JSON shape a Value serializes to
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * A diff result is itself a Value:
 * - leaf pair: Array of exactly [left, right]
 * - nested: Object of child key -> diff, equal keys omitted
 * - error leaf: Object { error: String }
 * An empty Object means "no difference".
 */
export type DiffNode = Value;

export type GlyphCategory = "missing" | "new" | "modified";

export interface GlyphDiffEntry {
  string: string;
  unicode: string; // U+XXXX
  name: string;
  percent: number;
  category: GlyphCategory;
}

export interface WordDiffEntry {
  word: string;
  percent: number;
}

export interface GlyphDiff {
  missing: GlyphDiffEntry[];
  new: GlyphDiffEntry[];
  modified: GlyphDiffEntry[];
}

/**
 * Aggregated comparison output, before conversion into a Value Tree
 */
export interface DiffReport {
  tables: DiffNode;
  glyphs: GlyphDiff;
  words: Record<string, WordDiffEntry[]>;
}
