/**
 * Whole-font table decoding into a Value Tree
 * One key per table tag, in sorted order. A table that fails to decode becomes
 * an error leaf; the other tables are unaffected.
 */

import type { Value } from "../../types/value.types";
import { engineLogger } from "../logging/logger";
import { errorLeaf, fromJson, object } from "../value/Value";
import { getTableDirectory } from "./RawTableParser";
import { parseTable } from "./tables";

export function compareTags(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Decode the tables of an SFNT buffer. With `tags`, only those tables are
 * decoded; requested tags the font lacks are left out.
 */
export function decodeTables(buffer: ArrayBuffer, tags?: readonly string[]): Value {
  const startTime = Date.now();
  const wanted = tags ? new Set(tags) : null;
  const entries = getTableDirectory(buffer)
    .filter((entry) => wanted === null || wanted.has(entry.tag))
    .sort((a, b) => compareTags(a.tag, b.tag));

  const decoded: Array<[string, Value]> = [];
  let failures = 0;

  for (const entry of entries) {
    const parsed = parseTable(entry.tag, buffer, entry.offset, entry.length);
    if (parsed.status === "error") {
      failures++;
      const message = parsed.error ?? "decode failed";
      engineLogger.warn("TableDecoder", "Table decode failed", {
        tag: entry.tag,
        error: message,
      });
      decoded.push([entry.tag, errorLeaf(message)]);
      continue;
    }
    decoded.push([entry.tag, fromJson(parsed.parsed)]);
  }

  engineLogger.timed("debug", "TableDecoder", "Tables decoded", startTime, {
    tables: entries.length,
    failures,
  });
  return object(decoded);
}
