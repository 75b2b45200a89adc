/**
 * Dispatcher for table decoding.
 * Routes to core, variable, layout or other; tables without a decoder fall back to the stub.
 */

import { parseCore } from "./core";
import { parseLayout } from "./layout";
import { parseOther } from "./other";
import { failed, type ParseResult, result } from "./result";
import { parseStub } from "./stub";
import { parseVariable } from "./variable";

export type { ParseResult, ParseStatus } from "./result";

export const GROUP_ORDER = ["core", "variable", "layout", "other"] as const;

export type TableGroup = (typeof GROUP_ORDER)[number];

const GROUPS: Record<TableGroup, ReadonlySet<string>> = {
  core: new Set(["head", "maxp", "hhea", "vhea", "name", "OS/2", "post", "cmap", "hmtx", "vmtx"]),
  variable: new Set(["fvar", "avar", "STAT", "HVAR", "VVAR", "MVAR", "gvar"]),
  layout: new Set(["GSUB", "GPOS", "GDEF"]),
  other: new Set(["gasp"]),
};

export function getGroupForTag(tag: string): TableGroup | null {
  return GROUP_ORDER.find((group) => GROUPS[group].has(tag)) ?? null;
}

/**
 * Decode one table. Never throws: decoder failures come back with status "error".
 */
export function parseTable(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult {
  const group = getGroupForTag(tag);
  try {
    let decoded: ParseResult | null = null;
    if (group === "core") decoded = parseCore(tag, buffer, offset, length);
    if (group === "variable") decoded = parseVariable(tag, buffer, offset, length);
    if (group === "layout") decoded = parseLayout(tag, buffer, offset, length);
    if (group === "other") decoded = parseOther(tag, buffer, offset, length);
    return decoded ?? result(parseStub(buffer, offset, length), "not_implemented");
  } catch (error) {
    return failed(error);
  }
}
