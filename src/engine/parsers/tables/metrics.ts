/**
 * Metrics table decoders: hmtx, vmtx.
 * Entries are keyed by glyph id so a single changed metric surfaces on its own.
 */

import { findTableOffset } from "../RawTableParser";
import { failed, type ParseResult, result } from "./result";

export function parseMetrics(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult {
  const vertical = tag === "vmtx";
  const headerTag = vertical ? "vhea" : "hhea";
  const header = findTableOffset(buffer, headerTag);
  const maxp = findTableOffset(buffer, "maxp");
  if (!header || !maxp || header.length < 36 || maxp.length < 6) {
    return failed(new Error(`${tag} needs ${headerTag} and maxp`));
  }

  const numLongMetrics = new DataView(buffer, header.offset, header.length).getUint16(34, false);
  const numGlyphs = new DataView(buffer, maxp.offset, maxp.length).getUint16(4, false);
  const view = new DataView(buffer, offset, length);
  const bearingKey = vertical ? "tsb" : "lsb";
  const advanceKey = vertical ? "advanceHeight" : "advanceWidth";

  const lastAdvance =
    numLongMetrics > 0 && numLongMetrics * 4 <= length
      ? view.getUint16((numLongMetrics - 1) * 4, false)
      : 0;

  const metrics: Record<string, Record<string, number>> = {};
  let status: "complete" | "partial" = "complete";

  for (let gid = 0; gid < numGlyphs; gid++) {
    let advance: number;
    let bearingOffset: number;
    if (gid < numLongMetrics) {
      if (gid * 4 + 4 > length) {
        status = "partial";
        break;
      }
      advance = view.getUint16(gid * 4, false);
      bearingOffset = gid * 4 + 2;
    } else {
      advance = lastAdvance;
      bearingOffset = numLongMetrics * 4 + (gid - numLongMetrics) * 2;
    }
    if (bearingOffset + 2 > length) {
      status = "partial";
      break;
    }
    metrics[String(gid)] = {
      [advanceKey]: advance,
      [bearingKey]: view.getInt16(bearingOffset, false),
    };
  }

  return result(
    {
      [vertical ? "numOfLongVerMetrics" : "numberOfHMetrics"]: numLongMetrics,
      numGlyphs,
      metrics,
    },
    status
  );
}
