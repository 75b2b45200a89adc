/**
 * Other table decoders: gasp.
 */

import { type ParseResult, result, tooShort } from "./result";

export function parseOther(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult | null {
  const view = new DataView(buffer, offset, length);
  switch (tag) {
    case "gasp": {
      if (length < 4) return tooShort(tag, length, 4);
      const numRanges = view.getUint16(2, false);
      const ranges: Record<string, Record<string, boolean>> = {};
      let status: "complete" | "partial" = "complete";
      for (let i = 0; i < numRanges; i++) {
        const o = 4 + i * 4;
        if (o + 4 > length) {
          status = "partial";
          break;
        }
        const behavior = view.getUint16(o + 2, false);
        ranges[String(view.getUint16(o, false))] = {
          gridfit: !!(behavior & 0x0001),
          doGray: !!(behavior & 0x0002),
          symmetricGridfit: !!(behavior & 0x0004),
          symmetricSmoothing: !!(behavior & 0x0008),
        };
      }
      return result({ version: view.getUint16(0, false), ranges }, status);
    }

    default:
      return null;
  }
}
