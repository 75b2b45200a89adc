/**
 * Fallback for tables with no dedicated decoder: size and checksum,
 * so that any change to the table's bytes still surfaces in a diff.
 */

import { computeTableChecksum } from "../RawTableParser";
import { u32ToHex } from "./formatters";

export function parseStub(
  buffer: ArrayBuffer,
  offset: number,
  length: number
): { size: number; checksum: string } {
  return { size: length, checksum: u32ToHex(computeTableChecksum(buffer, offset, length)) };
}
