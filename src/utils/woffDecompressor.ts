/**
 * WOFF decompression
 * Rebuilds an SFNT binary from a WOFF 1.0 file so table offsets can be read directly
 */

import { inflate, inflateRaw } from "pako";
import { engineLogger } from "../engine/logging/logger";

export type FontFormat = "ttf" | "otf" | "woff" | "woff2" | "ttc" | "unknown";

const WOFF_HEADER_SIZE = 44;
const WOFF_ENTRY_SIZE = 20;

/**
 * Detect font format from magic bytes
 */
export function detectFontFormat(bytes: Uint8Array): FontFormat {
  if (bytes.length < 4) return "unknown";

  const magic = String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);

  if (magic === "wOFF") return "woff";
  if (magic === "wOF2") return "woff2";
  if (magic === "ttcf") return "ttc";
  if (magic === "\x00\x01\x00\x00" || magic === "true") return "ttf";
  if (magic === "OTTO") return "otf";

  return "unknown";
}

interface WoffTableEntry {
  tag: string;
  offsetInFile: number;
  compLength: number;
  origLength: number;
  origChecksum: number;
}

function inflateTable(entry: WoffTableEntry, data: Uint8Array): Uint8Array {
  // Stored uncompressed when compression would not help
  if (entry.compLength === entry.origLength) return data;

  // WOFF mandates zlib streams; some encoders write raw deflate instead
  const hasZlibHeader = data.length >= 2 && data[0] === 0x78;
  try {
    return hasZlibHeader ? inflate(data) : inflateRaw(data);
  } catch (firstError) {
    try {
      return hasZlibHeader ? inflateRaw(data) : inflate(data);
    } catch {
      throw new Error(
        `Failed to decompress table ${entry.tag}: ${firstError instanceof Error ? firstError.message : String(firstError)}`
      );
    }
  }
}

/**
 * Decompress WOFF file (zlib per table) into an SFNT buffer.
 * Tables are written in tag order, each padded to a 4-byte boundary.
 */
export function decompressWOFF(compressed: Uint8Array): Uint8Array {
  const startTime = Date.now();
  if (compressed.byteLength < WOFF_HEADER_SIZE) {
    throw new Error(`WOFF header truncated (${compressed.byteLength} bytes)`);
  }

  const view = new DataView(compressed.buffer, compressed.byteOffset, compressed.byteLength);
  const flavor = view.getUint32(4, false);
  const numTables = view.getUint16(12, false);

  if (WOFF_HEADER_SIZE + numTables * WOFF_ENTRY_SIZE > compressed.byteLength) {
    throw new Error(`WOFF table directory of ${numTables} entries extends beyond the file`);
  }

  const entries: WoffTableEntry[] = [];
  for (let i = 0; i < numTables; i++) {
    const offset = WOFF_HEADER_SIZE + i * WOFF_ENTRY_SIZE;
    entries.push({
      tag: String.fromCharCode(
        compressed[offset],
        compressed[offset + 1],
        compressed[offset + 2],
        compressed[offset + 3]
      ),
      offsetInFile: view.getUint32(offset + 4, false),
      compLength: view.getUint32(offset + 8, false),
      origLength: view.getUint32(offset + 12, false),
      origChecksum: view.getUint32(offset + 16, false),
    });
  }

  const tables = entries.map((entry) => {
    if (entry.offsetInFile + entry.compLength > compressed.byteLength) {
      throw new Error(
        `Table ${entry.tag}: offset ${entry.offsetInFile} + length ${entry.compLength} exceeds file size ${compressed.byteLength}`
      );
    }
    const raw = compressed.subarray(entry.offsetInFile, entry.offsetInFile + entry.compLength);
    const data = inflateTable(entry, raw);
    if (data.byteLength !== entry.origLength) {
      throw new Error(
        `Table ${entry.tag}: decompressed to ${data.byteLength} bytes, expected ${entry.origLength}`
      );
    }
    return { tag: entry.tag, data, checksum: entry.origChecksum };
  });

  tables.sort((a, b) => (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0));

  let size = 12 + numTables * 16;
  for (const table of tables) {
    size = (size + table.data.byteLength + 3) & ~3;
  }

  const sfnt = new Uint8Array(size);
  const out = new DataView(sfnt.buffer);

  const entrySelector = numTables > 0 ? Math.floor(Math.log2(numTables)) : 0;
  const searchRange = numTables > 0 ? 2 ** entrySelector * 16 : 0;
  out.setUint32(0, flavor, false);
  out.setUint16(4, numTables, false);
  out.setUint16(6, searchRange, false);
  out.setUint16(8, entrySelector, false);
  out.setUint16(10, numTables * 16 - searchRange, false);

  let dataOffset = 12 + numTables * 16;
  tables.forEach((table, i) => {
    const record = 12 + i * 16;
    for (let c = 0; c < 4; c++) out.setUint8(record + c, table.tag.charCodeAt(c));
    out.setUint32(record + 4, table.checksum, false);
    out.setUint32(record + 8, dataOffset, false);
    out.setUint32(record + 12, table.data.byteLength, false);
    sfnt.set(table.data, dataOffset);
    dataOffset = (dataOffset + table.data.byteLength + 3) & ~3;
  });

  engineLogger.timed("debug", "woffDecompressor", "WOFF decompressed", startTime, {
    tables: numTables,
    size: sfnt.byteLength,
  });
  return sfnt;
}

/**
 * Return an SFNT buffer for TTF/OTF/WOFF input.
 * WOFF2 and collections are rejected: the engine compares single SFNT fonts.
 */
export function decompressFont(bytes: Uint8Array): Uint8Array {
  const format = detectFontFormat(bytes);

  switch (format) {
    case "woff":
      return decompressWOFF(bytes);
    case "ttf":
    case "otf":
      return bytes;
    case "woff2":
      throw new Error("WOFF2 input is not supported; decompress it to TTF/OTF first");
    case "ttc":
      throw new Error("Font collections are not supported; extract a single font first");
    default:
      throw new Error("Unsupported font format. Expected TTF, OTF or WOFF.");
  }
}
