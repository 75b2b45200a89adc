/**
 * Raw SFNT parsing: table directory, checksums and the fields the table
 * decoders share (OS/2, post, name records, fvar).
 */

import { engineLogger } from "../logging/logger";

export interface TableDirectoryEntry {
  tag: string;
  offset: number;
  length: number;
  checksum: number;
}

export interface NameRecord {
  platformID: number;
  encodingID: number;
  languageID: number;
  nameID: number;
  value: string;
}

export interface FvarAxisRecord {
  tag: string;
  min: number;
  default: number;
  max: number;
  flags: number;
  axisNameID: number;
}

export interface FvarInstanceRecord {
  subfamilyNameID: number;
  flags: number;
  coordinates: number[];
  postScriptNameID?: number;
}

export interface FvarTableData {
  majorVersion: number;
  minorVersion: number;
  axes: FvarAxisRecord[];
  instances: FvarInstanceRecord[];
}

export function readTag(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );
}

/**
 * Read the full table directory (tag, offset, length, checksum).
 * Throws when the directory or a table it lists lies outside the buffer.
 */
export function getTableDirectory(buffer: ArrayBuffer): TableDirectoryEntry[] {
  if (buffer.byteLength < 12) {
    throw new Error(`File too short for an SFNT header (${buffer.byteLength} bytes)`);
  }
  const view = new DataView(buffer);
  const numTables = view.getUint16(4, false);
  if (12 + numTables * 16 > buffer.byteLength) {
    throw new Error(`Table directory of ${numTables} entries extends beyond the file`);
  }

  const entries: TableDirectoryEntry[] = [];
  for (let i = 0; i < numTables; i++) {
    const entryOffset = 12 + i * 16;
    const tag = readTag(view, entryOffset);
    const checksum = view.getUint32(entryOffset + 4, false);
    const offset = view.getUint32(entryOffset + 8, false);
    const length = view.getUint32(entryOffset + 12, false);
    if (offset + length > buffer.byteLength) {
      throw new Error(`Table '${tag}' (offset ${offset}, length ${length}) extends beyond the file`);
    }
    entries.push({ tag, offset, length, checksum });
  }
  return entries;
}

/**
 * Find table offset in SFNT structure
 */
export function findTableOffset(
  buffer: ArrayBuffer,
  tableTag: string
): { offset: number; length: number } | null {
  try {
    const entry = getTableDirectory(buffer).find((e) => e.tag === tableTag);
    return entry ? { offset: entry.offset, length: entry.length } : null;
  } catch (error) {
    engineLogger.warn("RawTableParser", "Failed to find table", {
      tag: tableTag,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * OpenType table checksum: sum of big-endian uint32 words, zero padded, mod 2^32
 */
export function computeTableChecksum(buffer: ArrayBuffer, offset: number, length: number): number {
  const bytes = new Uint8Array(buffer, offset, length);
  let sum = 0;
  for (let i = 0; i < length; i += 4) {
    const word =
      ((bytes[i] ?? 0) << 24) |
      ((bytes[i + 1] ?? 0) << 16) |
      ((bytes[i + 2] ?? 0) << 8) |
      (bytes[i + 3] ?? 0);
    sum = (sum + (word >>> 0)) >>> 0;
  }
  return sum;
}

export interface OS2TableFields {
  xAvgCharWidth?: number;
  usWeightClass?: number;
  usWidthClass?: number;
  fsType?: number;
  ySubscriptXSize?: number;
  ySubscriptYSize?: number;
  ySubscriptXOffset?: number;
  ySubscriptYOffset?: number;
  ySuperscriptXSize?: number;
  ySuperscriptYSize?: number;
  ySuperscriptXOffset?: number;
  ySuperscriptYOffset?: number;
  yStrikeoutSize?: number;
  yStrikeoutPosition?: number;
  sFamilyClass?: number;
  achVendID?: string;
  fsSelection?: number;
  usFirstCharIndex?: number;
  usLastCharIndex?: number;
  sTypoAscender?: number;
  sTypoDescender?: number;
  sTypoLineGap?: number;
  usWinAscent?: number;
  usWinDescent?: number;
  ulCodePageRange1?: number;
  ulCodePageRange2?: number;
  sxHeight?: number;
  sCapHeight?: number;
  usDefaultChar?: number;
  usBreakChar?: number;
  usMaxContext?: number;
  usLowerOpticalPointSize?: number;
  usUpperOpticalPointSize?: number;
}

/**
 * Read OS/2 table fields from binary data.
 * v0 ends at usWinDescent (78); v1 adds ulCodePageRange (through 86);
 * v2 adds sxHeight through usMaxContext (through 96); v5 adds optical sizes (96-99).
 */
export function readOS2TableFields(view: DataView): OS2TableFields {
  const length = view.byteLength;
  const version = view.getUint16(0, false);
  const result: OS2TableFields = {};

  if (length >= 4) result.xAvgCharWidth = view.getInt16(2, false);
  if (length >= 6) result.usWeightClass = view.getUint16(4, false);
  if (length >= 8) result.usWidthClass = view.getUint16(6, false);
  if (length >= 10) result.fsType = view.getUint16(8, false);

  if (length >= 18) {
    result.ySubscriptXSize = view.getInt16(10, false);
    result.ySubscriptYSize = view.getInt16(12, false);
    result.ySubscriptXOffset = view.getInt16(14, false);
    result.ySubscriptYOffset = view.getInt16(16, false);
  }
  if (length >= 26) {
    result.ySuperscriptXSize = view.getInt16(18, false);
    result.ySuperscriptYSize = view.getInt16(20, false);
    result.ySuperscriptXOffset = view.getInt16(22, false);
    result.ySuperscriptYOffset = view.getInt16(24, false);
  }
  if (length >= 30) {
    result.yStrikeoutSize = view.getInt16(26, false);
    result.yStrikeoutPosition = view.getInt16(28, false);
  }
  if (length >= 32) result.sFamilyClass = view.getInt16(30, false);

  if (length >= 64) {
    result.achVendID = readTag(view, 58);
    result.fsSelection = view.getUint16(62, false);
  }
  if (length >= 68) {
    result.usFirstCharIndex = view.getUint16(64, false);
    result.usLastCharIndex = view.getUint16(66, false);
  }
  if (length >= 78) {
    result.sTypoAscender = view.getInt16(68, false);
    result.sTypoDescender = view.getInt16(70, false);
    result.sTypoLineGap = view.getInt16(72, false);
    result.usWinAscent = view.getUint16(74, false);
    result.usWinDescent = view.getUint16(76, false);
  }
  if (version >= 1 && length >= 86) {
    result.ulCodePageRange1 = view.getUint32(78, false);
    result.ulCodePageRange2 = view.getUint32(82, false);
  }
  if (version >= 2 && length >= 90) {
    result.sxHeight = view.getInt16(86, false);
    result.sCapHeight = view.getInt16(88, false);
  }
  if (version >= 2 && length >= 96) {
    result.usDefaultChar = view.getUint16(90, false);
    result.usBreakChar = view.getUint16(92, false);
    result.usMaxContext = view.getUint16(94, false);
  }
  if (version >= 5 && length >= 100) {
    result.usLowerOpticalPointSize = view.getUint16(96, false);
    result.usUpperOpticalPointSize = view.getUint16(98, false);
  }
  return result;
}

/**
 * post: 0-3 version, 4-7 italicAngle, 8-9 underlinePosition, 10-11 underlineThickness
 */
export function readPostTableFields(view: DataView): {
  underlinePosition?: number;
  underlineThickness?: number;
} {
  const result: { underlinePosition?: number; underlineThickness?: number } = {};
  if (view.byteLength >= 10) result.underlinePosition = view.getInt16(8, false);
  if (view.byteLength >= 12) result.underlineThickness = view.getInt16(10, false);
  return result;
}

function decodeWith(encoding: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder(encoding).decode(bytes);
  } catch {
    // Runtimes built without full ICU lack the legacy Mac encodings
    return new TextDecoder("latin1").decode(bytes);
  }
}

export function decodeNameString(platformID: number, bytes: Uint8Array): string {
  let decoded: string;
  if (platformID === 3 || platformID === 0) {
    decoded = decodeWith("utf-16be", bytes);
  } else if (platformID === 1) {
    decoded = decodeWith("macintosh", bytes);
  } else if (platformID === 2) {
    decoded = decodeWith("latin1", bytes);
  } else {
    decoded = new TextDecoder("utf-8", { fatal: false }).decode(bytes);
  }
  return decoded.replace(/\0/g, "");
}

/**
 * Read every name record, decoded. Records whose string lies outside the table are skipped.
 */
export function readNameRecords(buffer: ArrayBuffer, tableOffset: number, tableLength: number): NameRecord[] {
  const records: NameRecord[] = [];
  if (tableLength < 6) return records;

  const view = new DataView(buffer, tableOffset, tableLength);
  const count = view.getUint16(2, false);
  const stringOffset = view.getUint16(4, false);

  for (let i = 0; i < count; i++) {
    const recordOffset = 6 + i * 12;
    if (recordOffset + 12 > tableLength) break;

    const platformID = view.getUint16(recordOffset, false);
    const encodingID = view.getUint16(recordOffset + 2, false);
    const languageID = view.getUint16(recordOffset + 4, false);
    const nameID = view.getUint16(recordOffset + 6, false);
    const length = view.getUint16(recordOffset + 8, false);
    const offset = view.getUint16(recordOffset + 10, false);

    const start = stringOffset + offset;
    if (start + length > tableLength) continue;

    const bytes = new Uint8Array(buffer, tableOffset + start, length);
    records.push({ platformID, encodingID, languageID, nameID, value: decodeNameString(platformID, bytes) });
  }
  return records;
}

/**
 * Parse fvar table from binary data.
 * Returns null for unsupported versions; truncated records are dropped with a warning.
 */
export function parseFvarTable(view: DataView): FvarTableData | null {
  const length = view.byteLength;
  if (length < 16) return null;

  const majorVersion = view.getUint16(0, false);
  const minorVersion = view.getUint16(2, false);
  const axesArrayOffset = view.getUint16(4, false);
  const axisCount = view.getUint16(8, false);
  const axisSize = view.getUint16(10, false);
  const instanceCount = view.getUint16(12, false);
  const instanceSize = view.getUint16(14, false);

  if (majorVersion !== 1) {
    engineLogger.warn("RawTableParser", "Unsupported fvar version", {
      version: `${majorVersion}.${minorVersion}`,
    });
    return null;
  }

  const axes: FvarAxisRecord[] = [];
  let currentOffset = axesArrayOffset;

  for (let i = 0; i < axisCount; i++) {
    if (currentOffset + 20 > length) {
      engineLogger.warn("RawTableParser", "fvar axis extends beyond table bounds", { axis: i });
      break;
    }
    axes.push({
      tag: readTag(view, currentOffset),
      min: view.getInt32(currentOffset + 4, false) / 65536,
      default: view.getInt32(currentOffset + 8, false) / 65536,
      max: view.getInt32(currentOffset + 12, false) / 65536,
      flags: view.getUint16(currentOffset + 16, false),
      axisNameID: view.getUint16(currentOffset + 18, false),
    });
    currentOffset += axisSize;
  }

  const instances: FvarInstanceRecord[] = [];
  const coordinatesSize = axisCount * 4;

  for (let i = 0; i < instanceCount; i++) {
    if (currentOffset + 4 + coordinatesSize > length) {
      engineLogger.warn("RawTableParser", "fvar instance extends beyond table bounds", { instance: i });
      break;
    }

    const coordinates: number[] = [];
    for (let j = 0; j < axisCount; j++) {
      coordinates.push(view.getInt32(currentOffset + 4 + j * 4, false) / 65536);
    }

    const instance: FvarInstanceRecord = {
      subfamilyNameID: view.getUint16(currentOffset, false),
      flags: view.getUint16(currentOffset + 2, false),
      coordinates,
    };

    // postScriptNameID is present only when instanceSize leaves room for it
    const psOffset = currentOffset + 4 + coordinatesSize;
    if (instanceSize >= 6 + coordinatesSize && psOffset + 2 <= length) {
      const id = view.getUint16(psOffset, false);
      if (id !== 0xffff) instance.postScriptNameID = id;
    }

    instances.push(instance);
    currentOffset += instanceSize;
  }

  return { majorVersion, minorVersion, axes, instances };
}
