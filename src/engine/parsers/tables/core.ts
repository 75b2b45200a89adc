/**
 * Core table decoders: head, maxp, hhea, vhea, name, OS/2, post, cmap.
 */

import { readNameRecords, readOS2TableFields, readPostTableFields } from "../RawTableParser";
import {
  decodeCodePageRanges,
  decodeFsSelection,
  decodeFsType,
  decodeSFamilyClass,
  decodeUnicodeRanges,
  formatBinary32,
  getEncodingLabel,
  getLanguageLabel,
  macGlyphName,
  PLATFORM_LABELS,
} from "./decoders";
import { fixed16ToDecimal, hexCodepoint, macTimeToAsctime, u16ToBinary } from "./formatters";
import { parseMetrics } from "./metrics";
import { type ParseResult, result, tooShort } from "./result";

export function parseHead(view: DataView): ParseResult {
  if (view.byteLength < 54) return tooShort("head", view.byteLength, 54);
  const flags = view.getUint16(16, false);
  const macStyle = view.getUint16(44, false);
  // checkSumAdjustment is omitted: it covers the whole file and changes with any other edit
  return result(
    {
      version: `${view.getUint16(0, false)}.${view.getUint16(2, false)}`,
      fontRevision: fixed16ToDecimal(view.getUint32(4, false)),
      magicNumber: `0x${view.getUint32(12, false).toString(16)}`,
      flags: u16ToBinary(flags),
      _flagsDecoded: {
        baselineAtY0: !!(flags & 0x0001),
        leftSidebearingAtX0: !!(flags & 0x0002),
        instructionsDependOnPointSize: !!(flags & 0x0004),
        forcePpemToInteger: !!(flags & 0x0008),
        instructionsAlterAdvanceWidth: !!(flags & 0x0010),
        lossless: !!(flags & 0x0800),
        fontConverted: !!(flags & 0x1000),
        clearType: !!(flags & 0x2000),
        lastResort: !!(flags & 0x4000),
      },
      unitsPerEm: view.getUint16(18, false),
      created: macTimeToAsctime(view, 20),
      modified: macTimeToAsctime(view, 28),
      xMin: view.getInt16(36, false),
      yMin: view.getInt16(38, false),
      xMax: view.getInt16(40, false),
      yMax: view.getInt16(42, false),
      macStyle: u16ToBinary(macStyle),
      _macStyleDecoded: {
        bold: !!(macStyle & 0x0001),
        italic: !!(macStyle & 0x0002),
        underline: !!(macStyle & 0x0004),
        outline: !!(macStyle & 0x0008),
        shadow: !!(macStyle & 0x0010),
        condensed: !!(macStyle & 0x0020),
        extended: !!(macStyle & 0x0040),
      },
      lowestRecPPEM: view.getUint16(46, false),
      fontDirectionHint: view.getInt16(48, false),
      indexToLocFormat: view.getInt16(50, false),
      glyphDataFormat: view.getInt16(52, false),
    },
    "complete"
  );
}

export function parseMaxp(view: DataView): ParseResult {
  if (view.byteLength < 6) return tooShort("maxp", view.byteLength, 6);
  const version = view.getUint32(0, false);
  const out: Record<string, unknown> = {
    version: version === 0x00005000 ? "0.5" : version === 0x00010000 ? "1.0" : `0x${version.toString(16)}`,
    numGlyphs: view.getUint16(4, false),
  };
  if (version === 0x0001_0000 && view.byteLength >= 32) {
    out.maxPoints = view.getUint16(6, false);
    out.maxContours = view.getUint16(8, false);
    out.maxCompositePoints = view.getUint16(10, false);
    out.maxCompositeContours = view.getUint16(12, false);
    out.maxZones = view.getUint16(14, false);
    out.maxTwilightPoints = view.getUint16(16, false);
    out.maxStorage = view.getUint16(18, false);
    out.maxFunctionDefs = view.getUint16(20, false);
    out.maxInstructionDefs = view.getUint16(22, false);
    out.maxStackElements = view.getUint16(24, false);
    out.maxSizeOfInstructions = view.getUint16(26, false);
    out.maxComponentElements = view.getUint16(28, false);
    out.maxComponentDepth = view.getUint16(30, false);
  }
  return result(out, "complete");
}

function parseHorizontalOrVerticalHeader(view: DataView, vertical: boolean): ParseResult {
  const tag = vertical ? "vhea" : "hhea";
  if (view.byteLength < 36) return tooShort(tag, view.byteLength, 36);
  return result(
    {
      version: fixed16ToDecimal(view.getUint32(0, false)),
      ascent: view.getInt16(4, false),
      descent: view.getInt16(6, false),
      lineGap: view.getInt16(8, false),
      [vertical ? "advanceHeightMax" : "advanceWidthMax"]: view.getUint16(10, false),
      [vertical ? "minTopSideBearing" : "minLeftSideBearing"]: view.getInt16(12, false),
      [vertical ? "minBottomSideBearing" : "minRightSideBearing"]: view.getInt16(14, false),
      [vertical ? "yMaxExtent" : "xMaxExtent"]: view.getInt16(16, false),
      caretSlopeRise: view.getInt16(18, false),
      caretSlopeRun: view.getInt16(20, false),
      caretOffset: view.getInt16(22, false),
      metricDataFormat: view.getInt16(32, false),
      [vertical ? "numOfLongVerMetrics" : "numberOfHMetrics"]: view.getUint16(34, false),
    },
    "complete"
  );
}

export function parseOS2(view: DataView): ParseResult {
  if (view.byteLength < 2) return tooShort("OS/2", view.byteLength, 2);
  const base = readOS2TableFields(view);
  const obj: Record<string, unknown> = { version: view.getUint16(0, false), ...base };
  if (base.fsType !== undefined) {
    obj.fsType = u16ToBinary(base.fsType);
    obj._fsTypeDecoded = decodeFsType(base.fsType);
  }
  if (base.fsSelection !== undefined) {
    obj.fsSelection = u16ToBinary(base.fsSelection);
    obj._fsSelectionDecoded = decodeFsSelection(base.fsSelection);
  }
  if (base.sFamilyClass !== undefined) {
    obj._sFamilyClassDecoded = decodeSFamilyClass(base.sFamilyClass);
  }
  if (base.ulCodePageRange1 !== undefined && base.ulCodePageRange2 !== undefined) {
    obj._codePageRangesDecoded = decodeCodePageRanges(base.ulCodePageRange1, base.ulCodePageRange2);
  }
  if (view.byteLength >= 42) {
    const panose: number[] = [];
    for (let i = 0; i < 10; i++) panose.push(view.getUint8(32 + i));
    obj.panose = panose;
  }
  if (view.byteLength >= 58) {
    const ranges = [0, 1, 2, 3].map((i) => view.getUint32(42 + i * 4, false));
    ranges.forEach((range, i) => {
      obj[`ulUnicodeRange${i + 1}`] = formatBinary32(range);
    });
    obj._unicodeRangesDecoded = decodeUnicodeRanges(ranges);
  }
  return result(obj, "complete");
}

export function parsePost(view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 32) return tooShort("post", length, 32);
  const format = view.getUint32(0, false);
  const formatMajor = format >>> 16;
  const out: Record<string, unknown> = {
    format: fixed16ToDecimal(format),
    italicAngle: fixed16ToDecimal(view.getInt32(4, false)),
    ...readPostTableFields(view),
    isFixedPitch: view.getUint32(12, false),
    minMemType42: view.getUint32(16, false),
    maxMemType42: view.getUint32(20, false),
    minMemType1: view.getUint32(24, false),
    maxMemType1: view.getUint32(28, false),
  };

  if (formatMajor !== 2) return result(out, "complete");
  if (length < 34) return result(out, "partial");

  const numGlyphs = view.getUint16(32, false);
  const indexEnd = 34 + numGlyphs * 2;
  if (indexEnd > length) return result(out, "partial");

  const stringTable: string[] = [];
  let pos = indexEnd;
  while (pos < length) {
    const len = view.getUint8(pos);
    if (pos + 1 + len > length) break;
    let name = "";
    for (let j = 0; j < len; j++) name += String.fromCharCode(view.getUint8(pos + 1 + j));
    stringTable.push(name);
    pos += 1 + len;
  }

  // Keyed by glyph id so a rename surfaces as a single leaf
  const glyphNames: Record<string, string> = {};
  for (let gid = 0; gid < numGlyphs; gid++) {
    const idx = view.getUint16(34 + gid * 2, false);
    glyphNames[String(gid)] =
      (idx < 258 ? macGlyphName(idx) : stringTable[idx - 258]) ?? `[missing name ${idx}]`;
  }
  out.numGlyphs = numGlyphs;
  out.glyphNames = glyphNames;
  return result(out, "complete");
}

/**
 * name: nameID -> "platform, encoding, language" -> string
 */
export function parseName(buffer: ArrayBuffer, offset: number, length: number): ParseResult {
  if (length < 6) return tooShort("name", length, 6);
  const view = new DataView(buffer, offset, length);
  const format = view.getUint16(0, false);
  const count = view.getUint16(2, false);

  const langTags: string[] = [];
  if (format === 1 && 8 + count * 12 <= length) {
    const stringOffset = view.getUint16(4, false);
    const langTagCount = view.getUint16(6 + count * 12, false);
    for (let i = 0; i < langTagCount; i++) {
      const recOff = 8 + count * 12 + i * 4;
      if (recOff + 4 > length) break;
      const len = view.getUint16(recOff, false);
      const start = stringOffset + view.getUint16(recOff + 2, false);
      if (start + len > length) break;
      const bytes = new Uint8Array(buffer, offset + start, len);
      langTags.push(new TextDecoder("utf-16be").decode(bytes));
    }
  }

  const records = readNameRecords(buffer, offset, length).sort(
    (a, b) =>
      a.nameID - b.nameID ||
      a.platformID - b.platformID ||
      a.encodingID - b.encodingID ||
      a.languageID - b.languageID
  );

  const names: Record<string, Record<string, string>> = {};
  for (const record of records) {
    const tagIndex = record.languageID >= 0x8000 ? record.languageID - 0x8000 : -1;
    const language =
      tagIndex >= 0 && tagIndex < langTags.length
        ? langTags[tagIndex]
        : getLanguageLabel(record.platformID, record.languageID);
    const platform = PLATFORM_LABELS[record.platformID] ?? `Platform ${record.platformID}`;
    const key = `${platform}, ${getEncodingLabel(record.platformID, record.encodingID)}, ${language}`;
    const byLanguage = names[String(record.nameID)] ?? {};
    byLanguage[key] = record.value;
    names[String(record.nameID)] = byLanguage;
  }

  return result(format === 1 ? { format, langTags, names } : { format, names }, "complete");
}

function readCmapMappings(view: DataView, format: number): Map<number, number> | null {
  const mappings = new Map<number, number>();
  const length = view.byteLength;

  switch (format) {
    case 0: {
      for (let c = 0; c < 256 && 6 + c < length; c++) {
        const gid = view.getUint8(6 + c);
        if (gid !== 0) mappings.set(c, gid);
      }
      return mappings;
    }
    case 4: {
      const segCount = view.getUint16(6, false) >>> 1;
      const endBase = 14;
      const startBase = endBase + segCount * 2 + 2;
      const deltaBase = startBase + segCount * 2;
      const rangeBase = deltaBase + segCount * 2;
      if (rangeBase + segCount * 2 > length) return null;
      for (let i = 0; i < segCount; i++) {
        const end = view.getUint16(endBase + i * 2, false);
        const start = view.getUint16(startBase + i * 2, false);
        const delta = view.getUint16(deltaBase + i * 2, false);
        const rangeOffset = view.getUint16(rangeBase + i * 2, false);
        for (let c = start; c <= end && c !== 0xffff; c++) {
          let gid: number;
          if (rangeOffset === 0) {
            gid = (c + delta) & 0xffff;
          } else {
            const addr = rangeBase + i * 2 + rangeOffset + (c - start) * 2;
            if (addr + 2 > length) continue;
            const raw = view.getUint16(addr, false);
            gid = raw === 0 ? 0 : (raw + delta) & 0xffff;
          }
          if (gid !== 0) mappings.set(c, gid);
        }
      }
      return mappings;
    }
    case 6: {
      const firstCode = view.getUint16(6, false);
      const entryCount = view.getUint16(8, false);
      for (let i = 0; i < entryCount && 10 + i * 2 + 2 <= length; i++) {
        const gid = view.getUint16(10 + i * 2, false);
        if (gid !== 0) mappings.set(firstCode + i, gid);
      }
      return mappings;
    }
    case 12: {
      const numGroups = view.getUint32(12, false);
      for (let i = 0; i < numGroups && 16 + (i + 1) * 12 <= length; i++) {
        const g = 16 + i * 12;
        const start = view.getUint32(g, false);
        const end = view.getUint32(g + 4, false);
        const startGid = view.getUint32(g + 8, false);
        for (let c = start; c <= end && c <= 0x10ffff; c++) {
          mappings.set(c, startGid + (c - start));
        }
      }
      return mappings;
    }
    default:
      return null;
  }
}

/**
 * cmap: one entry per encoding record, with the decoded codepoint -> glyph id map
 * for formats 0, 4, 6 and 12
 */
export function parseCmap(buffer: ArrayBuffer, offset: number, length: number): ParseResult {
  if (length < 4) return tooShort("cmap", length, 4);
  const view = new DataView(buffer, offset, length);
  const numTables = view.getUint16(2, false);
  const subtables: Record<string, unknown> = {};
  let status: "complete" | "partial" = "complete";

  for (let i = 0; i < numTables; i++) {
    const o = 4 + i * 8;
    if (o + 8 > length) {
      status = "partial";
      break;
    }
    const platformID = view.getUint16(o, false);
    const encodingID = view.getUint16(o + 2, false);
    const subtableOffset = view.getUint32(o + 4, false);
    const key = `${PLATFORM_LABELS[platformID] ?? `Platform ${platformID}`} ${getEncodingLabel(platformID, encodingID)} (${platformID}/${encodingID})`;
    if (subtableOffset + 4 > length) {
      subtables[key] = { unreadable: "subtable offset beyond table" };
      status = "partial";
      continue;
    }

    const format = view.getUint16(subtableOffset, false);
    const wide = format === 8 || format === 10 || format === 12 || format === 13 || format === 14;
    const declared = wide
      ? subtableOffset + 8 <= length
        ? view.getUint32(subtableOffset + 4, false)
        : 0
      : view.getUint16(subtableOffset + 2, false);
    const subLength = Math.min(declared, length - subtableOffset);
    const sub = new DataView(buffer, offset + subtableOffset, subLength);

    const entry: Record<string, unknown> = { format };
    if (format === 14) {
      entry.numVarSelectorRecords = subLength >= 10 ? sub.getUint32(6, false) : 0;
    } else if (wide) {
      if (subLength >= 12) entry.language = sub.getUint32(8, false);
    } else if (subLength >= 6) {
      entry.language = sub.getUint16(4, false);
    }

    const mappings = readCmapMappings(sub, format);
    if (mappings) {
      const byCodepoint: Record<string, number> = {};
      for (const cp of [...mappings.keys()].sort((a, b) => a - b)) {
        byCodepoint[hexCodepoint(cp)] = mappings.get(cp) ?? 0;
      }
      entry.mappings = byCodepoint;
    } else if (format !== 14) {
      entry.length = subLength;
    }
    subtables[key] = entry;
  }

  return result({ version: view.getUint16(0, false), subtables }, status);
}

export function parseCore(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult | null {
  const view = new DataView(buffer, offset, length);
  switch (tag) {
    case "head":
      return parseHead(view);
    case "maxp":
      return parseMaxp(view);
    case "hhea":
      return parseHorizontalOrVerticalHeader(view, false);
    case "vhea":
      return parseHorizontalOrVerticalHeader(view, true);
    case "OS/2":
      return parseOS2(view);
    case "post":
      return parsePost(view);
    case "name":
      return parseName(buffer, offset, length);
    case "cmap":
      return parseCmap(buffer, offset, length);
    case "hmtx":
    case "vmtx":
      return parseMetrics(tag, buffer, offset, length);
    default:
      return null;
  }
}

