/**
 * Bit and label decoders for OpenType tables.
 */

import macGlyphOrder from "../../../data/macGlyphOrder.json";
import { findTableOffset, readNameRecords } from "../RawTableParser";

export function formatBinary32(n: number): string {
  const s = (n >>> 0).toString(2).padStart(32, "0");
  return `${s.slice(0, 8)} ${s.slice(8, 16)} ${s.slice(16, 24)} ${s.slice(24)}`;
}

/**
 * Decoded fsType field (OS/2 embedding permissions)
 */
export function decodeFsType(fsType: number): {
  installable: boolean;
  restrictedLicense: boolean;
  previewAndPrint: boolean;
  editable: boolean;
  noSubsetting: boolean;
  bitmapOnly: boolean;
} {
  return {
    installable: (fsType & 0x000e) === 0,
    restrictedLicense: !!(fsType & 0x0002),
    previewAndPrint: !!(fsType & 0x0004),
    editable: !!(fsType & 0x0008),
    noSubsetting: !!(fsType & 0x0100),
    bitmapOnly: !!(fsType & 0x0200),
  };
}

export function decodeFsSelection(fsSelection: number): {
  italic: boolean;
  underscore: boolean;
  negative: boolean;
  outlined: boolean;
  strikeout: boolean;
  bold: boolean;
  regular: boolean;
  useTypoMetrics: boolean;
  wws: boolean;
  oblique: boolean;
} {
  return {
    italic: !!(fsSelection & 0x0001),
    underscore: !!(fsSelection & 0x0002),
    negative: !!(fsSelection & 0x0004),
    outlined: !!(fsSelection & 0x0008),
    strikeout: !!(fsSelection & 0x0010),
    bold: !!(fsSelection & 0x0020),
    regular: !!(fsSelection & 0x0040),
    useTypoMetrics: !!(fsSelection & 0x0080),
    wws: !!(fsSelection & 0x0100),
    oblique: !!(fsSelection & 0x0200),
  };
}

/**
 * sFamilyClass: high byte = class, low byte = subclass
 */
export function decodeSFamilyClass(sFamilyClass: number): { class: number; subclass: number } {
  return {
    class: (sFamilyClass >> 8) & 0xff,
    subclass: sFamilyClass & 0xff,
  };
}

/** OS/2 ulCodePageRange1/2 bit-to-name map (bits 0-63) */
const CODE_PAGE_RANGE_NAMES: Record<number, string> = {
  0: "Latin 1 (1252)",
  1: "Latin 2 Eastern Europe (1250)",
  2: "Cyrillic (1251)",
  3: "Greek (1253)",
  4: "Turkish (1254)",
  5: "Hebrew (1255)",
  6: "Arabic (1256)",
  7: "Windows Baltic (1257)",
  8: "Vietnamese (1258)",
  16: "Thai (874)",
  17: "JIS/Japan (932)",
  18: "Chinese Simplified (936)",
  19: "Korean Wansung (949)",
  20: "Chinese Traditional (950)",
  21: "Korean Johab (1361)",
  29: "Macintosh",
  30: "OEM",
  31: "Symbol",
};

export function decodeCodePageRanges(r1: number, r2: number): string[] {
  const out: string[] = [];
  for (let bit = 0; bit < 32; bit++) {
    if ((r1 >>> bit) & 1) out.push(CODE_PAGE_RANGE_NAMES[bit] ?? `Bit ${bit}`);
  }
  for (let bit = 0; bit < 32; bit++) {
    if ((r2 >>> bit) & 1) out.push(`Bit ${32 + bit}`);
  }
  return out;
}

const UNICODE_RANGE_NAMES: Record<number, string> = {
  0: "Basic Latin",
  1: "Latin-1 Supplement",
  2: "Latin Extended-A",
  3: "Latin Extended-B",
  4: "IPA Extensions",
  5: "Spacing Modifier Letters",
  6: "Combining Diacritical Marks",
  7: "Greek and Coptic",
  9: "Cyrillic",
  10: "Armenian",
  11: "Hebrew",
  13: "Arabic",
  15: "Devanagari",
  24: "Thai",
  29: "Latin Extended Additional",
  31: "General Punctuation",
  33: "Currency Symbols",
};

export function decodeUnicodeRanges(ranges: readonly number[]): string[] {
  const out: string[] = [];
  ranges.forEach((word, index) => {
    for (let bit = 0; bit < 32; bit++) {
      if (!((word >>> bit) & 1)) continue;
      const position = index * 32 + bit;
      out.push(UNICODE_RANGE_NAMES[position] ?? `Bit ${position}`);
    }
  });
  return out;
}

export function getEncodingLabel(platformID: number, encodingID: number): string {
  if (platformID === 0) {
    const m: Record<number, string> = {
      0: "Unicode 1.0",
      1: "Unicode 1.1",
      2: "ISO/IEC 10646",
      3: "Unicode 2.0 BMP",
      4: "Unicode 2.0 full",
      5: "Unicode Variation",
      6: "Unicode full",
    };
    return m[encodingID] ?? `Encoding ${encodingID}`;
  }
  if (platformID === 1) {
    const m: Record<number, string> = {
      0: "Roman",
      1: "Japanese",
      2: "Chinese Traditional",
      3: "Korean",
      4: "Arabic",
      5: "Hebrew",
      6: "Greek",
    };
    return m[encodingID] ?? `Encoding ${encodingID}`;
  }
  if (platformID === 3) {
    const m: Record<number, string> = {
      0: "Symbol",
      1: "Unicode BMP",
      2: "ShiftJIS",
      3: "PRC",
      4: "Big5",
      5: "Wansung",
      6: "Johab",
      10: "Unicode full",
    };
    return m[encodingID] ?? `Encoding ${encodingID}`;
  }
  return `Encoding ${encodingID}`;
}

export function getLanguageLabel(platformID: number, languageID: number): string {
  if (platformID === 3) {
    const m: Record<number, string> = {
      1033: "en-US",
      2057: "en-GB",
      1031: "de-DE",
      1036: "fr-FR",
      1040: "it-IT",
      1034: "es-ES",
      1041: "ja-JP",
      1042: "ko-KR",
      2052: "zh-CN",
      1028: "zh-TW",
      1049: "ru-RU",
      1043: "nl-NL",
      1046: "pt-BR",
      2070: "pt-PT",
    };
    return m[languageID] ?? `Language ${languageID}`;
  }
  if (platformID === 1 && languageID === 0) return "en";
  return `Language ${languageID}`;
}

export const PLATFORM_LABELS: Record<number, string> = {
  0: "Unicode",
  1: "Mac",
  2: "ISO",
  3: "Windows",
};

export const GSUB_LOOKUP_TYPES: Record<number, string> = {
  1: "Single Substitution",
  2: "Multiple Substitution",
  3: "Alternate Substitution",
  4: "Ligature Substitution",
  5: "Contextual Substitution",
  6: "Chaining Contextual Substitution",
  7: "Extension Substitution",
  8: "Reverse Chaining Contextual Single Substitution",
};

export const GPOS_LOOKUP_TYPES: Record<number, string> = {
  1: "Single Adjustment",
  2: "Pair Adjustment",
  3: "Cursive Attachment",
  4: "MarkToBase Attachment",
  5: "MarkToLigature Attachment",
  6: "MarkToMark Attachment",
  7: "Contextual Positioning",
  8: "Chaining Contextual Positioning",
  9: "Extension Positioning",
};

/**
 * Standard Macintosh glyph name for a post format 2 glyphNameIndex below 258
 */
export function macGlyphName(index: number): string | undefined {
  return macGlyphOrder[index];
}

/**
 * Resolve nameIDs to strings in one pass over the name table.
 * Prefers Windows Unicode English (3/1/0x409); else the first non-empty record.
 */
export function resolveNameIDs(buffer: ArrayBuffer, nameIDs: readonly number[]): Map<number, string> {
  const result = new Map<number, string>();
  const nameTable = findTableOffset(buffer, "name");
  if (!nameTable) return result;

  const wanted = new Set(nameIDs);
  const preferred = new Map<number, string>();
  const fallback = new Map<number, string>();

  for (const record of readNameRecords(buffer, nameTable.offset, nameTable.length)) {
    if (!wanted.has(record.nameID)) continue;
    const value = record.value.trim();
    if (!value) continue;
    if (record.platformID === 3 && record.encodingID === 1 && record.languageID === 0x0409) {
      preferred.set(record.nameID, value);
    } else if (!fallback.has(record.nameID)) {
      fallback.set(record.nameID, value);
    }
  }

  for (const id of nameIDs) {
    const value = preferred.get(id) ?? fallback.get(id);
    if (value !== undefined) result.set(id, value);
  }
  return result;
}
