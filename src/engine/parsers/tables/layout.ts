/**
 * Layout table decoders: GSUB, GPOS, GDEF.
 * Script/language systems, feature records and the lookup inventory;
 * glyph classes, attachment points and ligature carets.
 */

import { readTag } from "../RawTableParser";
import { GPOS_LOOKUP_TYPES, GSUB_LOOKUP_TYPES, resolveNameIDs } from "./decoders";
import { fixed16ToDecimal } from "./formatters";
import { type ParseResult, result, tooShort } from "./result";

interface FeatureRecord {
  tag: string;
  lookupListIndices: number[];
  uiNameID?: number;
  designSize?: number;
}

// ---------------------------------------------------------------------------
// parseFeatureList: FeatureList + Feature tables
// Feature table: FeatureParamsOffset (2), LookupCount (2), LookupListIndex[].
// ---------------------------------------------------------------------------
function parseFeatureList(view: DataView, featureListOffset: number): FeatureRecord[] {
  const out: FeatureRecord[] = [];
  const length = view.byteLength;
  if (featureListOffset <= 0 || featureListOffset + 2 > length) return out;

  const featureCount = view.getUint16(featureListOffset, false);
  for (let i = 0; i < featureCount; i++) {
    const rec = featureListOffset + 2 + i * 6;
    if (rec + 6 > length) break;
    const tag = readTag(view, rec);
    const featAbs = featureListOffset + view.getUint16(rec + 4, false);
    const feature: FeatureRecord = { tag, lookupListIndices: [] };

    if (featAbs + 4 <= length) {
      const featureParamsOffset = view.getUint16(featAbs, false);
      const lookupCount = view.getUint16(featAbs + 2, false);
      for (let l = 0; l < lookupCount && featAbs + 4 + (l + 1) * 2 <= length; l++) {
        feature.lookupListIndices.push(view.getUint16(featAbs + 4 + l * 2, false));
      }

      const params = featAbs + featureParamsOffset;
      if (featureParamsOffset !== 0 && params + 4 <= length) {
        if (tag === "size") {
          feature.designSize = view.getUint16(params, false) / 10;
        } else if (/^ss(0[1-9]|1[0-9]|20)$/.test(tag) || /^cv(0[1-9]|[1-9][0-9])$/.test(tag)) {
          // StylisticSet: Version, UINameID; CharacterVariants: Format, FeatUILabelNameID
          feature.uiNameID = view.getUint16(params + 2, false);
        }
      }
    }
    out.push(feature);
  }
  return out;
}

// ---------------------------------------------------------------------------
// parseScriptListWithFeatures: ScriptList + Script + LangSys -> script -> lang -> feature tags
// ---------------------------------------------------------------------------
function parseScriptListWithFeatures(
  view: DataView,
  scriptListOffset: number,
  featureList: FeatureRecord[]
): Record<string, Record<string, { required: string | null; features: string[] }>> {
  const out: Record<string, Record<string, { required: string | null; features: string[] }>> = {};
  const length = view.byteLength;
  if (scriptListOffset <= 0 || scriptListOffset + 2 > length) return out;

  const readLangSys = (lsBase: number): { required: string | null; features: string[] } => {
    if (lsBase + 6 > length) return { required: null, features: [] };
    const requiredFeatureIndex = view.getUint16(lsBase + 2, false);
    const featureIndexCount = view.getUint16(lsBase + 4, false);
    const features: string[] = [];
    for (let k = 0; k < featureIndexCount && lsBase + 6 + (k + 1) * 2 <= length; k++) {
      const tag = featureList[view.getUint16(lsBase + 6 + k * 2, false)]?.tag;
      if (tag) features.push(tag);
    }
    const required =
      requiredFeatureIndex !== 0xffff ? (featureList[requiredFeatureIndex]?.tag ?? null) : null;
    return { required, features };
  };

  const scriptCount = view.getUint16(scriptListOffset, false);
  for (let i = 0; i < scriptCount; i++) {
    const rec = scriptListOffset + 2 + i * 6;
    if (rec + 6 > length) break;
    const scriptTag = readTag(view, rec);
    const scriptBase = scriptListOffset + view.getUint16(rec + 4, false);
    if (scriptBase + 4 > length) continue;

    const languages: Record<string, { required: string | null; features: string[] }> = {};
    const defaultLangSysOffset = view.getUint16(scriptBase, false);
    if (defaultLangSysOffset !== 0) {
      languages.dflt = readLangSys(scriptBase + defaultLangSysOffset);
    }
    const langSysCount = view.getUint16(scriptBase + 2, false);
    for (let j = 0; j < langSysCount; j++) {
      const lr = scriptBase + 4 + j * 6;
      if (lr + 6 > length) break;
      languages[readTag(view, lr).trim()] = readLangSys(scriptBase + view.getUint16(lr + 4, false));
    }
    out[scriptTag.trim()] = languages;
  }
  return out;
}

// ---------------------------------------------------------------------------
// parseLookupList: type, flags and subtable count per lookup.
// Extension lookups report the type they wrap.
// ---------------------------------------------------------------------------
function parseLookupList(
  view: DataView,
  lookupListOffset: number,
  isGsub: boolean
): Record<string, Record<string, unknown>> {
  const lookups: Record<string, Record<string, unknown>> = {};
  const length = view.byteLength;
  if (lookupListOffset <= 0 || lookupListOffset + 2 > length) return lookups;

  const typeNames = isGsub ? GSUB_LOOKUP_TYPES : GPOS_LOOKUP_TYPES;
  const extensionType = isGsub ? 7 : 9;
  const lookupCount = view.getUint16(lookupListOffset, false);

  for (let j = 0; j < lookupCount; j++) {
    const slot = lookupListOffset + 2 + j * 2;
    if (slot + 2 > length) break;
    const lookup = lookupListOffset + view.getUint16(slot, false);
    if (lookup + 6 > length) continue;

    let lookupType = view.getUint16(lookup, false);
    const lookupFlag = view.getUint16(lookup + 2, false);
    const subTableCount = view.getUint16(lookup + 4, false);
    let extension = false;
    if (lookupType === extensionType && subTableCount > 0 && lookup + 8 <= length) {
      const sub = lookup + view.getUint16(lookup + 6, false);
      if (sub + 4 <= length) {
        lookupType = view.getUint16(sub + 2, false);
        extension = true;
      }
    }

    const entry: Record<string, unknown> = {
      type: typeNames[lookupType] ?? `Type ${lookupType}`,
      flags: lookupFlag,
      subtableCount: subTableCount,
    };
    if (extension) entry.extension = true;
    if (lookupFlag & 0x0010 && lookup + 6 + subTableCount * 2 + 2 <= length) {
      entry.markFilteringSet = view.getUint16(lookup + 6 + subTableCount * 2, false);
    }
    lookups[String(j)] = entry;
  }
  return lookups;
}

function parseGsubOrGpos(
  tag: string,
  buffer: ArrayBuffer,
  view: DataView
): ParseResult {
  if (view.byteLength < 10) return tooShort(tag, view.byteLength, 10);
  const version = view.getUint32(0, false);
  const scriptListOffset = view.getUint16(4, false);
  const featureListOffset = view.getUint16(6, false);
  const lookupListOffset = view.getUint16(8, false);

  const featureList = parseFeatureList(view, featureListOffset);
  const scripts = parseScriptListWithFeatures(view, scriptListOffset, featureList);
  const lookups = parseLookupList(view, lookupListOffset, tag === "GSUB");

  const uiNames = resolveNameIDs(
    buffer,
    featureList.flatMap((f) => (f.uiNameID !== undefined ? [f.uiNameID] : []))
  );

  const features: Record<string, Record<string, unknown>> = {};
  for (const feature of featureList) {
    let key = feature.tag;
    for (let n = 2; key in features; n++) key = `${feature.tag} #${n}`;
    const entry: Record<string, unknown> = { lookups: feature.lookupListIndices };
    if (feature.uiNameID !== undefined) entry.uiName = uiNames.get(feature.uiNameID) ?? null;
    if (feature.designSize !== undefined) entry.designSize = feature.designSize;
    features[key] = entry;
  }

  return result(
    { version: fixed16ToDecimal(version), scripts, features, lookups },
    "complete"
  );
}

// ---------------------------------------------------------------------------
// Coverage and ClassDef, offsets relative to the table start
// ---------------------------------------------------------------------------
function readCoverage(view: DataView, at: number): number[] {
  const glyphs: number[] = [];
  const length = view.byteLength;
  if (at + 4 > length) return glyphs;
  const format = view.getUint16(at, false);
  const count = view.getUint16(at + 2, false);
  if (format === 1) {
    for (let i = 0; i < count && at + 4 + (i + 1) * 2 <= length; i++) {
      glyphs.push(view.getUint16(at + 4 + i * 2, false));
    }
  } else if (format === 2) {
    for (let i = 0; i < count && at + 4 + (i + 1) * 6 <= length; i++) {
      const start = view.getUint16(at + 4 + i * 6, false);
      const end = view.getUint16(at + 6 + i * 6, false);
      for (let gid = start; gid <= end; gid++) glyphs.push(gid);
    }
  }
  return glyphs;
}

/** Glyph id -> class; class 0 is implicit and left out */
function readClassDef(view: DataView, at: number): Map<number, number> {
  const classes = new Map<number, number>();
  const length = view.byteLength;
  if (at + 4 > length) return classes;
  const format = view.getUint16(at, false);
  if (format === 1 && at + 6 <= length) {
    const startGlyph = view.getUint16(at + 2, false);
    const glyphCount = view.getUint16(at + 4, false);
    for (let i = 0; i < glyphCount && at + 6 + (i + 1) * 2 <= length; i++) {
      const value = view.getUint16(at + 6 + i * 2, false);
      if (value !== 0) classes.set(startGlyph + i, value);
    }
  } else if (format === 2) {
    const rangeCount = view.getUint16(at + 2, false);
    for (let i = 0; i < rangeCount && at + 4 + (i + 1) * 6 <= length; i++) {
      const start = view.getUint16(at + 4 + i * 6, false);
      const end = view.getUint16(at + 6 + i * 6, false);
      const value = view.getUint16(at + 8 + i * 6, false);
      if (value === 0) continue;
      for (let gid = start; gid <= end; gid++) classes.set(gid, value);
    }
  }
  return classes;
}

const GLYPH_CLASS_NAMES: Record<number, string> = {
  1: "base",
  2: "ligature",
  3: "mark",
  4: "component",
};

function classRecord(classes: Map<number, number>, names?: Record<number, string>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [gid, value] of [...classes].sort(([a], [b]) => a - b)) {
    out[String(gid)] = names?.[value] ?? value;
  }
  return out;
}

// ---------------------------------------------------------------------------
// GDEF: header offsets at 4..10, MarkGlyphSetsDef from 1.2, ItemVarStore from 1.3
// ---------------------------------------------------------------------------
function parseGDEF(view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 12) return tooShort("GDEF", length, 12);

  const version = view.getUint32(0, false);
  const glyphClassDefOffset = view.getUint16(4, false);
  const attachListOffset = view.getUint16(6, false);
  const ligCaretListOffset = view.getUint16(8, false);
  const markAttachClassDefOffset = view.getUint16(10, false);

  const out: Record<string, unknown> = { version: fixed16ToDecimal(version) };

  if (glyphClassDefOffset > 0) {
    out.glyphClassDef = classRecord(readClassDef(view, glyphClassDefOffset), GLYPH_CLASS_NAMES);
  }

  if (attachListOffset > 0 && attachListOffset + 4 <= length) {
    const coverage = readCoverage(view, attachListOffset + view.getUint16(attachListOffset, false));
    const attachPoints: Record<string, number[]> = {};
    coverage.forEach((gid, i) => {
      const slot = attachListOffset + 4 + i * 2;
      if (slot + 2 > length) return;
      const pointAt = attachListOffset + view.getUint16(slot, false);
      if (pointAt + 2 > length) return;
      const count = view.getUint16(pointAt, false);
      const points: number[] = [];
      for (let p = 0; p < count && pointAt + 2 + (p + 1) * 2 <= length; p++) {
        points.push(view.getUint16(pointAt + 2 + p * 2, false));
      }
      attachPoints[String(gid)] = points;
    });
    out.attachList = attachPoints;
  }

  if (ligCaretListOffset > 0 && ligCaretListOffset + 4 <= length) {
    const coverage = readCoverage(view, ligCaretListOffset + view.getUint16(ligCaretListOffset, false));
    const carets: Record<string, number> = {};
    coverage.forEach((gid, i) => {
      const slot = ligCaretListOffset + 4 + i * 2;
      if (slot + 2 > length) return;
      const ligGlyphAt = ligCaretListOffset + view.getUint16(slot, false);
      if (ligGlyphAt + 2 <= length) carets[String(gid)] = view.getUint16(ligGlyphAt, false);
    });
    out.ligCaretList = carets;
  }

  if (markAttachClassDefOffset > 0) {
    out.markAttachClassDef = classRecord(readClassDef(view, markAttachClassDefOffset));
  }

  if (version >= 0x00010002 && length >= 14) {
    const setsOffset = view.getUint16(12, false);
    if (setsOffset > 0 && setsOffset + 4 <= length) {
      const setCount = view.getUint16(setsOffset + 2, false);
      const sets: number[][] = [];
      for (let i = 0; i < setCount && setsOffset + 4 + (i + 1) * 4 <= length; i++) {
        sets.push(readCoverage(view, setsOffset + view.getUint32(setsOffset + 4 + i * 4, false)));
      }
      out.markGlyphSets = sets;
    }
  }
  if (version >= 0x00010003 && length >= 18) {
    out.hasItemVariationStore = view.getUint32(14, false) !== 0;
  }

  return result(out, "partial");
}

export function parseLayout(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult | null {
  const view = new DataView(buffer, offset, length);
  switch (tag) {
    case "GSUB":
    case "GPOS":
      return parseGsubOrGpos(tag, buffer, view);
    case "GDEF":
      return parseGDEF(view);
    default:
      return null;
  }
}
