/**
 * Variable font table decoders: fvar, avar, STAT, HVAR, VVAR, MVAR, gvar.
 */

import { computeTableChecksum, findTableOffset, parseFvarTable, readTag } from "../RawTableParser";
import { resolveNameIDs } from "./decoders";
import { u32ToHex } from "./formatters";
import { failed, type ParseResult, result, tooShort } from "./result";

/**
 * Axis tags in fvar order, used to label per-axis records in avar and STAT
 */
function fvarAxisTags(buffer: ArrayBuffer): string[] {
  const fvar = findTableOffset(buffer, "fvar");
  if (!fvar) return [];
  const parsed = parseFvarTable(new DataView(buffer, fvar.offset, fvar.length));
  return parsed ? parsed.axes.map((axis) => axis.tag) : [];
}

function uniqueKey(target: Record<string, unknown>, key: string): string {
  if (!(key in target)) return key;
  let n = 2;
  while (`${key} #${n}` in target) n++;
  return `${key} #${n}`;
}

function summarizeItemVariationStore(view: DataView, storeOffset: number): Record<string, number> | null {
  if (storeOffset === 0 || storeOffset + 8 > view.byteLength) return null;
  const format = view.getUint16(storeOffset, false);
  const regionListOffset = view.getUint32(storeOffset + 2, false);
  const out: Record<string, number> = {
    format,
    itemVariationDataCount: view.getUint16(storeOffset + 6, false),
  };
  const regionList = storeOffset + regionListOffset;
  if (regionListOffset > 0 && regionList + 4 <= view.byteLength) {
    out.regionAxisCount = view.getUint16(regionList, false);
    out.regionCount = view.getUint16(regionList + 2, false);
  }
  return out;
}

function parseFvar(buffer: ArrayBuffer, view: DataView): ParseResult {
  const parsed = parseFvarTable(view);
  if (!parsed) return failed(new Error("Unsupported or truncated fvar table"));

  const nameIDs = [
    ...parsed.axes.map((axis) => axis.axisNameID),
    ...parsed.instances.flatMap((inst) =>
      inst.postScriptNameID !== undefined ? [inst.subfamilyNameID, inst.postScriptNameID] : [inst.subfamilyNameID]
    ),
  ];
  const names = resolveNameIDs(buffer, nameIDs);

  const axes: Record<string, unknown> = {};
  for (const axis of parsed.axes) {
    axes[uniqueKey(axes, axis.tag)] = {
      min: axis.min,
      default: axis.default,
      max: axis.max,
      hidden: !!(axis.flags & 0x0001),
      name: names.get(axis.axisNameID) ?? null,
    };
  }

  const instances: Record<string, unknown> = {};
  parsed.instances.forEach((inst, i) => {
    const coordinates: Record<string, number> = {};
    parsed.axes.forEach((axis, j) => {
      coordinates[axis.tag] = inst.coordinates[j];
    });
    const label = names.get(inst.subfamilyNameID) ?? `Instance ${i}`;
    const entry: Record<string, unknown> = { coordinates };
    if (inst.postScriptNameID !== undefined) {
      entry.postScriptName = names.get(inst.postScriptNameID) ?? null;
    }
    instances[uniqueKey(instances, label)] = entry;
  });

  return result(
    { version: `${parsed.majorVersion}.${parsed.minorVersion}`, axes, instances },
    "complete"
  );
}

function parseAvar(buffer: ArrayBuffer, view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 8) return tooShort("avar", length, 8);
  const axisCount = view.getUint16(6, false);
  const tags = fvarAxisTags(buffer);
  const segmentMaps: Record<string, Record<string, number>> = {};
  let status: "complete" | "partial" = "complete";

  let pos = 8;
  for (let i = 0; i < axisCount; i++) {
    if (pos + 2 > length) {
      status = "partial";
      break;
    }
    const count = view.getUint16(pos, false);
    pos += 2;
    const mapping: Record<string, number> = {};
    for (let j = 0; j < count && pos + 4 <= length; j++) {
      const from = view.getInt16(pos, false) / 16384;
      const to = view.getInt16(pos + 2, false) / 16384;
      mapping[String(from)] = to;
      pos += 4;
    }
    segmentMaps[tags[i] ?? `axis ${i}`] = mapping;
  }

  return result(
    { version: `${view.getUint16(0, false)}.${view.getUint16(2, false)}`, segmentMaps },
    status
  );
}

function parseStat(buffer: ArrayBuffer, view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 18) return tooShort("STAT", length, 18);
  const majorVersion = view.getUint16(0, false);
  const minorVersion = view.getUint16(2, false);
  const designAxisSize = view.getUint16(4, false);
  const designAxisCount = view.getUint16(6, false);
  const designAxisOffset = view.getUint32(8, false);
  const axisValueCount = view.getUint16(12, false);
  const axisValueArrayOffset = view.getUint32(14, false);
  const elidedFallbackNameID = minorVersion >= 1 && length >= 20 ? view.getUint16(18, false) : undefined;

  const axisTags: string[] = [];
  const axisNameIDs: number[] = [];
  const axisOrderings: number[] = [];
  for (let i = 0; i < designAxisCount; i++) {
    const pos = designAxisOffset + i * designAxisSize;
    if (pos + 8 > length) break;
    axisTags.push(readTag(view, pos));
    axisNameIDs.push(view.getUint16(pos + 4, false));
    axisOrderings.push(view.getUint16(pos + 6, false));
  }

  type AxisValueRecord = {
    format: number;
    flags: number;
    valueNameID: number;
    key: string;
    fields: Record<string, unknown>;
  };
  const records: AxisValueRecord[] = [];
  for (let i = 0; i < axisValueCount; i++) {
    const slot = axisValueArrayOffset + i * 2;
    if (slot + 2 > length) break;
    const pos = axisValueArrayOffset + view.getUint16(slot, false);
    if (pos + 8 > length) continue;
    const format = view.getUint16(pos, false);
    const fixed = (at: number) => view.getInt32(at, false) / 65536;

    if (format >= 1 && format <= 3) {
      const axisTag = axisTags[view.getUint16(pos + 2, false)] ?? "????";
      const flags = view.getUint16(pos + 4, false);
      const valueNameID = view.getUint16(pos + 6, false);
      const fields: Record<string, unknown> = { axis: axisTag };
      if (format === 1 && pos + 12 <= length) fields.value = fixed(pos + 8);
      if (format === 2 && pos + 20 <= length) {
        fields.nominalValue = fixed(pos + 8);
        fields.rangeMinValue = fixed(pos + 12);
        fields.rangeMaxValue = fixed(pos + 16);
      }
      if (format === 3 && pos + 16 <= length) {
        fields.value = fixed(pos + 8);
        fields.linkedValue = fixed(pos + 12);
      }
      const position = fields.value ?? fields.nominalValue ?? "?";
      records.push({ format, flags, valueNameID, key: `${axisTag}=${String(position)}`, fields });
    } else if (format === 4) {
      const count = view.getUint16(pos + 2, false);
      const flags = view.getUint16(pos + 4, false);
      const valueNameID = view.getUint16(pos + 6, false);
      const location: Record<string, number> = {};
      for (let j = 0; j < count && pos + 8 + (j + 1) * 6 <= length; j++) {
        const tag = axisTags[view.getUint16(pos + 8 + j * 6, false)] ?? "????";
        location[tag] = fixed(pos + 10 + j * 6);
      }
      const key = Object.entries(location)
        .map(([tag, value]) => `${tag}=${value}`)
        .join(",");
      records.push({ format, flags, valueNameID, key, fields: { location } });
    }
  }

  const names = resolveNameIDs(buffer, [
    ...axisNameIDs,
    ...records.map((r) => r.valueNameID),
    ...(elidedFallbackNameID !== undefined ? [elidedFallbackNameID] : []),
  ]);

  const designAxes: Record<string, unknown> = {};
  axisTags.forEach((tag, i) => {
    designAxes[uniqueKey(designAxes, tag)] = {
      name: names.get(axisNameIDs[i]) ?? null,
      ordering: axisOrderings[i],
    };
  });

  const axisValues: Record<string, unknown> = {};
  for (const record of records) {
    axisValues[uniqueKey(axisValues, record.key)] = {
      format: record.format,
      ...record.fields,
      name: names.get(record.valueNameID) ?? null,
      olderSiblingFontAttribute: !!(record.flags & 0x0001),
      elidableAxisValueName: !!(record.flags & 0x0002),
    };
  }

  const out: Record<string, unknown> = {
    version: `${majorVersion}.${minorVersion}`,
    designAxes,
    axisValues,
  };
  if (elidedFallbackNameID !== undefined) {
    out.elidedFallbackName = names.get(elidedFallbackNameID) ?? null;
  }
  return result(out, "complete");
}

/**
 * HVAR and VVAR share a layout; VVAR adds a vertical origin mapping
 */
function parseMetricsVariations(tag: string, view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 20) return tooShort(tag, length, 20);
  const vertical = tag === "VVAR";
  const out: Record<string, unknown> = {
    version: `${view.getUint16(0, false)}.${view.getUint16(2, false)}`,
    itemVariationStore: summarizeItemVariationStore(view, view.getUint32(4, false)),
    [vertical ? "hasAdvanceHeightMapping" : "hasAdvanceWidthMapping"]: view.getUint32(8, false) !== 0,
    [vertical ? "hasTsbMapping" : "hasLsbMapping"]: view.getUint32(12, false) !== 0,
    [vertical ? "hasBsbMapping" : "hasRsbMapping"]: view.getUint32(16, false) !== 0,
  };
  if (vertical && length >= 24) out.hasVOrgMapping = view.getUint32(20, false) !== 0;
  return result(out, "complete");
}

function parseMvar(view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 12) return tooShort("MVAR", length, 12);
  const valueRecordSize = view.getUint16(6, false);
  const valueRecordCount = view.getUint16(8, false);
  const valueRecords: Record<string, { outerIndex: number; innerIndex: number }> = {};
  for (let i = 0; i < valueRecordCount; i++) {
    const pos = 12 + i * valueRecordSize;
    if (pos + 8 > length) break;
    valueRecords[readTag(view, pos)] = {
      outerIndex: view.getUint16(pos + 4, false),
      innerIndex: view.getUint16(pos + 6, false),
    };
  }
  return result(
    {
      version: `${view.getUint16(0, false)}.${view.getUint16(2, false)}`,
      itemVariationStore: summarizeItemVariationStore(view, view.getUint16(10, false)),
      valueRecords,
    },
    "complete"
  );
}

/**
 * gvar: header plus size and checksum of each glyph's variation data
 */
function parseGvar(buffer: ArrayBuffer, offset: number, view: DataView): ParseResult {
  const length = view.byteLength;
  if (length < 20) return tooShort("gvar", length, 20);
  const axisCount = view.getUint16(4, false);
  const sharedTupleCount = view.getUint16(6, false);
  const glyphCount = view.getUint16(12, false);
  const longOffsets = !!(view.getUint16(14, false) & 0x0001);
  const dataArrayOffset = view.getUint32(16, false);

  const offsetAt = (i: number): number =>
    longOffsets ? view.getUint32(20 + i * 4, false) : view.getUint16(20 + i * 2, false) * 2;

  const glyphVariations: Record<string, { size: number; checksum: string }> = {};
  let status: "complete" | "partial" = "complete";
  const offsetsEnd = 20 + (glyphCount + 1) * (longOffsets ? 4 : 2);
  if (offsetsEnd > length) {
    status = "partial";
  } else {
    for (let gid = 0; gid < glyphCount; gid++) {
      const start = dataArrayOffset + offsetAt(gid);
      const size = dataArrayOffset + offsetAt(gid + 1) - start;
      if (size <= 0) continue;
      if (start + size > length) {
        status = "partial";
        break;
      }
      glyphVariations[String(gid)] = {
        size,
        checksum: u32ToHex(computeTableChecksum(buffer, offset + start, size)),
      };
    }
  }

  return result(
    {
      version: `${view.getUint16(0, false)}.${view.getUint16(2, false)}`,
      axisCount,
      sharedTupleCount,
      glyphCount,
      glyphVariations,
    },
    status
  );
}

export function parseVariable(
  tag: string,
  buffer: ArrayBuffer,
  offset: number,
  length: number
): ParseResult | null {
  const view = new DataView(buffer, offset, length);
  switch (tag) {
    case "fvar":
      return parseFvar(buffer, view);
    case "avar":
      return parseAvar(buffer, view);
    case "STAT":
      return parseStat(buffer, view);
    case "HVAR":
    case "VVAR":
      return parseMetricsVariations(tag, view);
    case "MVAR":
      return parseMvar(view);
    case "gvar":
      return parseGvar(buffer, offset, view);
    default:
      return null;
  }
}
