import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildSfnt,
  ByteWriter,
  cmapTable,
  gdefTable,
  headTable,
  hheaTable,
  hmtxTable,
  maxpTable,
  minimalFont,
  toArrayBuffer,
} from "../../test-utils/sfnt";
import { diff } from "../diff/StructuralDiff";
import { toJson } from "../value/Value";
import { decodeTables } from "./TableDecoder";

describe("decodeTables", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("decodes every table, keyed by tag in sorted order", () => {
    const tables = toJson(decodeTables(toArrayBuffer(minimalFont())));
    expect(Object.keys(tables ?? {})).toEqual(["cmap", "head", "hhea", "hmtx", "maxp", "name"]);
  });

  it("decodes core tables into field trees", () => {
    const tables = toJson(decodeTables(toArrayBuffer(minimalFont())));
    expect(tables).toMatchObject({
      hhea: { version: "1.0", ascent: 800, descent: -200, numberOfHMetrics: 2 },
      maxp: { version: "0.5", numGlyphs: 3 },
      head: { unitsPerEm: 1000, magicNumber: "0x5f0f3cf5", created: "Fri Jan 1 00:00:00 1904" },
      hmtx: {
        numberOfHMetrics: 2,
        numGlyphs: 3,
        metrics: {
          "0": { advanceWidth: 500, lsb: 10 },
          "1": { advanceWidth: 600, lsb: 20 },
          "2": { advanceWidth: 600, lsb: 30 },
        },
      },
      cmap: {
        version: 0,
        subtables: {
          "Windows Unicode full (3/10)": {
            format: 12,
            language: 0,
            mappings: { "U+0041": 1, "U+0042": 2 },
          },
        },
      },
      name: {
        format: 0,
        names: {
          "1": { "Windows, Unicode BMP, en-US": "Test Sans" },
          "2": { "Windows, Unicode BMP, en-US": "Regular" },
        },
      },
    });
  });

  it("leaves out the whole-file checksum adjustment", () => {
    const tables = toJson(decodeTables(toArrayBuffer(minimalFont())));
    expect(tables).not.toHaveProperty(["head", "checkSumAdjustment"]);
  });

  it("turns a failing table into an error leaf and keeps the rest", () => {
    const font = buildSfnt({
      head: headTable(),
      hhea: hheaTable().subarray(0, 10),
      hmtx: hmtxTable(),
      maxp: maxpTable(),
    });
    const tables = toJson(decodeTables(toArrayBuffer(font)));
    expect(tables).toMatchObject({
      hhea: { error: "hhea table too short (10 bytes, need 36)" },
      hmtx: { error: "hmtx needs hhea and maxp" },
      maxp: { numGlyphs: 3 },
    });
  });

  it("summarises tables without a decoder by size and checksum", () => {
    const font = buildSfnt({
      head: headTable(),
      zzzz: new ByteWriter().u32(1).u32(2).toBytes(),
    });
    expect(toJson(decodeTables(toArrayBuffer(font)))).toMatchObject({
      zzzz: { size: 8, checksum: "0x00000003" },
    });
  });

  it("decodes only the requested tags", () => {
    const font = toArrayBuffer(
      buildSfnt({ head: headTable(), maxp: maxpTable(), cmap: cmapTable([[0x41, 0x41, 1]]) })
    );
    const tables = toJson(decodeTables(font, ["maxp", "head", "GSUB"]));
    expect(Object.keys(tables ?? {})).toEqual(["head", "maxp"]);
  });

  it("decodes GDEF glyph classes by glyph id", () => {
    const font = buildSfnt({ GDEF: gdefTable([[1, 2, 1], [3, 3, 3]]) });
    expect(toJson(decodeTables(toArrayBuffer(font)))).toEqual({
      GDEF: { version: "1.0", glyphClassDef: { "1": "base", "2": "base", "3": "mark" } },
    });
  });

  it("shows a changed glyph class as a leaf pair", () => {
    const left = decodeTables(toArrayBuffer(buildSfnt({ GDEF: gdefTable([[1, 1, 1], [2, 2, 3]]) })));
    const right = decodeTables(toArrayBuffer(buildSfnt({ GDEF: gdefTable([[1, 2, 1]]) })));
    expect(toJson(diff(left, right))).toEqual({ GDEF: { glyphClassDef: { "2": ["mark", "base"] } } });
  });
});
