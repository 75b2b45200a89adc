import { deflate } from "pako";
import { describe, expect, it } from "vitest";
import { ByteWriter, cmapTable, headTable, maxpTable, minimalFont } from "../test-utils/sfnt";
import { decompressFont, decompressWOFF, detectFontFormat } from "./woffDecompressor";

interface WoffInput {
  tag: string;
  data: Uint8Array;
  compress: boolean;
}

function buildWoff(tables: WoffInput[]): Uint8Array {
  const stored = tables.map((table) => ({
    ...table,
    stored: table.compress ? deflate(table.data) : table.data,
  }));
  let offset = 44 + tables.length * 20;
  const directory = new ByteWriter();
  const body = new ByteWriter();
  for (const table of stored) {
    directory.tag(table.tag).u32(offset).u32(table.stored.length).u32(table.data.length).u32(0);
    body.raw(table.stored);
    while (body.length % 4 !== 0) body.u8(0);
    offset = 44 + tables.length * 20 + body.length;
  }
  const header = new ByteWriter()
    .tag("wOFF")
    .u32(0x00010000)
    .u32(offset)
    .u16(tables.length)
    .u16(0)
    .u32(0) // totalSfntSize
    .u16(1).u16(0) // version
    .u32(0).u32(0).u32(0) // metadata
    .u32(0).u32(0); // private data
  return header.raw(directory.toBytes()).raw(body.toBytes()).toBytes();
}

function tableBytes(sfnt: Uint8Array, tag: string): Uint8Array {
  const view = new DataView(sfnt.buffer, sfnt.byteOffset, sfnt.byteLength);
  const count = view.getUint16(4, false);
  for (let i = 0; i < count; i++) {
    const record = 12 + i * 16;
    const recordTag = String.fromCharCode(...sfnt.subarray(record, record + 4));
    if (recordTag === tag) {
      const offset = view.getUint32(record + 8, false);
      return sfnt.subarray(offset, offset + view.getUint32(record + 12, false));
    }
  }
  throw new Error(`no ${tag}`);
}

describe("detectFontFormat", () => {
  it("sniffs magic bytes", () => {
    expect(detectFontFormat(minimalFont())).toBe("ttf");
    expect(detectFontFormat(new TextEncoder().encode("OTTO...."))).toBe("otf");
    expect(detectFontFormat(new TextEncoder().encode("wOF2...."))).toBe("woff2");
    expect(detectFontFormat(new TextEncoder().encode("ttcf...."))).toBe("ttc");
    expect(detectFontFormat(new Uint8Array([1, 2]))).toBe("unknown");
  });
});

describe("decompressWOFF", () => {
  it("rebuilds the SFNT with tables in tag order", () => {
    const head = headTable();
    const cmap = cmapTable([[0x41, 0x42, 1]]);
    const maxp = maxpTable(7);
    const sfnt = decompressWOFF(
      buildWoff([
        { tag: "maxp", data: maxp, compress: false },
        { tag: "head", data: head, compress: true },
        { tag: "cmap", data: cmap, compress: false },
      ])
    );

    const view = new DataView(sfnt.buffer);
    expect(view.getUint32(0, false)).toBe(0x00010000);
    expect(view.getUint16(4, false)).toBe(3);
    expect(String.fromCharCode(...sfnt.subarray(12, 16))).toBe("cmap");
    expect(String.fromCharCode(...sfnt.subarray(28, 32))).toBe("head");
    expect(String.fromCharCode(...sfnt.subarray(44, 48))).toBe("maxp");
    expect(Array.from(tableBytes(sfnt, "head"))).toEqual(Array.from(head));
    expect(Array.from(tableBytes(sfnt, "cmap"))).toEqual(Array.from(cmap));
    expect(Array.from(tableBytes(sfnt, "maxp"))).toEqual(Array.from(maxp));
  });

  it("rejects truncated files", () => {
    expect(() => decompressWOFF(new TextEncoder().encode("wOFF"))).toThrow("WOFF header truncated (4 bytes)");
  });
});

describe("decompressFont", () => {
  it("passes SFNT input through", () => {
    const font = minimalFont();
    expect(decompressFont(font)).toBe(font);
  });

  it("rejects WOFF2, collections and unknown data", () => {
    expect(() => decompressFont(new TextEncoder().encode("wOF2...."))).toThrow("WOFF2 input is not supported");
    expect(() => decompressFont(new TextEncoder().encode("ttcf...."))).toThrow("Font collections are not supported");
    expect(() => decompressFont(new Uint8Array(8))).toThrow("Unsupported font format");
  });
});
