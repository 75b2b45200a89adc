/**
 * Synthetic SFNT builders for decoder tests
 */

export class ByteWriter {
  private readonly bytes: number[] = [];

  u8(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  u16(value: number): this {
    return this.u8(value >>> 8).u8(value);
  }

  i16(value: number): this {
    return this.u16(value & 0xffff);
  }

  u32(value: number): this {
    return this.u16(value >>> 16).u16(value & 0xffff);
  }

  i32(value: number): this {
    return this.u32(value >>> 0);
  }

  tag(value: string): this {
    for (let i = 0; i < 4; i++) this.u8(value.charCodeAt(i));
    return this;
  }

  raw(data: Uint8Array | readonly number[]): this {
    for (const byte of data) this.u8(byte);
    return this;
  }

  get length(): number {
    return this.bytes.length;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Assemble an SFNT: directory in tag order, tables 4-byte aligned
 */
export function buildSfnt(tables: Record<string, Uint8Array>, flavor = 0x00010000): Uint8Array {
  const tags = Object.keys(tables).sort();
  const headerSize = 12 + tags.length * 16;
  let size = headerSize;
  const offsets: number[] = [];
  for (const tag of tags) {
    offsets.push(size);
    size = (size + tables[tag].length + 3) & ~3;
  }

  const out = new Uint8Array(size);
  const view = new DataView(out.buffer);
  view.setUint32(0, flavor, false);
  view.setUint16(4, tags.length, false);
  tags.forEach((tag, i) => {
    const record = 12 + i * 16;
    for (let c = 0; c < 4; c++) view.setUint8(record + c, tag.charCodeAt(c));
    view.setUint32(record + 4, 0, false);
    view.setUint32(record + 8, offsets[i], false);
    view.setUint32(record + 12, tables[tag].length, false);
    out.set(tables[tag], offsets[i]);
  });
  return out;
}

export function headTable(unitsPerEm = 1000): Uint8Array {
  return new ByteWriter()
    .u16(1).u16(0) // version
    .u32(0x00010000) // fontRevision
    .u32(0x12345678) // checkSumAdjustment
    .u32(0x5f0f3cf5) // magicNumber
    .u16(0x000b) // flags
    .u16(unitsPerEm)
    .u32(0).u32(0) // created
    .u32(0).u32(0) // modified
    .i16(0).i16(-200).i16(600).i16(800) // bbox
    .u16(0) // macStyle
    .u16(8) // lowestRecPPEM
    .i16(2) // fontDirectionHint
    .i16(0) // indexToLocFormat
    .i16(0) // glyphDataFormat
    .toBytes();
}

export function hheaTable(ascent = 800, descent = -200, numberOfHMetrics = 2): Uint8Array {
  const writer = new ByteWriter()
    .u32(0x00010000)
    .i16(ascent)
    .i16(descent)
    .i16(0) // lineGap
    .u16(600) // advanceWidthMax
    .i16(10) // minLeftSideBearing
    .i16(0) // minRightSideBearing
    .i16(580) // xMaxExtent
    .i16(1) // caretSlopeRise
    .i16(0) // caretSlopeRun
    .i16(0); // caretOffset
  for (let i = 0; i < 4; i++) writer.i16(0);
  return writer.i16(0).u16(numberOfHMetrics).toBytes();
}

export function maxpTable(numGlyphs = 3): Uint8Array {
  return new ByteWriter().u32(0x00005000).u16(numGlyphs).toBytes();
}

/**
 * Two long metrics, (500, 10) and (600, 20), then one bearing of 30
 */
export function hmtxTable(): Uint8Array {
  return new ByteWriter().u16(500).i16(10).u16(600).i16(20).i16(30).toBytes();
}

/**
 * cmap with one Windows full-repertoire format 12 subtable
 */
export function cmapTable(groups: ReadonlyArray<[start: number, end: number, startGlyph: number]>): Uint8Array {
  const subtableLength = 16 + groups.length * 12;
  const writer = new ByteWriter()
    .u16(0) // version
    .u16(1) // numTables
    .u16(3).u16(10).u32(12)
    .u16(12).u16(0).u32(subtableLength).u32(0).u32(groups.length);
  for (const [start, end, startGlyph] of groups) writer.u32(start).u32(end).u32(startGlyph);
  return writer.toBytes();
}

/**
 * name table with Windows Unicode BMP, en-US records
 */
export function nameTable(records: ReadonlyArray<[nameID: number, value: string]>): Uint8Array {
  const strings = new ByteWriter();
  const header = new ByteWriter().u16(0).u16(records.length).u16(6 + records.length * 12);
  for (const [nameID, value] of records) {
    const start = strings.length;
    for (const char of value) strings.u16(char.charCodeAt(0));
    header.u16(3).u16(1).u16(0x0409).u16(nameID).u16(strings.length - start).u16(start);
  }
  return header.raw(strings.toBytes()).toBytes();
}

/**
 * fvar with 20-byte axis records and instances without a PostScript name
 */
export function fvarTable(
  axes: ReadonlyArray<[tag: string, min: number, defaultValue: number, max: number, nameID: number]>,
  instances: ReadonlyArray<[subfamilyNameID: number, coordinates: number[]]>
): Uint8Array {
  const writer = new ByteWriter()
    .u16(1).u16(0) // version
    .u16(16) // axesArrayOffset
    .u16(2) // reserved
    .u16(axes.length)
    .u16(20)
    .u16(instances.length)
    .u16(4 + axes.length * 4);
  for (const [tag, min, defaultValue, max, nameID] of axes) {
    writer.tag(tag).i32(min * 65536).i32(defaultValue * 65536).i32(max * 65536).u16(0).u16(nameID);
  }
  for (const [subfamilyNameID, coordinates] of instances) {
    writer.u16(subfamilyNameID).u16(0);
    for (const value of coordinates) writer.i32(value * 65536);
  }
  return writer.toBytes();
}

/**
 * GDEF 1.0 with only a format 2 glyph class definition
 */
export function gdefTable(ranges: ReadonlyArray<[start: number, end: number, glyphClass: number]>): Uint8Array {
  const writer = new ByteWriter()
    .u32(0x00010000)
    .u16(12) // glyphClassDef
    .u16(0) // attachList
    .u16(0) // ligCaretList
    .u16(0) // markAttachClassDef
    .u16(2)
    .u16(ranges.length);
  for (const [start, end, glyphClass] of ranges) writer.u16(start).u16(end).u16(glyphClass);
  return writer.toBytes();
}

/**
 * A minimal static font: head, hhea, maxp, hmtx, cmap (A and B) and name
 */
export function minimalFont(overrides: Partial<Record<string, Uint8Array>> = {}): Uint8Array {
  const tables: Record<string, Uint8Array> = {
    head: headTable(),
    hhea: hheaTable(),
    maxp: maxpTable(),
    hmtx: hmtxTable(),
    cmap: cmapTable([[0x41, 0x42, 1]]),
    name: nameTable([
      [1, "Test Sans"],
      [2, "Regular"],
    ]),
  };
  for (const [tag, data] of Object.entries(overrides)) {
    if (data) tables[tag] = data;
  }
  return buildSfnt(tables);
}

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  return bytes.slice().buffer;
}
