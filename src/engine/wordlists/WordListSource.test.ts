import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { brotliCompressSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { knownScripts, scriptOf } from "../scripts/ScriptSupport";
import {
  BUNDLED_WORDLIST_DIR,
  DirectoryWordListSource,
  LayeredWordListSource,
  createWordListSource,
  splitWordList,
} from "./WordListSource";

describe("splitWordList", () => {
  it("trims, drops blanks and keeps the first of each duplicate", () => {
    expect(splitWordList("one\r\n two \n\none\nthree\n")).toEqual(["one", "two", "three"]);
  });
});

describe("DirectoryWordListSource", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "wordlists-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("reads plain lists", () => {
    writeFileSync(join(directory, "Latin.txt"), "alpha\nbeta\n");
    expect(new DirectoryWordListSource(directory).words("Latin")).toEqual(["alpha", "beta"]);
  });

  it("reads brotli compressed lists", () => {
    writeFileSync(join(directory, "Greek.txt.br"), brotliCompressSync(Buffer.from("άλφα\nβήτα\n")));
    expect(new DirectoryWordListSource(directory).words("Greek")).toEqual(["άλφα", "βήτα"]);
  });

  it("prefers the plain list over the compressed one", () => {
    writeFileSync(join(directory, "Latin.txt"), "plain\n");
    writeFileSync(join(directory, "Latin.txt.br"), brotliCompressSync(Buffer.from("packed\n")));
    expect(new DirectoryWordListSource(directory).words("Latin")).toEqual(["plain"]);
  });

  it("returns null for scripts without a list", () => {
    expect(new DirectoryWordListSource(directory).words("Thai")).toBeNull();
  });

  it("reads each list once", () => {
    writeFileSync(join(directory, "Latin.txt"), "first\n");
    const source = new DirectoryWordListSource(directory);
    const before = source.words("Latin");
    writeFileSync(join(directory, "Latin.txt"), "second\n");
    expect(source.words("Latin")).toBe(before);
  });
});

describe("createWordListSource", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "wordlists-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("ships bundled lists", () => {
    expect(createWordListSource().words("Latin")?.[0]).toBe("the");
  });

  it("names a known script in every bundled list and keeps its words in that script", () => {
    const names = new Set(knownScripts().map((script) => script.name));
    const source = createWordListSource();
    const files = readdirSync(BUNDLED_WORDLIST_DIR).filter((file) => file.endsWith(".txt"));
    expect(files.length).toBeGreaterThanOrEqual(13);
    for (const file of files) {
      const script = file.slice(0, -".txt".length);
      expect(names.has(script)).toBe(true);
      const offScript = (source.words(script) ?? []).filter((word) =>
        Array.from(word).some((char) => scriptOf(char.codePointAt(0) ?? 0) !== script)
      );
      expect(offScript, script).toEqual([]);
    }
  });

  it("bundles lists beyond the European scripts", () => {
    const source = createWordListSource();
    expect(source.words("Thai")?.[0]).toBe("และ");
    expect(source.words("Katakana")?.[0]).toBe("アメリカ");
    expect(source.words("Tifinagh")).toBeNull();
  });

  it("layers a user directory over the bundled lists", () => {
    writeFileSync(join(directory, "Latin.txt"), "custom\n");
    const source = createWordListSource(directory);
    expect(source.words("Latin")).toEqual(["custom"]);
    expect(source.words("Hebrew")?.[0]).toBe("של");
  });

  it("falls through layers in order", () => {
    const source = new LayeredWordListSource([
      { words: () => null },
      { words: (script) => (script === "Latin" ? ["x"] : null) },
    ]);
    expect(source.words("Latin")).toEqual(["x"]);
    expect(source.words("Arabic")).toBeNull();
  });
});
