/**
 * Per-script word lists
 * A directory holds `<Script>.txt` (one word per line) or the brotli
 * compressed `<Script>.txt.br`. Lists are read once and kept.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { brotliDecompressSync } from "node:zlib";
import { engineLogger } from "../logging/logger";

export interface WordListSource {
  /** Words for a script in list order, or null when there is no list */
  words(script: string): readonly string[] | null;
}

export const BUNDLED_WORDLIST_DIR = fileURLToPath(new URL("../../data/wordlists", import.meta.url));

export function splitWordList(text: string): string[] {
  const words: string[] = [];
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim();
    if (!word || seen.has(word)) continue;
    seen.add(word);
    words.push(word);
  }
  return words;
}

export class DirectoryWordListSource implements WordListSource {
  private readonly lists = new Map<string, readonly string[] | null>();

  constructor(readonly directory: string) {}

  words(script: string): readonly string[] | null {
    const cached = this.lists.get(script);
    if (cached !== undefined) return cached;
    const loaded = this.load(script);
    this.lists.set(script, loaded);
    return loaded;
  }

  private load(script: string): readonly string[] | null {
    const plain = join(this.directory, `${script}.txt`);
    const compressed = `${plain}.br`;
    try {
      if (existsSync(plain)) return splitWordList(readFileSync(plain, "utf-8"));
      if (existsSync(compressed)) {
        return splitWordList(brotliDecompressSync(readFileSync(compressed)).toString("utf-8"));
      }
    } catch (error) {
      engineLogger.warn("WordListSource", "Word list unreadable", {
        script,
        directory: this.directory,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    engineLogger.debug("WordListSource", "No word list for script", { script });
    return null;
  }
}

/**
 * Lists from `directory`, falling back to the bundled lists for scripts it lacks
 */
export class LayeredWordListSource implements WordListSource {
  constructor(private readonly layers: readonly WordListSource[]) {}

  words(script: string): readonly string[] | null {
    for (const layer of this.layers) {
      const words = layer.words(script);
      if (words !== null) return words;
    }
    return null;
  }
}

export function createWordListSource(directory?: string): WordListSource {
  const bundled = new DirectoryWordListSource(BUNDLED_WORDLIST_DIR);
  return directory === undefined
    ? bundled
    : new LayeredWordListSource([new DirectoryWordListSource(directory), bundled]);
}
