/**
 * Script support
 * A font supports a script when its character map holds at least one
 * codepoint whose Unicode Script property is that script.
 */

import { z } from "zod";
import scriptData from "../../data/scripts.json";

const scriptInfoSchema = z.object({
  name: z.string().min(1),
  tag: z.string().length(4),
  direction: z.enum(["ltr", "rtl"]),
});

export type ScriptInfo = z.infer<typeof scriptInfoSchema>;

const SCRIPTS: readonly ScriptInfo[] = z.array(scriptInfoSchema).parse(scriptData);

const BY_NAME = new Map(SCRIPTS.map((script) => [script.name, script]));

const MATCHERS = SCRIPTS.map(
  (script) => [script.name, new RegExp(`^\\p{Script=${script.name}}$`, "u")] as const
);

export function knownScripts(): readonly ScriptInfo[] {
  return SCRIPTS;
}

/**
 * Canonical direction and OpenType shaping tag for a script name
 */
export function getScriptInfo(name: string): ScriptInfo | null {
  return BY_NAME.get(name) ?? null;
}

/**
 * Script of a single codepoint, among the known scripts
 */
export function scriptOf(codepoint: number): string | null {
  const char = String.fromCodePoint(codepoint);
  for (const [name, pattern] of MATCHERS) {
    if (pattern.test(char)) return name;
  }
  return null;
}

/**
 * Every known script with at least one codepoint in `codepoints`
 */
export function supportedScripts(codepoints: Iterable<number>): Set<string> {
  const scripts = new Set<string>();
  for (const codepoint of codepoints) {
    if (codepoint > 0x10ffff || (codepoint >= 0xd800 && codepoint <= 0xdfff)) continue;
    const script = scriptOf(codepoint);
    if (script !== null) scripts.add(script);
  }
  return scripts;
}
