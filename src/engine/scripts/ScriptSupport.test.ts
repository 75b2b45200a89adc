import { describe, expect, it } from "vitest";
import { getScriptInfo, knownScripts, scriptOf, supportedScripts } from "./ScriptSupport";

describe("scriptOf", () => {
  it("maps codepoints to their Unicode script", () => {
    expect(scriptOf(0x41)).toBe("Latin");
    expect(scriptOf(0x0628)).toBe("Arabic");
    expect(scriptOf(0x05d0)).toBe("Hebrew");
    expect(scriptOf(0x0416)).toBe("Cyrillic");
    expect(scriptOf(0x20)).toBe("Common");
  });

  it("returns null for unassigned codepoints", () => {
    expect(scriptOf(0x0378)).toBeNull();
  });
});

describe("supportedScripts", () => {
  it("collects each script once", () => {
    expect([...supportedScripts([0x41, 0x42, 0x0628])].sort()).toEqual(["Arabic", "Latin"]);
  });

  it("skips surrogates and out-of-range values", () => {
    expect(supportedScripts([0xd800, 0x110000]).size).toBe(0);
  });
});

describe("getScriptInfo", () => {
  it("gives shaping tag and direction", () => {
    expect(getScriptInfo("Arabic")).toEqual({ name: "Arabic", tag: "arab", direction: "rtl" });
    expect(getScriptInfo("Latin")).toEqual({ name: "Latin", tag: "latn", direction: "ltr" });
  });

  it("returns null for unknown scripts", () => {
    expect(getScriptInfo("Klingon")).toBeNull();
  });

  it("lists every right-to-left script", () => {
    const rtl = knownScripts()
      .filter((script) => script.direction === "rtl")
      .map((script) => script.name);
    expect(rtl).toEqual(["Adlam", "Arabic", "Avestan", "Hebrew", "Syriac", "Thaana"]);
  });
});
