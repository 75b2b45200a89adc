import { describe, expect, it } from "vitest";
import { fvarTable, minimalFont, nameTable, toArrayBuffer } from "../../test-utils/sfnt";
import type { AxisInfo, NamedInstance } from "../../types/engine.types";
import { FatalComparisonError } from "../errors/FatalComparisonError";
import {
  formatLocation,
  parseLocation,
  readDesignSpace,
  resolveLocation,
  sortInstances,
  variationCoordinates,
} from "./LocationResolver";

const AXES: AxisInfo[] = [
  { tag: "wght", name: "Weight", min: 100, default: 400, max: 900 },
  { tag: "wdth", name: "Width", min: 75, default: 100, max: 100 },
];

const INSTANCES: NamedInstance[] = [
  { name: "Bold", coordinates: { wght: 700, wdth: 100 } },
  { name: "Regular", coordinates: { wght: 400, wdth: 100 } },
];

function configurationError(run: () => unknown): FatalComparisonError | null {
  try {
    run();
  } catch (error) {
    if (error instanceof FatalComparisonError) return error;
    throw error;
  }
  return null;
}

describe("parseLocation", () => {
  it("parses tag=value pairs", () => {
    expect(parseLocation("wght=400, wdth=87.5")).toEqual({ wght: 400, wdth: 87.5 });
  });

  it("pads short tags", () => {
    expect(parseLocation("XY=1")).toEqual({ "XY  ": 1 });
    expect(formatLocation({ "XY  ": 1, wght: 300 })).toBe("XY=1,wght=300");
  });

  it("rejects malformed settings as configuration errors", () => {
    expect(configurationError(() => parseLocation("wght"))?.message).toBe(
      "Malformed location setting 'wght'"
    );
    expect(configurationError(() => parseLocation("wght=bold"))?.kind).toBe("configuration");
    expect(configurationError(() => parseLocation("weight=400"))?.kind).toBe("configuration");
  });
});

describe("resolveLocation", () => {
  it("returns null when nothing is requested", () => {
    expect(resolveLocation({}, AXES, INSTANCES, "font A")).toBeNull();
  });

  it("accepts values inside the axis bounds", () => {
    expect(resolveLocation({ location: "wght=900,wdth=75" }, AXES, INSTANCES, "font A")).toEqual({
      wght: 900,
      wdth: 75,
    });
  });

  it("rejects unknown axes", () => {
    expect(
      configurationError(() => resolveLocation({ location: "opsz=12" }, AXES, INSTANCES, "font A"))
        ?.message
    ).toBe("font A has no 'opsz' axis");
  });

  it("rejects out-of-range values", () => {
    expect(
      configurationError(() => resolveLocation({ location: "wght=1000" }, AXES, INSTANCES, "font B"))
        ?.message
    ).toBe("wght=1000 is outside font B's axis range 100..900");
  });

  it("looks up named instances", () => {
    expect(resolveLocation({ instance: "Bold" }, AXES, INSTANCES, "font A")).toEqual({
      wght: 700,
      wdth: 100,
    });
    expect(
      configurationError(() => resolveLocation({ instance: "Black" }, AXES, INSTANCES, "font A"))
        ?.message
    ).toBe("font A has no instance named 'Black' (available: Bold, Regular)");
  });
});

describe("sortInstances", () => {
  it("orders by axis values in fvar order", () => {
    const sorted = sortInstances(
      [
        { name: "Bold Condensed", coordinates: { wght: 700, wdth: 75 } },
        { name: "Light", coordinates: { wght: 300, wdth: 100 } },
        { name: "Bold", coordinates: { wght: 700, wdth: 100 } },
      ],
      AXES
    );
    expect(sorted.map((instance) => instance.name)).toEqual(["Light", "Bold Condensed", "Bold"]);
  });
});

describe("readDesignSpace", () => {
  it("is empty for static fonts", () => {
    expect(readDesignSpace(toArrayBuffer(minimalFont()))).toEqual({ axes: [], instances: [] });
  });

  it("reads axes and named instances with their names", () => {
    const font = minimalFont({
      fvar: fvarTable(
        [["wght", 100, 400, 900, 256]],
        [
          [258, [700]],
          [257, [400]],
          [300, [100]],
        ]
      ),
      name: nameTable([
        [256, "Weight"],
        [257, "Regular"],
        [258, "Bold"],
      ]),
    });
    expect(readDesignSpace(toArrayBuffer(font))).toEqual({
      axes: [{ tag: "wght", name: "Weight", min: 100, default: 400, max: 900 }],
      instances: [
        { name: "Instance 3", coordinates: { wght: 100 } },
        { name: "Regular", coordinates: { wght: 400 } },
        { name: "Bold", coordinates: { wght: 700 } },
      ],
    });
  });
});

describe("variationCoordinates", () => {
  it("drops the padding of short tags", () => {
    expect(variationCoordinates(parseLocation("XY=1,wght=300"))).toEqual({ XY: 1, wght: 300 });
  });
});
