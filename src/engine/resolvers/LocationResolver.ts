/**
 * Design-space location resolution
 * Axes and named instances come from fvar, names from the name table.
 */

import type { AxisInfo, DesignLocation, NamedInstance } from "../../types/engine.types";
import { FatalComparisonError } from "../errors/FatalComparisonError";
import { findTableOffset, parseFvarTable } from "../parsers/RawTableParser";
import { resolveNameIDs } from "../parsers/tables/decoders";

export interface LocationRequest {
  location?: string;
  instance?: string;
}

/**
 * Parse "wght=400,wdth=100" into an axis -> value map.
 * Tags shorter than four characters are space padded ("opsz", "ital", "XY  ").
 */
export function parseLocation(text: string): DesignLocation {
  const location: DesignLocation = {};
  for (const part of text.split(",")) {
    const [rawTag, rawValue, ...rest] = part.split("=");
    const tag = (rawTag ?? "").trim();
    const value = Number((rawValue ?? "").trim());
    if (!tag || tag.length > 4 || rest.length > 0 || rawValue === undefined || !rawValue.trim()) {
      throw new FatalComparisonError("configuration", `Malformed location setting '${part.trim()}'`);
    }
    if (!Number.isFinite(value)) {
      throw new FatalComparisonError("configuration", `Location value for '${tag}' is not a number`);
    }
    location[tag.padEnd(4, " ")] = value;
  }
  return location;
}

export function formatLocation(location: DesignLocation): string {
  return Object.entries(location)
    .map(([tag, value]) => `${tag.trim()}=${value}`)
    .join(",");
}

/**
 * Axis settings as the shaper keys them: tags without padding
 */
export function variationCoordinates(location: DesignLocation): Record<string, number> {
  const coordinates: Record<string, number> = {};
  for (const [tag, value] of Object.entries(location)) coordinates[tag.trim()] = value;
  return coordinates;
}

/**
 * Sort instances by coordinates
 * Primary: fvar axis order, then alphabetical
 */
export function sortInstances(instances: NamedInstance[], axes: AxisInfo[]): NamedInstance[] {
  const axisOrder = axes.map((axis) => axis.tag);

  return [...instances].sort((a, b) => {
    for (const axisTag of axisOrder) {
      const aVal = a.coordinates[axisTag] ?? 0;
      const bVal = b.coordinates[axisTag] ?? 0;
      if (aVal !== bVal) return aVal - bVal;
    }

    const allTags = new Set([...Object.keys(a.coordinates), ...Object.keys(b.coordinates)]);
    for (const tag of Array.from(allTags).sort()) {
      const aVal = a.coordinates[tag] ?? 0;
      const bVal = b.coordinates[tag] ?? 0;
      if (aVal !== bVal) return aVal - bVal;
    }
    return a.name.localeCompare(b.name);
  });
}

/**
 * Axes and named instances of an SFNT buffer; both empty for static fonts.
 * Instance names try subfamilyNameID, then postScriptNameID, then "Instance N".
 */
export function readDesignSpace(buffer: ArrayBuffer): { axes: AxisInfo[]; instances: NamedInstance[] } {
  const fvar = findTableOffset(buffer, "fvar");
  if (!fvar) return { axes: [], instances: [] };

  const table = parseFvarTable(new DataView(buffer, fvar.offset, fvar.length));
  if (!table) return { axes: [], instances: [] };

  const nameIDs = [
    ...table.axes.map((axis) => axis.axisNameID),
    ...table.instances.flatMap((instance) =>
      instance.postScriptNameID !== undefined
        ? [instance.subfamilyNameID, instance.postScriptNameID]
        : [instance.subfamilyNameID]
    ),
  ];
  const names = resolveNameIDs(buffer, nameIDs);

  const axes: AxisInfo[] = table.axes.map((axis) => ({
    tag: axis.tag,
    name: names.get(axis.axisNameID) ?? axis.tag,
    min: axis.min,
    default: axis.default,
    max: axis.max,
  }));

  const instances: NamedInstance[] = table.instances.map((instance, index) => {
    const coordinates: Record<string, number> = {};
    table.axes.forEach((axis, i) => {
      coordinates[axis.tag] = instance.coordinates[i] ?? axis.default;
    });
    const name =
      names.get(instance.subfamilyNameID) ??
      (instance.postScriptNameID !== undefined ? names.get(instance.postScriptNameID) : undefined) ??
      `Instance ${index + 1}`;
    return { name, coordinates };
  });

  return { axes, instances: sortInstances(instances, axes) };
}

/**
 * Resolve a requested location or named instance against one font.
 * Returns null when nothing was requested. Throws a configuration error for
 * unknown axes, out-of-range values and unknown instances.
 */
export function resolveLocation(
  request: LocationRequest,
  axes: AxisInfo[],
  instances: NamedInstance[],
  fontLabel: string
): DesignLocation | null {
  if (request.instance !== undefined) {
    const match = instances.find((instance) => instance.name === request.instance);
    if (!match) {
      const known = instances.map((instance) => instance.name).join(", ") || "none";
      throw new FatalComparisonError(
        "configuration",
        `${fontLabel} has no instance named '${request.instance}' (available: ${known})`
      );
    }
    return { ...match.coordinates };
  }

  if (request.location === undefined) return null;

  const location = parseLocation(request.location);
  for (const [tag, value] of Object.entries(location)) {
    const axis = axes.find((a) => a.tag === tag);
    if (!axis) {
      throw new FatalComparisonError(
        "configuration",
        `${fontLabel} has no '${tag.trim()}' axis`
      );
    }
    if (value < axis.min || value > axis.max) {
      throw new FatalComparisonError(
        "configuration",
        `${tag.trim()}=${value} is outside ${fontLabel}'s axis range ${axis.min}..${axis.max}`
      );
    }
  }
  return location;
}
