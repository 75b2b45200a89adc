/**
 * Value Tree construction, equality and serialization
 */

import type { ArrayValue, JsonValue, ObjectValue, Value } from "../../types/value.types";

export const NULL: Value = { kind: "null" };

export function bool(value: boolean): Value {
  return { kind: "bool", value };
}

export function num(value: number): Value {
  return { kind: "number", value };
}

export function str(value: string): Value {
  return { kind: "string", value };
}

export function array(items: readonly Value[]): ArrayValue {
  return { kind: "array", items: [...items] };
}

/**
 * Build an Object value from ordered entries. A repeated key keeps its first position
 * and takes the last value.
 */
export function object(entries: Iterable<readonly [string, Value]>): ObjectValue {
  const map = new Map<string, Value>();
  for (const [key, value] of entries) {
    map.set(key, value);
  }
  return { kind: "object", entries: map };
}

export const EMPTY_OBJECT: ObjectValue = object([]);

export function errorLeaf(message: string): ObjectValue {
  return object([["error", str(message)]]);
}

/**
 * Error leaves are single-key objects holding a string under "error"
 */
export function isErrorLeaf(value: Value): value is ObjectValue {
  if (value.kind !== "object" || value.entries.size !== 1) return false;
  const message = value.entries.get("error");
  return message !== undefined && message.kind === "string";
}

/**
 * Convert decoded data (plain objects, arrays, scalars) into a Value Tree.
 * Object properties holding `undefined` or functions are skipped; non-finite
 * numbers, bigints and other non-JSON scalars become strings.
 */
export function fromJson(data: unknown): Value {
  return convert(data, new Set());
}

function convert(data: unknown, ancestors: Set<object>): Value {
  if (data === null || data === undefined) return NULL;
  if (typeof data === "boolean") return bool(data);
  if (typeof data === "number") return Number.isFinite(data) ? num(data) : str(String(data));
  if (typeof data === "string") return str(data);
  if (typeof data !== "object") return str(String(data));

  if (ancestors.has(data)) {
    throw new Error("Cannot build a Value Tree from cyclic data");
  }
  ancestors.add(data);
  try {
    if (Array.isArray(data)) {
      return array(data.map((item: unknown) => convert(item, ancestors)));
    }
    if (ArrayBuffer.isView(data) && !(data instanceof DataView)) {
      const bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
      return array(Array.from(bytes, (b) => num(b)));
    }
    if (data instanceof Map) {
      const entries: Array<[string, Value]> = [];
      for (const [key, value] of data) {
        entries.push([String(key), convert(value, ancestors)]);
      }
      return object(entries);
    }
    const entries: Array<[string, Value]> = [];
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined || typeof value === "function") continue;
      entries.push([key, convert(value, ancestors)]);
    }
    return object(entries);
  } finally {
    ancestors.delete(data);
  }
}

export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "array":
      return value.items.map(toJson);
    case "object": {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, child] of value.entries) {
        out[key] = toJson(child);
      }
      return out;
    }
  }
}

/**
 * Deep structural equality. Object key order is not significant.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valuesEqual(item, b.items[i]))
      );
    case "object": {
      if (b.kind !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, child] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(child, other)) return false;
      }
      return true;
    }
  }
}

/**
 * Presence predicate: false for null and for empty strings, arrays and objects
 */
export function isSomething(value: Value): boolean {
  switch (value.kind) {
    case "null":
      return false;
    case "bool":
    case "number":
      return true;
    case "string":
      return value.value.length > 0;
    case "array":
      return value.items.length > 0;
    case "object":
      return value.entries.size > 0;
  }
}

/**
 * Compact single-line rendering, as JSON
 */
export function formatValue(value: Value): string {
  return JSON.stringify(toJson(value));
}
