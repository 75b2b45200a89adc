/**
 * Structural diff over Value Trees
 *
 * Objects are compared key by key (left keys first, then right-only keys, each in
 * their own order). Everything else, arrays included, is compared as a whole and
 * reported as a [left, right] leaf pair. Equal subtrees never appear in the output.
 */

import type { DiffNode, ObjectValue, Value } from "../../types/value.types";
import {
  array,
  EMPTY_OBJECT,
  errorLeaf,
  formatValue,
  isErrorLeaf,
  isSomething,
  NULL,
  object,
  valuesEqual,
} from "../value/Value";

/**
 * Diff two values. Returns an empty Object when they do not differ.
 */
export function diff(left: Value, right: Value): DiffNode {
  return diffNode(left, right) ?? EMPTY_OBJECT;
}

/**
 * True when a diff result carries no difference
 */
export function isEmptyDiff(node: DiffNode): boolean {
  return node.kind === "object" && node.entries.size === 0;
}

function diffNode(left: Value, right: Value): DiffNode | undefined {
  // The same decode failure on both sides is no difference
  if (valuesEqual(left, right)) return undefined;

  if (isErrorLeaf(left) || isErrorLeaf(right)) {
    return errorLeaf(describeErrors(left, right));
  }

  if (left.kind === "object" && right.kind === "object") {
    const children = diffObjects(left, right);
    return children.entries.size > 0 ? children : undefined;
  }

  return leafPair(left, right);
}

function diffObjects(left: ObjectValue, right: ObjectValue): ObjectValue {
  const out: Array<[string, DiffNode]> = [];

  const keys: string[] = [...left.entries.keys()];
  for (const key of right.entries.keys()) {
    if (!left.entries.has(key)) keys.push(key);
  }

  for (const key of keys) {
    const l = left.entries.get(key);
    const r = right.entries.get(key);

    // Presence differs: always reported, even if the present side is null or empty
    if (l === undefined || r === undefined) {
      out.push([key, leafPair(l ?? NULL, r ?? NULL)]);
      continue;
    }

    const child = diffNode(l, r);
    if (child !== undefined) out.push([key, child]);
  }

  return object(out);
}

function leafPair(left: Value, right: Value): DiffNode {
  return array([left, right]);
}

function describeErrors(left: Value, right: Value): string {
  const messages: string[] = [];
  if (isErrorLeaf(left)) messages.push(`left: ${errorMessage(left)}`);
  if (isErrorLeaf(right)) messages.push(`right: ${errorMessage(right)}`);
  return messages.join("; ");
}

function errorMessage(leaf: ObjectValue): string {
  const message = leaf.entries.get("error");
  return message?.kind === "string" ? message.value : "";
}

/**
 * Leaf pair accessor: returns [left, right] when `node` has the leaf-pair shape
 */
export function asLeafPair(node: DiffNode): [Value, Value] | null {
  if (node.kind !== "array" || node.items.length !== 2) return null;
  return [node.items[0], node.items[1]];
}

export interface LeafPairDescription {
  /** null means the side is reported as absent */
  left: string | null;
  right: string | null;
}

/**
 * Presentation of a leaf pair. In succinct mode, a side that is not "something"
 * while the other side is gets reported as absent.
 */
export function describeLeafPair(
  left: Value,
  right: Value,
  succinct: boolean
): LeafPairDescription {
  if (succinct && isSomething(left) && !isSomething(right)) {
    return { left: formatValue(left), right: null };
  }
  if (succinct && isSomething(right) && !isSomething(left)) {
    return { left: null, right: formatValue(right) };
  }
  return { left: formatValue(left), right: formatValue(right) };
}
