/**
 * packages/core/src/ui/elementId.ts - Positional addresses of UI nodes.
 *
 * An ElementId is the path of indices from a root to a node:
 *   - first entry: root index in the tree
 *   - each next entry: child index under the previous node
 *
 * Ids are positional. They stay valid because trees are append-only.
 */

import { TesseraError } from "../errors.js";

export type ElementId = readonly [root: number, ...children: number[]];

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new TesseraError(
      "TESSERA_INVALID_ELEMENT_ID",
      `element index must be a non-negative integer, got ${String(index)}`,
    );
  }
}

/** Single-level id addressing root `index`. */
export function elementId(index: number): ElementId {
  assertIndex(index);
  return Object.freeze([index] as const);
}

/** Id one level deeper: the child at `index` of the node `id` addresses. */
export function pushElementId(id: ElementId, index: number): ElementId {
  assertIndex(index);
  return Object.freeze([...id, index] as const);
}

export function elementIdEquals(a: ElementId, b: ElementId): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Stable string form for maps and log lines, e.g. "0/2/1". */
export function elementIdKey(id: ElementId): string {
  return id.join("/");
}
