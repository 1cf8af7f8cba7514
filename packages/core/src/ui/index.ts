/**
 * packages/core/src/ui/index.ts - Retained UI tree public exports.
 */

export {
  type ElementId,
  elementId,
  elementIdEquals,
  elementIdKey,
  pushElementId,
} from "./elementId.js";
export type {
  UiAnimatableId,
  UiElement,
  UiElementKind,
  UiGeometry,
  UiHit,
  UiNodeSnapshot,
} from "./types.js";
export { UiNodeHandle, UiTree } from "./uiTree.js";
