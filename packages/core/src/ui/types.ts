/**
 * packages/core/src/ui/types.ts - UI tree element types.
 */

import type { TextureId } from "../backend.js";
import type { Vec2 } from "../math/vec2.js";
import type { ElementId } from "./elementId.js";

/**
 * Panels are decorative and never hit; buttons are hit-testable.
 * A panel's children are still searched by click().
 */
export type UiElementKind = "panel" | "button";

/**
 * Element description in parent-relative units: `pos` and `size` are
 * fractions of the parent's global size. Root elements use window units.
 */
export type UiElement = Readonly<{
  kind: UiElementKind;
  pos: Vec2;
  size: Vec2;
  texture: TextureId;
}>;

/** Properties an Animator can drive on a UI node. */
export type UiAnimatableId = "scaleX" | "scaleY" | "positionX" | "positionY";

export type UiGeometry = Readonly<{ pos: Vec2; size: Vec2 }>;

/** Read-only view of one node. */
export type UiNodeSnapshot = Readonly<{
  id: ElementId;
  kind: UiElementKind;
  texture: TextureId;
  intrinsic: UiGeometry;
  global: UiGeometry;
}>;

/** Result of a successful hit test. */
export type UiHit = Readonly<{ elementId: ElementId }>;
