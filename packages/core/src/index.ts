/**
 * @tessera/core
 *
 * Runtime-agnostic core of the tile editor: animation, retained UI tree,
 * tile scenes and the editor state machine.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { TesseraError, type TesseraErrorCode, describeThrown, safeErr } from "./errors.js";

// =============================================================================
// Geometry
// =============================================================================

export {
  type Vec2,
  VEC2_ZERO,
  addScalarVec2,
  addVec2,
  divVec2,
  equalsVec2,
  floorVec2,
  formatVec2,
  mapVec2,
  mulVec2,
  negVec2,
  scaleVec2,
  subVec2,
  vec2,
  vec2Repeat,
} from "./math/vec2.js";

// =============================================================================
// Backend contract
// =============================================================================

export {
  type EditorAssets,
  type PixelRect,
  type RenderBackend,
  type RenderSurface,
  type TextureId,
  type TextureRegistry,
  toPixelRect,
} from "./backend.js";

// =============================================================================
// Modules
// =============================================================================

export * from "./animation/index.js";
export * from "./ui/index.js";
export * from "./grid/index.js";
export * from "./editor/index.js";
