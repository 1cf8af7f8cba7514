/**
 * packages/core/src/editor/camera.ts - World/screen mapping for the tile view.
 *
 * World space is y-up and measured in tiles. `height` is the number of tiles
 * visible vertically; the camera position is the world point at the centre
 * of the window. Window pixels are y-down.
 */

import type { PixelRect } from "../backend.js";
import {
  type Vec2,
  addScalarVec2,
  addVec2,
  divVec2,
  floorVec2,
  mapVec2,
  mulVec2,
  scaleVec2,
  subVec2,
  vec2,
  vec2Repeat,
} from "../math/vec2.js";

export type Camera = Readonly<{ pos: Vec2; height: number }>;

export function createCamera(height: number, pos: Vec2 = vec2(0, 0)): Camera {
  return Object.freeze({ pos, height });
}

function cameraOffset(camera: Camera): Vec2 {
  return mapVec2(camera.pos, (c) => c / camera.height);
}

/** Tile under a window pixel. */
export function screenToTile(camera: Camera, pointerPx: Vec2, windowPx: Vec2): Vec2 {
  const normalized = divVec2(pointerPx, windowPx);
  const flipped = vec2(normalized.x, 1 - normalized.y);
  const world = scaleVec2(addScalarVec2(addVec2(flipped, cameraOffset(camera)), -0.5), camera.height);
  return floorVec2(world);
}

/** Normalized y-up view position of a tile's lower-left corner. */
export function tileToView(camera: Camera, tile: Vec2): Vec2 {
  const pos = mapVec2(tile, (c) => c / camera.height);
  return addScalarVec2(subVec2(pos, cameraOffset(camera)), 0.5);
}

/**
 * Pixel rect of a tile. Origins are floored and sizes padded by one pixel so
 * neighbouring tiles never leave a seam.
 */
export function tilePixelRect(camera: Camera, tile: Vec2, windowPx: Vec2): PixelRect {
  const size = vec2Repeat(1 / camera.height);
  const view = tileToView(camera, tile);
  const pos = vec2(view.x, 1 - view.y - size.y);
  const scaledPos = floorVec2(mulVec2(pos, windowPx));
  const scaledSize = mapVec2(mulVec2(size, windowPx), (c) => Math.trunc(c) + 1);
  return Object.freeze({ x: scaledPos.x, y: scaledPos.y, w: scaledSize.x, h: scaledSize.y });
}

/** Pan distance per frame, in world units. Faster when zoomed out. */
export function cameraSpeed(camera: Camera, frameMs: number): number {
  return 0.002 * Math.sqrt(camera.height) * frameMs;
}

/** Per-frame zoom multiplier. */
export function zoomStep(frameMs: number): number {
  return 0.9 ** (0.05 * frameMs);
}
