/**
 * Render backend and texture registry contracts.
 *
 * The core never decodes images or touches a window: it hands pixel rects and
 * opaque texture handles to whatever backend the host provides.
 */

import type { Tile } from "./editor/tile.js";
import type { Vec2 } from "./math/vec2.js";

/** Index of a texture in the host's registry. */
export type TextureId = number;

/** Integer pixel rectangle, y-down, origin top-left. `w` and `h` are >= 0. */
export type PixelRect = Readonly<{ x: number; y: number; w: number; h: number }>;

// =============================================================================
// RenderBackend Interface
// =============================================================================

/**
 * Backend interface for drawing.
 *
 * Rules:
 * - `blit` stretches the texture over `rect` with alpha blending and must
 *   tolerate one call per node per frame, in draw order.
 * - `blit` may receive rects partially or fully outside the window; clipping
 *   is the backend's job.
 * - Nothing is visible until `present()`.
 */
export interface RenderBackend<H> {
  /** Window size in pixels. */
  windowSize(): Vec2;
  clear(): void;
  blit(texture: H, rect: PixelRect): void;
  present(): void;
}

/** Resolves texture ids to drawable handles. */
export interface TextureRegistry<H> {
  /** Throws TESSERA_UNKNOWN_TEXTURE for ids it never issued. */
  texture(id: TextureId): H;
}

/** Asset catalogue the editor builds its UI and palette from. */
export interface EditorAssets<H> extends TextureRegistry<H> {
  /** Id of a named texture such as "ui/plus.png". */
  textureId(name: string): TextureId;
  /** Texture of a non-empty tile. */
  tileTextureId(tile: Tile): TextureId;
  /** Number of tiles in the palette. */
  tileCount(): number;
}

/** Everything a UI tree needs to draw itself. */
export type RenderSurface<H> = Readonly<{
  backend: RenderBackend<H>;
  textures: TextureRegistry<H>;
}>;

/**
 * Map a y-up normalized rectangle onto y-down window pixels.
 * Position and size are rounded independently; size never goes negative.
 */
export function toPixelRect(pos: Vec2, size: Vec2, windowSize: Vec2): PixelRect {
  const flippedY = 1 - pos.y - size.y;
  return Object.freeze({
    x: Math.round(pos.x * windowSize.x),
    y: Math.round(flippedY * windowSize.y),
    w: Math.max(0, Math.round(size.x * windowSize.x)),
    h: Math.max(0, Math.round(size.y * windowSize.y)),
  });
}
