/**
 * packages/core/src/editor/tile.ts - Tile values stored in scenes.
 *
 * `0` is the empty tile. Palette entry `i` is stored as `i + 1`.
 */

import { TesseraError } from "../errors.js";

export type Tile = number;

export const EMPTY_TILE: Tile = 0;

export function tileFromPaletteIndex(index: number): Tile {
  return index + 1;
}

export function isEmptyTile(tile: Tile): boolean {
  return tile === EMPTY_TILE;
}

/** Palette index of a non-empty tile. */
export function tilePaletteIndex(tile: Tile): number {
  if (isEmptyTile(tile)) {
    throw new TesseraError("TESSERA_UNKNOWN_TEXTURE", "the empty tile has no palette entry");
  }
  return tile - 1;
}
