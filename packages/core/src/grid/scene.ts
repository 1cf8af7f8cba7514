/**
 * packages/core/src/grid/scene.ts - Unbounded tile map over a growable grid.
 *
 * World positions are integer tile coordinates, possibly negative. The
 * backing grid stores world position `p` at local `p + offset` and grows on
 * write just enough to contain the written position. Growing toward negative
 * coordinates shifts the stored tiles and the offset together.
 */

import { EMPTY_TILE, type Tile } from "../editor/tile.js";
import { TesseraError } from "../errors.js";
import { type Vec2, VEC2_ZERO, addVec2, formatVec2, subVec2, vec2 } from "../math/vec2.js";
import { Grid2d } from "./grid2d.js";

/** Signed growth needed on one axis so `pos` fits in `[0, size)`. */
function growthOnAxis(pos: number, size: number): number {
  if (pos >= size) return pos - size + 1;
  if (pos < 0) return pos;
  return 0;
}

export class Scene {
  private grid: Grid2d<Tile>;
  private offsetValue: Vec2;

  constructor(size: Vec2 = VEC2_ZERO, offset: Vec2 = VEC2_ZERO) {
    this.grid = new Grid2d<Tile>(size, () => EMPTY_TILE);
    this.offsetValue = offset;
  }

  get size(): Vec2 {
    return this.grid.size;
  }

  /** Local grid position of world position (0, 0). */
  get offset(): Vec2 {
    return this.offsetValue;
  }

  /** Grow the backing grid so it contains world position `pos`. */
  extendToContain(pos: Vec2): void {
    assertTilePosition(pos);
    const local = addVec2(pos, this.offsetValue);
    const size = this.grid.size;
    const growth = vec2(growthOnAxis(local.x, size.x), growthOnAxis(local.y, size.y));
    if (growth.x === 0 && growth.y === 0) return;

    const nextSize = vec2(size.x + Math.abs(growth.x), size.y + Math.abs(growth.y));
    const shift = vec2(Math.min(growth.x, 0), Math.min(growth.y, 0));
    this.offsetValue = subVec2(this.offsetValue, shift);

    const next = new Grid2d<Tile>(nextSize, () => EMPTY_TILE);
    for (const [cell, tile] of this.grid.entries()) {
      next.set(subVec2(cell, shift), tile);
    }
    this.grid = next;
  }

  /** Tile at world position `pos`; the empty tile outside the stored area. */
  get(pos: Vec2): Tile {
    assertTilePosition(pos);
    const local = addVec2(pos, this.offsetValue);
    return this.grid.contains(local) ? this.grid.get(local) : EMPTY_TILE;
  }

  set(pos: Vec2, tile: Tile): void {
    this.extendToContain(pos);
    this.grid.set(addVec2(pos, this.offsetValue), tile);
  }

  /** Every stored cell with its world position, in grid index order. */
  *entries(): IterableIterator<readonly [Vec2, Tile]> {
    for (const [cell, tile] of this.grid.entries()) {
      yield [subVec2(cell, this.offsetValue), tile] as const;
    }
  }
}

function assertTilePosition(pos: Vec2): void {
  if (!Number.isInteger(pos.x) || !Number.isInteger(pos.y)) {
    throw new TesseraError(
      "TESSERA_OUT_OF_BOUNDS",
      `tile positions must be integers, got ${formatVec2(pos)}`,
    );
  }
}
