/**
 * packages/core/src/grid/grid2d.ts - Fixed-size row-major 2D storage.
 *
 * Cell (x, y) lives at index `y * width + x`. Iteration follows index order:
 * left to right, then top to bottom.
 */

import { TesseraError } from "../errors.js";
import { type Vec2, formatVec2, vec2 } from "../math/vec2.js";

export function gridIndex(size: Vec2, pos: Vec2): number {
  return pos.y * size.x + pos.x;
}

export function gridPosition(size: Vec2, index: number): Vec2 {
  return vec2(index % size.x, Math.floor(index / size.x));
}

function assertGridSize(size: Vec2): void {
  if (!Number.isInteger(size.x) || !Number.isInteger(size.y) || size.x < 0 || size.y < 0) {
    throw new TesseraError(
      "TESSERA_OUT_OF_BOUNDS",
      `grid size must be non-negative integers, got ${formatVec2(size)}`,
    );
  }
}

/** Cells hold non-nullable values so a missing cell is never a stored value. */
export class Grid2d<T extends NonNullable<unknown>> {
  readonly size: Vec2;
  private readonly cells: T[];

  constructor(size: Vec2, fill: () => T) {
    assertGridSize(size);
    this.size = size;
    const count = size.x * size.y;
    this.cells = new Array<T>(count);
    for (let i = 0; i < count; i++) {
      this.cells[i] = fill();
    }
  }

  contains(pos: Vec2): boolean {
    return (
      Number.isInteger(pos.x) &&
      Number.isInteger(pos.y) &&
      pos.x >= 0 &&
      pos.y >= 0 &&
      pos.x < this.size.x &&
      pos.y < this.size.y
    );
  }

  get(pos: Vec2): T {
    return this.cellAt(this.indexOf(pos));
  }

  set(pos: Vec2, value: T): void {
    this.cells[this.indexOf(pos)] = value;
  }

  *entries(): IterableIterator<readonly [Vec2, T]> {
    for (let i = 0; i < this.cells.length; i++) {
      yield [gridPosition(this.size, i), this.cellAt(i)] as const;
    }
  }

  private indexOf(pos: Vec2): number {
    if (!this.contains(pos)) {
      throw new TesseraError(
        "TESSERA_OUT_OF_BOUNDS",
        `position ${formatVec2(pos)} is outside grid ${formatVec2(this.size)}`,
      );
    }
    return gridIndex(this.size, pos);
  }

  private cellAt(index: number): T {
    const value = this.cells[index];
    if (value === undefined) {
      throw new TesseraError("TESSERA_OUT_OF_BOUNDS", `no cell at index ${String(index)}`);
    }
    return value;
  }
}
