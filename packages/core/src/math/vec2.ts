/**
 * packages/core/src/math/vec2.ts - Immutable 2D vector helpers.
 *
 * Component-wise operations only. Every helper returns a fresh frozen value.
 */

export type Vec2 = Readonly<{ x: number; y: number }>;

export function vec2(x: number, y: number): Vec2 {
  return Object.freeze({ x, y });
}

/** Vector with both components set to `value`. */
export function vec2Repeat(value: number): Vec2 {
  return vec2(value, value);
}

export const VEC2_ZERO: Vec2 = vec2(0, 0);

export function addVec2(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x + b.x, a.y + b.y);
}

export function subVec2(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x - b.x, a.y - b.y);
}

export function mulVec2(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x * b.x, a.y * b.y);
}

export function divVec2(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x / b.x, a.y / b.y);
}

export function scaleVec2(a: Vec2, s: number): Vec2 {
  return vec2(a.x * s, a.y * s);
}

export function addScalarVec2(a: Vec2, s: number): Vec2 {
  return vec2(a.x + s, a.y + s);
}

export function negVec2(a: Vec2): Vec2 {
  return vec2(-a.x, -a.y);
}

export function mapVec2(a: Vec2, fn: (component: number) => number): Vec2 {
  return vec2(fn(a.x), fn(a.y));
}

export function floorVec2(a: Vec2): Vec2 {
  return mapVec2(a, Math.floor);
}

export function equalsVec2(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

export function formatVec2(a: Vec2): string {
  return `(${String(a.x)}, ${String(a.y)})`;
}
