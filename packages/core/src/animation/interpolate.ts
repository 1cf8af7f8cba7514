/**
 * packages/core/src/animation/interpolate.ts - Primitive interpolation helpers.
 */

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Clamp `value` into `[min, max]`. Callers guarantee `min <= max`. */
export function clampNumber(value: number, min: number, max: number): number {
  if (value <= min) return min;
  if (value >= max) return max;
  return value;
}

/**
 * Weighted mix `from*(1-t) + to*t`. Exact at both endpoints; `t` is not
 * clamped.
 */
export function mixNumber(from: number, to: number, t: number): number {
  return from * (1 - t) + to * t;
}
