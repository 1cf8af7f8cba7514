/**
 * packages/core/src/animation/types.ts - Core animation API types.
 *
 * Why: Animator, curves and timed properties share these shapes; targets only
 * need the one-method Animatable contract.
 */

/** Eased progress curve. Strength is the exponent of the power curve. */
export type Curve =
  | Readonly<{ kind: "linear" }>
  | Readonly<{ kind: "easeIn"; strength: number }>
  | Readonly<{ kind: "easeOut"; strength: number }>;

export type CurveKind = Curve["kind"];

/** Inclusive `[start, end]` value range. `start > end` animates downward. */
export type ValueRange = readonly [start: number, end: number];

/** Sub-interval of global progress, `0 <= start < end <= 1`. */
export type TimeWindow = readonly [start: number, end: number];

/**
 * One animated property: drives `id` from `range[0]` to `range[1]` while the
 * animator's global progress moves through `window`.
 */
export type TimedProperty<K> = Readonly<{
  id: K;
  range: ValueRange;
  curve: Curve;
  window: TimeWindow;
}>;

/**
 * Anything an Animator can drive. The key namespace belongs to the target.
 */
export interface Animatable<K> {
  set(id: K, value: number): void;
}

/** Derived from the clock on every query, never stored. */
export type AnimationState = "playing" | "over";

/** Monotonic millisecond time source. */
export type Clock = () => number;
