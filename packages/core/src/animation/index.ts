export { Animator, type AnimatorOptions } from "./animator.js";
export { monotonicClock } from "./clock.js";
export { LINEAR, applyCurve, curvesEqual, easeIn, easeOut, reverseCurve } from "./curve.js";
export { clamp01, clampNumber, mixNumber } from "./interpolate.js";
export {
  evaluateTimedProperty,
  reverseTimedProperty,
  timedProperty,
  validateTimeWindow,
} from "./timedProperty.js";
export type {
  Animatable,
  AnimationState,
  Clock,
  Curve,
  CurveKind,
  TimeWindow,
  TimedProperty,
  ValueRange,
} from "./types.js";
