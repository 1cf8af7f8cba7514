/**
 * packages/core/src/animation/timedProperty.ts - Windowed, eased property tracks.
 *
 * Each track holds its start value before its window opens and its end value
 * after it closes, so several tracks can share one animator duration while
 * moving during different sub-intervals of it.
 */

import { TesseraError } from "../errors.js";
import { applyCurve, reverseCurve } from "./curve.js";
import { clampNumber, mixNumber } from "./interpolate.js";
import type { Curve, TimeWindow, TimedProperty, ValueRange } from "./types.js";

export function timedProperty<K>(
  id: K,
  range: ValueRange,
  curve: Curve,
  window: TimeWindow = [0, 1],
): TimedProperty<K> {
  return Object.freeze({
    id,
    range: Object.freeze([range[0], range[1]] as const),
    curve,
    window: Object.freeze([window[0], window[1]] as const),
  });
}

/**
 * Throw unless `0 <= window[0] < window[1] <= 1`.
 * NaN bounds fail every comparison and are rejected too.
 */
export function validateTimeWindow(window: TimeWindow): void {
  const [start, end] = window;
  if (!(start >= 0 && end <= 1 && start < end)) {
    throw new TesseraError(
      "TESSERA_INVALID_TIME_WINDOW",
      `time window [${String(start)}, ${String(end)}] must satisfy 0 <= start < end <= 1`,
    );
  }
}

/** Value of the track at global animator progress `progress`. */
export function evaluateTimedProperty<K>(property: TimedProperty<K>, progress: number): number {
  const [w0, w1] = property.window;
  const clamped = clampNumber(progress, w0, w1);
  const local = (clamped - w0) / (w1 - w0);
  const eased = applyCurve(property.curve, local);
  return mixNumber(property.range[0], property.range[1], eased);
}

/**
 * Mirror a track in time: reversed curve, swapped range, window
 * `[w0, w1] -> [1 - w1, 1 - w0]`.
 */
export function reverseTimedProperty<K>(property: TimedProperty<K>): TimedProperty<K> {
  const [start, end] = property.range;
  const [w0, w1] = property.window;
  return timedProperty(property.id, [end, start], reverseCurve(property.curve), [1 - w1, 1 - w0]);
}
