/**
 * packages/core/src/animation/animator.ts - Wall-clock property animator.
 *
 * Why: Drives an ordered set of timed properties on any Animatable target.
 * State is derived from the clock on each call:
 *   - playing: elapsed < duration
 *   - over:    otherwise
 *
 * A new animator starts "already finished" so nothing moves until reset().
 * Within one animate() call properties are applied in stored order, so a
 * later track for the same id overwrites an earlier one.
 */

import { TesseraError } from "../errors.js";
import { monotonicClock } from "./clock.js";
import { evaluateTimedProperty, reverseTimedProperty, validateTimeWindow } from "./timedProperty.js";
import type { Animatable, AnimationState, Clock, TimedProperty } from "./types.js";

export type AnimatorOptions = Readonly<{
  /** Millisecond time source. Defaults to `performance.now`. */
  clock?: Clock;
}>;

function assertDuration(durationMs: number): void {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    throw new TesseraError(
      "TESSERA_INVALID_DURATION",
      `Animator duration must be a positive finite number of milliseconds, got ${String(durationMs)}`,
    );
  }
}

export class Animator<K> {
  readonly properties: readonly TimedProperty<K>[];
  readonly durationMs: number;
  private readonly clock: Clock;
  private startMs: number;

  constructor(
    properties: readonly TimedProperty<K>[],
    durationMs: number,
    opts: AnimatorOptions = {},
  ) {
    for (const property of properties) {
      validateTimeWindow(property.window);
    }
    assertDuration(durationMs);

    this.properties = Object.freeze([...properties]);
    this.durationMs = durationMs;
    this.clock = opts.clock ?? monotonicClock;
    this.startMs = this.clock() - durationMs;
  }

  /** Restart from progress 0. */
  reset(): void {
    this.startMs = this.clock();
  }

  elapsedMs(): number {
    return this.clock() - this.startMs;
  }

  /** Global progress, capped at 1. */
  progress(): number {
    return Math.min(this.elapsedMs() / this.durationMs, 1);
  }

  isPlaying(): boolean {
    return this.elapsedMs() < this.durationMs;
  }

  /**
   * Push every property's current value into `target`, in stored order.
   * Safe to call after the end: keeps emitting end-of-range values.
   */
  animate(target: Animatable<K>): AnimationState {
    const progress = this.progress();
    for (const property of this.properties) {
      target.set(property.id, evaluateTimedProperty(property, progress));
    }
    return progress >= 1 ? "over" : "playing";
  }

  /** Independent animator that plays this one backwards. Starts finished. */
  reversed(): Animator<K> {
    return new Animator(this.properties.map(reverseTimedProperty), this.durationMs, {
      clock: this.clock,
    });
  }
}
