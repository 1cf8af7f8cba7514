/**
 * packages/core/src/animation/curve.ts - Power easing curves.
 *
 * Reversal swaps easeIn and easeOut at the same strength. That is the mirror
 * image of the curve, not its functional inverse; reversed animations rely on
 * exactly this swap.
 */

import { TesseraError } from "../errors.js";
import { clamp01 } from "./interpolate.js";
import type { Curve } from "./types.js";

export const LINEAR: Curve = Object.freeze({ kind: "linear" });

function assertStrength(strength: number, name: string): void {
  if (!Number.isFinite(strength) || strength <= 0) {
    throw new TesseraError(
      "TESSERA_INVALID_CURVE",
      `${name}(strength): strength must be a positive finite number, got ${String(strength)}`,
    );
  }
}

/** `t^strength`: starts slow, ends fast. */
export function easeIn(strength: number): Curve {
  assertStrength(strength, "easeIn");
  return Object.freeze({ kind: "easeIn", strength });
}

/** `1-(1-t)^strength`: starts fast, ends slow. */
export function easeOut(strength: number): Curve {
  assertStrength(strength, "easeOut");
  return Object.freeze({ kind: "easeOut", strength });
}

/** Map progress to eased progress. Input is clamped to [0, 1] first. */
export function applyCurve(curve: Curve, progress: number): number {
  const t = clamp01(progress);
  switch (curve.kind) {
    case "linear":
      return t;
    case "easeIn":
      return t ** curve.strength;
    case "easeOut":
      return 1 - (1 - t) ** curve.strength;
  }
}

export function reverseCurve(curve: Curve): Curve {
  switch (curve.kind) {
    case "linear":
      return LINEAR;
    case "easeIn":
      return Object.freeze({ kind: "easeOut", strength: curve.strength });
    case "easeOut":
      return Object.freeze({ kind: "easeIn", strength: curve.strength });
  }
}

export function curvesEqual(a: Curve, b: Curve): boolean {
  if (a.kind === "linear" || b.kind === "linear") return a.kind === b.kind;
  return a.kind === b.kind && a.strength === b.strength;
}
