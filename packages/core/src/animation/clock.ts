/**
 * packages/core/src/animation/clock.ts - Default monotonic clock.
 */

import type { Clock } from "./types.js";

export const monotonicClock: Clock = () => performance.now();
