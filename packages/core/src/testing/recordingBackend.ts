/**
 * packages/core/src/testing/recordingBackend.ts - In-memory render backend.
 *
 * Why: Draw tests assert on the exact blit sequence instead of pixels. Frames
 * are split at clear() and committed at present().
 */

import type { PixelRect, RenderBackend } from "../backend.js";
import { type Vec2, vec2 } from "../math/vec2.js";

export type RecordedBlit<H> = Readonly<{ texture: H; rect: PixelRect }>;

export type RecordingBackend<H> = RenderBackend<H> &
  Readonly<{
    /** Blits issued since the last clear(). */
    pending: () => readonly RecordedBlit<H>[];
    /** Blit lists of every presented frame, oldest first. */
    frames: () => readonly (readonly RecordedBlit<H>[])[];
    resize: (width: number, height: number) => void;
  }>;

export function createRecordingBackend<H = string>(
  width = 100,
  height = 100,
): RecordingBackend<H> {
  let size: Vec2 = vec2(width, height);
  let pending: RecordedBlit<H>[] = [];
  const frames: (readonly RecordedBlit<H>[])[] = [];

  return Object.freeze({
    windowSize: () => size,
    clear: () => {
      pending = [];
    },
    blit: (texture: H, rect: PixelRect) => {
      pending.push(Object.freeze({ texture, rect }));
    },
    present: () => {
      frames.push(Object.freeze([...pending]));
    },
    pending: () => pending,
    frames: () => frames,
    resize: (nextWidth: number, nextHeight: number) => {
      size = vec2(nextWidth, nextHeight);
    },
  });
}
