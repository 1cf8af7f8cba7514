/**
 * packages/core/src/editor/config.ts - Editor configuration defaults and validation.
 */

import { TesseraError } from "../errors.js";
import {
  CONTROL_NAMES,
  type ControlName,
  DEFAULT_KEYBINDS,
  type Keybind,
  type KeybindSpec,
  parseKeybind,
} from "./controls.js";

export type EditorConfig = Readonly<{
  fps?: number;
  /** Tiles visible vertically. */
  cameraHeight?: number;
  paletteOpenMs?: number;
  keybinds?: readonly KeybindSpec[];
}>;

export type ResolvedKeybind = readonly [bind: Keybind, control: ControlName];

export type NormalizedEditorConfig = Readonly<{
  fps: number;
  cameraHeight: number;
  paletteOpenMs: number;
  keybinds: readonly ResolvedKeybind[];
}>;

export const DEFAULT_FPS = 60;
export const DEFAULT_CAMERA_HEIGHT = 10;
export const DEFAULT_PALETTE_OPEN_MS = 200;

const CONTROL_SET: ReadonlySet<string> = new Set(CONTROL_NAMES);

function invalid(detail: string): TesseraError {
  return new TesseraError("TESSERA_INVALID_CONFIG", detail);
}

function positiveNumber(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw invalid(`${name} must be a finite number > 0, got ${String(value)}`);
  }
  return value;
}

export function normalizeEditorConfig(config: EditorConfig = {}): NormalizedEditorConfig {
  const fps = positiveNumber("fps", config.fps, DEFAULT_FPS);
  if (!Number.isInteger(fps) || fps > 1000) {
    throw invalid(`fps must be an integer in 1..1000, got ${String(fps)}`);
  }

  const keybinds: ResolvedKeybind[] = [];
  for (const [binding, control] of config.keybinds ?? DEFAULT_KEYBINDS) {
    if (!CONTROL_SET.has(control)) {
      throw invalid(`unknown control "${control}" for binding "${binding}"`);
    }
    const parsed = parseKeybind(binding);
    if (!parsed.ok) throw invalid(parsed.error.detail);
    keybinds.push(Object.freeze([parsed.value, control] as const));
  }

  return Object.freeze({
    fps,
    cameraHeight: positiveNumber("cameraHeight", config.cameraHeight, DEFAULT_CAMERA_HEIGHT),
    paletteOpenMs: positiveNumber("paletteOpenMs", config.paletteOpenMs, DEFAULT_PALETTE_OPEN_MS),
    keybinds: Object.freeze(keybinds),
  });
}

/** Milliseconds simulated per frame. */
export function frameDurationMs(fps: number): number {
  return Math.floor(1000 / fps);
}
