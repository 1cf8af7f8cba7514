/**
 * packages/node/src/backend/ansiBackend.ts - Truecolor terminal render backend.
 *
 * Each terminal cell shows two vertically stacked pixels: the upper half
 * block glyph in the top pixel's colour over a background of the bottom
 * pixel's colour. A window of C columns and R rows is C x 2R pixels.
 *
 * Texture handles are packed 0xRRGGBB colours; blit fills the clipped rect.
 */

import { type PixelRect, type RenderBackend, vec2 } from "@tessera/core";

/** Packed 0xRRGGBB colour. */
export type Rgb = number;

export interface TerminalOutput {
  write(chunk: string): unknown;
  readonly columns?: number;
  readonly rows?: number;
}

export type AnsiBackendOptions = Readonly<{
  /** Overrides `output.columns`. */
  columns?: number;
  /** Overrides `output.rows`. */
  rows?: number;
}>;

export type AnsiBackend = RenderBackend<Rgb> &
  Readonly<{
    /** Switch to the alternate screen, hide the cursor and enable mouse reporting. */
    enter: () => void;
    /** Undo enter(). */
    leave: () => void;
    /** Colour of a back-buffer pixel; black outside the window. */
    pixel: (x: number, y: number) => Rgb;
  }>;

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;
const UPPER_HALF_BLOCK = "▀";

// Alternate screen, hidden cursor, any-motion mouse tracking in SGR encoding.
const ENTER_SEQUENCE = "\x1b[?1049h\x1b[?25l\x1b[?1003h\x1b[?1006h";
const LEAVE_SEQUENCE = "\x1b[?1006l\x1b[?1003l\x1b[?25h\x1b[?1049l";
const RESET_SGR = "\x1b[0m";

function positiveInt(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function rgbParams(color: Rgb): string {
  const r = (color >> 16) & 0xff;
  const g = (color >> 8) & 0xff;
  const b = color & 0xff;
  return `${String(r)};${String(g)};${String(b)}`;
}

export function createAnsiBackend(output: TerminalOutput, opts: AnsiBackendOptions = {}): AnsiBackend {
  const columns = positiveInt(opts.columns) ?? positiveInt(output.columns) ?? DEFAULT_COLUMNS;
  const rows = positiveInt(opts.rows) ?? positiveInt(output.rows) ?? DEFAULT_ROWS;
  const width = columns;
  const height = rows * 2;
  const size = vec2(width, height);
  const pixels = new Uint32Array(width * height);

  const present = (): void => {
    let out = "";
    let fg = -1;
    let bg = -1;
    for (let row = 0; row < rows; row++) {
      out += `\x1b[${String(row + 1)};1H`;
      const top = row * 2 * width;
      const bottom = top + width;
      for (let col = 0; col < width; col++) {
        const upper = pixels[top + col] ?? 0;
        const lower = pixels[bottom + col] ?? 0;
        if (upper !== fg) {
          out += `\x1b[38;2;${rgbParams(upper)}m`;
          fg = upper;
        }
        if (lower !== bg) {
          out += `\x1b[48;2;${rgbParams(lower)}m`;
          bg = lower;
        }
        out += UPPER_HALF_BLOCK;
      }
    }
    output.write(out + RESET_SGR);
  };

  return Object.freeze({
    windowSize: () => size,
    clear: () => {
      pixels.fill(0);
    },
    blit: (color: Rgb, rect: PixelRect) => {
      const x0 = Math.max(0, rect.x);
      const y0 = Math.max(0, rect.y);
      const x1 = Math.min(width, rect.x + rect.w);
      const y1 = Math.min(height, rect.y + rect.h);
      for (let y = y0; y < y1; y++) {
        pixels.fill(color, y * width + x0, y * width + x1);
      }
    },
    present,
    enter: () => {
      output.write(ENTER_SEQUENCE);
    },
    leave: () => {
      output.write(RESET_SGR + LEAVE_SEQUENCE);
    },
    pixel: (x: number, y: number) => {
      if (x < 0 || y < 0 || x >= width || y >= height) return 0;
      return pixels[y * width + x] ?? 0;
    },
  });
}
