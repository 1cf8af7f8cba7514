/**
 * packages/node/src/input.ts - Raw terminal input to editor events.
 *
 * Terminals report key presses (repeated while held) but never releases, so
 * the decoder yields `keyPress` and KeyHoldTracker turns presses into
 * keyDown/keyUp pairs with a release timeout.
 *
 * Mouse input is expected in SGR encoding (`ESC [ < b ; col ; row M|m`).
 * Pointer positions are reported in backend pixels: one column per pixel,
 * two pixels per row.
 */

import type { EditorEvent } from "@tessera/core";

export type DecodedInput =
  | Readonly<{ kind: "quit" }>
  | Readonly<{ kind: "keyPress"; key: string }>
  | Extract<EditorEvent, { kind: "mouseMove" | "mouseDown" | "mouseUp" }>;

export type InputDecoder = Readonly<{
  /** Decode one chunk. Incomplete escape sequences carry over to the next chunk. */
  push: (chunk: string | Uint8Array) => readonly DecodedInput[];
  /**
   * Emit a lone ESC still held back from the last chunk as an escape key
   * press. Call once no further bytes are coming right away.
   */
  flush: () => readonly DecodedInput[];
}>;

const ESC = "\x1b";
const CTRL_C = "\x03";

const SGR_MOUSE = /\x1b\[<(\d+);(\d+);(\d+)([Mm])/y;
const SGR_MOUSE_PREFIX = /^\x1b\[<[\d;]*$/;
const CSI = /\x1b\[([\d;]*)([A-Za-z~])/y;
const CSI_PREFIX = /^\x1b\[[\d;]*$/;

const MOTION_BIT = 32;
const WHEEL_BIT = 64;
const BUTTON_MASK = 3;

const ARROWS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
});

const CONTROL_KEYS: Readonly<Record<string, string>> = Object.freeze({
  " ": "space",
  "\r": "enter",
  "\n": "enter",
  "\t": "tab",
  "\x7f": "backspace",
  "\b": "backspace",
});

function decodeMouse(code: number, col: number, row: number, final: string): DecodedInput | null {
  if ((code & WHEEL_BIT) !== 0) return null;
  const x = col - 1;
  const y = (row - 1) * 2;
  const button = code & BUTTON_MASK;
  if ((code & MOTION_BIT) !== 0) return { kind: "mouseMove", x, y };
  if (final === "m") return { kind: "mouseUp", button };
  return { kind: "mouseDown", button, x, y };
}

export function createInputDecoder(): InputDecoder {
  const utf8 = new TextDecoder();
  let pending = "";

  const push = (chunk: string | Uint8Array): readonly DecodedInput[] => {
    const carriedEsc = pending === ESC;
    const text = pending + (typeof chunk === "string" ? chunk : utf8.decode(chunk, { stream: true }));
    pending = "";
    const out: DecodedInput[] = [];

    let i = 0;
    while (i < text.length) {
      const ch = text.charAt(i);

      if (ch === CTRL_C) {
        out.push({ kind: "quit" });
        i++;
        continue;
      }

      if (ch === ESC) {
        if (i + 1 === text.length) {
          pending = ESC;
          break;
        }
        if (text.charAt(i + 1) !== "[") {
          if (i === 0 && carriedEsc) out.push({ kind: "keyPress", key: "escape" });
          // Alt+key arrives as ESC followed by the key; the key alone is kept.
          i++;
          continue;
        }

        SGR_MOUSE.lastIndex = i;
        const mouse = SGR_MOUSE.exec(text);
        if (mouse !== null) {
          const decoded = decodeMouse(
            Number(mouse[1]),
            Number(mouse[2]),
            Number(mouse[3]),
            mouse[4] ?? "M",
          );
          if (decoded !== null) out.push(decoded);
          i = SGR_MOUSE.lastIndex;
          continue;
        }

        CSI.lastIndex = i;
        const csi = CSI.exec(text);
        if (csi !== null) {
          const arrow = ARROWS[csi[2] ?? ""];
          if (arrow !== undefined) out.push({ kind: "keyPress", key: arrow });
          i = CSI.lastIndex;
          continue;
        }

        const rest = text.slice(i);
        if (SGR_MOUSE_PREFIX.test(rest) || CSI_PREFIX.test(rest)) {
          pending = rest;
          break;
        }
        i++;
        continue;
      }

      const named = CONTROL_KEYS[ch];
      if (named !== undefined) {
        out.push({ kind: "keyPress", key: named });
      } else if (/^[a-z0-9]$/i.test(ch)) {
        const key = ch.toLowerCase();
        out.push(key === "q" ? { kind: "quit" } : { kind: "keyPress", key });
      }
      i++;
    }
    return out;
  };

  const flush = (): readonly DecodedInput[] => {
    if (pending !== ESC) return [];
    pending = "";
    return [{ kind: "keyPress", key: "escape" }];
  };

  return Object.freeze({ push, flush });
}

/** Release delay covering the usual initial key-repeat delay. */
export const DEFAULT_KEY_RELEASE_MS = 550;

/** Held-key state synthesized from repeated presses. */
export class KeyHoldTracker {
  private readonly lastSeen = new Map<string, number>();

  constructor(private readonly releaseMs = DEFAULT_KEY_RELEASE_MS) {}

  isHeld(key: string): boolean {
    return this.lastSeen.has(key);
  }

  /** Record a press. Yields keyDown only for a key that was not held. */
  press(key: string, nowMs: number): readonly EditorEvent[] {
    const held = this.lastSeen.has(key);
    this.lastSeen.set(key, nowMs);
    return held ? [] : [{ kind: "keyDown", key }];
  }

  /** Release every key not pressed within the last `releaseMs`. */
  expire(nowMs: number): readonly EditorEvent[] {
    const out: EditorEvent[] = [];
    for (const [key, seen] of this.lastSeen) {
      if (nowMs - seen >= this.releaseMs) {
        this.lastSeen.delete(key);
        out.push({ kind: "keyUp", key });
      }
    }
    return out;
  }
}
