/**
 * packages/core/src/editor/controls.ts - Held-state controls and keybinds.
 *
 * Format examples:
 *   - Keyboard key: "w", "space", "ctrl"
 *   - Mouse button: "mouse:0" (left), "mouse:2" (right)
 *
 * Several bindings may drive one control. When one binding appears twice,
 * only its first entry counts.
 */

export type ControlName =
  | "forward"
  | "back"
  | "right"
  | "left"
  | "zoomOut"
  | "zoomIn"
  | "createTile"
  | "deleteTile";

export const CONTROL_NAMES: readonly ControlName[] = Object.freeze([
  "forward",
  "back",
  "right",
  "left",
  "zoomOut",
  "zoomIn",
  "createTile",
  "deleteTile",
]);

export type Keybind =
  | Readonly<{ kind: "keyboard"; key: string }>
  | Readonly<{ kind: "mouse"; button: number }>;

/** Unparsed binding: `[binding text, control]`. */
export type KeybindSpec = readonly [binding: string, control: ControlName];

export type KeybindParseError = Readonly<{
  code: "EMPTY_BINDING" | "INVALID_KEY" | "INVALID_BUTTON";
  detail: string;
}>;

export type ParseKeybindResult =
  | Readonly<{ ok: true; value: Keybind }>
  | Readonly<{ ok: false; error: KeybindParseError }>;

export const DEFAULT_KEYBINDS: readonly KeybindSpec[] = Object.freeze([
  ["w", "forward"],
  ["s", "back"],
  ["a", "left"],
  ["d", "right"],
  ["space", "zoomOut"],
  ["ctrl", "zoomIn"],
  ["mouse:0", "createTile"],
  ["z", "createTile"],
  ["mouse:2", "deleteTile"],
  ["x", "deleteTile"],
] as const);

const NAMED_KEYS: ReadonlySet<string> = new Set([
  "space",
  "ctrl",
  "shift",
  "alt",
  "tab",
  "enter",
  "escape",
  "backspace",
  "up",
  "down",
  "left",
  "right",
]);

const MAX_MOUSE_BUTTON = 7;
const MOUSE_PREFIX = "mouse:";

export function parseKeybind(text: string): ParseKeybindResult {
  const lower = text.trim().toLowerCase();
  if (lower.length === 0) {
    return { ok: false, error: { code: "EMPTY_BINDING", detail: "empty binding" } };
  }

  if (lower.startsWith(MOUSE_PREFIX)) {
    const raw = lower.slice(MOUSE_PREFIX.length);
    const button = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (!Number.isInteger(button) || button > MAX_MOUSE_BUTTON) {
      return {
        ok: false,
        error: { code: "INVALID_BUTTON", detail: `invalid mouse button in "${text}"` },
      };
    }
    return { ok: true, value: Object.freeze({ kind: "mouse", button }) };
  }

  if (/^[a-z0-9]$/.test(lower) || NAMED_KEYS.has(lower)) {
    return { ok: true, value: Object.freeze({ kind: "keyboard", key: lower }) };
  }
  return { ok: false, error: { code: "INVALID_KEY", detail: `unknown key "${text}"` } };
}

export function keybindsEqual(a: Keybind, b: Keybind): boolean {
  if (a.kind === "keyboard" && b.kind === "keyboard") return a.key === b.key;
  if (a.kind === "mouse" && b.kind === "mouse") return a.button === b.button;
  return false;
}

export function formatKeybind(bind: Keybind): string {
  return bind.kind === "keyboard" ? bind.key : `${MOUSE_PREFIX}${String(bind.button)}`;
}

/** Pressed/released state of every control. */
export class ControlState {
  private readonly pressedControls = new Set<ControlName>();

  constructor(private readonly bindings: readonly (readonly [Keybind, ControlName])[]) {}

  /** Apply a press or release. Returns the control it drove, if any. */
  apply(bind: Keybind, pressed: boolean): ControlName | null {
    const entry = this.bindings.find(([candidate]) => keybindsEqual(candidate, bind));
    if (entry === undefined) return null;
    const control = entry[1];
    if (pressed) {
      this.pressedControls.add(control);
    } else {
      this.pressedControls.delete(control);
    }
    return control;
  }

  pressed(control: ControlName): boolean {
    return this.pressedControls.has(control);
  }
}
