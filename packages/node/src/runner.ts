/**
 * packages/node/src/runner.ts - Runs the tile editor in a terminal.
 *
 * Owns the terminal for the editor's lifetime: alternate screen, raw input,
 * mouse reporting. The terminal is restored on every exit path, including a
 * frame that throws.
 */

import {
  type Clock,
  DEFAULT_KEYBINDS,
  type EditorAssets,
  type EditorConfig,
  type EditorEvent,
  type EditorLogSink,
  type KeybindSpec,
  TileEditor,
  describeThrown,
  frameDurationMs,
  makeLogSink,
  monotonicClock,
  safeErr,
} from "@tessera/core";
import { type Rgb, type TerminalOutput, createAnsiBackend } from "./backend/ansiBackend.js";
import {
  DEFAULT_KEY_RELEASE_MS,
  type DecodedInput,
  KeyHoldTracker,
  createInputDecoder,
} from "./input.js";

export type TerminalInput = NodeJS.ReadableStream &
  Readonly<{
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
  }>;

export type NodeEditorOptions = Readonly<{
  assets: EditorAssets<Rgb>;
  config?: EditorConfig;
  log?: EditorLogSink;
  input?: TerminalInput;
  output?: TerminalOutput;
  /** How long a key counts as held after its last repeat. */
  keyReleaseMs?: number;
  clock?: Clock;
}>;

/** Terminals never report a bare Ctrl press, so zoom-in moves to "e". */
export const TERMINAL_KEYBINDS: readonly KeybindSpec[] = Object.freeze(
  DEFAULT_KEYBINDS.map(([binding, control]): KeybindSpec => [binding === "ctrl" ? "e" : binding, control]),
);

/** Resolves when the user quits; rejects with the error that stopped the editor. */
export function runNodeEditor(opts: NodeEditorOptions): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const input = opts.input ?? process.stdin;
    const output = opts.output ?? process.stdout;
    const log = makeLogSink(opts.log);
    const clock = opts.clock ?? monotonicClock;

    const backend = createAnsiBackend(output);
    const editor = new TileEditor({
      backend,
      assets: opts.assets,
      config: { ...opts.config, keybinds: opts.config?.keybinds ?? TERMINAL_KEYBINDS },
      clock,
      log,
    });
    const decoder = createInputDecoder();
    const holds = new KeyHoldTracker(opts.keyReleaseMs ?? DEFAULT_KEY_RELEASE_MS);
    const rawMode = input.isTTY === true && typeof input.setRawMode === "function";

    let finished = false;
    let timer: NodeJS.Timeout | undefined;
    let inputSinceTick = false;

    const finish = (err?: Error): void => {
      if (finished) return;
      finished = true;
      if (timer !== undefined) clearInterval(timer);
      input.off("data", onData);
      if (rawMode) input.setRawMode?.(false);
      input.pause();
      backend.leave();
      if (err === undefined) {
        log({ level: "info", message: "editor stopped" });
        resolve();
      } else {
        log({ level: "error", message: `editor failed: ${describeThrown(err)}` });
        reject(err);
      }
    };

    const dispatch = (events: readonly EditorEvent[]): void => {
      for (const event of events) {
        if (finished) return;
        if (!editor.handleEvent(event)) finish();
      }
    };

    const deliver = (inputs: readonly DecodedInput[]): void => {
      for (const decoded of inputs) {
        dispatch(decoded.kind === "keyPress" ? holds.press(decoded.key, clock()) : [decoded]);
      }
    };

    function onData(chunk: string | Buffer): void {
      inputSinceTick = true;
      try {
        deliver(decoder.push(chunk));
      } catch (err) {
        finish(safeErr(err));
      }
    }

    const tick = (): void => {
      try {
        // A lone ESC waits one quiet tick for the rest of an escape sequence.
        if (!inputSinceTick) deliver(decoder.flush());
        inputSinceTick = false;
        dispatch(holds.expire(clock()));
        if (!finished) editor.frame();
      } catch (err) {
        finish(safeErr(err));
      }
    };

    backend.enter();
    if (rawMode) input.setRawMode?.(true);
    input.on("data", onData);
    input.resume();
    const size = backend.windowSize();
    log({ level: "info", message: `editor started at ${String(size.x)}x${String(size.y)} pixels` });
    timer = setInterval(tick, frameDurationMs(editor.config.fps));
  });
}
