/**
 * packages/core/src/editor/events.ts - Input events consumed by the editor.
 *
 * Pointer coordinates are window pixels, y-down, origin top-left.
 */

export type EditorEvent =
  | Readonly<{ kind: "quit" }>
  | Readonly<{ kind: "keyDown"; key: string }>
  | Readonly<{ kind: "keyUp"; key: string }>
  | Readonly<{ kind: "mouseMove"; x: number; y: number }>
  | Readonly<{ kind: "mouseDown"; button: number; x: number; y: number }>
  | Readonly<{ kind: "mouseUp"; button: number }>;

export type EditorLogEvent = Readonly<{
  level: "info" | "warn" | "error";
  message: string;
  scene?: number;
  tile?: number;
}>;

export type EditorLogSink = (event: EditorLogEvent) => void;

export function makeLogSink(log: EditorLogSink | undefined): EditorLogSink {
  if (typeof log === "function") return log;
  return () => {};
}
