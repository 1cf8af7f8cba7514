/**
 * packages/node/src/log.ts - Append-only JSON-lines log file.
 *
 * The editor owns the terminal, so log events go to a file instead.
 */

import { appendFileSync } from "node:fs";
import type { EditorLogEvent, EditorLogSink } from "@tessera/core";

export type FileLogSinkOptions = Readonly<{
  /** Defaults to wall-clock time. */
  now?: () => Date;
}>;

export function formatLogLine(event: EditorLogEvent, time: Date): string {
  return `${JSON.stringify({ time: time.toISOString(), ...event })}\n`;
}

export function createFileLogSink(path: string, opts: FileLogSinkOptions = {}): EditorLogSink {
  const now = opts.now ?? (() => new Date());
  return (event) => {
    appendFileSync(path, formatLogLine(event, now()));
  };
}
