import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { createFileLogSink } from "../log.js";

test("createFileLogSink appends one JSON line per event", () => {
  const dir = mkdtempSync(join(tmpdir(), "tessera-log-"));
  try {
    const file = join(dir, "editor.log");
    const log = createFileLogSink(file, { now: () => new Date(0) });
    log({ level: "info", message: "current scene: 1", scene: 1 });
    log({ level: "warn", message: "slow frame" });

    assert.equal(
      readFileSync(file, "utf8"),
      '{"time":"1970-01-01T00:00:00.000Z","level":"info","message":"current scene: 1","scene":1}\n' +
        '{"time":"1970-01-01T00:00:00.000Z","level":"warn","message":"slow frame"}\n',
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
