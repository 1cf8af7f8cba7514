import assert from "node:assert/strict";
import test from "node:test";
import { parseArgs } from "../cli.js";

const INVALID = { name: "TesseraError", code: "TESSERA_INVALID_CONFIG" } as const;

test("parseArgs defaults", () => {
  assert.deepEqual(parseArgs([]), { tilesDir: "./tiles", uiDir: "./ui", help: false });
});

test("parseArgs accepts separate and inline values", () => {
  assert.deepEqual(parseArgs(["--tiles", "art/tiles", "--ui=art/ui", "--fps=30", "--log", "e.log"]), {
    tilesDir: "art/tiles",
    uiDir: "art/ui",
    fps: 30,
    logFile: "e.log",
    help: false,
  });
  assert.equal(parseArgs(["-h"]).help, true);
});

test("TESSERA_LOG sets the log file unless --log is given", () => {
  assert.equal(parseArgs([], { TESSERA_LOG: "env.log" }).logFile, "env.log");
  assert.equal(parseArgs([], { TESSERA_LOG: "  " }).logFile, undefined);
  assert.equal(parseArgs(["--log", "flag.log"], { TESSERA_LOG: "env.log" }).logFile, "flag.log");
});

test("parseArgs rejects bad input", () => {
  assert.throws(() => parseArgs(["--fps", "fast"]), INVALID);
  assert.throws(() => parseArgs(["--tiles"]), INVALID);
  assert.throws(() => parseArgs(["--verbose"]), INVALID);
  assert.throws(() => parseArgs(["extra"]), INVALID);
});
