import { assert, describe, test } from "@tessera/testkit";
import { frameDurationMs, normalizeEditorConfig } from "../config.js";

const INVALID = { name: "TesseraError", code: "TESSERA_INVALID_CONFIG" } as const;

describe("editor/normalizeEditorConfig", () => {
  test("fills defaults", () => {
    const config = normalizeEditorConfig();
    assert.equal(config.fps, 60);
    assert.equal(config.cameraHeight, 10);
    assert.equal(config.paletteOpenMs, 200);
    assert.equal(config.keybinds.length, 10);
    assert.deepEqual(config.keybinds[0], [{ kind: "keyboard", key: "w" }, "forward"]);
    assert.deepEqual(config.keybinds[6], [{ kind: "mouse", button: 0 }, "createTile"]);
  });

  test("keeps explicit values and parses keybinds", () => {
    const config = normalizeEditorConfig({
      fps: 30,
      cameraHeight: 2.5,
      paletteOpenMs: 120,
      keybinds: [["Up", "forward"]],
    });
    assert.equal(config.fps, 30);
    assert.equal(config.cameraHeight, 2.5);
    assert.equal(config.paletteOpenMs, 120);
    assert.deepEqual(config.keybinds, [[{ kind: "keyboard", key: "up" }, "forward"]]);
  });

  test("rejects non-positive or non-integer fps", () => {
    assert.throws(() => normalizeEditorConfig({ fps: 0 }), INVALID);
    assert.throws(() => normalizeEditorConfig({ fps: 29.5 }), INVALID);
    assert.throws(() => normalizeEditorConfig({ fps: 5000 }), INVALID);
  });

  test("rejects bad heights, durations and bindings", () => {
    assert.throws(() => normalizeEditorConfig({ cameraHeight: Number.NaN }), INVALID);
    assert.throws(() => normalizeEditorConfig({ paletteOpenMs: -1 }), INVALID);
    assert.throws(() => normalizeEditorConfig({ keybinds: [["f13", "forward"]] }), INVALID);
  });

  test("frame duration is whole milliseconds", () => {
    assert.equal(frameDurationMs(60), 16);
    assert.equal(frameDurationMs(50), 20);
  });
});
