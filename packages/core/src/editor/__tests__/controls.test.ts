import { assert, describe, test } from "@tessera/testkit";
import { ControlState, type Keybind, formatKeybind, parseKeybind } from "../controls.js";

const key = (name: string): Keybind => ({ kind: "keyboard", key: name });
const mouse = (button: number): Keybind => ({ kind: "mouse", button });

describe("editor/controls.parseKeybind", () => {
  test("parses keys case-insensitively and trims", () => {
    assert.deepEqual(parseKeybind("W"), { ok: true, value: key("w") });
    assert.deepEqual(parseKeybind(" Space "), { ok: true, value: key("space") });
    assert.deepEqual(parseKeybind("7"), { ok: true, value: key("7") });
  });

  test("parses mouse buttons", () => {
    assert.deepEqual(parseKeybind("mouse:0"), { ok: true, value: mouse(0) });
    assert.deepEqual(parseKeybind("MOUSE:2"), { ok: true, value: mouse(2) });
  });

  test("rejects malformed bindings with a code", () => {
    const codes = ["", "f13", "ctrl+w", "mouse:", "mouse:x", "mouse:8", "mouse:-1"].map((text) => {
      const result = parseKeybind(text);
      return result.ok ? "ok" : result.error.code;
    });
    assert.deepEqual(codes, [
      "EMPTY_BINDING",
      "INVALID_KEY",
      "INVALID_KEY",
      "INVALID_BUTTON",
      "INVALID_BUTTON",
      "INVALID_BUTTON",
      "INVALID_BUTTON",
    ]);
  });

  test("formatKeybind renders the parseable form", () => {
    assert.equal(formatKeybind(key("space")), "space");
    assert.equal(formatKeybind(mouse(2)), "mouse:2");
  });
});

describe("editor/ControlState", () => {
  test("tracks press and release per control", () => {
    const controls = new ControlState([
      [key("w"), "forward"],
      [mouse(0), "createTile"],
    ]);
    assert.equal(controls.apply(key("w"), true), "forward");
    assert.equal(controls.pressed("forward"), true);
    assert.equal(controls.pressed("createTile"), false);
    assert.equal(controls.apply(key("w"), false), "forward");
    assert.equal(controls.pressed("forward"), false);
  });

  test("unbound input is ignored", () => {
    const controls = new ControlState([[key("w"), "forward"]]);
    assert.equal(controls.apply(key("q"), true), null);
    assert.equal(controls.apply(mouse(1), true), null);
  });

  test("only the first entry for a binding counts", () => {
    const controls = new ControlState([
      [key("w"), "forward"],
      [key("w"), "back"],
    ]);
    controls.apply(key("w"), true);
    assert.equal(controls.pressed("forward"), true);
    assert.equal(controls.pressed("back"), false);
  });

  test("any binding of a control releases it", () => {
    const controls = new ControlState([
      [mouse(0), "createTile"],
      [key("z"), "createTile"],
    ]);
    controls.apply(key("z"), true);
    controls.apply(mouse(0), false);
    assert.equal(controls.pressed("createTile"), false);
  });
});
