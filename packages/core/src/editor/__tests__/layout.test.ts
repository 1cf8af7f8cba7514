import { assert, createManualClock, describe, test } from "@tessera/testkit";
import type { Animatable } from "../../animation/types.js";
import { vec2 } from "../../math/vec2.js";
import { createMemoryAssets, createRecordingBackend } from "../../testing/index.js";
import type { UiAnimatableId } from "../../ui/types.js";
import { UiTree } from "../../ui/uiTree.js";
import { UI_TEXTURES, buildMainUi, buildPaletteUi, createPaletteAnimators } from "../layout.js";

function setup(tileCount: number) {
  const tiles = Array.from({ length: tileCount }, (_, i) => `tiles/${String(i)}.png`);
  const assets = createMemoryAssets({ tiles, textures: Object.values(UI_TEXTURES) });
  const ui = new UiTree({ backend: createRecordingBackend<string>(200, 100), textures: assets });
  return { assets, ui };
}

function recorder(): Animatable<UiAnimatableId> & { values: Map<UiAnimatableId, number> } {
  const values = new Map<UiAnimatableId, number>();
  return { values, set: (id, value) => values.set(id, value) };
}

describe("editor/layout.buildMainUi", () => {
  test("places scene buttons top right and the current tile top left", () => {
    const { assets, ui } = setup(2);
    const ids = buildMainUi(ui, assets, 2, 1);

    assert.deepEqual(ids.nextScene, [0]);
    assert.deepEqual(ids.prevScene, [1]);
    assert.deepEqual(ids.currentTile, [4]);
    assert.equal(ui.size, 5);

    assert.deepEqual(ui.get(ids.nextScene).global(), {
      pos: vec2(1 - 0.08, 1 - 0.07 * 2),
      size: vec2(0.08, 0.07 * 2),
    });
    assert.deepEqual(ui.get(ids.prevScene).global().pos, vec2(1 - 0.08 * 2 - 0.02, 1 - 0.07 * 2));
    assert.deepEqual(ui.get(ids.currentTile).global(), {
      pos: vec2(0, 1 - 0.1 * 2),
      size: vec2(0.1, 0.1 * 2),
    });
    assert.equal(ui.get(ids.currentTile).kind, "button");
    assert.equal(ui.get(ids.currentTile).texture, assets.tileTextureId(1));
    assert.equal(ui.get([2]).kind, "panel");
    assert.equal(ui.get([3]).kind, "panel");
  });
});

describe("editor/layout.buildPaletteUi", () => {
  test("centres a panel that is square in pixels", () => {
    const { assets, ui } = setup(4);
    const palette = buildPaletteUi(ui, assets, 2);
    assert.approxEqual(palette.panelSize.x, 0.4);
    assert.approxEqual(palette.panelSize.y, 0.8);
    assert.approxEqual(palette.panelPos.x, 0.3);
    assert.approxEqual(palette.panelPos.y, 0.1);
  });

  test("the panel uses the panel texture", () => {
    const { assets, ui } = setup(2);
    const palette = buildPaletteUi(ui, assets, 2);
    assert.equal(ui.get(palette.panel).texture, assets.textureId("ui/panel.png"));
    assert.notEqual(ui.get(palette.panel).texture, assets.textureId("ui/background.png"));
  });

  test("tall windows keep the full margin width", () => {
    const { assets, ui } = setup(1);
    const palette = buildPaletteUi(ui, assets, 0.5);
    assert.approxEqual(palette.panelSize.x, 0.8);
    assert.approxEqual(palette.panelSize.y, 0.4);
  });

  test("lays tiles out row by row, top first, on a ceil(sqrt(n)) grid", () => {
    const { assets, ui } = setup(5);
    const palette = buildPaletteUi(ui, assets, 1);
    assert.equal(palette.tiles.length, 5);
    assert.equal(ui.size, 6);

    const size = 0.91 / 3.2;
    const step = size * 1.1;
    const expected = [
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
    ] as const;
    palette.tiles.forEach((id, index) => {
      const [column, row] = expected[index] ?? [0, 0];
      const local = ui.get(id).intrinsic();
      assert.approxEqual(local.pos.x, column * step + 0.045);
      assert.approxEqual(local.pos.y, 1 - row * step - size - 0.045);
      assert.approxEqual(local.size.x, size);
      assert.equal(ui.get(id).texture, assets.tileTextureId(index + 1));
    });
  });

  test("an empty tile set yields a bare panel", () => {
    const { assets, ui } = setup(0);
    const palette = buildPaletteUi(ui, assets, 1);
    assert.deepEqual(palette.tiles, []);
    assert.equal(ui.size, 1);
  });
});

describe("editor/layout.createPaletteAnimators", () => {
  const panelPos = vec2(0.25, 0.125);
  const panelSize = vec2(0.5, 0.75);

  test("open starts as a thin centred line and ends at the panel rect", () => {
    const clock = createManualClock();
    const { open } = createPaletteAnimators(panelPos, panelSize, 200, clock.now);
    assert.equal(open.isPlaying(), false);

    open.reset();
    const start = recorder();
    open.animate(start);
    assert.approxEqual(start.values.get("scaleY") ?? -1, 0.75 * 0.02);
    assert.approxEqual(start.values.get("positionY") ?? -1, 0.375 + 0.125);
    assert.equal(start.values.get("scaleX"), 0);
    assert.equal(start.values.get("positionX"), 0.5);

    clock.advance(200);
    const end = recorder();
    assert.equal(open.animate(end), "over");
    assert.equal(end.values.get("scaleY"), 0.75);
    assert.equal(end.values.get("positionY"), 0.125);
    assert.equal(end.values.get("scaleX"), 0.5);
    assert.equal(end.values.get("positionX"), 0.25);
  });

  test("height holds until a fifth of the way in; width is done by two fifths", () => {
    const clock = createManualClock();
    const { open } = createPaletteAnimators(panelPos, panelSize, 200, clock.now);
    open.reset();

    clock.advance(40);
    const early = recorder();
    open.animate(early);
    assert.approxEqual(early.values.get("scaleY") ?? -1, 0.75 * 0.02);
    assert.ok((early.values.get("scaleX") ?? 0) > 0);

    clock.advance(40);
    const later = recorder();
    open.animate(later);
    assert.equal(later.values.get("scaleX"), 0.5);
    assert.equal(later.values.get("positionX"), 0.25);
  });

  test("close plays the open motion backwards", () => {
    const clock = createManualClock();
    const { close } = createPaletteAnimators(panelPos, panelSize, 200, clock.now);
    close.reset();
    const start = recorder();
    close.animate(start);
    assert.equal(start.values.get("scaleX"), 0.5);
    assert.equal(start.values.get("scaleY"), 0.75);

    clock.advance(200);
    const end = recorder();
    close.animate(end);
    assert.equal(end.values.get("scaleX"), 0);
    assert.approxEqual(end.values.get("scaleY") ?? -1, 0.75 * 0.02);
    assert.equal(close.isPlaying(), false);
  });
});
