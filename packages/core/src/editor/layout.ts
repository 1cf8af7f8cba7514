/**
 * packages/core/src/editor/layout.ts - Editor UI layout and palette animation.
 *
 * Positions are normalized window units, y-up. `aspect` is window
 * width / height and keeps square widgets square in pixels.
 */

import { Animator } from "../animation/animator.js";
import { easeIn } from "../animation/curve.js";
import { timedProperty } from "../animation/timedProperty.js";
import type { Clock } from "../animation/types.js";
import type { EditorAssets } from "../backend.js";
import { type Vec2, addScalarVec2, negVec2, scaleVec2, vec2 } from "../math/vec2.js";
import type { ElementId } from "../ui/elementId.js";
import type { UiAnimatableId } from "../ui/types.js";
import type { UiTree } from "../ui/uiTree.js";
import { type Tile, tileFromPaletteIndex } from "./tile.js";

export const UI_TEXTURES = Object.freeze({
  nextScene: "ui/plus.png",
  prevScene: "ui/minus.png",
  frame: "ui/white.png",
  background: "ui/background.png",
  panel: "ui/panel.png",
} as const);

export type MainUiIds = Readonly<{
  nextScene: ElementId;
  prevScene: ElementId;
  currentTile: ElementId;
}>;

export type PaletteLayout = Readonly<{
  panel: ElementId;
  /** Button ids in palette order. */
  tiles: readonly ElementId[];
  panelPos: Vec2;
  panelSize: Vec2;
}>;

const SCENE_BUTTON_WIDTH = 0.08;
const SCENE_BUTTON_HEIGHT = 0.07;
const SCENE_BUTTON_GAP = 0.02;
const CURRENT_TILE_SIZE = 0.1;
const CURRENT_TILE_MARGIN = 0.01;

export function buildMainUi<H>(
  ui: UiTree<H>,
  assets: EditorAssets<H>,
  aspect: number,
  currentTile: Tile,
): MainUiIds {
  const buttonSize = vec2(SCENE_BUTTON_WIDTH, SCENE_BUTTON_HEIGHT * aspect);
  const nextScene = ui.push({
    kind: "button",
    pos: vec2(1 - buttonSize.x, 1 - buttonSize.y),
    size: buttonSize,
    texture: assets.textureId(UI_TEXTURES.nextScene),
  });
  const prevScene = ui.push({
    kind: "button",
    pos: vec2(1 - buttonSize.x * 2 - SCENE_BUTTON_GAP, 1 - buttonSize.y),
    size: buttonSize,
    texture: assets.textureId(UI_TEXTURES.prevScene),
  });

  const framed = CURRENT_TILE_SIZE + CURRENT_TILE_MARGIN;
  ui.push({
    kind: "panel",
    pos: vec2(0, 1 - framed * aspect),
    size: vec2(framed, framed * aspect),
    texture: assets.textureId(UI_TEXTURES.frame),
  });
  const tileRect = {
    pos: vec2(0, 1 - CURRENT_TILE_SIZE * aspect),
    size: vec2(CURRENT_TILE_SIZE, CURRENT_TILE_SIZE * aspect),
  };
  ui.push({ kind: "panel", ...tileRect, texture: assets.textureId(UI_TEXTURES.background) });
  const current = ui.push({ kind: "button", ...tileRect, texture: assets.tileTextureId(currentTile) });

  return Object.freeze({ nextScene, prevScene, currentTile: current });
}

const PALETTE_MARGIN = 0.1;
const TILE_MARGIN = 0.045;
const TILE_PADDING = 0.1;

/** Centred square panel holding one button per tile on a near-square grid. */
export function buildPaletteUi<H>(
  ui: UiTree<H>,
  assets: EditorAssets<H>,
  aspect: number,
): PaletteLayout {
  let side = 1 - PALETTE_MARGIN * 2;
  if (aspect >= 1) side /= aspect;
  const panelSize = vec2(side, side * aspect);
  const panelPos = scaleVec2(addScalarVec2(negVec2(panelSize), 1), 0.5);

  const panel = ui.push({
    kind: "panel",
    pos: panelPos,
    size: panelSize,
    texture: assets.textureId(UI_TEXTURES.panel),
  });

  const count = assets.tileCount();
  const perRow = Math.ceil(Math.sqrt(count));
  const rowSize = perRow + (perRow - 1) * TILE_PADDING;
  const tileSize = (1 - TILE_MARGIN * 2) / rowSize;
  const step = tileSize * (1 + TILE_PADDING);

  const tiles: ElementId[] = [];
  for (let index = 0; index < count; index++) {
    const column = index % perRow;
    const row = Math.floor(index / perRow);
    tiles.push(
      ui.pushChild(panel, {
        kind: "button",
        pos: vec2(column * step + TILE_MARGIN, 1 - row * step - tileSize - TILE_MARGIN),
        size: vec2(tileSize, tileSize),
        texture: assets.tileTextureId(tileFromPaletteIndex(index)),
      }),
    );
  }

  return Object.freeze({ panel, tiles: Object.freeze(tiles), panelPos, panelSize });
}

export type PaletteAnimators = Readonly<{
  open: Animator<UiAnimatableId>;
  close: Animator<UiAnimatableId>;
}>;

const THIN_LINE = 0.02;
const X_STRENGTH = 0.7;
const Y_STRENGTH = 0.9;
const Y_SCALE_START = 0.2;
const X_SCALE_END = 0.4;

/**
 * The panel opens as a thin horizontal line that widens from the centre,
 * then grows vertically. Closing plays the same motion backwards.
 */
export function createPaletteAnimators(
  panelPos: Vec2,
  panelSize: Vec2,
  durationMs: number,
  clock?: Clock,
): PaletteAnimators {
  const xCurve = easeIn(X_STRENGTH);
  const yCurve = easeIn(Y_STRENGTH);
  const yWindow = [Y_SCALE_START, 1] as const;
  const xWindow = [0, X_SCALE_END] as const;

  const open = new Animator<UiAnimatableId>(
    [
      timedProperty("scaleY", [panelSize.y * THIN_LINE, panelSize.y], yCurve, yWindow),
      timedProperty("positionY", [panelSize.y / 2 + panelPos.y, panelPos.y], yCurve, yWindow),
      timedProperty("scaleX", [0, panelSize.x], xCurve, xWindow),
      timedProperty("positionX", [panelSize.x / 2 + panelPos.x, panelPos.x], xCurve, xWindow),
    ],
    durationMs,
    clock === undefined ? {} : { clock },
  );
  return Object.freeze({ open, close: open.reversed() });
}
