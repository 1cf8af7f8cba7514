/**
 * packages/core/src/editor/editor.ts - Tile editor state machine.
 *
 * The host feeds input through handleEvent() and calls frame() once per
 * tick. Per frame:
 *   1. Pan and zoom the camera from held controls.
 *   2. Paint or erase the tile under the pointer.
 *   3. Draw scene tiles, then the main UI, then the palette while it is
 *      open or still closing.
 */

import type { Clock } from "../animation/types.js";
import type { EditorAssets, RenderBackend, RenderSurface } from "../backend.js";
import { TesseraError } from "../errors.js";
import { Scene } from "../grid/scene.js";
import { type Vec2, VEC2_ZERO, vec2 } from "../math/vec2.js";
import { type ElementId, elementIdEquals, elementIdKey } from "../ui/elementId.js";
import { UiTree } from "../ui/uiTree.js";
import {
  type Camera,
  cameraSpeed,
  createCamera,
  screenToTile,
  tilePixelRect,
  zoomStep,
} from "./camera.js";
import { type EditorConfig, type NormalizedEditorConfig, frameDurationMs, normalizeEditorConfig } from "./config.js";
import { type ControlName, ControlState, type Keybind } from "./controls.js";
import { type EditorEvent, type EditorLogSink, makeLogSink } from "./events.js";
import {
  type MainUiIds,
  type PaletteAnimators,
  type PaletteLayout,
  buildMainUi,
  buildPaletteUi,
  createPaletteAnimators,
} from "./layout.js";
import { EMPTY_TILE, type Tile, isEmptyTile, tileFromPaletteIndex } from "./tile.js";

export type PaletteMode = "closed" | "open";

export type TileEditorOptions<H> = Readonly<{
  backend: RenderBackend<H>;
  assets: EditorAssets<H>;
  config?: EditorConfig;
  /** Millisecond time source for palette animation. */
  clock?: Clock;
  log?: EditorLogSink;
}>;

const LEFT_BUTTON = 0;

export class TileEditor<H> {
  readonly config: NormalizedEditorConfig;
  private readonly backend: RenderBackend<H>;
  private readonly assets: EditorAssets<H>;
  private readonly log: EditorLogSink;
  private readonly windowPx: Vec2;
  private readonly controls: ControlState;
  private readonly scenes: Scene[] = [];
  private readonly ui: UiTree<H>;
  private readonly paletteUi: UiTree<H>;
  private readonly mainIds: MainUiIds;
  private readonly palette: PaletteLayout;
  private readonly animators: PaletteAnimators;

  private cameraState: Camera;
  private sceneIndex = 0;
  private tile: Tile;
  private paletteMode: PaletteMode = "closed";
  private pointerPx: Vec2 = VEC2_ZERO;

  constructor(opts: TileEditorOptions<H>) {
    this.config = normalizeEditorConfig(opts.config);
    this.backend = opts.backend;
    this.assets = opts.assets;
    this.log = makeLogSink(opts.log);
    this.windowPx = opts.backend.windowSize();
    this.controls = new ControlState(this.config.keybinds);
    this.cameraState = createCamera(this.config.cameraHeight);
    if (opts.assets.tileCount() === 0) {
      throw new TesseraError("TESSERA_INVALID_CONFIG", "at least one tile texture is required");
    }
    this.tile = tileFromPaletteIndex(0);

    const surface: RenderSurface<H> = Object.freeze({ backend: opts.backend, textures: opts.assets });
    const aspect = this.windowPx.x / this.windowPx.y;
    this.ui = new UiTree(surface);
    this.mainIds = buildMainUi(this.ui, opts.assets, aspect, this.tile);
    this.paletteUi = new UiTree(surface);
    this.palette = buildPaletteUi(this.paletteUi, opts.assets, aspect);
    this.animators = createPaletteAnimators(
      this.palette.panelPos,
      this.palette.panelSize,
      this.config.paletteOpenMs,
      opts.clock,
    );
    this.ensureScene();
  }

  get camera(): Camera {
    return this.cameraState;
  }

  get currentScene(): number {
    return this.sceneIndex;
  }

  get currentTile(): Tile {
    return this.tile;
  }

  get mode(): PaletteMode {
    return this.paletteMode;
  }

  get sceneCount(): number {
    return this.scenes.length;
  }

  scene(index: number): Scene | undefined {
    return this.scenes[index];
  }

  isPressed(control: ControlName): boolean {
    return this.controls.pressed(control);
  }

  /** Apply one input event. Returns false when the editor should quit. */
  handleEvent(event: EditorEvent): boolean {
    switch (event.kind) {
      case "quit":
        return false;
      case "keyDown":
        this.controls.apply({ kind: "keyboard", key: event.key }, true);
        return true;
      case "keyUp":
        this.controls.apply({ kind: "keyboard", key: event.key }, false);
        return true;
      case "mouseMove":
        this.pointerPx = vec2(event.x, event.y);
        return true;
      case "mouseDown": {
        this.pointerPx = vec2(event.x, event.y);
        if (event.button === LEFT_BUTTON && this.clickUi()) return true;
        if (this.paletteMode === "open") return true;
        this.controls.apply(mouse(event.button), true);
        return true;
      }
      case "mouseUp":
        this.controls.apply(mouse(event.button), false);
        return true;
    }
  }

  frame(): void {
    this.ensureScene();
    this.moveCamera();
    this.paint();

    this.backend.clear();
    this.drawScene();
    this.ui.draw();
    if (this.paletteMode === "open") {
      this.animators.open.animate(this.paletteUi.get(this.palette.panel));
      this.paletteUi.draw();
    } else if (this.animators.close.isPlaying()) {
      this.animators.close.animate(this.paletteUi.get(this.palette.panel));
      this.paletteUi.draw();
    }
    this.backend.present();
  }

  /** True when a UI layer consumed the click at the pointer. */
  private clickUi(): boolean {
    const point = vec2(this.pointerPx.x / this.windowPx.x, 1 - this.pointerPx.y / this.windowPx.y);

    const hit = this.ui.click(point);
    if (hit !== null) {
      this.handleMainUi(hit.elementId);
      return true;
    }

    if (this.paletteMode === "open") {
      const pick = this.paletteUi.click(point);
      if (pick !== null) this.handlePalette(pick.elementId);
      return true;
    }
    return false;
  }

  private handleMainUi(id: ElementId): void {
    if (elementIdEquals(id, this.mainIds.nextScene)) {
      this.sceneIndex += 1;
      this.log({ level: "info", message: `current scene: ${String(this.sceneIndex)}`, scene: this.sceneIndex });
    } else if (elementIdEquals(id, this.mainIds.prevScene)) {
      this.sceneIndex = Math.max(0, this.sceneIndex - 1);
      this.log({ level: "info", message: `current scene: ${String(this.sceneIndex)}`, scene: this.sceneIndex });
    } else if (elementIdEquals(id, this.mainIds.currentTile)) {
      this.togglePalette();
    } else {
      throw unhandled(id);
    }
  }

  private handlePalette(id: ElementId): void {
    const index = this.palette.tiles.findIndex((tileId) => elementIdEquals(tileId, id));
    if (index < 0) throw unhandled(id);
    this.tile = tileFromPaletteIndex(index);
    this.ui.get(this.mainIds.currentTile).setTexture(this.assets.tileTextureId(this.tile));
    this.log({ level: "info", message: `picked tile ${String(this.tile)}`, tile: this.tile });
  }

  private togglePalette(): void {
    if (this.paletteMode === "open") {
      this.paletteMode = "closed";
      this.animators.close.reset();
      this.log({ level: "info", message: "palette closed" });
    } else {
      this.paletteMode = "open";
      this.animators.open.reset();
      this.log({ level: "info", message: "palette opened" });
    }
  }

  private ensureScene(): void {
    while (this.scenes.length <= this.sceneIndex) {
      this.scenes.push(new Scene());
    }
  }

  private activeScene(): Scene {
    this.ensureScene();
    const scene = this.scenes[this.sceneIndex];
    if (scene === undefined) {
      throw new TesseraError("TESSERA_OUT_OF_BOUNDS", `scene ${String(this.sceneIndex)} missing`);
    }
    return scene;
  }

  private moveCamera(): void {
    const frameMs = frameDurationMs(this.config.fps);
    const speed = cameraSpeed(this.cameraState, frameMs);
    let { x, y } = this.cameraState.pos;
    let height = this.cameraState.height;

    if (this.controls.pressed("forward")) {
      y += speed;
    } else if (this.controls.pressed("back")) {
      y -= speed;
    }
    if (this.controls.pressed("right")) {
      x += speed;
    } else if (this.controls.pressed("left")) {
      x -= speed;
    }

    const zoom = zoomStep(frameMs);
    if (this.controls.pressed("zoomOut")) {
      height /= zoom;
    } else if (this.controls.pressed("zoomIn")) {
      height *= zoom;
    }
    this.cameraState = createCamera(height, vec2(x, y));
  }

  private paint(): void {
    const create = this.controls.pressed("createTile");
    if (!create && !this.controls.pressed("deleteTile")) return;
    const tile = create ? this.tile : EMPTY_TILE;
    const pos = screenToTile(this.cameraState, this.pointerPx, this.windowPx);
    this.activeScene().set(pos, tile);
  }

  private drawScene(): void {
    for (const [pos, tile] of this.activeScene().entries()) {
      if (isEmptyTile(tile)) continue;
      const rect = tilePixelRect(this.cameraState, pos, this.windowPx);
      this.backend.blit(this.assets.texture(this.assets.tileTextureId(tile)), rect);
    }
  }
}

function mouse(button: number): Keybind {
  return { kind: "mouse", button };
}

function unhandled(id: ElementId): TesseraError {
  return new TesseraError("TESSERA_UNHANDLED_ELEMENT", `no handler for element ${elementIdKey(id)}`);
}
