/**
 * packages/core/src/editor/index.ts - Tile editor public exports.
 */

export {
  type Camera,
  cameraSpeed,
  createCamera,
  screenToTile,
  tilePixelRect,
  tileToView,
  zoomStep,
} from "./camera.js";
export {
  DEFAULT_CAMERA_HEIGHT,
  DEFAULT_FPS,
  DEFAULT_PALETTE_OPEN_MS,
  type EditorConfig,
  type NormalizedEditorConfig,
  type ResolvedKeybind,
  frameDurationMs,
  normalizeEditorConfig,
} from "./config.js";
export {
  CONTROL_NAMES,
  type ControlName,
  ControlState,
  DEFAULT_KEYBINDS,
  type Keybind,
  type KeybindParseError,
  type KeybindSpec,
  type ParseKeybindResult,
  formatKeybind,
  keybindsEqual,
  parseKeybind,
} from "./controls.js";
export { type PaletteMode, TileEditor, type TileEditorOptions } from "./editor.js";
export { type EditorEvent, type EditorLogEvent, type EditorLogSink, makeLogSink } from "./events.js";
export {
  type MainUiIds,
  type PaletteAnimators,
  type PaletteLayout,
  UI_TEXTURES,
  buildMainUi,
  buildPaletteUi,
  createPaletteAnimators,
} from "./layout.js";
export { EMPTY_TILE, type Tile, isEmptyTile, tileFromPaletteIndex, tilePaletteIndex } from "./tile.js";
export {
  type AssetCatalog,
  type AssetCatalogInput,
  type NamedTexture,
  createAssetCatalog,
} from "./assetCatalog.js";
