/**
 * @tessera/node
 *
 * Terminal host for the Tessera tile editor.
 */

export {
  type AnsiBackend,
  type AnsiBackendOptions,
  type Rgb,
  type TerminalOutput,
  createAnsiBackend,
} from "./backend/ansiBackend.js";
export { type LoadEditorAssetsOptions, loadEditorAssets } from "./assets.js";
export {
  DEFAULT_KEY_RELEASE_MS,
  type DecodedInput,
  type InputDecoder,
  KeyHoldTracker,
  createInputDecoder,
} from "./input.js";
export { type FileLogSinkOptions, createFileLogSink, formatLogLine } from "./log.js";
export {
  type NodeEditorOptions,
  TERMINAL_KEYBINDS,
  type TerminalInput,
  runNodeEditor,
} from "./runner.js";
export { fnv1a, loadTextureColor, textureColor } from "./texture.js";
