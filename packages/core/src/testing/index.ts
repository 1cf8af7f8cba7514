export { createMemoryAssets, type MemoryAssetsOptions } from "./memoryAssets.js";
export {
  createRecordingBackend,
  type RecordedBlit,
  type RecordingBackend,
} from "./recordingBackend.js";
