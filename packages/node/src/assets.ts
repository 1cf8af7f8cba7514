/**
 * packages/node/src/assets.ts - Editor assets from tile and UI directories.
 *
 * Every regular file in `tilesDir` becomes a palette tile named
 * "tiles/<file>", in file-name order. Files in `uiDir` are registered as
 * "ui/<file>". Subdirectories are skipped.
 */

import { readdirSync } from "node:fs";
import { join } from "node:path";
import {
  type AssetCatalog,
  type NamedTexture,
  TesseraError,
  createAssetCatalog,
  describeThrown,
} from "@tessera/core";
import type { Rgb } from "./backend/ansiBackend.js";
import { loadTextureColor } from "./texture.js";

export type LoadEditorAssetsOptions = Readonly<{
  tilesDir: string;
  uiDir: string;
}>;

function listTextureFiles(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw new TesseraError(
      "TESSERA_BACKEND_ERROR",
      `cannot read texture directory ${dir}: ${describeThrown(err)}`,
    );
  }
}

function loadDirectory(dir: string, prefix: string): NamedTexture<Rgb>[] {
  return listTextureFiles(dir).map((file): NamedTexture<Rgb> => [
    `${prefix}/${file}`,
    loadTextureColor(join(dir, file)),
  ]);
}

export function loadEditorAssets(opts: LoadEditorAssetsOptions): AssetCatalog<Rgb> {
  return createAssetCatalog({
    tiles: loadDirectory(opts.tilesDir, "tiles"),
    textures: loadDirectory(opts.uiDir, "ui"),
  });
}
