/**
 * packages/core/src/editor/assetCatalog.ts - Name-indexed texture catalogue.
 *
 * Tiles are registered first, in palette order, so tile `t` has texture id
 * `t - 1`. A name registered twice keeps its first id and handle.
 */

import type { EditorAssets, TextureId } from "../backend.js";
import { TesseraError } from "../errors.js";
import { type Tile, tilePaletteIndex } from "./tile.js";

export type NamedTexture<H> = readonly [name: string, handle: H];

export type AssetCatalogInput<H> = Readonly<{
  tiles: readonly NamedTexture<H>[];
  textures: readonly NamedTexture<H>[];
}>;

export type AssetCatalog<H> = EditorAssets<H> &
  Readonly<{
    /** Registered names in id order. */
    names: () => readonly string[];
  }>;

export function createAssetCatalog<H>(input: AssetCatalogInput<H>): AssetCatalog<H> {
  const names: string[] = [];
  const handles: H[] = [];
  const ids = new Map<string, TextureId>();
  const tileIds: TextureId[] = [];

  const add = ([name, handle]: NamedTexture<H>): TextureId => {
    const existing = ids.get(name);
    if (existing !== undefined) return existing;
    const id = names.length;
    names.push(name);
    handles.push(handle);
    ids.set(name, id);
    return id;
  };

  for (const tile of input.tiles) tileIds.push(add(tile));
  for (const texture of input.textures) add(texture);

  return Object.freeze({
    texture: (id: TextureId) => {
      const handle = Number.isInteger(id) ? handles[id] : undefined;
      if (handle === undefined) {
        throw new TesseraError("TESSERA_UNKNOWN_TEXTURE", `unknown texture id ${String(id)}`);
      }
      return handle;
    },
    textureId: (name: string) => {
      const id = ids.get(name);
      if (id === undefined) {
        throw new TesseraError("TESSERA_UNKNOWN_TEXTURE", `unknown texture "${name}"`);
      }
      return id;
    },
    tileTextureId: (tile: Tile) => {
      const id = tileIds[tilePaletteIndex(tile)];
      if (id === undefined) {
        throw new TesseraError("TESSERA_UNKNOWN_TEXTURE", `unknown tile ${String(tile)}`);
      }
      return id;
    },
    tileCount: () => tileIds.length,
    names: () => names,
  });
}
