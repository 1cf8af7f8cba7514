import { assert, describe, test } from "@tessera/testkit";
import { createAssetCatalog } from "../assetCatalog.js";

const UNKNOWN = { name: "TesseraError", code: "TESSERA_UNKNOWN_TEXTURE" } as const;

describe("editor/createAssetCatalog", () => {
  const catalog = createAssetCatalog<number>({
    tiles: [
      ["tiles/grass.png", 0x00ff00],
      ["tiles/water.png", 0x0000ff],
    ],
    textures: [
      ["ui/plus.png", 0xffffff],
      ["tiles/grass.png", 0x123456],
    ],
  });

  test("tiles take the first ids in palette order", () => {
    assert.equal(catalog.tileCount(), 2);
    assert.equal(catalog.tileTextureId(1), 0);
    assert.equal(catalog.tileTextureId(2), 1);
    assert.equal(catalog.texture(catalog.tileTextureId(2)), 0x0000ff);
  });

  test("a repeated name keeps its first handle", () => {
    assert.deepEqual(catalog.names(), ["tiles/grass.png", "tiles/water.png", "ui/plus.png"]);
    assert.equal(catalog.texture(catalog.textureId("tiles/grass.png")), 0x00ff00);
    assert.equal(catalog.texture(catalog.textureId("ui/plus.png")), 0xffffff);
  });

  test("unknown names, ids and tiles throw", () => {
    assert.throws(() => catalog.textureId("ui/missing.png"), UNKNOWN);
    assert.throws(() => catalog.texture(3), UNKNOWN);
    assert.throws(() => catalog.texture(0.5), UNKNOWN);
    assert.throws(() => catalog.tileTextureId(0), UNKNOWN);
    assert.throws(() => catalog.tileTextureId(3), UNKNOWN);
  });
});
