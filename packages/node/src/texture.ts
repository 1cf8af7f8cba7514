/**
 * packages/node/src/texture.ts - Flat colour for a texture file.
 *
 * The terminal backend draws each texture as one colour. A file whose text is
 * a hex colour ("#3a7d44" or "3a7d44") uses that colour; any other file gets
 * a stable colour hashed from its bytes.
 */

import { readFileSync } from "node:fs";
import type { Rgb } from "./backend/ansiBackend.js";

const HEX_COLOR = /^#?([0-9a-f]{6})$/i;
const MAX_HEX_FILE_BYTES = 16;
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** 32-bit FNV-1a over `bytes`. */
export function fnv1a(bytes: Uint8Array): number {
  let hash = FNV_OFFSET;
  for (const byte of bytes) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function textureColor(bytes: Uint8Array): Rgb {
  if (bytes.length <= MAX_HEX_FILE_BYTES) {
    const match = HEX_COLOR.exec(new TextDecoder().decode(bytes).trim());
    if (match?.[1] !== undefined) return Number.parseInt(match[1], 16);
  }
  return fnv1a(bytes) & 0xffffff;
}

export function loadTextureColor(path: string): Rgb {
  if (path.length === 0) {
    throw new TypeError("loadTextureColor(path): path must be a non-empty string");
  }
  return textureColor(new Uint8Array(readFileSync(path)));
}
