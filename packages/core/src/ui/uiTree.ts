/**
 * packages/core/src/ui/uiTree.ts - Retained UI forest with parent-relative geometry.
 *
 * Why: Nodes store position and size as fractions of their parent and cache
 * absolute (global) geometry. Every mutation recomputes the affected subtree
 * before returning, so for any node at any time:
 *
 *   child.global.pos  = parent.global.pos + child.pos * parent.global.size
 *   child.global.size = child.size * parent.global.size
 *   root.global       = root intrinsic
 *
 * Storage is an arena of records addressed by integer slots. Parent and child
 * links are slots, never object references.
 *
 * Traversal order (draw and click): depth-first preorder, roots in insertion
 * order, children left-to-right. click() returns the FIRST button containing
 * the point and does not descend into it.
 */

import type { RenderSurface, TextureId } from "../backend.js";
import { toPixelRect } from "../backend.js";
import { TesseraError } from "../errors.js";
import { type Vec2, addVec2, mulVec2, vec2 } from "../math/vec2.js";
import type { Animatable } from "../animation/types.js";
import { type ElementId, elementId, elementIdKey, pushElementId } from "./elementId.js";
import type {
  UiAnimatableId,
  UiElement,
  UiElementKind,
  UiGeometry,
  UiHit,
  UiNodeSnapshot,
} from "./types.js";

const NO_PARENT = -1;

export type UiNodeRecord = {
  readonly kind: UiElementKind;
  texture: TextureId;
  pos: Vec2;
  size: Vec2;
  globalPos: Vec2;
  globalSize: Vec2;
  /** Parent slot or NO_PARENT. Used only to dispatch recomputation upward. */
  readonly parent: number;
  readonly indexInParent: number;
  readonly children: number[];
};

type WalkEntry = Readonly<{ slot: number; id: ElementId }>;

/** Inclusive on all four edges. */
function containsPoint(record: UiNodeRecord, point: Vec2): boolean {
  const { globalPos: pos, globalSize: size } = record;
  return (
    point.x >= pos.x && point.x <= pos.x + size.x && point.y >= pos.y && point.y <= pos.y + size.y
  );
}

function snapshotRecord(id: ElementId, record: UiNodeRecord): UiNodeSnapshot {
  return Object.freeze({
    id,
    kind: record.kind,
    texture: record.texture,
    intrinsic: Object.freeze({ pos: record.pos, size: record.size }),
    global: Object.freeze({ pos: record.globalPos, size: record.globalSize }),
  });
}

/** Node storage shared by a tree and the handles it gives out. */
export class UiArena {
  private readonly records: UiNodeRecord[] = [];
  readonly roots: number[] = [];

  get size(): number {
    return this.records.length;
  }

  record(slot: number): UiNodeRecord {
    const record = this.records[slot];
    if (record === undefined) {
      throw new TesseraError("TESSERA_INVALID_ELEMENT_ID", `no UI node in slot ${String(slot)}`);
    }
    return record;
  }

  insert(element: UiElement, parent: number, indexInParent: number): number {
    const slot = this.records.length;
    this.records.push({
      kind: element.kind,
      texture: element.texture,
      pos: element.pos,
      size: element.size,
      globalPos: element.pos,
      globalSize: element.size,
      parent,
      indexInParent,
      children: [],
    });
    return slot;
  }

  resolve(id: ElementId): number {
    const [rootIndex, ...path] = id;
    let slot = this.roots[rootIndex];
    if (slot === undefined) {
      throw new TesseraError(
        "TESSERA_INVALID_ELEMENT_ID",
        `element id ${elementIdKey(id)}: no root at index ${String(rootIndex)}`,
      );
    }
    for (const childIndex of path) {
      const next: number | undefined = this.record(slot).children[childIndex];
      if (next === undefined) {
        throw new TesseraError(
          "TESSERA_INVALID_ELEMENT_ID",
          `element id ${elementIdKey(id)}: no child at index ${String(childIndex)}`,
        );
      }
      slot = next;
    }
    return slot;
  }

  /** Recompute one child's global geometry from its parent, then its subtree. */
  updateChild(parentSlot: number, childIndex: number): void {
    const parent = this.record(parentSlot);
    const childSlot = parent.children[childIndex];
    if (childSlot === undefined) return;
    const child = this.record(childSlot);
    child.globalPos = addVec2(parent.globalPos, mulVec2(child.pos, parent.globalSize));
    child.globalSize = mulVec2(child.size, parent.globalSize);
    this.updateChildren(childSlot);
  }

  updateChildren(slot: number): void {
    const count = this.record(slot).children.length;
    for (let i = 0; i < count; i++) {
      this.updateChild(slot, i);
    }
  }

  /** Restore the geometry invariant for the subtree rooted at `slot`. */
  update(slot: number): void {
    const record = this.record(slot);
    if (record.parent !== NO_PARENT) {
      this.updateChild(record.parent, record.indexInParent);
      return;
    }
    record.globalPos = record.pos;
    record.globalSize = record.size;
    this.updateChildren(slot);
  }

  setProperty(slot: number, property: UiAnimatableId, value: number): void {
    const record = this.record(slot);
    switch (property) {
      case "scaleX":
        record.size = vec2(value, record.size.y);
        break;
      case "scaleY":
        record.size = vec2(record.size.x, value);
        break;
      case "positionX":
        record.pos = vec2(value, record.pos.y);
        break;
      case "positionY":
        record.pos = vec2(record.pos.x, value);
        break;
    }
    this.update(slot);
  }

  /**
   * Depth-first preorder walk. Stops at the first node for which `visit`
   * returns a value, without visiting that node's children.
   */
  walk<T>(visit: (id: ElementId, record: UiNodeRecord) => T | undefined): T | undefined {
    const stack: WalkEntry[] = [];
    for (let i = this.roots.length - 1; i >= 0; i--) {
      const slot = this.roots[i];
      if (slot !== undefined) stack.push({ slot, id: elementId(i) });
    }

    let entry = stack.pop();
    while (entry !== undefined) {
      const record = this.record(entry.slot);
      const result = visit(entry.id, record);
      if (result !== undefined) return result;

      for (let i = record.children.length - 1; i >= 0; i--) {
        const childSlot = record.children[i];
        if (childSlot !== undefined) {
          stack.push({ slot: childSlot, id: pushElementId(entry.id, i) });
        }
      }
      entry = stack.pop();
    }
    return undefined;
  }
}

/**
 * Handle to one node. Acts as the Animatable target for UI animators.
 */
export class UiNodeHandle implements Animatable<UiAnimatableId> {
  constructor(
    private readonly arena: UiArena,
    private readonly slot: number,
    readonly id: ElementId,
  ) {}

  get kind(): UiElementKind {
    return this.arena.record(this.slot).kind;
  }

  get texture(): TextureId {
    return this.arena.record(this.slot).texture;
  }

  setTexture(texture: TextureId): void {
    this.arena.record(this.slot).texture = texture;
  }

  /** Mutate one intrinsic scalar and recompute this node's subtree. */
  set(property: UiAnimatableId, value: number): void {
    this.arena.setProperty(this.slot, property, value);
  }

  intrinsic(): UiGeometry {
    const record = this.arena.record(this.slot);
    return Object.freeze({ pos: record.pos, size: record.size });
  }

  global(): UiGeometry {
    const record = this.arena.record(this.slot);
    return Object.freeze({ pos: record.globalPos, size: record.globalSize });
  }

  geometry(): UiNodeSnapshot {
    return snapshotRecord(this.id, this.arena.record(this.slot));
  }
}

export class UiTree<H> {
  private readonly arena = new UiArena();

  constructor(private readonly surface: RenderSurface<H>) {}

  /** Total number of nodes in the forest. */
  get size(): number {
    return this.arena.size;
  }

  /** Append a root node. Its global geometry is its intrinsic geometry. */
  push(element: UiElement): ElementId {
    const index = this.arena.roots.length;
    const slot = this.arena.insert(element, NO_PARENT, index);
    this.arena.roots.push(slot);
    return elementId(index);
  }

  /** Append a child under `parentId`, placed relative to the parent's current global geometry. */
  pushChild(parentId: ElementId, element: UiElement): ElementId {
    const parentSlot = this.arena.resolve(parentId);
    const parent = this.arena.record(parentSlot);
    const index = parent.children.length;
    const slot = this.arena.insert(element, parentSlot, index);
    parent.children.push(slot);
    this.arena.updateChild(parentSlot, index);
    return pushElementId(parentId, index);
  }

  /** Throws TESSERA_INVALID_ELEMENT_ID for ids that address no node. */
  get(id: ElementId): UiNodeHandle {
    return new UiNodeHandle(this.arena, this.arena.resolve(id), id);
  }

  /** One blit per node in traversal order. No culling. */
  draw(): void {
    const { backend, textures } = this.surface;
    const windowSize = backend.windowSize();
    this.arena.walk((_id, record) => {
      const rect = toPixelRect(record.globalPos, record.globalSize, windowSize);
      backend.blit(textures.texture(record.texture), rect);
      return undefined;
    });
  }

  /** First button (preorder) whose global rect contains `point`, or null. */
  click(point: Vec2): UiHit | null {
    const hit = this.arena.walk((id, record): UiHit | undefined => {
      if (record.kind === "button" && containsPoint(record, point)) {
        return Object.freeze({ elementId: id });
      }
      return undefined;
    });
    return hit ?? null;
  }

  forEachNode(visit: (node: UiNodeSnapshot) => void): void {
    this.arena.walk((id, record) => {
      visit(snapshotRecord(id, record));
      return undefined;
    });
  }
}
