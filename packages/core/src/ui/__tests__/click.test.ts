import { assert, describe, test } from "@tessera/testkit";
import { type Vec2, vec2 } from "../../math/vec2.js";
import { createMemoryAssets, createRecordingBackend } from "../../testing/index.js";
import type { UiElement, UiElementKind } from "../types.js";
import { UiTree } from "../uiTree.js";

function createTree(): UiTree<string> {
  return new UiTree({
    backend: createRecordingBackend(),
    textures: createMemoryAssets({ textures: ["ui/panel.png"] }),
  });
}

function element(kind: UiElementKind, pos: Vec2, size: Vec2): UiElement {
  return { kind, pos, size, texture: 0 };
}

describe("ui/UiTree.click", () => {
  test("hits a button containing the point and misses outside it", () => {
    const tree = createTree();
    const id = tree.push(element("button", vec2(0.2, 0.2), vec2(0.3, 0.3)));
    assert.deepEqual(tree.click(vec2(0.3, 0.3)), { elementId: id });
    assert.equal(tree.click(vec2(0.6, 0.6)), null);
  });

  test("containment is inclusive on every edge", () => {
    const tree = createTree();
    tree.push(element("button", vec2(0.25, 0.25), vec2(0.25, 0.25)));
    for (const point of [vec2(0.25, 0.25), vec2(0.5, 0.5), vec2(0.25, 0.5), vec2(0.5, 0.25)]) {
      assert.deepEqual(tree.click(point), { elementId: [0] });
    }
    assert.equal(tree.click(vec2(0.5000001, 0.3)), null);
    assert.equal(tree.click(vec2(0.3, 0.2499999)), null);
  });

  test("panels never match but their button children do", () => {
    const tree = createTree();
    const panel = tree.push(element("panel", vec2(0, 0), vec2(1, 1)));
    tree.pushChild(panel, element("button", vec2(0.5, 0.5), vec2(0.25, 0.25)));
    assert.deepEqual(tree.click(vec2(0.6, 0.6)), { elementId: [0, 0] });
    assert.equal(tree.click(vec2(0.1, 0.1)), null);
  });

  test("a matching button wins over its own children", () => {
    const tree = createTree();
    const outer = tree.push(element("button", vec2(0, 0), vec2(1, 1)));
    tree.pushChild(outer, element("button", vec2(0, 0), vec2(1, 1)));
    assert.deepEqual(tree.click(vec2(0.5, 0.5)), { elementId: [0] });
  });

  test("the earlier node in preorder wins among overlapping buttons", () => {
    const tree = createTree();
    const panel = tree.push(element("panel", vec2(0, 0), vec2(1, 1)));
    tree.pushChild(panel, element("button", vec2(0, 0), vec2(0.5, 0.5)));
    tree.push(element("button", vec2(0, 0), vec2(0.5, 0.5)));
    assert.deepEqual(tree.click(vec2(0.25, 0.25)), { elementId: [0, 0] });
  });

  test("search continues past non-matching siblings", () => {
    const tree = createTree();
    const panel = tree.push(element("panel", vec2(0, 0), vec2(1, 1)));
    tree.pushChild(panel, element("button", vec2(0, 0), vec2(0.25, 0.25)));
    tree.pushChild(panel, element("button", vec2(0.5, 0), vec2(0.25, 0.25)));
    tree.push(element("button", vec2(0.5, 0.5), vec2(0.5, 0.5)));
    assert.deepEqual(tree.click(vec2(0.6, 0.1)), { elementId: [0, 1] });
    assert.deepEqual(tree.click(vec2(0.9, 0.9)), { elementId: [1] });
  });

  test("hit-testing follows animated geometry", () => {
    const tree = createTree();
    const panel = tree.push(element("panel", vec2(0, 0), vec2(1, 1)));
    tree.pushChild(panel, element("button", vec2(0.5, 0.5), vec2(0.5, 0.5)));
    assert.deepEqual(tree.click(vec2(0.75, 0.75)), { elementId: [0, 0] });

    tree.get(panel).set("scaleX", 0.5);
    tree.get(panel).set("scaleY", 0.5);
    assert.equal(tree.click(vec2(0.75, 0.75)), null);
    assert.deepEqual(tree.click(vec2(0.375, 0.375)), { elementId: [0, 0] });
  });

  test("an empty tree has no hits", () => {
    assert.equal(createTree().click(vec2(0.5, 0.5)), null);
  });
});
