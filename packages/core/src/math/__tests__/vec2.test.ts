import { assert, describe, test } from "@tessera/testkit";
import {
  addScalarVec2,
  addVec2,
  divVec2,
  equalsVec2,
  floorVec2,
  formatVec2,
  mulVec2,
  negVec2,
  scaleVec2,
  subVec2,
  vec2,
  vec2Repeat,
} from "../vec2.js";

describe("math/vec2", () => {
  test("component-wise arithmetic", () => {
    const a = vec2(3, -2);
    const b = vec2(0.5, 4);
    assert.deepEqual(addVec2(a, b), vec2(3.5, 2));
    assert.deepEqual(subVec2(a, b), vec2(2.5, -6));
    assert.deepEqual(mulVec2(a, b), vec2(1.5, -8));
    assert.deepEqual(divVec2(a, b), vec2(6, -0.5));
    assert.deepEqual(scaleVec2(a, 2), vec2(6, -4));
    assert.deepEqual(addScalarVec2(a, 1), vec2(4, -1));
    assert.deepEqual(negVec2(a), vec2(-3, 2));
  });

  test("floor rounds toward negative infinity", () => {
    assert.deepEqual(floorVec2(vec2(1.75, -0.25)), vec2(1, -1));
  });

  test("values are frozen", () => {
    assert.equal(Object.isFrozen(vec2Repeat(2)), true);
    assert.deepEqual(vec2Repeat(2), vec2(2, 2));
  });

  test("equality and formatting", () => {
    assert.equal(equalsVec2(vec2(1, 2), vec2(1, 2)), true);
    assert.equal(equalsVec2(vec2(1, 2), vec2(2, 1)), false);
    assert.equal(formatVec2(vec2(1.5, -3)), "(1.5, -3)");
  });
});
