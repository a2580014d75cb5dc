import { assert, describe, test } from "@tween-ui/testkit";
import { isTweenError } from "../../errors.js";
import {
  assertCompatibleValues,
  clamp01,
  interpolateColorSteps,
  interpolateValue,
  isRgba,
  lerp,
  lerpColor,
  valueKindOf,
} from "../interpolate.js";

const BLACK = { r: 0, g: 0, b: 0, a: 1 };
const WHITE = { r: 255, g: 255, b: 255, a: 1 };

describe("animation/interpolate", () => {
  test("clamp01 clamps non-finite and out-of-range values", () => {
    assert.equal(clamp01(Number.NaN), 0);
    assert.equal(clamp01(Number.POSITIVE_INFINITY), 0);
    assert.equal(clamp01(-0.5), 0);
    assert.equal(clamp01(0.25), 0.25);
    assert.equal(clamp01(2), 1);
  });

  test("lerp hits both endpoints and does not clamp t", () => {
    assert.equal(lerp(10, 30, 0), 10);
    assert.equal(lerp(10, 30, 1), 30);
    assert.equal(lerp(10, 30, 0.5), 20);
    assert.equal(lerp(10, 30, 1.5), 40);
    assert.equal(lerp(10, 30, -0.5), 0);
  });

  test("equal endpoints stay put for every t, overshoot included", () => {
    const teal = { r: 0, g: 128, b: 128, a: 0.4 };
    for (const t of [-1.5, -0.2, 0, 0.3, 0.5, 1, 1.1, 2.7]) {
      assert.equal(lerp(42, 42, t), 42, `number at t=${t}`);
      assert.equal(interpolateValue(-7.5, -7.5, t), -7.5, `value at t=${t}`);
      assert.deepEqual(lerpColor(teal, teal, t), teal, `color at t=${t}`);
      assert.deepEqual(interpolateValue(teal, teal, t), teal, `color value at t=${t}`);
    }
  });

  test("lerpColor rounds channels and keeps alpha as a float", () => {
    assert.deepEqual(lerpColor(BLACK, WHITE, 0.5), { r: 128, g: 128, b: 128, a: 1 });
    assert.deepEqual(lerpColor({ r: 0, g: 0, b: 0, a: 0 }, { r: 10, g: 0, b: 0, a: 1 }, 0.25), {
      r: 3,
      g: 0,
      b: 0,
      a: 0.25,
    });
  });

  test("lerpColor clamps overshoot into channel range", () => {
    assert.deepEqual(lerpColor(BLACK, WHITE, 1.2), WHITE);
    assert.deepEqual(lerpColor(BLACK, WHITE, -0.2), BLACK);
  });

  test("lerpColor returns frozen endpoints at t=0 and t=1", () => {
    const from = { r: 3, g: 40, b: 200, a: 0.5 };
    const to = { r: 250, g: 100, b: 0, a: 1 };
    const start = lerpColor(from, to, 0);
    assert.deepEqual(start, from);
    assert.deepEqual(lerpColor(from, to, 1), to);
    assert.equal(Object.isFrozen(start), true);
  });

  test("interpolateColorSteps includes both endpoints", () => {
    const steps = interpolateColorSteps(BLACK, { r: 255, g: 0, b: 0, a: 1 }, 4);
    assert.deepEqual(
      steps.map((c) => c.r),
      [0, 85, 170, 255],
    );
    assert.deepEqual(interpolateColorSteps(BLACK, WHITE, 0), []);
    assert.deepEqual(interpolateColorSteps(BLACK, WHITE, 1), [BLACK]);
  });

  test("isRgba and valueKindOf classify values", () => {
    assert.equal(isRgba(WHITE), true);
    assert.equal(isRgba({ r: 1, g: 2, b: 3 }), false);
    assert.equal(isRgba({ r: 1, g: 2, b: 3, a: Number.NaN }), false);
    assert.equal(valueKindOf(4), "number");
    assert.equal(valueKindOf(WHITE), "color");
    assert.throws(
      () => valueKindOf(Number.POSITIVE_INFINITY),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_VALUE"),
    );
    assert.throws(
      () => valueKindOf("red"),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_VALUE"),
    );
  });

  test("assertCompatibleValues rejects mixed kinds", () => {
    assert.equal(assertCompatibleValues(1, 2), "number");
    assert.equal(assertCompatibleValues(BLACK, WHITE), "color");
    assert.throws(
      () => assertCompatibleValues(1, WHITE),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_VALUE"),
    );
  });

  test("interpolateValue dispatches on value kind", () => {
    assert.equal(interpolateValue(0, 100, 0.25), 25);
    assert.deepEqual(interpolateValue(BLACK, WHITE, 0.5), { r: 128, g: 128, b: 128, a: 1 });
  });
});
