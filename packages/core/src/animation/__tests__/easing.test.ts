import { assert, assertApprox, describe, test } from "@tween-ui/testkit";
import { isTweenError } from "../../errors.js";
import { EASING_NAMES, isEasingName, resolveEasing } from "../easing.js";

describe("animation/easing", () => {
  test("exposes every built-in curve", () => {
    assert.deepEqual(EASING_NAMES, [
      "linear",
      "easeInQuad",
      "easeOutQuad",
      "easeInOutQuad",
      "easeInCubic",
      "easeOutCubic",
      "easeInOutCubic",
      "easeOutBounce",
      "easeOutElastic",
      "easeInBack",
      "easeOutBack",
      "easeInOutBack",
      "easeInCirc",
      "easeOutCirc",
      "easeInOutCirc",
    ]);
  });

  test("every curve maps 0 to 0 and 1 to 1", () => {
    for (const name of EASING_NAMES) {
      const ease = resolveEasing(name);
      assertApprox(ease(0), 0, 1e-9, `${name}(0)`);
      assertApprox(ease(1), 1, 1e-9, `${name}(1)`);
    }
  });

  test("progress outside [0..1] is clamped before evaluation", () => {
    const ease = resolveEasing("easeInQuad");
    assert.equal(ease(-2), 0);
    assert.equal(ease(5), 1);
    assert.equal(ease(Number.NaN), 0);
  });

  test("curves match their closed forms at midpoints", () => {
    assert.equal(resolveEasing("linear")(0.25), 0.25);
    assert.equal(resolveEasing("easeInQuad")(0.5), 0.25);
    assert.equal(resolveEasing("easeOutQuad")(0.5), 0.75);
    assert.equal(resolveEasing("easeInOutQuad")(0.25), 0.125);
    assert.equal(resolveEasing("easeInCubic")(0.5), 0.125);
    assert.equal(resolveEasing("easeOutCubic")(0.5), 0.875);
    assert.equal(resolveEasing("easeInOutCubic")(0.5), 0.5);
    assertApprox(resolveEasing("easeOutBounce")(0.5), 0.765625);
  });

  test("back and elastic curves overshoot without clamping", () => {
    assert.ok(resolveEasing("easeInBack")(0.2) < 0);
    assert.ok(resolveEasing("easeOutBack")(0.8) > 1);
    assert.ok(resolveEasing("easeOutElastic")(0.1) > 1);
  });

  test("unknown tags are rejected", () => {
    assert.equal(isEasingName("easeOutCubic"), true);
    assert.equal(isEasingName("toString"), false);
    assert.equal(isEasingName(42), false);

    assert.throws(
      () => resolveEasing("easeSideways"),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_EASING"),
    );
  });
});
