import { assert, assertApprox, createManualClock, describe, test } from "@tween-ui/testkit";
import { AnimationManager } from "../../animation/manager.js";
import { parseColor } from "../../color/color.js";
import { isTweenError } from "../../errors.js";
import { createLogger } from "../../logging.js";
import { AnimatedProgressBar, type AnimatedProgressBarOptions } from "../progressBar.js";

const SETTLE_MS = 600;

function setup(options: AnimatedProgressBarOptions = {}) {
  const clock = createManualClock();
  const logger = createLogger({ level: "silent" });
  const manager = new AnimationManager({ clock, logger });
  const bar = new AnimatedProgressBar({ id: "bar", manager, logger, ...options });
  return { clock, manager, bar };
}

describe("AnimatedProgressBar - value", () => {
  test("starts empty at the bottom of the default range", () => {
    const { bar } = setup();
    const appearance = bar.getAppearance();
    assert.equal(bar.getValue(), 0);
    assert.deepEqual(bar.getRange(), [0, 100]);
    assert.equal(appearance.indicator, 0);
    assert.equal(appearance.label, "0%");
    assert.deepEqual(appearance.background, parseColor("#ecf0f1"));
    assert.deepEqual(appearance.accent, parseColor("#3498db"));
  });

  test("setValue fills smoothly and reports when the fill arrives", () => {
    const { clock, bar } = setup();
    const reported: number[] = [];
    bar.onValueChanged((value) => reported.push(value));

    bar.setValue(42);
    assert.equal(bar.getValue(), 42);
    assert.deepEqual(reported, []);

    clock.advance(250);
    const shown = bar.getDisplayValue();
    assert.ok(shown > 0 && shown < 42);

    clock.advance(SETTLE_MS);
    assert.equal(bar.getProperty("indicator"), 0.42);
    assert.equal(bar.getAppearance().label, "42%");
    assert.deepEqual(reported, [42]);
  });

  test("a replaced fill reports only its own value", () => {
    const { clock, bar } = setup();
    const reported: number[] = [];
    bar.onValueChanged((value) => reported.push(value));
    bar.setValue(30);
    clock.advance(100);
    bar.setValue(80);
    clock.advance(SETTLE_MS);
    assert.deepEqual(reported, [80]);
    assertApprox(bar.getProperty("indicator"), 0.8);
  });

  test("values are clamped and unchanged values are ignored", () => {
    const { bar } = setup();
    const reported: number[] = [];
    bar.onValueChanged((value) => reported.push(value));
    bar.setValue(150, false);
    assert.equal(bar.getValue(), 100);
    assert.equal(bar.getAppearance().label, "100%");
    bar.setValue(100, false);
    bar.setValue(-5, false);
    assert.deepEqual(reported, [100, 0]);
  });

  test("non-finite values are rejected", () => {
    const { bar } = setup();
    assert.throws(
      () => bar.setValue(Number.NaN),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_VALUE"),
    );
  });

  test("increment, decrement, complete and reset step the value", () => {
    const { bar } = setup({ value: 10 });
    bar.increment(5, false);
    assert.equal(bar.getValue(), 15);
    bar.decrement(20, false);
    assert.equal(bar.getValue(), 0);
    bar.complete(false);
    assert.equal(bar.getValue(), 100);
    assert.equal(bar.getProperty("indicator"), 1);
    bar.reset(false);
    assert.equal(bar.getValue(), 0);
  });

  test("with animations disabled the fill jumps and reports at once", () => {
    const { bar } = setup({ config: { enableAnimations: false } });
    const reported: number[] = [];
    bar.onValueChanged((value) => reported.push(value));
    bar.setValue(25);
    assert.equal(bar.getProperty("indicator"), 0.25);
    assert.deepEqual(reported, [25]);
  });
});

describe("AnimatedProgressBar - range and text", () => {
  test("setRange keeps the value inside the new range", () => {
    const { bar } = setup({ value: 50 });
    bar.setRange(0, 200);
    assert.equal(bar.getValue(), 50);
    assert.equal(bar.getProperty("indicator"), 0.25);

    bar.setRange(60, 80);
    assert.equal(bar.getValue(), 60);
    assert.equal(bar.getProperty("indicator"), 0);
  });

  test("empty or inverted ranges are rejected", () => {
    assert.throws(
      () => setup({ min: 10, max: 10 }),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_CONFIG"),
    );
    const { bar } = setup();
    assert.throws(
      () => bar.setRange(5, 1),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_CONFIG"),
    );
  });

  test("the text format takes the value and the percentage", () => {
    const { bar } = setup({ min: 0, max: 200, value: 50, style: { textFormat: "{value}/{percent}" } });
    assert.equal(bar.getAppearance().label, "50/25");
    assert.equal(setup({ style: { showText: false } }).bar.getAppearance().label, "");
  });
});

describe("AnimatedProgressBar - indeterminate and pulse", () => {
  test("indeterminate mode sweeps until turned off", () => {
    const { clock, bar } = setup({ value: 40 });
    const reported: number[] = [];
    bar.onValueChanged((value) => reported.push(value));

    bar.setIndeterminate();
    assert.equal(bar.isIndeterminate(), true);
    assert.equal(bar.getAppearance().label, "");
    clock.advance(500);
    assertApprox(bar.getProperty("indicator"), 0.5, 0.05);

    bar.setValue(70);
    assert.deepEqual(reported, [70]);
    assert.equal(bar.isAnimating(), true);

    bar.setIndeterminate(false);
    assert.equal(bar.isAnimating(), false);
    assert.equal(bar.getProperty("indicator"), 0.7);
    assert.equal(bar.getAppearance().label, "70%");
  });

  test("pulsing breathes a glow in the pulse color until turned off", () => {
    const { clock, bar } = setup();
    bar.setPulsing();
    assert.equal(bar.isPulsing(), true);
    assert.deepEqual(bar.getAppearance().glowColor, parseColor("#ffffff"));

    clock.advance(750);
    const glow = bar.getProperty("glow");
    assert.ok(glow > 0 && glow <= 0.3);

    clock.advance(3000);
    assert.equal(bar.isAnimating(), true);

    bar.setPulsing(false);
    assert.equal(bar.getProperty("glow"), 0);
    assert.equal(bar.isAnimating(), false);
  });

  test("pulse opacity must be a fraction", () => {
    assert.throws(
      () => setup({ style: { pulseOpacity: 2 } }),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_CONFIG"),
    );
  });
});
