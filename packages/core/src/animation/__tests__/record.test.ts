import { assert, describe, test } from "@tween-ui/testkit";
import { isTweenError } from "../../errors.js";
import { normalizeAnimationConfig } from "../config.js";
import {
  type AnimationRecord,
  advanceRecord,
  cancelRecord,
  createAnimationRecord,
  failRecord,
  isRecordActive,
  settleRecordPass,
} from "../record.js";
import type { AnimationConfig } from "../types.js";

function numberRecord(config: AnimationConfig, nowMs = 0): AnimationRecord<number> {
  return createAnimationRecord({
    id: "fade",
    from: 0,
    to: 100,
    config: normalizeAnimationConfig({ easing: "linear", ...config }),
    nowMs,
    onUpdate: () => {},
  });
}

describe("animation/record", () => {
  test("starts pending and forward", () => {
    const record = numberRecord({ duration: 100 });
    assert.equal(record.state, "pending");
    assert.equal(record.direction, "forward");
    assert.equal(record.currentRepeat, 0);
    assert.equal(record.kind, "number");
    assert.equal(isRecordActive(record), true);
  });

  test("rejects mismatched endpoints", () => {
    assert.throws(
      () =>
        createAnimationRecord<number | { r: number; g: number; b: number; a: number }>({
          id: "mixed",
          from: 0,
          to: { r: 0, g: 0, b: 0, a: 1 },
          config: normalizeAnimationConfig(undefined),
          nowMs: 0,
          onUpdate: () => {},
        }),
      (err: unknown) => isTweenError(err, "TWEEN_INVALID_VALUE"),
    );
  });

  test("advanceRecord waits out the delay before running", () => {
    const record = numberRecord({ duration: 100, delay: 50 }, 10);
    assert.deepEqual(advanceRecord(record, 40), { kind: "idle" });
    assert.equal(record.state, "pending");

    const step = advanceRecord(record, 85);
    assert.equal(record.state, "running");
    assert.equal(record.passStartMs, 60);
    assert.deepEqual(step, { kind: "frame", value: 25, progress: 0.25, passFinished: false });
  });

  test("progress is clamped at the end of a pass", () => {
    const record = numberRecord({ duration: 100 });
    assert.deepEqual(advanceRecord(record, 250), {
      kind: "frame",
      value: 100,
      progress: 1,
      passFinished: true,
    });
  });

  test("a single pass completes", () => {
    const record = numberRecord({ duration: 100 });
    advanceRecord(record, 100);
    assert.equal(settleRecordPass(record, 100), "completed");
    assert.equal(record.state, "completed");
    assert.equal(record.currentRepeat, 1);
    assert.deepEqual(advanceRecord(record, 120), { kind: "idle" });
  });

  test("auto-reverse turns around before counting a repeat", () => {
    const record = numberRecord({ duration: 100, autoReverse: true });
    advanceRecord(record, 0);
    assert.equal(settleRecordPass(record, 100), "continue");
    assert.equal(record.direction, "reverse");
    assert.equal(record.currentRepeat, 0);
    assert.deepEqual(advanceRecord(record, 125), {
      kind: "frame",
      value: 75,
      progress: 0.25,
      passFinished: false,
    });
    assert.equal(settleRecordPass(record, 200), "completed");
  });

  test("repeats restart from the start value", () => {
    const record = numberRecord({ duration: 100, repeatCount: 2 });
    advanceRecord(record, 0);
    assert.equal(settleRecordPass(record, 100), "continue");
    assert.equal(record.currentRepeat, 1);
    assert.equal(record.passStartMs, 100);
    assert.deepEqual(advanceRecord(record, 100), {
      kind: "frame",
      value: 0,
      progress: 0,
      passFinished: false,
    });
    assert.equal(settleRecordPass(record, 200), "completed");
  });

  test("cancelRecord only affects active records", () => {
    const record = numberRecord({ duration: 100 });
    assert.equal(cancelRecord(record), true);
    assert.equal(record.state, "cancelled");
    assert.equal(cancelRecord(record), false);
    assert.equal(isRecordActive(record), false);
    assert.deepEqual(advanceRecord(record, 50), { kind: "idle" });
  });

  test("failRecord cancels a record that already completed", () => {
    const record = numberRecord({ duration: 100 });
    advanceRecord(record, 100);
    settleRecordPass(record, 100);
    assert.equal(record.state, "completed");
    assert.equal(cancelRecord(record), false);

    failRecord(record);
    assert.equal(record.state, "cancelled");
  });

  test("endpoints are frozen copies of the caller's colors", () => {
    const from = { r: 0, g: 0, b: 0, a: 1 };
    const to = { r: 200, g: 100, b: 50, a: 1 };
    const record = createAnimationRecord({
      id: "tint",
      from,
      to,
      config: normalizeAnimationConfig({ duration: 100, easing: "linear" }),
      nowMs: 0,
      onUpdate: () => {},
    });
    to.r = 0;
    from.a = 0;

    assert.notEqual(record.to, to);
    assert.equal(Object.isFrozen(record.to), true);
    assert.deepEqual(record.from, { r: 0, g: 0, b: 0, a: 1 });
    assert.deepEqual(advanceRecord(record, 100), {
      kind: "frame",
      value: { r: 200, g: 100, b: 50, a: 1 },
      progress: 1,
      passFinished: true,
    });
  });
});
