/**
 * packages/core/src/animation/record.ts — State of one in-flight animation.
 *
 * A record is owned by exactly one AnimationManager. Timing fields are mutated
 * only by the manager's tick (through `advanceRecord`/`settleRecordPass`) and by
 * explicit cancellation. Endpoints are frozen copies taken at registration.
 */

import { resolveEasing } from "./easing.js";
import {
  assertCompatibleValues,
  clamp01,
  freezeValue,
  interpolateValue,
} from "./interpolate.js";
import type {
  AnimatableValue,
  CompletionCallback,
  EasingFunction,
  NormalizedAnimationConfig,
  ValueKind,
} from "./types.js";

export type AnimationState = "pending" | "running" | "completed" | "cancelled";

export type AnimationDirection = "forward" | "reverse";

export interface AnimationRecord<V extends AnimatableValue = AnimatableValue> {
  readonly id: string;
  readonly from: V;
  readonly to: V;
  readonly kind: ValueKind;
  readonly config: NormalizedAnimationConfig;
  readonly easing: EasingFunction;
  readonly registeredAtMs: number;
  readonly onComplete: CompletionCallback | undefined;
  /** Start of the current pass; meaningful once running. */
  passStartMs: number;
  /** Completed cycles. */
  currentRepeat: number;
  direction: AnimationDirection;
  state: AnimationState;
  onUpdate(value: V): void;
}

export type CreateAnimationRecordParams<V extends AnimatableValue> = Readonly<{
  id: string;
  from: V;
  to: V;
  config: NormalizedAnimationConfig;
  nowMs: number;
  onUpdate: (value: V) => void;
  onComplete?: CompletionCallback | undefined;
}>;

/** Outcome of one tick for one record. */
export type RecordStep<V extends AnimatableValue> =
  | Readonly<{ kind: "idle" }>
  | Readonly<{
      kind: "frame";
      value: V;
      /** Linear progress of the current pass in [0..1]. */
      progress: number;
      /** The frame sits at the end of the pass; `settleRecordPass` decides what follows. */
      passFinished: boolean;
    }>;

const IDLE_STEP = Object.freeze({ kind: "idle" as const });

export type PassOutcome = "continue" | "completed";

/**
 * @throws TweenError TWEEN_INVALID_VALUE when the endpoints cannot be interpolated together
 * @throws TweenError TWEEN_INVALID_EASING when the config names an unknown curve
 */
export function createAnimationRecord<V extends AnimatableValue>(
  params: CreateAnimationRecordParams<V>,
): AnimationRecord<V> {
  const kind = assertCompatibleValues(params.from, params.to);
  return {
    id: params.id,
    from: freezeValue(params.from),
    to: freezeValue(params.to),
    kind,
    config: params.config,
    easing: resolveEasing(params.config.easing),
    registeredAtMs: params.nowMs,
    onComplete: params.onComplete,
    passStartMs: params.nowMs + params.config.delay,
    currentRepeat: 0,
    direction: "forward",
    state: "pending",
    onUpdate: params.onUpdate,
  };
}

export function isRecordActive(record: AnimationRecord): boolean {
  return record.state === "pending" || record.state === "running";
}

/**
 * Compute the value for `nowMs`, promoting a pending record once its delay has
 * elapsed. Idle while the record is waiting or already terminal.
 */
export function advanceRecord<V extends AnimatableValue>(
  record: AnimationRecord<V>,
  nowMs: number,
): RecordStep<V> {
  if (record.state === "pending") {
    if (nowMs - record.registeredAtMs < record.config.delay) return IDLE_STEP;
    record.state = "running";
    record.passStartMs = record.registeredAtMs + record.config.delay;
  }
  if (record.state !== "running") return IDLE_STEP;

  const progress = clamp01((nowMs - record.passStartMs) / record.config.duration);
  const eased = record.easing(progress);
  const t = record.direction === "reverse" ? 1 - eased : eased;
  return Object.freeze({
    kind: "frame",
    value: interpolateValue(record.from, record.to, t),
    progress,
    passFinished: progress >= 1,
  });
}

/**
 * Apply the repeat / auto-reverse policy after a frame at progress 1.
 * A forward pass with auto-reverse turns around without consuming a repeat.
 */
export function settleRecordPass(record: AnimationRecord, nowMs: number): PassOutcome {
  if (record.config.autoReverse && record.direction === "forward") {
    record.direction = "reverse";
    record.passStartMs = nowMs;
    return "continue";
  }

  record.currentRepeat += 1;
  const repeatCount = record.config.repeatCount;
  if (repeatCount === "infinite" || record.currentRepeat < repeatCount) {
    record.direction = "forward";
    record.passStartMs = nowMs;
    return "continue";
  }

  record.state = "completed";
  return "completed";
}

export function cancelRecord(record: AnimationRecord): boolean {
  if (!isRecordActive(record)) return false;
  record.state = "cancelled";
  return true;
}

/** A record whose callback threw ends cancelled, even after it completed. */
export function failRecord(record: AnimationRecord): void {
  record.state = "cancelled";
}
