/**
 * packages/core/src/animation/manager.ts — Scheduler for named, independent animations.
 *
 * Why: Widgets need many small transitions (color, scale, lift) running at the
 * same time without each one owning a timer. The manager keeps one record per
 * id and drives all of them from a single tick loop.
 *
 * Concurrency model:
 *   - Every mutation of the record map happens synchronously on the caller's
 *     event-loop turn, so `animate`/`stop*` calls never interleave with each
 *     other or with a tick.
 *   - A tick iterates a snapshot of the map and re-checks identity and state
 *     before each dispatch. A callback that stops or replaces a record (its own
 *     or a sibling's) takes effect before that record's next dispatch.
 *   - The loop holds a timer only while records exist. A record faster than
 *     the pending wake pulls the next tick forward to the next turn.
 *
 * Callbacks must not block: they run on the tick itself.
 */

import { TweenError, describeThrown } from "../errors.js";
import { type Logger, defaultLogger } from "../logging.js";
import { normalizeAnimationConfig } from "./config.js";
import { type CancelTimer, type FrameClock, systemFrameClock } from "./frameClock.js";
import {
  type AnimationRecord,
  type AnimationState,
  advanceRecord,
  cancelRecord,
  createAnimationRecord,
  failRecord,
  isRecordActive,
  settleRecordPass,
} from "./record.js";
import type {
  AnimatableValue,
  AnimationConfig,
  CompletionCallback,
  UpdateCallback,
} from "./types.js";

/** Receives callback failures detected inside the tick loop. */
export type AnimationErrorHandler = (error: TweenError, id: string) => void;

export type AnimationManagerOptions = Readonly<{
  /** Time source and timer; defaults to `performance.now()` + `setTimeout`. */
  clock?: FrameClock;
  logger?: Logger;
  onError?: AnimationErrorHandler;
}>;

type CallbackPhase = "onUpdate" | "onComplete";

export class AnimationManager {
  private readonly records = new Map<string, AnimationRecord>();
  private readonly clock: FrameClock;
  private readonly logger: Logger;
  private readonly onError: AnimationErrorHandler | undefined;
  private cancelTimer: CancelTimer | null = null;
  private lastTickDueMs = 0;
  private inTick = false;
  private disposed = false;

  constructor(options: AnimationManagerOptions = {}) {
    this.clock = options.clock ?? systemFrameClock;
    this.logger = options.logger ?? defaultLogger();
    this.onError = options.onError;
  }

  /**
   * Register an animation under `id`, replacing (and cancelling) any record
   * already there. Values and config are validated before the previous record
   * is touched, so a rejected call leaves the manager unchanged.
   *
   * @throws TweenError TWEEN_INVALID_VALUE, TWEEN_INVALID_EASING, TWEEN_INVALID_CONFIG
   * @throws TweenError TWEEN_INVALID_STATE after `dispose()`
   */
  animate<V extends AnimatableValue>(
    id: string,
    from: V,
    to: V,
    onUpdate: UpdateCallback<V>,
    config?: AnimationConfig,
    onComplete?: CompletionCallback,
  ): void {
    if (this.disposed) {
      throw new TweenError("TWEEN_INVALID_STATE", `animate("${id}"): manager is disposed`);
    }

    const record = createAnimationRecord({
      id,
      from,
      to,
      config: normalizeAnimationConfig(config),
      nowMs: this.clock.now(),
      onUpdate,
      onComplete,
    });

    const previous = this.records.get(id);
    if (previous !== undefined) {
      cancelRecord(previous);
      this.records.delete(id);
      this.logger.debug({ animationId: id }, "animation replaced");
    }
    this.records.set(id, record);
    this.ensureTicking(record.config.fps);
  }

  /** Cancel one animation. Its completion callback never runs. Unknown ids are ignored. */
  stopAnimation(id: string): void {
    const record = this.records.get(id);
    if (record === undefined) return;
    cancelRecord(record);
    this.records.delete(id);
    if (this.records.size === 0) this.releaseTimer();
  }

  stopAllAnimations(): void {
    for (const record of this.records.values()) {
      cancelRecord(record);
    }
    this.records.clear();
    this.releaseTimer();
  }

  isAnimating(id: string): boolean {
    const record = this.records.get(id);
    return record !== undefined && isRecordActive(record);
  }

  getActiveCount(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (isRecordActive(record)) count++;
    }
    return count;
  }

  /** Active ids in registration order. */
  getActiveIds(): readonly string[] {
    const ids: string[] = [];
    for (const record of this.records.values()) {
      if (isRecordActive(record)) ids.push(record.id);
    }
    return Object.freeze(ids);
  }

  getAnimationState(id: string): AnimationState | undefined {
    return this.records.get(id)?.state;
  }

  /** True while the loop holds a pending timer. */
  get isTicking(): boolean {
    return this.cancelTimer !== null;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Stop everything and refuse further `animate` calls. */
  dispose(): void {
    this.stopAllAnimations();
    this.disposed = true;
  }

  private ensureTicking(fps: number): void {
    // Mid-tick registrations are picked up by scheduleNextTick.
    if (this.inTick) return;
    const nowMs = this.clock.now();
    if (this.cancelTimer !== null) {
      if (this.lastTickDueMs - nowMs <= 1000 / fps) return;
      this.releaseTimer();
    }
    this.lastTickDueMs = nowMs;
    this.cancelTimer = this.clock.setTimer(() => this.runTick(), 0);
  }

  private releaseTimer(): void {
    const cancel = this.cancelTimer;
    this.cancelTimer = null;
    cancel?.();
  }

  private maxFps(): number {
    let fps = 0;
    for (const record of this.records.values()) {
      if (record.config.fps > fps) fps = record.config.fps;
    }
    return fps;
  }

  private runTick(): void {
    this.cancelTimer = null;
    const nowMs = this.clock.now();

    this.inTick = true;
    try {
      for (const record of Array.from(this.records.values())) {
        if (this.records.get(record.id) !== record || !isRecordActive(record)) continue;
        this.advance(record, nowMs);
      }
    } finally {
      this.inTick = false;
      this.scheduleNextTick(nowMs);
    }
  }

  private scheduleNextTick(nowMs: number): void {
    if (this.records.size === 0 || this.cancelTimer !== null) return;
    const fps = this.maxFps();
    if (fps <= 0) return;

    const intervalMs = 1000 / fps;
    let dueMs = this.lastTickDueMs + intervalMs;
    if (dueMs < nowMs) {
      // Skip frames that were missed instead of bursting to catch up.
      dueMs += Math.ceil((nowMs - dueMs) / intervalMs) * intervalMs;
    }
    this.lastTickDueMs = dueMs;
    this.cancelTimer = this.clock.setTimer(() => this.runTick(), dueMs - nowMs);
  }

  private advance(record: AnimationRecord, nowMs: number): void {
    const step = advanceRecord(record, nowMs);
    if (step.kind === "idle") return;

    try {
      record.onUpdate(step.value);
    } catch (err: unknown) {
      if (this.records.get(record.id) === record) this.records.delete(record.id);
      failRecord(record);
      this.reportCallbackFailure(record.id, "onUpdate", err);
      return;
    }

    // Stopped or replaced from inside the callback.
    if (this.records.get(record.id) !== record || record.state !== "running") return;
    if (!step.passFinished) return;
    if (settleRecordPass(record, nowMs) === "continue") return;

    this.records.delete(record.id);
    const onComplete = record.onComplete;
    if (onComplete === undefined) return;
    try {
      onComplete();
    } catch (err: unknown) {
      failRecord(record);
      this.reportCallbackFailure(record.id, "onComplete", err);
    }
  }

  private reportCallbackFailure(id: string, phase: CallbackPhase, cause: unknown): void {
    const error = new TweenError(
      "TWEEN_CALLBACK_FAILURE",
      `${phase} for "${id}" threw: ${describeThrown(cause)}`,
      { cause },
    );
    this.logger.warn({ err: error, animationId: id, phase }, "animation callback failed");

    const onError = this.onError;
    if (onError === undefined) return;
    try {
      onError(error, id);
    } catch (handlerErr: unknown) {
      this.logger.error(
        { err: handlerErr, animationId: id },
        `animation error handler threw: ${describeThrown(handlerErr)}`,
      );
    }
  }
}

let sharedManager: AnimationManager | null = null;

/**
 * Process-wide convenience manager. Widgets never require it; pass an explicit
 * instance to keep animations scoped.
 */
export function defaultAnimationManager(): AnimationManager {
  if (sharedManager === null || sharedManager.isDisposed) {
    sharedManager = new AnimationManager();
  }
  return sharedManager;
}
