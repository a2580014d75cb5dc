/**
 * packages/core/src/animation/config.ts — AnimationConfig defaults and validation.
 */

import { TweenError } from "../errors.js";
import { isEasingName } from "./easing.js";
import type { AnimationConfig, NormalizedAnimationConfig, RepeatCount } from "./types.js";

export const DEFAULT_ANIMATION_CONFIG: NormalizedAnimationConfig = Object.freeze({
  duration: 300,
  easing: "easeOutCubic",
  fps: 60,
  autoReverse: false,
  repeatCount: 1,
  delay: 0,
});

function invalidConfig(detail: string): never {
  throw new TweenError("TWEEN_INVALID_CONFIG", detail);
}

function readDuration(duration: number | undefined): number {
  if (duration === undefined) return DEFAULT_ANIMATION_CONFIG.duration;
  if (!Number.isFinite(duration) || duration <= 0) {
    invalidConfig(`duration must be a positive number of milliseconds, got ${duration}`);
  }
  return duration;
}

function readFps(fps: number | undefined): number {
  if (fps === undefined) return DEFAULT_ANIMATION_CONFIG.fps;
  if (!Number.isInteger(fps) || fps <= 0) {
    invalidConfig(`fps must be a positive integer, got ${fps}`);
  }
  return fps;
}

function readRepeatCount(repeatCount: RepeatCount | undefined): RepeatCount {
  if (repeatCount === undefined) return DEFAULT_ANIMATION_CONFIG.repeatCount;
  if (repeatCount === "infinite") return repeatCount;
  if (!Number.isInteger(repeatCount) || repeatCount < 1) {
    invalidConfig(`repeatCount must be an integer >= 1 or "infinite", got ${repeatCount}`);
  }
  return repeatCount;
}

function readDelay(delay: number | undefined): number {
  if (delay === undefined) return DEFAULT_ANIMATION_CONFIG.delay;
  if (!Number.isFinite(delay) || delay < 0) {
    invalidConfig(`delay must be a non-negative number of milliseconds, got ${delay}`);
  }
  return delay;
}

/**
 * Apply defaults and validate. The result is frozen.
 *
 * @throws TweenError TWEEN_INVALID_EASING for an unknown easing tag
 * @throws TweenError TWEEN_INVALID_CONFIG for any other invalid field
 */
export function normalizeAnimationConfig(
  config: AnimationConfig | undefined,
): NormalizedAnimationConfig {
  if (!config) return DEFAULT_ANIMATION_CONFIG;

  const easing = config.easing ?? DEFAULT_ANIMATION_CONFIG.easing;
  if (!isEasingName(easing)) {
    throw new TweenError("TWEEN_INVALID_EASING", `unknown easing: ${String(easing)}`);
  }

  return Object.freeze({
    duration: readDuration(config.duration),
    easing,
    fps: readFps(config.fps),
    autoReverse: config.autoReverse === true,
    repeatCount: readRepeatCount(config.repeatCount),
    delay: readDelay(config.delay),
  });
}
