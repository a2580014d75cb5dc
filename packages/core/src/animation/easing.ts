/**
 * packages/core/src/animation/easing.ts — Easing curve helpers.
 */

import { TweenError } from "../errors.js";
import { clamp01 } from "./interpolate.js";
import type { EasingFunction, EasingName } from "./types.js";

const BACK_OVERSHOOT = 1.70158;
const IN_OUT_BACK_OVERSHOOT = BACK_OVERSHOOT * 1.525;
const ELASTIC_PERIOD = (2 * Math.PI) / 3;

const easeOutBounce = (t: number): number => {
  if (t < 1 / 2.75) return 7.5625 * t * t;
  if (t < 2 / 2.75) {
    const shifted = t - 1.5 / 2.75;
    return 7.5625 * shifted * shifted + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const shifted = t - 2.25 / 2.75;
    return 7.5625 * shifted * shifted + 0.9375;
  }
  const shifted = t - 2.625 / 2.75;
  return 7.5625 * shifted * shifted + 0.984375;
};

export const EASING_CURVES: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: (t: number): number => t,
  easeInQuad: (t: number): number => t * t,
  easeOutQuad: (t: number): number => t * (2 - t),
  easeInOutQuad: (t: number): number => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2),
  easeInCubic: (t: number): number => t * t * t,
  easeOutCubic: (t: number): number => 1 - (1 - t) ** 3,
  easeInOutCubic: (t: number): number => (t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2),
  easeOutBounce,
  easeOutElastic: (t: number): number => {
    if (t === 0 || t === 1) return t;
    return 2 ** (-10 * t) * Math.sin((t * 10 - 0.75) * ELASTIC_PERIOD) + 1;
  },
  easeInBack: (t: number): number => (BACK_OVERSHOOT + 1) * t * t * t - BACK_OVERSHOOT * t * t,
  easeOutBack: (t: number): number => {
    const shifted = t - 1;
    return 1 + (BACK_OVERSHOOT + 1) * shifted ** 3 + BACK_OVERSHOOT * shifted ** 2;
  },
  easeInOutBack: (t: number): number => {
    if (t < 0.5) {
      return ((2 * t) ** 2 * ((IN_OUT_BACK_OVERSHOOT + 1) * 2 * t - IN_OUT_BACK_OVERSHOOT)) / 2;
    }
    const shifted = 2 * t - 2;
    return (shifted ** 2 * ((IN_OUT_BACK_OVERSHOOT + 1) * shifted + IN_OUT_BACK_OVERSHOOT) + 2) / 2;
  },
  easeInCirc: (t: number): number => 1 - Math.sqrt(1 - t * t),
  easeOutCirc: (t: number): number => Math.sqrt(1 - (t - 1) ** 2),
  easeInOutCirc: (t: number): number => {
    if (t < 0.5) return (1 - Math.sqrt(1 - (2 * t) ** 2)) / 2;
    return (Math.sqrt(1 - (-2 * t + 2) ** 2) + 1) / 2;
  },
});

/** Every built-in easing tag, in declaration order. */
export const EASING_NAMES: readonly EasingName[] = Object.freeze(
  Object.keys(EASING_CURVES).filter(isEasingName),
);

export function isEasingName(value: unknown): value is EasingName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(EASING_CURVES, value);
}

/**
 * Resolve an easing tag to its curve. Progress outside [0..1] is clamped before
 * evaluation; the curve's output is not clamped so overshooting curves keep
 * their shape.
 *
 * @throws TweenError TWEEN_INVALID_EASING for an unknown tag
 */
export function resolveEasing(name: string): EasingFunction {
  if (!isEasingName(name)) {
    throw new TweenError("TWEEN_INVALID_EASING", `unknown easing: ${name}`);
  }
  const curve = EASING_CURVES[name];
  return (t: number): number => curve(clamp01(t));
}
