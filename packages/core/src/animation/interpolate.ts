/**
 * packages/core/src/animation/interpolate.ts — Primitive interpolation helpers.
 */

import { TweenError } from "../errors.js";
import type { AnimatableValue, Rgba, ValueKind } from "./types.js";

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/**
 * Linear interpolation between two numbers. `t` is not clamped so overshooting
 * easing curves carry through to the value.
 */
export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

function clampRgbChannel(channel: number): number {
  if (!Number.isFinite(channel)) return 0;
  if (channel <= 0) return 0;
  if (channel >= 255) return 255;
  return Math.round(channel);
}

/** Channel-wise interpolation; RGB rounds to the nearest byte, alpha stays float. */
export function lerpColor(from: Rgba, to: Rgba, t: number): Rgba {
  return Object.freeze({
    r: clampRgbChannel(lerp(from.r, to.r, t)),
    g: clampRgbChannel(lerp(from.g, to.g, t)),
    b: clampRgbChannel(lerp(from.b, to.b, t)),
    a: clamp01Alpha(lerp(from.a, to.a, t)),
  });
}

function clamp01Alpha(alpha: number): number {
  if (!Number.isFinite(alpha)) return 1;
  return Math.min(1, Math.max(0, alpha));
}

/** Generate `steps` colors between two endpoints (inclusive). */
export function interpolateColorSteps(from: Rgba, to: Rgba, steps: number): readonly Rgba[] {
  const count = Math.max(0, Math.trunc(steps));
  if (count <= 0) return Object.freeze([]);
  if (count === 1) return Object.freeze([lerpColor(from, to, 0)]);
  const samples: Rgba[] = [];
  for (let i = 0; i < count; i++) {
    samples.push(lerpColor(from, to, i / (count - 1)));
  }
  return Object.freeze(samples);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function isRgba(value: unknown): value is Rgba {
  if (typeof value !== "object" || value === null) return false;
  return (
    "r" in value &&
    "g" in value &&
    "b" in value &&
    "a" in value &&
    isFiniteNumber(value.r) &&
    isFiniteNumber(value.g) &&
    isFiniteNumber(value.b) &&
    isFiniteNumber(value.a)
  );
}

/**
 * Classify an animatable value.
 *
 * @throws TweenError TWEEN_INVALID_VALUE for non-finite numbers and malformed colors
 */
export function valueKindOf(value: unknown): ValueKind {
  if (isFiniteNumber(value)) return "number";
  if (isRgba(value)) return "color";
  throw new TweenError("TWEEN_INVALID_VALUE", `value is not interpolatable: ${String(value)}`);
}

/**
 * Both endpoints must be of the same kind.
 *
 * @throws TweenError TWEEN_INVALID_VALUE
 */
export function assertCompatibleValues(from: unknown, to: unknown): ValueKind {
  const fromKind = valueKindOf(from);
  const toKind = valueKindOf(to);
  if (fromKind !== toKind) {
    throw new TweenError(
      "TWEEN_INVALID_VALUE",
      `start and end values differ in kind: ${fromKind} vs ${toKind}`,
    );
  }
  return fromKind;
}

/** Frozen copy of an endpoint, detached from the caller's object. */
export function freezeValue<V extends AnimatableValue>(value: V): V;
export function freezeValue(value: AnimatableValue): AnimatableValue {
  if (typeof value === "number") return value;
  return Object.freeze({ r: value.r, g: value.g, b: value.b, a: value.a });
}

export function interpolateValue<V extends AnimatableValue>(from: V, to: V, t: number): V;
export function interpolateValue(
  from: AnimatableValue,
  to: AnimatableValue,
  t: number,
): AnimatableValue {
  if (typeof from === "number" && typeof to === "number") return lerp(from, to, t);
  if (typeof from !== "number" && typeof to !== "number") return lerpColor(from, to, t);
  throw new TweenError("TWEEN_INVALID_VALUE", "cannot interpolate between a number and a color");
}
