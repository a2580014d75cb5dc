/**
 * packages/core/src/animation/types.ts — Core animation API types.
 *
 * Why: Centralize animation configs so the manager, the presets and the widget
 * adapters share consistent behavior and defaults.
 */

/** Easing function input/output; input in [0..1], output may overshoot. */
export type EasingFunction = (t: number) => number;

/** Built-in easing curves. The set is closed. */
export type EasingName =
  | "linear"
  | "easeInQuad"
  | "easeOutQuad"
  | "easeInOutQuad"
  | "easeInCubic"
  | "easeOutCubic"
  | "easeInOutCubic"
  | "easeOutBounce"
  | "easeOutElastic"
  | "easeInBack"
  | "easeOutBack"
  | "easeInOutBack"
  | "easeInCirc"
  | "easeOutCirc"
  | "easeInOutCirc";

/** RGBA color: integer channels in 0..255, alpha in 0..1. */
export type Rgba = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

/** Values the manager knows how to interpolate. */
export type AnimatableValue = number | Rgba;

export type ValueKind = "number" | "color";

/** `"infinite"` repeats until stopped. */
export type RepeatCount = number | "infinite";

/** Time-based animation configuration. */
export type AnimationConfig = Readonly<{
  /** Duration of one pass in milliseconds. */
  duration?: number;
  /** Easing curve name. */
  easing?: EasingName;
  /** Target frame rate. */
  fps?: number;
  /** Run the eased curve forward, then backward, within one repeat. */
  autoReverse?: boolean;
  /** Number of cycles; integer >= 1 or "infinite". */
  repeatCount?: RepeatCount;
  /** Wait before the first pass, in milliseconds. */
  delay?: number;
}>;

/** Internal config with defaults applied and values validated. */
export type NormalizedAnimationConfig = Readonly<{
  duration: number;
  easing: EasingName;
  fps: number;
  autoReverse: boolean;
  repeatCount: RepeatCount;
  delay: number;
}>;

export type UpdateCallback<V extends AnimatableValue> = (value: V) => void;

export type CompletionCallback = () => void;
