/**
 * packages/core/src/animation/presets.ts — Prebuilt configs for common widget motions.
 */

import { normalizeAnimationConfig } from "./config.js";
import type { EasingName, NormalizedAnimationConfig } from "./types.js";

export type ToggleAnimationKind = "default" | "bounce" | "elastic";

function preset(duration: number, easing: EasingName): NormalizedAnimationConfig {
  return normalizeAnimationConfig({ duration, easing });
}

function toggleEasing(kind: ToggleAnimationKind): EasingName {
  switch (kind) {
    case "bounce":
      return "easeOutBounce";
    case "elastic":
      return "easeOutElastic";
    case "default":
      return "easeOutCubic";
  }
}

export function fadeAnimation(duration = 300): NormalizedAnimationConfig {
  return preset(duration, "easeOutQuad");
}

export function scaleAnimation(
  duration = 200,
  easing: EasingName = "easeOutBounce",
): NormalizedAnimationConfig {
  return preset(duration, easing);
}

export function slideAnimation(
  duration = 400,
  easing: EasingName = "easeOutCubic",
): NormalizedAnimationConfig {
  return preset(duration, easing);
}

export function bounceAnimation(duration = 600): NormalizedAnimationConfig {
  return preset(duration, "easeOutBounce");
}

export function elasticAnimation(duration = 800): NormalizedAnimationConfig {
  return preset(duration, "easeOutElastic");
}

/** Checkbox check/uncheck; "default" is a plain scale. */
export function checkboxAnimation(
  kind: ToggleAnimationKind = "default",
  duration = 300,
): NormalizedAnimationConfig {
  return preset(duration, toggleEasing(kind));
}

/** Switch thumb travel; "default" is a plain slide. */
export function switchAnimation(
  kind: ToggleAnimationKind = "default",
  duration = 300,
): NormalizedAnimationConfig {
  return preset(duration, toggleEasing(kind));
}

export function validationErrorAnimation(duration = 500): NormalizedAnimationConfig {
  return preset(duration, "easeOutCubic");
}
