/**
 * packages/core/src/widgets/types.ts — Widget configuration, visual state and appearance types.
 */

import type { Rgba } from "../animation/types.js";
import { type ColorInput, parseColor } from "../color/color.js";
import { TweenError } from "../errors.js";

/** Discrete visual states. The state machine lives in the widget, not the manager. */
export type WidgetVisualState = "normal" | "hover" | "pressed" | "disabled";

export const WIDGET_VISUAL_STATES: readonly WidgetVisualState[] = Object.freeze([
  "normal",
  "hover",
  "pressed",
  "disabled",
]);

export type WidgetConfig = Readonly<{
  width?: number;
  height?: number;
  backgroundColor?: ColorInput;
  textColor?: ColorInput;
  borderRadius?: number;
  borderWidth?: number;
  borderColor?: ColorInput;
  fontFamily?: string;
  fontSize?: number;
  /** Default transition duration in milliseconds. */
  animationDuration?: number;
  /** When false, property changes jump straight to their end value. */
  enableAnimations?: boolean;
}>;

export type NormalizedWidgetConfig = Readonly<{
  width: number;
  height: number;
  backgroundColor: Rgba;
  textColor: Rgba;
  borderRadius: number;
  borderWidth: number;
  borderColor: Rgba;
  fontFamily: string;
  fontSize: number;
  animationDuration: number;
  enableAnimations: boolean;
}>;

export const DEFAULT_WIDGET_CONFIG: NormalizedWidgetConfig = Object.freeze({
  width: 120,
  height: 40,
  backgroundColor: parseColor("#3498db"),
  textColor: parseColor("#ffffff"),
  borderRadius: 8,
  borderWidth: 0,
  borderColor: parseColor("#2c3e50"),
  fontFamily: "Arial",
  fontSize: 12,
  animationDuration: 300,
  enableAnimations: true,
});

export function readNonNegative(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 0) {
    throw new TweenError("TWEEN_INVALID_CONFIG", `${name} must be a non-negative number`);
  }
  return value;
}

export function readPositive(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new TweenError("TWEEN_INVALID_CONFIG", `${name} must be positive`);
  }
  return value;
}

/**
 * @throws TweenError TWEEN_INVALID_CONFIG for negative sizes or a non-positive duration
 * @throws TweenError TWEEN_INVALID_VALUE for an unparseable color
 */
export function normalizeWidgetConfig(config: WidgetConfig | undefined): NormalizedWidgetConfig {
  if (!config) return DEFAULT_WIDGET_CONFIG;
  const d = DEFAULT_WIDGET_CONFIG;

  const animationDuration = config.animationDuration ?? d.animationDuration;
  if (!Number.isFinite(animationDuration) || animationDuration <= 0) {
    throw new TweenError("TWEEN_INVALID_CONFIG", "animationDuration must be positive");
  }

  return Object.freeze({
    width: readNonNegative("width", config.width, d.width),
    height: readNonNegative("height", config.height, d.height),
    backgroundColor:
      config.backgroundColor === undefined ? d.backgroundColor : parseColor(config.backgroundColor),
    textColor: config.textColor === undefined ? d.textColor : parseColor(config.textColor),
    borderRadius: readNonNegative("borderRadius", config.borderRadius, d.borderRadius),
    borderWidth: readNonNegative("borderWidth", config.borderWidth, d.borderWidth),
    borderColor: config.borderColor === undefined ? d.borderColor : parseColor(config.borderColor),
    fontFamily: config.fontFamily ?? d.fontFamily,
    fontSize: readNonNegative("fontSize", config.fontSize, d.fontSize),
    animationDuration,
    enableAnimations: config.enableAnimations ?? d.enableAnimations,
  });
}

/** Properties a widget animates. Each one owns its own animation id. */
export type AnimatedProperties = {
  background: Rgba;
  scale: number;
  elevation: number;
  opacity: number;
  offsetX: number;
  offsetY: number;
  width: number;
  height: number;
  /** Glow strength in [0..1]. */
  glow: number;
  /**
   * Widget-specific indicator in [0..1]: checkmark stroke, switch thumb travel,
   * progress fill.
   */
  indicator: number;
};

export type AnimatedPropertyName = keyof AnimatedProperties;

export const ANIMATED_PROPERTY_NAMES: readonly AnimatedPropertyName[] = Object.freeze([
  "background",
  "scale",
  "elevation",
  "opacity",
  "offsetX",
  "offsetY",
  "width",
  "height",
  "glow",
  "indicator",
]);

/** Target values for a visual state; omitted properties are left alone. */
export type WidgetStateTargets = Readonly<Partial<AnimatedProperties>>;

/** Snapshot pushed to render surfaces on every change. */
export type WidgetAppearance = Readonly<
  {
    state: WidgetVisualState;
    label: string;
    foreground: Rgba;
    border: Rgba;
    borderRadius: number;
    borderWidth: number;
    fontFamily: string;
    fontSize: number;
    /** Drop shadow color under elevation; null when the widget casts none. */
    shadow: Rgba | null;
    glowColor: Rgba;
    /** Color of the indicator (checkmark, thumb, fill). */
    accent: Rgba;
  } & Readonly<AnimatedProperties>
>;

/** Argument lists per widget event. */
export type WidgetEventMap = {
  click: [];
  hoverEnter: [];
  hoverLeave: [];
  valueChanged: [value: unknown];
  stateChanged: [from: WidgetVisualState, to: WidgetVisualState];
  focusIn: [];
  focusOut: [];
};

export type WidgetEventType = keyof WidgetEventMap;

export type WidgetEventCallback<E extends WidgetEventType> = (...args: WidgetEventMap[E]) => void;
