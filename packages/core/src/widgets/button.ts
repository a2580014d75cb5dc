/**
 * packages/core/src/widgets/button.ts — Button with hover lift, press squash and color fades.
 */

import type { AnimationConfig, Rgba } from "../animation/types.js";
import { type ColorInput, parseColor } from "../color/color.js";
import { TweenError } from "../errors.js";
import { AnimatedWidget, type AnimatedWidgetOptions } from "./animatedWidget.js";
import type { AnimatedPropertyName, WidgetStateTargets, WidgetVisualState } from "./types.js";

export type ButtonStyle = Readonly<{
  normalColor?: ColorInput;
  hoverColor?: ColorInput;
  pressedColor?: ColorInput;
  disabledColor?: ColorInput;
  text?: string;
  shadowEnabled?: boolean;
  shadowColor?: ColorInput;
  /** Elevation while hovered. */
  hoverLift?: number;
  /** Scale while pressed. */
  clickScale?: number;
}>;

export type NormalizedButtonStyle = Readonly<{
  normalColor: Rgba;
  hoverColor: Rgba;
  pressedColor: Rgba;
  disabledColor: Rgba;
  text: string;
  shadowEnabled: boolean;
  shadowColor: Rgba;
  hoverLift: number;
  clickScale: number;
}>;

export const DEFAULT_BUTTON_STYLE: NormalizedButtonStyle = Object.freeze({
  normalColor: parseColor("#3498db"),
  hoverColor: parseColor("#2980b9"),
  pressedColor: parseColor("#21618c"),
  disabledColor: parseColor("#95a5a6"),
  text: "Button",
  shadowEnabled: true,
  shadowColor: parseColor("#2c3e50"),
  hoverLift: 2,
  clickScale: 0.95,
});

function pickColor(value: ColorInput | undefined, fallback: Rgba): Rgba {
  return value === undefined ? fallback : parseColor(value);
}

export function normalizeButtonStyle(style: ButtonStyle | undefined): NormalizedButtonStyle {
  if (!style) return DEFAULT_BUTTON_STYLE;
  const d = DEFAULT_BUTTON_STYLE;

  const hoverLift = style.hoverLift ?? d.hoverLift;
  if (!Number.isFinite(hoverLift)) {
    throw new TweenError("TWEEN_INVALID_CONFIG", "hoverLift must be a finite number");
  }
  const clickScale = style.clickScale ?? d.clickScale;
  if (!Number.isFinite(clickScale) || clickScale <= 0) {
    throw new TweenError("TWEEN_INVALID_CONFIG", "clickScale must be positive");
  }

  return Object.freeze({
    normalColor: pickColor(style.normalColor, d.normalColor),
    hoverColor: pickColor(style.hoverColor, d.hoverColor),
    pressedColor: pickColor(style.pressedColor, d.pressedColor),
    disabledColor: pickColor(style.disabledColor, d.disabledColor),
    text: style.text ?? d.text,
    shadowEnabled: style.shadowEnabled ?? d.shadowEnabled,
    shadowColor: pickColor(style.shadowColor, d.shadowColor),
    hoverLift,
    clickScale,
  });
}

export type AnimatedButtonOptions = AnimatedWidgetOptions &
  Readonly<{
    style?: ButtonStyle;
  }>;

export type ButtonColors = Readonly<{
  normal?: ColorInput;
  hover?: ColorInput;
  pressed?: ColorInput;
  disabled?: ColorInput;
}>;

export class AnimatedButton extends AnimatedWidget {
  private style: NormalizedButtonStyle;

  constructor(options: AnimatedButtonOptions = {}) {
    super(options);
    this.style = normalizeButtonStyle(options.style);
    // The normal color wins over the generic widget background.
    this.setProperty("background", this.style.normalColor);
  }

  get text(): string {
    return this.style.text;
  }

  get buttonStyle(): NormalizedButtonStyle {
    return this.style;
  }

  /** Bind a click listener. Returns the button for chaining. */
  onClick(callback: () => void): this {
    this.bindCallback("click", callback);
    return this;
  }

  setText(text: string): void {
    this.style = Object.freeze({ ...this.style, text });
    this.updateAppearance();
  }

  /** Toggle the drop shadow cast while lifted. */
  setShadow(enabled: boolean, color?: ColorInput): void {
    this.style = Object.freeze({
      ...this.style,
      shadowEnabled: enabled,
      shadowColor: pickColor(color, this.style.shadowColor),
    });
    this.updateAppearance();
  }

  /** Replace state colors. The normal color applies at once while in the normal state. */
  setColors(colors: ButtonColors): void {
    const s = this.style;
    this.style = Object.freeze({
      ...s,
      normalColor: pickColor(colors.normal, s.normalColor),
      hoverColor: pickColor(colors.hover, s.hoverColor),
      pressedColor: pickColor(colors.pressed, s.pressedColor),
      disabledColor: pickColor(colors.disabled, s.disabledColor),
    });
    if (colors.normal !== undefined && this.getState() === "normal") {
      this.setProperty("background", this.style.normalColor);
    }
  }

  protected override label(): string {
    return this.style.text;
  }

  protected override shadowColor(): Rgba | null {
    return this.style.shadowEnabled ? this.style.shadowColor : null;
  }

  protected override resolveStateTargets(state: WidgetVisualState): WidgetStateTargets {
    const s = this.style;
    switch (state) {
      case "normal":
        return { background: s.normalColor, elevation: 0, scale: 1 };
      case "hover":
        return { background: s.hoverColor, elevation: s.hoverLift, scale: 1 };
      case "pressed":
        return { background: s.pressedColor, scale: s.clickScale };
      case "disabled":
        return { background: s.disabledColor, elevation: 0, scale: 1 };
    }
  }

  protected override stateTransitionConfig(
    from: WidgetVisualState,
    to: WidgetVisualState,
    property: AnimatedPropertyName,
  ): AnimationConfig {
    const intoPress = to === "pressed";
    const outOfPress = from === "pressed";
    switch (property) {
      case "background":
        return {
          duration: intoPress ? 100 : outOfPress ? 150 : this.config.animationDuration,
          easing: "easeOutCubic",
        };
      case "elevation":
        return { duration: 200, easing: "easeOutQuad" };
      case "scale":
        if (intoPress) return { duration: 100, easing: "easeOutQuad" };
        if (outOfPress) return { duration: 150, easing: "easeOutElastic" };
        return { duration: 200, easing: "easeOutQuad" };
      default:
        return super.stateTransitionConfig(from, to, property);
    }
  }
}
