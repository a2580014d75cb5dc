/**
 * packages/core/src/widgets/switch.ts — On/off switch with a sliding thumb.
 *
 * The thumb position is the `indicator` channel (0 = off, 1 = on); the track
 * color is the widget background.
 */

import { type ToggleAnimationKind, elasticAnimation, switchAnimation } from "../animation/presets.js";
import type { AnimationConfig, Rgba } from "../animation/types.js";
import { type ColorInput, parseColor } from "../color/color.js";
import { AnimatedWidget, type AnimatedWidgetOptions } from "./animatedWidget.js";
import {
  type AnimatedPropertyName,
  type WidgetStateTargets,
  type WidgetVisualState,
  readNonNegative,
  readPositive,
} from "./types.js";

export type SwitchStyle = Readonly<{
  trackOnColor?: ColorInput;
  trackOffColor?: ColorInput;
  trackDisabledColor?: ColorInput;
  thumbColor?: ColorInput;
  width?: number;
  height?: number;
  hoverScale?: number;
  /** Scale while pressed. */
  activeScale?: number;
  animation?: ToggleAnimationKind;
  /** Thumb travel time in milliseconds. */
  duration?: number;
  onLabel?: string;
  offLabel?: string;
  shadowEnabled?: boolean;
  shadowColor?: ColorInput;
}>;

export type NormalizedSwitchStyle = Readonly<{
  trackOnColor: Rgba;
  trackOffColor: Rgba;
  trackDisabledColor: Rgba;
  thumbColor: Rgba;
  width: number;
  height: number;
  hoverScale: number;
  activeScale: number;
  animation: ToggleAnimationKind;
  duration: number;
  onLabel: string;
  offLabel: string;
  shadowEnabled: boolean;
  shadowColor: Rgba;
}>;

export const DEFAULT_SWITCH_STYLE: NormalizedSwitchStyle = Object.freeze({
  trackOnColor: parseColor("#4299e1"),
  trackOffColor: parseColor("#cbd5e0"),
  trackDisabledColor: parseColor("#e2e8f0"),
  thumbColor: parseColor("#ffffff"),
  width: 60,
  height: 30,
  hoverScale: 1.05,
  activeScale: 0.95,
  animation: "default",
  duration: 300,
  onLabel: "on",
  offLabel: "off",
  shadowEnabled: true,
  shadowColor: parseColor("#000000"),
});

function pickColor(value: ColorInput | undefined, fallback: Rgba): Rgba {
  return value === undefined ? fallback : parseColor(value);
}

export function normalizeSwitchStyle(style: SwitchStyle | undefined): NormalizedSwitchStyle {
  if (!style) return DEFAULT_SWITCH_STYLE;
  const d = DEFAULT_SWITCH_STYLE;
  return Object.freeze({
    trackOnColor: pickColor(style.trackOnColor, d.trackOnColor),
    trackOffColor: pickColor(style.trackOffColor, d.trackOffColor),
    trackDisabledColor: pickColor(style.trackDisabledColor, d.trackDisabledColor),
    thumbColor: pickColor(style.thumbColor, d.thumbColor),
    width: readNonNegative("width", style.width, d.width),
    height: readNonNegative("height", style.height, d.height),
    hoverScale: readPositive("hoverScale", style.hoverScale, d.hoverScale),
    activeScale: readPositive("activeScale", style.activeScale, d.activeScale),
    animation: style.animation ?? d.animation,
    duration: readPositive("duration", style.duration, d.duration),
    onLabel: style.onLabel ?? d.onLabel,
    offLabel: style.offLabel ?? d.offLabel,
    shadowEnabled: style.shadowEnabled ?? d.shadowEnabled,
    shadowColor: pickColor(style.shadowColor, d.shadowColor),
  });
}

export type AnimatedSwitchOptions = AnimatedWidgetOptions &
  Readonly<{
    label?: string;
    on?: boolean;
    style?: SwitchStyle;
  }>;

export type SwitchColors = Readonly<{
  trackOn?: ColorInput;
  trackOff?: ColorInput;
  thumb?: ColorInput;
}>;

export class AnimatedSwitch extends AnimatedWidget {
  private style: NormalizedSwitchStyle;
  private readonly text: string;
  private on: boolean;

  constructor(options: AnimatedSwitchOptions = {}) {
    super(options);
    this.style = normalizeSwitchStyle(options.style);
    this.text = options.label ?? "";
    this.on = options.on === true;
    this.setProperty("width", this.style.width);
    this.setProperty("height", this.style.height);
    this.setProperty("background", this.trackColor(this.getState()));
    this.setProperty("indicator", this.on ? 1 : 0);
  }

  get switchStyle(): NormalizedSwitchStyle {
    return this.style;
  }

  isOn(): boolean {
    return this.on;
  }

  setOn(on: boolean, animate = true): void {
    if (this.isDisposed || on === this.on) return;
    this.on = on;
    const background = this.trackColor(this.getState());
    const indicator = on ? 1 : 0;
    if (animate) {
      this.animateProperties(
        { background, indicator },
        switchAnimation(this.style.animation, this.style.duration),
      );
    } else {
      this.setProperty("background", background);
      this.setProperty("indicator", indicator);
    }
    this.updateAppearance();
    this.triggerCallback("valueChanged", on);
  }

  toggle(): void {
    this.setOn(!this.on);
  }

  override click(): void {
    if (!this.isEnabled) return;
    this.toggle();
    super.click();
  }

  onSwitchedOn(callback: () => void): this {
    this.bindCallback("valueChanged", (value) => {
      if (value === true) callback();
    });
    return this;
  }

  onSwitchedOff(callback: () => void): this {
    this.bindCallback("valueChanged", (value) => {
      if (value === false) callback();
    });
    return this;
  }

  /** Replace track and thumb colors; the current track color applies at once. */
  setColors(colors: SwitchColors): void {
    const s = this.style;
    this.style = Object.freeze({
      ...s,
      trackOnColor: pickColor(colors.trackOn, s.trackOnColor),
      trackOffColor: pickColor(colors.trackOff, s.trackOffColor),
      thumbColor: pickColor(colors.thumb, s.thumbColor),
    });
    this.setProperty("background", this.trackColor(this.getState()));
  }

  private trackColor(state: WidgetVisualState): Rgba {
    if (state === "disabled") return this.style.trackDisabledColor;
    return this.on ? this.style.trackOnColor : this.style.trackOffColor;
  }

  protected override label(): string {
    const stateText = this.on ? this.style.onLabel : this.style.offLabel;
    if (this.text === "") return stateText;
    return stateText === "" ? this.text : `${this.text}: ${stateText}`;
  }

  protected override shadowColor(): Rgba | null {
    return this.style.shadowEnabled ? this.style.shadowColor : null;
  }

  protected override accentColor(): Rgba {
    return this.style.thumbColor;
  }

  protected override resolveStateTargets(state: WidgetVisualState): WidgetStateTargets {
    const background = this.trackColor(state);
    const indicator = this.on ? 1 : 0;
    switch (state) {
      case "hover":
        return { background, indicator, scale: this.style.hoverScale };
      case "pressed":
        return { background, indicator, scale: this.style.activeScale };
      case "normal":
      case "disabled":
        return { background, indicator, scale: 1 };
    }
  }

  protected override stateTransitionConfig(
    from: WidgetVisualState,
    _to: WidgetVisualState,
    property: AnimatedPropertyName,
  ): AnimationConfig {
    if (property === "scale" && from === "pressed") return elasticAnimation(300);
    return { duration: 200, easing: "easeOutQuad" };
  }
}
