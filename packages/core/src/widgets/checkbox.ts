/**
 * packages/core/src/widgets/checkbox.ts — Checkbox with an animated fill and checkmark stroke.
 *
 * The check state (unchecked / checked / indeterminate) is independent of the
 * visual state: hover and press only scale the box, while the fill color and
 * the `indicator` channel (checkmark stroke) follow the check state.
 */

import { type ToggleAnimationKind, checkboxAnimation, scaleAnimation } from "../animation/presets.js";
import type { AnimationConfig, Rgba } from "../animation/types.js";
import { type ColorInput, lightenColor, parseColor } from "../color/color.js";
import { TweenError } from "../errors.js";
import { AnimatedWidget, type AnimatedWidgetOptions } from "./animatedWidget.js";
import {
  type AnimatedPropertyName,
  type WidgetStateTargets,
  type WidgetVisualState,
  readNonNegative,
  readPositive,
} from "./types.js";

export type CheckState = "unchecked" | "checked" | "indeterminate";

export type CheckboxStyle = Readonly<{
  uncheckedColor?: ColorInput;
  checkedColor?: ColorInput;
  indeterminateColor?: ColorInput;
  disabledColor?: ColorInput;
  checkmarkColor?: ColorInput;
  /** Edge length of the box. */
  size?: number;
  hoverScale?: number;
  /** Scale while pressed. */
  pressScale?: number;
  animation?: ToggleAnimationKind;
  /** Duration of the check/uncheck transition in milliseconds. */
  checkDuration?: number;
  shadowEnabled?: boolean;
  shadowColor?: ColorInput;
  /** Cycle through the indeterminate state on click. */
  triState?: boolean;
}>;

export type NormalizedCheckboxStyle = Readonly<{
  uncheckedColor: Rgba;
  checkedColor: Rgba;
  indeterminateColor: Rgba;
  disabledColor: Rgba;
  checkmarkColor: Rgba;
  size: number;
  hoverScale: number;
  pressScale: number;
  animation: ToggleAnimationKind;
  checkDuration: number;
  shadowEnabled: boolean;
  shadowColor: Rgba;
  triState: boolean;
}>;

export const DEFAULT_CHECKBOX_STYLE: NormalizedCheckboxStyle = Object.freeze({
  uncheckedColor: parseColor("#bdc3c7"),
  checkedColor: parseColor("#3498db"),
  indeterminateColor: parseColor("#f39c12"),
  disabledColor: parseColor("#ecf0f1"),
  checkmarkColor: parseColor("#ffffff"),
  size: 20,
  hoverScale: 1.1,
  pressScale: 0.9,
  animation: "default",
  checkDuration: 300,
  shadowEnabled: true,
  shadowColor: parseColor("#34495e"),
  triState: false,
});

function pickColor(value: ColorInput | undefined, fallback: Rgba): Rgba {
  return value === undefined ? fallback : parseColor(value);
}

export function normalizeCheckboxStyle(style: CheckboxStyle | undefined): NormalizedCheckboxStyle {
  if (!style) return DEFAULT_CHECKBOX_STYLE;
  const d = DEFAULT_CHECKBOX_STYLE;
  return Object.freeze({
    uncheckedColor: pickColor(style.uncheckedColor, d.uncheckedColor),
    checkedColor: pickColor(style.checkedColor, d.checkedColor),
    indeterminateColor: pickColor(style.indeterminateColor, d.indeterminateColor),
    disabledColor: pickColor(style.disabledColor, d.disabledColor),
    checkmarkColor: pickColor(style.checkmarkColor, d.checkmarkColor),
    size: readNonNegative("size", style.size, d.size),
    hoverScale: readPositive("hoverScale", style.hoverScale, d.hoverScale),
    pressScale: readPositive("pressScale", style.pressScale, d.pressScale),
    animation: style.animation ?? d.animation,
    checkDuration: readPositive("checkDuration", style.checkDuration, d.checkDuration),
    shadowEnabled: style.shadowEnabled ?? d.shadowEnabled,
    shadowColor: pickColor(style.shadowColor, d.shadowColor),
    triState: style.triState ?? d.triState,
  });
}

export type AnimatedCheckboxOptions = AnimatedWidgetOptions &
  Readonly<{
    label?: string;
    checked?: boolean;
    style?: CheckboxStyle;
  }>;

export type CheckboxColors = Readonly<{
  checked?: ColorInput;
  unchecked?: ColorInput;
  indeterminate?: ColorInput;
}>;

type CheckTargets = Readonly<{ background: Rgba; indicator: number }>;

export class AnimatedCheckbox extends AnimatedWidget {
  private style: NormalizedCheckboxStyle;
  private readonly text: string;
  private current: CheckState;

  constructor(options: AnimatedCheckboxOptions = {}) {
    super(options);
    this.style = normalizeCheckboxStyle(options.style);
    this.text = options.label ?? "";
    this.current = options.checked === true ? "checked" : "unchecked";
    this.setProperty("width", this.style.size);
    this.setProperty("height", this.style.size);
    this.jumpToCheckState();
  }

  get checkState(): CheckState {
    return this.current;
  }

  get checkboxStyle(): NormalizedCheckboxStyle {
    return this.style;
  }

  isChecked(): boolean {
    return this.current === "checked";
  }

  isIndeterminate(): boolean {
    return this.current === "indeterminate";
  }

  setChecked(checked: boolean, animate = true): void {
    this.moveTo(checked ? "checked" : "unchecked", animate);
  }

  /** @throws TweenError TWEEN_INVALID_STATE unless the style enables tri-state */
  setIndeterminate(animate = true): void {
    if (!this.style.triState) {
      throw new TweenError(
        "TWEEN_INVALID_STATE",
        `checkbox ${this.widgetId}: indeterminate needs triState`,
      );
    }
    this.moveTo("indeterminate", animate);
  }

  /** Flip the check state; tri-state boxes cycle unchecked, indeterminate, checked. */
  toggle(): void {
    if (!this.style.triState) {
      this.moveTo(this.current === "checked" ? "unchecked" : "checked", true);
      return;
    }
    switch (this.current) {
      case "unchecked":
        this.moveTo("indeterminate", true);
        return;
      case "indeterminate":
        this.moveTo("checked", true);
        return;
      case "checked":
        this.moveTo("unchecked", true);
        return;
    }
  }

  override click(): void {
    if (!this.isEnabled) return;
    this.toggle();
    super.click();
  }

  onChecked(callback: () => void): this {
    this.bindCallback("valueChanged", (value) => {
      if (value === "checked") callback();
    });
    return this;
  }

  onUnchecked(callback: () => void): this {
    this.bindCallback("valueChanged", (value) => {
      if (value === "unchecked") callback();
    });
    return this;
  }

  /** Replace fill colors; the color of the current check state applies at once. */
  setColors(colors: CheckboxColors): void {
    const s = this.style;
    this.style = Object.freeze({
      ...s,
      checkedColor: pickColor(colors.checked, s.checkedColor),
      uncheckedColor: pickColor(colors.unchecked, s.uncheckedColor),
      indeterminateColor: pickColor(colors.indeterminate, s.indeterminateColor),
    });
    this.setProperty("background", this.checkTargets(this.getState()).background);
  }

  private moveTo(next: CheckState, animate: boolean): void {
    if (this.isDisposed || next === this.current) return;
    this.current = next;
    if (animate) {
      this.animateProperties(
        this.checkTargets(this.getState()),
        checkboxAnimation(this.style.animation, this.style.checkDuration),
      );
    } else {
      this.jumpToCheckState();
    }
    this.updateAppearance();
    this.triggerCallback("valueChanged", next);
  }

  private jumpToCheckState(): void {
    const targets = this.checkTargets(this.getState());
    this.setProperty("background", targets.background);
    this.setProperty("indicator", targets.indicator);
  }

  private checkTargets(state: WidgetVisualState): CheckTargets {
    const s = this.style;
    const indicator = this.current === "checked" ? 1 : 0;
    if (state === "disabled") return { background: s.disabledColor, indicator };
    switch (this.current) {
      case "checked":
        return {
          background: state === "hover" ? lightenColor(s.checkedColor, 0.1) : s.checkedColor,
          indicator,
        };
      case "indeterminate":
        return { background: s.indeterminateColor, indicator };
      case "unchecked":
        return { background: s.uncheckedColor, indicator };
    }
  }

  protected override label(): string {
    const mark = this.current === "checked" ? "[x]" : this.current === "indeterminate" ? "[-]" : "[ ]";
    return this.text === "" ? mark : `${mark} ${this.text}`;
  }

  protected override shadowColor(): Rgba | null {
    return this.style.shadowEnabled ? this.style.shadowColor : null;
  }

  protected override accentColor(): Rgba {
    return this.style.checkmarkColor;
  }

  protected override resolveStateTargets(state: WidgetVisualState): WidgetStateTargets {
    const targets = this.checkTargets(state);
    switch (state) {
      case "hover":
        return { ...targets, scale: this.style.hoverScale };
      case "pressed":
        return { ...targets, scale: this.style.pressScale };
      case "normal":
      case "disabled":
        return { ...targets, scale: 1 };
    }
  }

  protected override stateTransitionConfig(
    from: WidgetVisualState,
    to: WidgetVisualState,
    property: AnimatedPropertyName,
  ): AnimationConfig {
    if (property === "scale") {
      if (to === "pressed") return { duration: 100, easing: "easeOutQuad" };
      if (from === "pressed") return scaleAnimation(150);
      return { duration: 200, easing: "easeOutQuad" };
    }
    return { duration: 250, easing: "easeOutCubic" };
  }
}
