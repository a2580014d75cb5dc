/**
 * packages/core/src/widgets/progressBar.ts — Linear progress bar with an animated fill.
 *
 * The fill fraction is the `indicator` channel; the label is formatted from the
 * fraction on every frame, so the text counts along with the fill.
 */

import type { AnimationConfig, Rgba } from "../animation/types.js";
import { type ColorInput, parseColor } from "../color/color.js";
import { TweenError } from "../errors.js";
import { AnimatedWidget, type AnimatedWidgetOptions } from "./animatedWidget.js";
import { type WidgetStateTargets, readPositive } from "./types.js";

export type ProgressBarStyle = Readonly<{
  trackColor?: ColorInput;
  fillColor?: ColorInput;
  showText?: boolean;
  /** `{value}` and `{percent}` are replaced with whole numbers. */
  textFormat?: string;
  /** Fill transition in milliseconds. */
  fillDuration?: number;
  /** Ease the fill; linear when false. */
  smooth?: boolean;
  pulseColor?: ColorInput;
  /** Peak glow of the pulse, in [0..1]. */
  pulseOpacity?: number;
  pulseDuration?: number;
  shadowEnabled?: boolean;
  shadowColor?: ColorInput;
}>;

export type NormalizedProgressBarStyle = Readonly<{
  trackColor: Rgba;
  fillColor: Rgba;
  showText: boolean;
  textFormat: string;
  fillDuration: number;
  smooth: boolean;
  pulseColor: Rgba;
  pulseOpacity: number;
  pulseDuration: number;
  shadowEnabled: boolean;
  shadowColor: Rgba;
}>;

export const DEFAULT_PROGRESS_BAR_STYLE: NormalizedProgressBarStyle = Object.freeze({
  trackColor: parseColor("#ecf0f1"),
  fillColor: parseColor("#3498db"),
  showText: true,
  textFormat: "{value}%",
  fillDuration: 500,
  smooth: true,
  pulseColor: parseColor("#ffffff"),
  pulseOpacity: 0.3,
  pulseDuration: 1500,
  shadowEnabled: true,
  shadowColor: parseColor("#2c3e50"),
});

/** One sweep of the indeterminate marker. */
const INDETERMINATE_SWEEP_MS = 1000;

function pickColor(value: ColorInput | undefined, fallback: Rgba): Rgba {
  return value === undefined ? fallback : parseColor(value);
}

export function normalizeProgressBarStyle(
  style: ProgressBarStyle | undefined,
): NormalizedProgressBarStyle {
  if (!style) return DEFAULT_PROGRESS_BAR_STYLE;
  const d = DEFAULT_PROGRESS_BAR_STYLE;
  const pulseOpacity = style.pulseOpacity ?? d.pulseOpacity;
  if (!Number.isFinite(pulseOpacity) || pulseOpacity < 0 || pulseOpacity > 1) {
    throw new TweenError("TWEEN_INVALID_CONFIG", "pulseOpacity must be within [0, 1]");
  }
  return Object.freeze({
    trackColor: pickColor(style.trackColor, d.trackColor),
    fillColor: pickColor(style.fillColor, d.fillColor),
    showText: style.showText ?? d.showText,
    textFormat: style.textFormat ?? d.textFormat,
    fillDuration: readPositive("fillDuration", style.fillDuration, d.fillDuration),
    smooth: style.smooth ?? d.smooth,
    pulseColor: pickColor(style.pulseColor, d.pulseColor),
    pulseOpacity,
    pulseDuration: readPositive("pulseDuration", style.pulseDuration, d.pulseDuration),
    shadowEnabled: style.shadowEnabled ?? d.shadowEnabled,
    shadowColor: pickColor(style.shadowColor, d.shadowColor),
  });
}

export type AnimatedProgressBarOptions = AnimatedWidgetOptions &
  Readonly<{
    value?: number;
    min?: number;
    max?: number;
    style?: ProgressBarStyle;
  }>;

export type ProgressBarColors = Readonly<{
  track?: ColorInput;
  fill?: ColorInput;
}>;

function assertRange(min: number, max: number): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || max <= min) {
    throw new TweenError("TWEEN_INVALID_CONFIG", `invalid range [${min}, ${max}]`);
  }
}

export class AnimatedProgressBar extends AnimatedWidget {
  private style: NormalizedProgressBarStyle;
  private min: number;
  private max: number;
  private value: number;
  private indeterminate = false;
  private pulsing = false;

  constructor(options: AnimatedProgressBarOptions = {}) {
    super(options);
    this.style = normalizeProgressBarStyle(options.style);
    this.min = options.min ?? 0;
    this.max = options.max ?? 100;
    assertRange(this.min, this.max);
    this.value = this.clampValue(options.value ?? this.min);
    this.setProperty("background", this.style.trackColor);
    this.setProperty("indicator", this.fractionOf(this.value));
  }

  get progressStyle(): NormalizedProgressBarStyle {
    return this.style;
  }

  /** The value last set, not the one the fill is passing through. */
  getValue(): number {
    return this.value;
  }

  /** The value under the fill right now. */
  getDisplayValue(): number {
    return this.min + this.getProperty("indicator") * (this.max - this.min);
  }

  getRange(): readonly [min: number, max: number] {
    return [this.min, this.max];
  }

  isIndeterminate(): boolean {
    return this.indeterminate;
  }

  isPulsing(): boolean {
    return this.pulsing;
  }

  /**
   * Move to `value`, clamped into the range. An animated change reports
   * `valueChanged` when the fill arrives; a replaced fill never reports.
   *
   * @throws TweenError TWEEN_INVALID_VALUE for a non-finite value
   */
  setValue(value: number, animate = true): void {
    if (!Number.isFinite(value)) {
      throw new TweenError("TWEEN_INVALID_VALUE", `progress value must be finite: ${value}`);
    }
    const next = this.clampValue(value);
    if (this.isDisposed || next === this.value) return;
    this.value = next;

    if (!animate || this.indeterminate) {
      if (!this.indeterminate) this.setProperty("indicator", this.fractionOf(next));
      this.updateAppearance();
      this.triggerCallback("valueChanged", next);
      return;
    }
    this.animateProperty("indicator", this.getProperty("indicator"), this.fractionOf(next), {
      ...this.fillConfig(),
      onComplete: () => this.triggerCallback("valueChanged", next),
    });
  }

  increment(amount = 1, animate = true): void {
    this.setValue(this.value + amount, animate);
  }

  decrement(amount = 1, animate = true): void {
    this.setValue(this.value - amount, animate);
  }

  reset(animate = true): void {
    this.setValue(this.min, animate);
  }

  complete(animate = true): void {
    this.setValue(this.max, animate);
  }

  /** @throws TweenError TWEEN_INVALID_CONFIG unless `min < max` */
  setRange(min: number, max: number): void {
    assertRange(min, max);
    this.min = min;
    this.max = max;
    this.value = this.clampValue(this.value);
    if (!this.indeterminate) this.setProperty("indicator", this.fractionOf(this.value));
    this.updateAppearance();
  }

  /** Sweep the indicator back and forth until turned off; the fill then returns to the value. */
  setIndeterminate(enabled = true): void {
    if (this.isDisposed || enabled === this.indeterminate) return;
    this.indeterminate = enabled;
    if (enabled) {
      this.animateProperty("indicator", 0, 1, {
        duration: INDETERMINATE_SWEEP_MS,
        easing: "easeInOutQuad",
        autoReverse: true,
        repeatCount: "infinite",
      });
    } else {
      this.setProperty("indicator", this.fractionOf(this.value));
    }
    this.updateAppearance();
  }

  /** Breathe a glow over the fill until turned off. */
  setPulsing(enabled = true): void {
    if (this.isDisposed || enabled === this.pulsing) return;
    this.pulsing = enabled;
    if (!enabled) {
      this.setProperty("glow", 0);
      return;
    }
    this.setGlowColor(this.style.pulseColor);
    this.animateProperty("glow", 0, this.style.pulseOpacity, {
      duration: this.style.pulseDuration,
      easing: "easeInOutQuad",
      autoReverse: true,
      repeatCount: "infinite",
    });
  }

  setColors(colors: ProgressBarColors): void {
    const s = this.style;
    this.style = Object.freeze({
      ...s,
      trackColor: pickColor(colors.track, s.trackColor),
      fillColor: pickColor(colors.fill, s.fillColor),
    });
    this.setProperty("background", this.style.trackColor);
  }

  onValueChanged(callback: (value: number) => void): this {
    this.bindCallback("valueChanged", (value) => {
      if (typeof value === "number") callback(value);
    });
    return this;
  }

  private clampValue(value: number): number {
    return Math.min(this.max, Math.max(this.min, value));
  }

  private fractionOf(value: number): number {
    return (value - this.min) / (this.max - this.min);
  }

  private fillConfig(): AnimationConfig {
    return {
      duration: this.style.fillDuration,
      easing: this.style.smooth ? "easeOutCubic" : "linear",
    };
  }

  protected override label(): string {
    if (!this.style.showText || this.indeterminate) return "";
    const fraction = this.getProperty("indicator");
    return this.style.textFormat
      .replace("{value}", String(Math.round(this.getDisplayValue())))
      .replace("{percent}", String(Math.round(fraction * 100)));
  }

  protected override shadowColor(): Rgba | null {
    return this.style.shadowEnabled ? this.style.shadowColor : null;
  }

  protected override accentColor(): Rgba {
    return this.style.fillColor;
  }

  protected override resolveStateTargets(): WidgetStateTargets {
    return { background: this.style.trackColor };
  }
}
