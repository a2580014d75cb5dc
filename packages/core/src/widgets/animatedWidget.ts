/**
 * packages/core/src/widgets/animatedWidget.ts — Base adapter between widget state and the manager.
 *
 * A widget keeps a bag of animated properties (background, scale, lift, ...),
 * maps each visual state to target values, and issues one `animate()` call per
 * property that has to move. Every property owns a single animation id, so a
 * new transition on a property replaces the one in flight.
 *
 * Rendering is delegated to a toolkit adapter; the widget only pushes frozen
 * appearance snapshots to whatever surface it is mounted on.
 */

import { interpolateValue } from "../animation/interpolate.js";
import { AnimationManager } from "../animation/manager.js";
import {
  bounceAnimation,
  fadeAnimation,
  slideAnimation,
  validationErrorAnimation,
} from "../animation/presets.js";
import type {
  AnimatableValue,
  AnimationConfig,
  CompletionCallback,
  Rgba,
} from "../animation/types.js";
import { type ColorInput, parseColor } from "../color/color.js";
import { TweenError } from "../errors.js";
import { type Logger, defaultLogger } from "../logging.js";
import { renderWidget } from "../render/render.js";
import type {
  FrameworkKind,
  FrameworkParentMap,
  RenderableWidget,
  WidgetInput,
  WidgetSurface,
} from "../render/types.js";
import { CallbackRegistry } from "./callbacks.js";
import {
  ANIMATED_PROPERTY_NAMES,
  type AnimatedProperties,
  type AnimatedPropertyName,
  type NormalizedWidgetConfig,
  type WidgetAppearance,
  type WidgetConfig,
  type WidgetEventCallback,
  type WidgetEventMap,
  type WidgetEventType,
  type WidgetStateTargets,
  type WidgetVisualState,
  normalizeWidgetConfig,
} from "./types.js";

export type AnimatedWidgetOptions = Readonly<{
  /** Prefix for this widget's animation ids; generated when omitted. */
  id?: string;
  config?: WidgetConfig;
  /** Shared manager. When omitted the widget owns a private one and disposes it. */
  manager?: AnimationManager;
  logger?: Logger;
}>;

export type PropertyAnimationOptions = AnimationConfig &
  Readonly<{
    onComplete?: CompletionCallback;
  }>;

export type WidgetAnimationState = Readonly<{
  isAnimating: boolean;
  activeAnimations: readonly string[];
  animationCount: number;
  widgetState: WidgetVisualState;
}>;

export type PulseOptions = Readonly<{ scaleFactor?: number; duration?: number }>;
export type BounceOptions = Readonly<{ height?: number; duration?: number }>;
export type ShakeOptions = Readonly<{ intensity?: number; duration?: number }>;
export type SlideDirection = "left" | "right" | "top" | "bottom";
export type SlideInOptions = Readonly<{ distance?: number; duration?: number }>;

let nextWidgetSerial = 1;

function sameValue(a: AnimatableValue, b: AnimatableValue): boolean {
  if (typeof a === "number" || typeof b === "number") return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

export abstract class AnimatedWidget implements RenderableWidget {
  readonly widgetId: string;
  readonly config: NormalizedWidgetConfig;
  protected readonly manager: AnimationManager;
  protected readonly logger: Logger;
  private readonly ownsManager: boolean;
  private readonly callbacks: CallbackRegistry<WidgetEventMap>;
  private readonly channels = new Set<string>();
  private readonly properties: AnimatedProperties;
  /** Values effects settle on when the current state names no target. */
  private readonly baseline: AnimatedProperties;
  private glowColor: Rgba;
  private widgetState: WidgetVisualState = "normal";
  private surface: WidgetSurface | null = null;
  private disposed = false;

  constructor(options: AnimatedWidgetOptions = {}) {
    this.widgetId = options.id ?? `widget-${nextWidgetSerial++}`;
    this.config = normalizeWidgetConfig(options.config);
    this.logger = options.logger ?? defaultLogger();
    this.ownsManager = options.manager === undefined;
    this.manager = options.manager ?? new AnimationManager({ logger: this.logger });
    this.callbacks = new CallbackRegistry<WidgetEventMap>(this.logger);
    this.properties = {
      background: this.config.backgroundColor,
      scale: 1,
      elevation: 0,
      opacity: 1,
      offsetX: 0,
      offsetY: 0,
      width: this.config.width,
      height: this.config.height,
      glow: 0,
      indicator: 0,
    };
    this.baseline = { ...this.properties };
    this.glowColor = this.config.backgroundColor;
  }

  /** Target property values for `state`. */
  protected abstract resolveStateTargets(state: WidgetVisualState): WidgetStateTargets;

  /** Timing for one property while moving between two states. */
  protected stateTransitionConfig(
    _from: WidgetVisualState,
    _to: WidgetVisualState,
    _property: AnimatedPropertyName,
  ): AnimationConfig {
    return { duration: this.config.animationDuration, easing: "easeOutCubic" };
  }

  protected label(): string {
    return "";
  }

  /** Shadow cast under elevation; none by default. */
  protected shadowColor(): Rgba | null {
    return null;
  }

  protected accentColor(): Rgba {
    return this.config.textColor;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  bindCallback<E extends WidgetEventType>(event: E, callback: WidgetEventCallback<E>): () => void {
    return this.callbacks.bind(event, callback);
  }

  triggerCallback<E extends WidgetEventType>(event: E, ...args: WidgetEventMap[E]): number {
    return this.callbacks.trigger(event, ...args);
  }

  // ---------------------------------------------------------------------------
  // Visual state
  // ---------------------------------------------------------------------------

  getState(): WidgetVisualState {
    return this.widgetState;
  }

  get isEnabled(): boolean {
    return this.widgetState !== "disabled";
  }

  /** Move to `next`, animating every property the state targets. */
  setState(next: WidgetVisualState): void {
    this.transitionTo(next, this.resolveStateTargets(next));
  }

  /** Move to `state` using explicit targets instead of the widget's own mapping. */
  animateToState(state: WidgetVisualState, targets?: WidgetStateTargets): void {
    this.transitionTo(state, targets ?? this.resolveStateTargets(state));
  }

  enable(): void {
    this.setState("normal");
  }

  disable(): void {
    this.setState("disabled");
  }

  private transitionTo(next: WidgetVisualState, targets: WidgetStateTargets): void {
    if (this.disposed) return;
    const prev = this.widgetState;
    if (prev === next) return;

    this.widgetState = next;
    this.callbacks.trigger("stateChanged", prev, next);
    for (const name of ANIMATED_PROPERTY_NAMES) {
      const target = targets[name];
      if (target === undefined) continue;
      this.animateTowards(name, target, this.stateTransitionConfig(prev, next, name));
    }
    this.updateAppearance();
  }

  // ---------------------------------------------------------------------------
  // Input
  // ---------------------------------------------------------------------------

  handleInput(input: WidgetInput): void {
    switch (input) {
      case "hoverEnter":
        this.hoverEnter();
        return;
      case "hoverLeave":
        this.hoverLeave();
        return;
      case "press":
        this.press();
        return;
      case "release":
        this.release();
        return;
      case "click":
        this.click();
        return;
    }
  }

  hoverEnter(): void {
    if (!this.isEnabled) return;
    this.setState("hover");
    this.callbacks.trigger("hoverEnter");
  }

  hoverLeave(): void {
    if (!this.isEnabled) return;
    this.setState("normal");
    this.callbacks.trigger("hoverLeave");
  }

  press(): void {
    if (!this.isEnabled) return;
    this.setState("pressed");
  }

  /** `pointerInside` picks hover or normal as the resting state. */
  release(pointerInside = true): void {
    if (!this.isEnabled) return;
    this.setState(pointerInside ? "hover" : "normal");
  }

  click(): void {
    if (!this.isEnabled) return;
    this.callbacks.trigger("click");
  }

  // ---------------------------------------------------------------------------
  // Properties
  // ---------------------------------------------------------------------------

  getProperty<K extends AnimatedPropertyName>(name: K): AnimatedProperties[K] {
    return this.properties[name];
  }

  /**
   * Jump a property to `value` without animating; cancels any animation on it.
   * The value also becomes the property's resting value for effects.
   */
  setProperty<K extends AnimatedPropertyName>(name: K, value: AnimatedProperties[K]): void {
    this.manager.stopAnimation(this.animationId(name));
    this.baseline[name] = value;
    this.applyProperty(name, value);
  }

  /** Where a property rests in the current state: the state's target, else its baseline. */
  protected restingValue<K extends AnimatedPropertyName>(name: K): AnimatedProperties[K] {
    const targets: Partial<AnimatedProperties> = this.resolveStateTargets(this.widgetState);
    const target: AnimatedProperties[K] | undefined = targets[name];
    return target ?? this.baseline[name];
  }

  /**
   * Animate one property. With animations disabled the property jumps to its
   * settled value (the end value, or the start value for auto-reversing runs).
   */
  animateProperty<K extends AnimatedPropertyName>(
    name: K,
    from: AnimatedProperties[K],
    to: AnimatedProperties[K],
    options: PropertyAnimationOptions = {},
  ): void {
    const { onComplete, ...config } = options;
    this.runAnimation(
      name,
      from,
      to,
      (value) => this.applyProperty(name, value),
      { ...config, duration: config.duration ?? this.config.animationDuration },
      onComplete,
    );
  }

  /** Animate several properties from their current values. */
  animateProperties(targets: WidgetStateTargets, options: PropertyAnimationOptions = {}): void {
    for (const name of ANIMATED_PROPERTY_NAMES) {
      const target = targets[name];
      if (target === undefined) continue;
      this.animateTowards(name, target, options);
    }
  }

  private animateTowards<K extends AnimatedPropertyName>(
    name: K,
    target: AnimatedProperties[K],
    options: PropertyAnimationOptions,
  ): void {
    const current = this.properties[name];
    if (sameValue(current, target)) {
      // Already there; drop any run still heading somewhere else.
      this.manager.stopAnimation(this.animationId(name));
      return;
    }
    this.animateProperty(name, current, target, options);
  }

  private applyProperty<K extends AnimatedPropertyName>(
    name: K,
    value: AnimatedProperties[K],
  ): void {
    if (this.disposed) return;
    this.properties[name] = value;
    this.updateAppearance();
  }

  private animationId(channel: string): string {
    return `${this.widgetId}:${channel}`;
  }

  /** Single entry point to the manager for this widget. */
  protected runAnimation<V extends AnimatableValue>(
    channel: string,
    from: V,
    to: V,
    onValue: (value: V) => void,
    config: AnimationConfig,
    onComplete?: CompletionCallback,
  ): void {
    if (this.disposed) return;
    if (!this.config.enableAnimations) {
      this.manager.stopAnimation(this.animationId(channel));
      onValue(config.autoReverse === true ? from : to);
      onComplete?.();
      return;
    }
    this.channels.add(channel);
    this.manager.animate(this.animationId(channel), from, to, onValue, config, onComplete);
  }

  // ---------------------------------------------------------------------------
  // Effects
  // ---------------------------------------------------------------------------

  /**
   * One run on `name`'s channel: from wherever the property is now to `peak`
   * over the first half, then to its resting value. Re-triggering mid-flight
   * never strands the property off rest.
   */
  private peakAndSettle<K extends AnimatedPropertyName>(
    name: K,
    peak: AnimatedProperties[K],
    duration: number,
  ): void {
    const start = this.properties[name];
    const rest = this.restingValue(name);
    this.runAnimation<number>(
      name,
      0,
      1,
      (t) => {
        if (t >= 1) {
          this.applyProperty(name, rest);
        } else if (t <= 0.5) {
          this.applyProperty(name, interpolateValue(start, peak, t * 2));
        } else {
          this.applyProperty(name, interpolateValue(peak, rest, (t - 0.5) * 2));
        }
      },
      { duration, easing: "easeInOutQuad" },
    );
  }

  /** Scale up and back once. `duration` is one direction. */
  pulse(options: PulseOptions = {}): void {
    const peak = this.restingValue("scale") * (options.scaleFactor ?? 1.1);
    this.peakAndSettle("scale", peak, 2 * (options.duration ?? 500));
  }

  /** Background to `flashColor` and back; `duration` covers the round trip. */
  flash(flashColor: ColorInput = "#ffffff", duration = 300): void {
    this.peakAndSettle("background", parseColor(flashColor), duration);
  }

  /** Swell a colored glow and let it fade out. */
  glow(color: ColorInput = "#3498db", duration = 1000): void {
    this.setGlowColor(parseColor(color));
    this.peakAndSettle("glow", 1, duration);
  }

  /** Color drawn for the `glow` channel. */
  protected setGlowColor(color: Rgba): void {
    this.glowColor = color;
    this.updateAppearance();
  }

  /** Drop in from `height` above the resting offset and bounce to rest. */
  bounce(options: BounceOptions = {}): void {
    const rest = this.restingValue("offsetY");
    this.animateProperty(
      "offsetY",
      rest - (options.height ?? 10),
      rest,
      bounceAnimation(options.duration),
    );
  }

  /** Damped horizontal shake around the resting offset. */
  shake(options: ShakeOptions = {}): void {
    const rest = this.restingValue("offsetX");
    const intensity = options.intensity ?? 5;
    this.runAnimation<number>(
      "offsetX",
      0,
      1,
      (progress) => {
        const offset = Math.sin(progress * Math.PI * 8) * intensity * (1 - progress);
        this.applyProperty("offsetX", rest + offset);
      },
      validationErrorAnimation(options.duration),
    );
  }

  /** Enter from `direction`, `distance` away (the widget's own size by default). */
  slideIn(direction: SlideDirection = "left", options: SlideInOptions = {}): void {
    const config = slideAnimation(options.duration);
    const horizontal = direction === "left" || direction === "right";
    const name = horizontal ? "offsetX" : "offsetY";
    const distance = options.distance ?? (horizontal ? this.properties.width : this.properties.height);
    const sign = direction === "left" || direction === "top" ? -1 : 1;
    const rest = this.restingValue(name);
    this.animateProperty(name, rest + sign * distance, rest, config);
  }

  fadeIn(duration = 300): void {
    this.animateProperty("opacity", this.properties.opacity, 1, fadeAnimation(duration));
  }

  fadeOut(duration = 300): void {
    this.animateProperty("opacity", this.properties.opacity, 0, fadeAnimation(duration));
  }

  setSize(width: number, height: number, animate = true): void {
    if (!animate) {
      this.setProperty("width", width);
      this.setProperty("height", height);
      return;
    }
    const options: PropertyAnimationOptions = {
      duration: this.config.animationDuration,
      easing: "easeOutCubic",
    };
    this.animateProperty("width", this.properties.width, width, options);
    this.animateProperty("height", this.properties.height, height, options);
  }

  // ---------------------------------------------------------------------------
  // Animation bookkeeping
  // ---------------------------------------------------------------------------

  isAnimating(): boolean {
    for (const channel of this.channels) {
      if (this.manager.isAnimating(this.animationId(channel))) return true;
    }
    return false;
  }

  getAnimationState(): WidgetAnimationState {
    const active: string[] = [];
    for (const channel of this.channels) {
      if (this.manager.isAnimating(this.animationId(channel))) active.push(channel);
    }
    return Object.freeze({
      isAnimating: active.length > 0,
      activeAnimations: Object.freeze(active),
      animationCount: active.length,
      widgetState: this.widgetState,
    });
  }

  /** Cancel this widget's animations; properties keep their current values. */
  stopAllAnimations(): void {
    for (const channel of this.channels) {
      this.manager.stopAnimation(this.animationId(channel));
    }
    this.channels.clear();
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  getAppearance(): WidgetAppearance {
    return Object.freeze({
      ...this.properties,
      state: this.widgetState,
      label: this.label(),
      foreground: this.config.textColor,
      border: this.config.borderColor,
      borderRadius: this.config.borderRadius,
      borderWidth: this.config.borderWidth,
      fontFamily: this.config.fontFamily,
      fontSize: this.config.fontSize,
      shadow: this.shadowColor(),
      glowColor: this.glowColor,
      accent: this.accentColor(),
    });
  }

  /** Push the current appearance to the mounted surface, if any. */
  updateAppearance(): void {
    if (this.disposed || this.surface === null) return;
    this.surface.updateAppearance(this.getAppearance());
  }

  /**
   * Mount into `parent` with the toolkit named by `framework`, replacing any
   * previous mount.
   *
   * @throws TweenError TWEEN_UNSUPPORTED_FRAMEWORK
   */
  render<K extends FrameworkKind>(parent: FrameworkParentMap[K], framework: K): WidgetSurface {
    if (this.disposed) {
      throw new TweenError("TWEEN_INVALID_STATE", `render: widget ${this.widgetId} is disposed`);
    }
    const surface = renderWidget(this, parent, framework);
    this.surface?.dispose();
    this.surface = surface;
    return surface;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    if (this.disposed) return;
    this.stopAllAnimations();
    if (this.ownsManager) this.manager.dispose();
    this.surface?.dispose();
    this.surface = null;
    this.callbacks.clear();
    this.disposed = true;
  }
}
