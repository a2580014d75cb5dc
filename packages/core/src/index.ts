/**
 * @tween-ui/core
 *
 * Named, independently keyed property animations for widgets, plus the widget
 * and render adapters that drive them.
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  TweenError,
  type TweenErrorCode,
  type TweenErrorOptions,
  describeThrown,
  isTweenError,
} from "./errors.js";
export { type CreateLoggerOptions, type Logger, createLogger, defaultLogger } from "./logging.js";

// =============================================================================
// Animation
// =============================================================================

export type {
  AnimatableValue,
  AnimationConfig,
  CompletionCallback,
  EasingFunction,
  EasingName,
  NormalizedAnimationConfig,
  RepeatCount,
  Rgba,
  UpdateCallback,
  ValueKind,
} from "./animation/types.js";
export { EASING_CURVES, EASING_NAMES, isEasingName, resolveEasing } from "./animation/easing.js";
export {
  assertCompatibleValues,
  clamp01,
  freezeValue,
  interpolateColorSteps,
  interpolateValue,
  isRgba,
  lerp,
  lerpColor,
  valueKindOf,
} from "./animation/interpolate.js";
export { DEFAULT_ANIMATION_CONFIG, normalizeAnimationConfig } from "./animation/config.js";
export {
  type ToggleAnimationKind,
  bounceAnimation,
  checkboxAnimation,
  elasticAnimation,
  fadeAnimation,
  scaleAnimation,
  slideAnimation,
  switchAnimation,
  validationErrorAnimation,
} from "./animation/presets.js";
export { type CancelTimer, type FrameClock, systemFrameClock } from "./animation/frameClock.js";
export type {
  AnimationDirection,
  AnimationRecord,
  AnimationState,
  RecordStep,
} from "./animation/record.js";
export {
  AnimationManager,
  type AnimationErrorHandler,
  type AnimationManagerOptions,
  defaultAnimationManager,
} from "./animation/manager.js";

// =============================================================================
// Color
// =============================================================================

export {
  type ColorInput,
  NAMED_COLORS,
  contrastColor,
  darkenColor,
  lightenColor,
  parseColor,
  rgba,
  toHex,
  toRgbaString,
} from "./color/color.js";

// =============================================================================
// Widgets
// =============================================================================

export {
  ANIMATED_PROPERTY_NAMES,
  type AnimatedProperties,
  type AnimatedPropertyName,
  DEFAULT_WIDGET_CONFIG,
  type NormalizedWidgetConfig,
  WIDGET_VISUAL_STATES,
  type WidgetAppearance,
  type WidgetConfig,
  type WidgetEventCallback,
  type WidgetEventMap,
  type WidgetEventType,
  type WidgetStateTargets,
  type WidgetVisualState,
  normalizeWidgetConfig,
  readNonNegative,
  readPositive,
} from "./widgets/types.js";
export { CallbackRegistry } from "./widgets/callbacks.js";
export {
  AnimatedWidget,
  type AnimatedWidgetOptions,
  type BounceOptions,
  type PropertyAnimationOptions,
  type PulseOptions,
  type ShakeOptions,
  type SlideDirection,
  type SlideInOptions,
  type WidgetAnimationState,
} from "./widgets/animatedWidget.js";
export {
  AnimatedButton,
  type AnimatedButtonOptions,
  type ButtonColors,
  type ButtonStyle,
  DEFAULT_BUTTON_STYLE,
  type NormalizedButtonStyle,
  normalizeButtonStyle,
} from "./widgets/button.js";
export {
  AnimatedCheckbox,
  type AnimatedCheckboxOptions,
  type CheckState,
  type CheckboxColors,
  type CheckboxStyle,
  DEFAULT_CHECKBOX_STYLE,
  type NormalizedCheckboxStyle,
  normalizeCheckboxStyle,
} from "./widgets/checkbox.js";
export {
  AnimatedSwitch,
  type AnimatedSwitchOptions,
  DEFAULT_SWITCH_STYLE,
  type NormalizedSwitchStyle,
  type SwitchColors,
  type SwitchStyle,
  normalizeSwitchStyle,
} from "./widgets/switch.js";
export {
  AnimatedProgressBar,
  type AnimatedProgressBarOptions,
  DEFAULT_PROGRESS_BAR_STYLE,
  type NormalizedProgressBarStyle,
  type ProgressBarColors,
  type ProgressBarStyle,
  normalizeProgressBarStyle,
} from "./widgets/progressBar.js";

// =============================================================================
// Render
// =============================================================================

export {
  FRAMEWORK_KINDS,
  type FrameworkKind,
  type FrameworkParentMap,
  type RenderableWidget,
  type ToolkitAdapter,
  type WidgetInput,
  type WidgetSurface,
} from "./render/types.js";
export { isFrameworkAvailable, isFrameworkKind, renderWidget } from "./render/render.js";
export { HeadlessHost, HeadlessSurface, headlessAdapter } from "./render/headless.js";
export { type TerminalSink, formatTerminalLine, terminalAdapter } from "./render/terminal.js";
export { type DomElementLike, type DomParent, domAdapter, domStyleFor } from "./render/dom.js";
