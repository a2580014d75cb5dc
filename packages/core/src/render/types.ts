/**
 * packages/core/src/render/types.ts — Capability interfaces between widgets and toolkits.
 *
 * The animation manager never imports this module; only widget adapters do.
 */

import type { WidgetAppearance } from "../widgets/types.js";
import type { DomParent } from "./dom.js";
import type { HeadlessHost } from "./headless.js";
import type { TerminalSink } from "./terminal.js";

/** Toolkits a widget can be rendered into. */
export type FrameworkKind = "headless" | "terminal" | "dom";

export const FRAMEWORK_KINDS: readonly FrameworkKind[] = Object.freeze([
  "headless",
  "terminal",
  "dom",
]);

/** Parent handle expected by each toolkit. */
export type FrameworkParentMap = {
  headless: HeadlessHost;
  terminal: TerminalSink;
  dom: DomParent;
};

/** Native input a toolkit forwards back to the widget. */
export type WidgetInput = "hoverEnter" | "hoverLeave" | "press" | "release" | "click";

/** What an adapter may ask of a widget. */
export interface RenderableWidget {
  readonly widgetId: string;
  getAppearance(): WidgetAppearance;
  handleInput(input: WidgetInput): void;
}

/** A mounted widget inside a toolkit. */
export interface WidgetSurface {
  readonly framework: FrameworkKind;
  updateAppearance(appearance: WidgetAppearance): void;
  dispose(): void;
}

export interface ToolkitAdapter<P> {
  readonly kind: FrameworkKind;
  /** False when the toolkit's host objects are missing from this environment. */
  isAvailable(): boolean;
  mount(parent: P, widget: RenderableWidget): WidgetSurface;
}
