/**
 * packages/core/src/render/headless.ts — In-memory toolkit that records every appearance.
 */

import type { WidgetAppearance } from "../widgets/types.js";
import type { RenderableWidget, ToolkitAdapter, WidgetInput, WidgetSurface } from "./types.js";

export class HeadlessSurface implements WidgetSurface {
  readonly framework = "headless";
  readonly frames: WidgetAppearance[] = [];
  private readonly widget: RenderableWidget;
  private disposed = false;

  constructor(widget: RenderableWidget) {
    this.widget = widget;
  }

  get widgetId(): string {
    return this.widget.widgetId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get latest(): WidgetAppearance | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Simulate native input. Ignored once disposed. */
  dispatch(input: WidgetInput): void {
    if (this.disposed) return;
    this.widget.handleInput(input);
  }

  updateAppearance(appearance: WidgetAppearance): void {
    if (this.disposed) return;
    this.frames.push(appearance);
  }

  dispose(): void {
    this.disposed = true;
  }
}

/** Parent handle for headless rendering; collects mounted surfaces. */
export class HeadlessHost {
  readonly surfaces: HeadlessSurface[] = [];

  find(widgetId: string): HeadlessSurface | undefined {
    return this.surfaces.find((s) => s.widgetId === widgetId && !s.isDisposed);
  }
}

export const headlessAdapter: ToolkitAdapter<HeadlessHost> = {
  kind: "headless",
  isAvailable: () => true,
  mount(parent: HeadlessHost, widget: RenderableWidget): WidgetSurface {
    const surface = new HeadlessSurface(widget);
    parent.surfaces.push(surface);
    surface.updateAppearance(widget.getAppearance());
    return surface;
  },
};
