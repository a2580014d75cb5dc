/**
 * packages/core/src/render/dom.ts — Browser DOM rendering.
 *
 * Typed structurally so the package builds without the DOM lib. The adapter
 * reports itself unavailable when `globalThis.document` is missing.
 */

import { toRgbaString } from "../color/color.js";
import { TweenError } from "../errors.js";
import type { WidgetAppearance } from "../widgets/types.js";
import type { RenderableWidget, ToolkitAdapter, WidgetInput, WidgetSurface } from "./types.js";

type DomListener = () => void;

export interface DomElementLike {
  textContent: string | null;
  readonly style: { setProperty(name: string, value: string): void };
  setAttribute(name: string, value: string): void;
  addEventListener(type: string, listener: DomListener): void;
  removeEventListener(type: string, listener: DomListener): void;
  remove(): void;
}

export interface DomParent {
  appendChild(child: DomElementLike): unknown;
}

type DomDocumentLike = {
  createElement(tagName: string): DomElementLike;
};

const DOM_INPUTS: ReadonlyArray<readonly [string, WidgetInput]> = Object.freeze([
  ["mouseenter", "hoverEnter"],
  ["mouseleave", "hoverLeave"],
  ["mousedown", "press"],
  ["mouseup", "release"],
  ["click", "click"],
]);

function currentDocument(): DomDocumentLike | undefined {
  const doc = (globalThis as { document?: DomDocumentLike }).document;
  if (doc === undefined || typeof doc.createElement !== "function") return undefined;
  return doc;
}

function boxShadowFor(appearance: WidgetAppearance): string {
  const layers: string[] = [];
  const { shadow, elevation, glow } = appearance;
  if (shadow !== null && elevation > 0) {
    const color = toRgbaString({ ...shadow, a: shadow.a * 0.3 });
    layers.push(`0 ${elevation}px ${elevation * 2}px ${color}`);
  }
  if (glow > 0) {
    layers.push(`0 0 ${glow * 8}px ${toRgbaString(appearance.glowColor)}`);
  }
  return layers.length > 0 ? layers.join(", ") : "none";
}

export function domStyleFor(appearance: WidgetAppearance): ReadonlyArray<readonly [string, string]> {
  const lift = appearance.offsetY - appearance.elevation;
  return [
    ["width", `${appearance.width}px`],
    ["height", `${appearance.height}px`],
    ["background-color", toRgbaString(appearance.background)],
    ["color", toRgbaString(appearance.foreground)],
    ["border", `${appearance.borderWidth}px solid ${toRgbaString(appearance.border)}`],
    ["border-radius", `${appearance.borderRadius}px`],
    ["font-family", appearance.fontFamily],
    ["font-size", `${appearance.fontSize}px`],
    ["opacity", String(appearance.opacity)],
    ["transform", `translate(${appearance.offsetX}px, ${lift}px) scale(${appearance.scale})`],
    ["box-shadow", boxShadowFor(appearance)],
    // Stylesheets draw checkmarks, thumbs and fills from these.
    ["--tween-indicator", String(appearance.indicator)],
    ["--tween-accent", toRgbaString(appearance.accent)],
  ];
}

class DomSurface implements WidgetSurface {
  readonly framework = "dom";
  private readonly element: DomElementLike;
  private readonly listeners: Array<readonly [string, DomListener]> = [];
  private disposed = false;

  constructor(element: DomElementLike, widget: RenderableWidget) {
    this.element = element;
    for (const [type, input] of DOM_INPUTS) {
      const listener: DomListener = () => widget.handleInput(input);
      element.addEventListener(type, listener);
      this.listeners.push([type, listener]);
    }
  }

  updateAppearance(appearance: WidgetAppearance): void {
    if (this.disposed) return;
    this.element.textContent = appearance.label;
    this.element.setAttribute("data-state", appearance.state);
    for (const [name, value] of domStyleFor(appearance)) {
      this.element.style.setProperty(name, value);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const [type, listener] of this.listeners) {
      this.element.removeEventListener(type, listener);
    }
    this.listeners.length = 0;
    this.element.remove();
  }
}

export const domAdapter: ToolkitAdapter<DomParent> = {
  kind: "dom",
  isAvailable: () => currentDocument() !== undefined,
  mount(parent: DomParent, widget: RenderableWidget): WidgetSurface {
    const doc = currentDocument();
    if (doc === undefined) {
      throw new TweenError("TWEEN_UNSUPPORTED_FRAMEWORK", "dom: no document in this environment");
    }
    const element = doc.createElement("button");
    element.setAttribute("type", "button");
    const surface = new DomSurface(element, widget);
    surface.updateAppearance(widget.getAppearance());
    parent.appendChild(element);
    return surface;
  },
};
