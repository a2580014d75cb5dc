/**
 * packages/core/src/render/render.ts — Toolkit selection.
 */

import { TweenError } from "../errors.js";
import { domAdapter } from "./dom.js";
import { headlessAdapter } from "./headless.js";
import { terminalAdapter } from "./terminal.js";
import {
  FRAMEWORK_KINDS,
  type FrameworkKind,
  type FrameworkParentMap,
  type RenderableWidget,
  type ToolkitAdapter,
  type WidgetSurface,
} from "./types.js";

const ADAPTERS: { readonly [K in FrameworkKind]: ToolkitAdapter<FrameworkParentMap[K]> } =
  Object.freeze({
    headless: headlessAdapter,
    terminal: terminalAdapter,
    dom: domAdapter,
  });

export function isFrameworkKind(value: unknown): value is FrameworkKind {
  return typeof value === "string" && FRAMEWORK_KINDS.some((kind) => kind === value);
}

/** Whether `framework` is known and its host objects exist here. */
export function isFrameworkAvailable(framework: string): boolean {
  return isFrameworkKind(framework) && ADAPTERS[framework].isAvailable();
}

/**
 * Mount `widget` into `parent` using the adapter for `framework`.
 *
 * @throws TweenError TWEEN_UNSUPPORTED_FRAMEWORK for an unknown tag or a toolkit
 *   that is unavailable in this environment
 */
export function renderWidget<K extends FrameworkKind>(
  widget: RenderableWidget,
  parent: FrameworkParentMap[K],
  framework: K,
): WidgetSurface {
  if (!isFrameworkKind(framework)) {
    throw new TweenError(
      "TWEEN_UNSUPPORTED_FRAMEWORK",
      `unsupported framework: ${String(framework)} (expected one of ${FRAMEWORK_KINDS.join(", ")})`,
    );
  }
  const adapter: ToolkitAdapter<FrameworkParentMap[K]> = ADAPTERS[framework];
  if (!adapter.isAvailable()) {
    throw new TweenError(
      "TWEEN_UNSUPPORTED_FRAMEWORK",
      `framework "${framework}" is not available in this environment`,
    );
  }
  return adapter.mount(parent, widget);
}
