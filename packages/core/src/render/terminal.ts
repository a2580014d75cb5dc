/**
 * packages/core/src/render/terminal.ts — ANSI truecolor rendering onto a text stream.
 *
 * Each appearance change redraws the widget in place on the current line.
 * Terminals have no pointer hover, so input must be forwarded by the caller
 * through `handleInput`.
 */

import type { WidgetAppearance } from "../widgets/types.js";
import type { RenderableWidget, ToolkitAdapter, WidgetSurface } from "./types.js";

/** Anything with a string `write`, e.g. `process.stdout`. */
export type TerminalSink = Readonly<{
  write: (chunk: string) => unknown;
}>;

const CSI = "\u001b[";
const RESET = `${CSI}0m`;
const CLEAR_TO_EOL = `${CSI}K`;

export function formatTerminalLine(appearance: WidgetAppearance): string {
  const { background: bg, foreground: fg } = appearance;
  const indent = " ".repeat(Math.max(0, Math.round(appearance.offsetX)));
  const dim = appearance.state === "disabled" ? `${CSI}2m` : "";
  return (
    `${indent}${dim}${CSI}48;2;${bg.r};${bg.g};${bg.b}m` +
    `${CSI}38;2;${fg.r};${fg.g};${fg.b}m ${appearance.label} ${RESET}`
  );
}

class TerminalSurface implements WidgetSurface {
  readonly framework = "terminal";
  private readonly sink: TerminalSink;
  private lastLine: string | null = null;
  private disposed = false;

  constructor(sink: TerminalSink) {
    this.sink = sink;
  }

  updateAppearance(appearance: WidgetAppearance): void {
    if (this.disposed) return;
    const line = formatTerminalLine(appearance);
    if (line === this.lastLine) return;
    this.lastLine = line;
    this.sink.write(`\r${line}${CLEAR_TO_EOL}`);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.lastLine !== null) this.sink.write("\n");
  }
}

export const terminalAdapter: ToolkitAdapter<TerminalSink> = {
  kind: "terminal",
  isAvailable: () => true,
  mount(parent: TerminalSink, widget: RenderableWidget): WidgetSurface {
    const surface = new TerminalSurface(parent);
    surface.updateAppearance(widget.getAppearance());
    return surface;
  },
};
