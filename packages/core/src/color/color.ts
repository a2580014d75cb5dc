/**
 * packages/core/src/color/color.ts — Color parsing and simple color math.
 */

import type { Rgba } from "../animation/types.js";
import { TweenError } from "../errors.js";

export type ColorInput = string | Rgba | readonly [r: number, g: number, b: number, a?: number];

export const NAMED_COLORS: Readonly<Record<string, string>> = Object.freeze({
  red: "#ff0000",
  green: "#008000",
  blue: "#0000ff",
  white: "#ffffff",
  black: "#000000",
  gray: "#808080",
  yellow: "#ffff00",
  cyan: "#00ffff",
  magenta: "#ff00ff",
});

const HEX_RE = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;
const RGB_FN_RE = /^rgba?\(\s*([^)]*)\)$/i;

function clampByte(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(255, Math.max(0, Math.round(value)));
}

function clampAlpha(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

/** Build a frozen color, clamping channels into range. */
export function rgba(r: number, g: number, b: number, a = 1): Rgba {
  return Object.freeze({ r: clampByte(r), g: clampByte(g), b: clampByte(b), a: clampAlpha(a) });
}

function invalidColor(input: string): never {
  throw new TweenError("TWEEN_INVALID_VALUE", `unparseable color: "${input}"`);
}

function parseHex(hex: string): Rgba {
  const digits =
    hex.length === 3
      ? hex
          .split("")
          .map((c) => c + c)
          .join("")
      : hex;
  return rgba(
    Number.parseInt(digits.slice(0, 2), 16),
    Number.parseInt(digits.slice(2, 4), 16),
    Number.parseInt(digits.slice(4, 6), 16),
  );
}

function parseRgbFunction(input: string, args: string): Rgba {
  const parts = args.split(",").map((p) => p.trim());
  if (parts.length !== 3 && parts.length !== 4) invalidColor(input);
  const numbers = parts.map((p) => (p.length === 0 ? Number.NaN : Number(p)));
  if (numbers.some((n) => !Number.isFinite(n))) invalidColor(input);
  const [r = 0, g = 0, b = 0, a = 1] = numbers;
  return rgba(r, g, b, a);
}

/**
 * Parse `#rgb`, `#rrggbb`, `rgb(r, g, b)`, `rgba(r, g, b, a)`, a basic named
 * color, a channel tuple, or an existing color.
 *
 * @throws TweenError TWEEN_INVALID_VALUE when the string cannot be parsed
 */
export function parseColor(input: ColorInput): Rgba {
  if (typeof input !== "string") {
    if ("r" in input) return rgba(input.r, input.g, input.b, input.a);
    return rgba(input[0], input[1], input[2], input[3] ?? 1);
  }

  const trimmed = input.trim();
  const hex = HEX_RE.exec(trimmed)?.[1];
  if (hex !== undefined) return parseHex(hex);

  const fnArgs = RGB_FN_RE.exec(trimmed)?.[1];
  if (fnArgs !== undefined) return parseRgbFunction(input, fnArgs);

  const key = trimmed.toLowerCase();
  const named = Object.prototype.hasOwnProperty.call(NAMED_COLORS, key)
    ? NAMED_COLORS[key]
    : undefined;
  if (named !== undefined) return parseColor(named);

  return invalidColor(input);
}

function byteHex(value: number): string {
  return clampByte(value).toString(16).padStart(2, "0");
}

export function toHex(color: Rgba): string {
  return `#${byteHex(color.r)}${byteHex(color.g)}${byteHex(color.b)}`;
}

export function toRgbaString(color: Rgba): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.a})`;
}

/** Move each channel `factor` of the way toward white. */
export function lightenColor(color: ColorInput, factor = 0.2): Rgba {
  const c = parseColor(color);
  return rgba(
    Math.trunc(c.r + (255 - c.r) * factor),
    Math.trunc(c.g + (255 - c.g) * factor),
    Math.trunc(c.b + (255 - c.b) * factor),
    c.a,
  );
}

/** Scale each channel down by `factor`. */
export function darkenColor(color: ColorInput, factor = 0.2): Rgba {
  const c = parseColor(color);
  return rgba(
    Math.trunc(c.r * (1 - factor)),
    Math.trunc(c.g * (1 - factor)),
    Math.trunc(c.b * (1 - factor)),
    c.a,
  );
}

/** Black on light backgrounds, white on dark ones. */
export function contrastColor(color: ColorInput): Rgba {
  const c = parseColor(color);
  const luminance = (0.299 * c.r + 0.587 * c.g + 0.114 * c.b) / 255;
  return luminance > 0.5 ? rgba(0, 0, 0) : rgba(255, 255, 255);
}
