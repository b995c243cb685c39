import type { Color } from "../coreTypes/Color";
import type { Float4 } from "../coreTypes/Vec";

export type ColorLike = Color | Float4 | string;

export const WHITE: Float4 = [1, 1, 1, 1];
export const BLACK: Float4 = [0, 0, 0, 1];
export const TRANSPARENT: Float4 = [0, 0, 0, 0];

const NAMED: Record<string, Float4> = {
  white: WHITE,
  black: BLACK,
  red: [1, 0, 0, 1],
  green: [0, 1, 0, 1],
  blue: [0, 0, 1, 1],
  transparent: TRANSPARENT,
  none: TRANSPARENT,
};

/**
 * Converts any supported color notation to normalized RGBA.
 *
 * Strings may be a name (`"red"`, `"transparent"`, ...), `#rrggbb` or `#rrggbbaa`.
 * Unrecognized strings become white.
 *
 * @example
 *
 * toFloat4("#ff000080"); // [1, 0, 0, 0.50196...]
 * toFloat4({ r: 0, g: 1, b: 0, a: 1 }); // [0, 1, 0, 1]
 */
export function toFloat4(color: ColorLike): Float4 {
  if (typeof color === "string") {
    return parseColor(color);
  }
  if (Array.isArray(color)) {
    return [color[0], color[1], color[2], color[3]];
  }
  return [color.r, color.g, color.b, color.a];
}

export function toColor(color: ColorLike): Color {
  const [r, g, b, a] = toFloat4(color);
  return { r, g, b, a };
}

/**
 * 8-bit channels to normalized RGBA.
 */
export function fromBytes(r: number, g: number, b: number, a = 255): Float4 {
  return [r / 255, g / 255, b / 255, a / 255];
}

export function parseColor(value: string): Float4 {
  const named = NAMED[value];
  if (named) {
    return [...named];
  }
  if (value.startsWith("#") && (value.length === 7 || value.length === 9)) {
    return fromBytes(
      hexByte(value, 1),
      hexByte(value, 3),
      hexByte(value, 5),
      value.length === 9 ? hexByte(value, 7) : 255,
    );
  }
  return [...WHITE];
}

// a malformed pair reads as 0
function hexByte(value: string, start: number): number {
  const pair = value.slice(start, start + 2);
  if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
    return 0;
  }
  return Number.parseInt(pair, 16);
}
