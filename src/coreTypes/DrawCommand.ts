import type { CpuTexture } from "../textures/types";
import type { Brush } from "./Brush";
import type { Float2 } from "./Vec";

type CommandBase = {
  position: Float2;
  size: Float2;
  /** texture region origin, defaults to [0, 0] */
  src?: Float2;
  /** texture region extent, defaults to [1, 1] */
  uv?: Float2;
};

/**
 * Draws the texture region as-is.
 */
export type ImageCommand = CommandBase & {
  kind: "image";
  texture: CpuTexture;
};

/**
 * Draws a rounded rectangle with an optional border. The brush colors are
 * multiplied by the texture, which defaults to plain white.
 */
export type RoundedRectCommand = CommandBase & {
  kind: "roundedRect";
  texture?: CpuTexture;
  brush: Partial<Brush>;
};

export type DrawCommand = ImageCommand | RoundedRectCommand;

/**
 * A glyph quad produced by an external text layout.
 */
export type Glyph = {
  position: Float2;
  src: Float2;
  uv: Float2;
  size: Float2;
};
