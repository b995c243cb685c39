import type { Float2, Uint4 } from "./Vec";

/**
 * Values of `attrs[0]`. Anything other than `RoundedRect` is drawn as an image.
 */
export const ElementKind = {
  Image: 0,
  RoundedRect: 1,
} as const;

export type ElementKind = (typeof ElementKind)[keyof typeof ElementKind];

/**
 * One drawable rectangle as the shaders see it. Mirrors `struct Element` in canvas.wgsl.
 */
export type ElementRecord = {
  /** origin of the quad in layout units */
  position: Float2;
  /** reserved */
  image: Float2;
  /** origin of the sampled texture region, normalized */
  src: Float2;
  /** extent of the sampled texture region, normalized */
  uv: Float2;
  /** extent of the quad in pixels. `size[1]` must be positive */
  size: Float2;
  /** reserved */
  reserved: Float2;
  /** `[kind, textureIndex, brushIndex, reserved]` */
  attrs: Uint4;
};
