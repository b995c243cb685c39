import type { Float4 } from "./Vec";

/**
 * Style record for rounded rectangles. Mirrors `struct Brush` in canvas.wgsl.
 */
export type Brush = {
  /** border color */
  fg: Float4;
  /** fill color */
  bg: Float4;
  /**
   * Corner radii in pixels, picked by quadrant of the point relative to the quad center
   * (local space is y-down): `[bottomRight, topRight, bottomLeft, topLeft]`.
   * See {@link cornerRadii}.
   */
  radius: Float4;
  /** `border[0]` is the border width in pixels, the rest is reserved */
  border: Float4;
};
