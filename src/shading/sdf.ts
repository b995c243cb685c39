import { type Vec2, vec2 } from "wgpu-matrix";
import type { Float2, Float4 } from "../coreTypes/Vec";

export function clamp(x: number, low: number, high: number): number {
  return Math.min(Math.max(x, low), high);
}

/**
 * Cubic Hermite step, same as the WGSL builtin.
 */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp((x - edge0) / (edge1 - edge0), 0, 1);
  return t * t * (3 - 2 * t);
}

export function mix(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

/**
 * Picks the corner radius for the quadrant `p` falls in.
 * `x > 0` takes the first pair, `y > 0` the first of that pair.
 */
export function quadrantRadius(p: Float2 | Vec2, radius: Float4): number {
  const first = p[0] > 0 ? radius[0] : radius[2];
  const second = p[0] > 0 ? radius[1] : radius[3];
  return p[1] > 0 ? first : second;
}

/**
 * Signed distance from `p` to a box centered at the origin with per-corner rounding.
 * Negative inside, zero on the boundary, positive outside.
 *
 * @param halfExtent - half width and half height of the box
 * @param radius - four corner radii, see {@link quadrantRadius}
 */
export function roundedBoxSdf(
  p: Float2 | Vec2,
  halfExtent: Float2 | Vec2,
  radius: Float4,
): number {
  const r = quadrantRadius(p, radius);
  const q = vec2.subtract(
    vec2.create(Math.abs(p[0]) + r, Math.abs(p[1]) + r),
    halfExtent,
  );
  return (
    Math.min(Math.max(q[0], q[1]), 0) +
    vec2.length(vec2.max(q, vec2.create(0, 0))) -
    r
  );
}
