import type { Mat4 } from "wgpu-matrix";

/**
 * Per-batch camera. The vertex stage combines it as `proj * view * model`.
 */
export type Transform = {
  model: Mat4;
  view: Mat4;
  proj: Mat4;
};
