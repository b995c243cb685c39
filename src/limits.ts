/**
 * Capacity of the canvas. GPU buffers for the worst case are allocated up front.
 */
export type Limits = {
  /** maximum elements drawn per frame, across all batches */
  elementCount: number;
  /** maximum brushes referenced per frame, across all batches */
  brushCount: number;
  /** maximum distinct textures. Each one takes a texture array layer */
  textureCount: number;
  /** width and height of each texture array layer, in texels */
  textureSize: number;
  /** maximum bind/draw rounds per frame */
  batchCount: number;
};

export type LimitsOptions = Partial<Limits>;

export const DEFAULT_LIMITS: Limits = {
  elementCount: 4096,
  brushCount: 4096,
  textureCount: 16,
  textureSize: 1024,
  batchCount: 16,
};
