/**
 * RGBA8 pixels, row-major, top row first.
 */
export type CpuTexture = {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
};
