import { type ColorLike, toFloat4 } from "../colors/mod";
import type { CpuTexture } from "./types";

export function createTexture(
  width: number,
  height: number,
  data: Uint8Array,
): CpuTexture {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new Error(`Texture size must be whole texels, got ${width}x${height}`);
  }
  if (width <= 0 || height <= 0) {
    throw new Error(`Texture size must be positive, got ${width}x${height}`);
  }
  const expected = width * height * 4;
  if (data.length !== expected) {
    throw new Error(
      `Texture data for ${width}x${height} must be ${expected} bytes, got ${data.length}`,
    );
  }
  return { width, height, data };
}

/**
 * A texture filled with one color. The default 1x1 white texture lets rounded
 * rectangles show their brush colors unchanged.
 */
export function createSolidTexture(
  color: ColorLike,
  width = 1,
  height = 1,
): CpuTexture {
  const [r, g, b, a] = toFloat4(color).map((c) =>
    Math.round(Math.min(Math.max(c, 0), 1) * 255),
  );
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
    data[i + 3] = a;
  }
  return createTexture(width, height, data);
}
