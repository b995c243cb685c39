import type { CanvasBatch } from "../coreTypes/CanvasBatch";
import type { Limits } from "../limits";
import type { CpuTexture } from "../textures/types";
import { canvasError } from "../utils/errors";

/**
 * What a frame has drawn so far. Buffers are sized for {@link Limits} up front,
 * so every backend enforces the same per-frame caps.
 */
export type FrameUsage = {
  elements: number;
  brushes: number;
  batches: number;
};

export function emptyFrameUsage(): FrameUsage {
  return { elements: 0, brushes: 0, batches: 0 };
}

/**
 * Throws `CanvasBatchCap`, `CanvasElementCap` or `CanvasBrushCap` when drawing
 * `batch` would exceed the frame's capacity.
 */
export function checkFrameCapacity(
  limits: Limits,
  usage: FrameUsage,
  batch: CanvasBatch,
) {
  if (usage.batches >= limits.batchCount) {
    throw canvasError(
      "CanvasBatchCap",
      `${usage.batches + 1} batches drawn this frame, max is ${limits.batchCount}`,
    );
  }
  const elements = usage.elements + batch.elements.length;
  if (elements > limits.elementCount) {
    throw canvasError(
      "CanvasElementCap",
      `${elements} elements drawn this frame, max is ${limits.elementCount}`,
    );
  }
  const brushes = usage.brushes + batch.brushes.length;
  if (brushes > limits.brushCount) {
    throw canvasError(
      "CanvasBrushCap",
      `${brushes} brushes drawn this frame, max is ${limits.brushCount}`,
    );
  }
}

export function recordBatch(usage: FrameUsage, batch: CanvasBatch) {
  usage.elements += batch.elements.length;
  usage.brushes += batch.brushes.length;
  usage.batches++;
}

/**
 * Throws `CanvasTextureTooLarge` for textures that don't fit a texture array layer.
 */
export function checkTextureSize(limits: Limits, texture: CpuTexture) {
  const size = limits.textureSize;
  if (texture.width > size || texture.height > size) {
    throw canvasError(
      "CanvasTextureTooLarge",
      `texture is ${texture.width}x${texture.height}, max is ${size}x${size}`,
    );
  }
}
