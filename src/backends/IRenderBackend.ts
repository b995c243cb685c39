import type { CanvasBatch } from "../coreTypes/CanvasBatch";
import type { Color } from "../coreTypes/Color";
import type { Limits } from "../limits";
import type { CpuTexture } from "../textures/types";

export type BackendType = "webgpu" | "software";

export type TextureFilter = "nearest" | "linear";

/**
 * The render backend interface abstracts WebGPU and the software rasterizer.
 *
 * Both run the same two stages: a quad generator expanding each element to six
 * vertices, and a shape compositor coloring each covered pixel.
 */
export interface IRenderBackend {
  /** The type of backend ("webgpu" or "software") */
  readonly type: BackendType;

  /** Capacity of buffers and the texture array */
  readonly limits: Limits;

  /**
   * Begin a new frame.
   * WebGPU: creates command encoder and render pass
   * Software: clears the framebuffer if loadOp is "clear"
   */
  startFrame(clearColor: Color, loadOp: "clear" | "load"): void;

  /**
   * Make a texture addressable as `attrs[1] == index`.
   */
  uploadTexture(texture: CpuTexture, index: number): void;

  /**
   * Draw `batch.elements.length` instances of six vertices.
   *
   * @returns Number of draw calls issued
   */
  drawBatch(batch: CanvasBatch): number;

  /**
   * End the current frame.
   * WebGPU: ends render pass and submits command buffer
   * Software: copies the framebuffer to its canvas, when it has one
   */
  endFrame(): void;

  /**
   * Handle target resize.
   */
  resize(width: number, height: number): void;

  /**
   * Clean up resources.
   */
  destroy(): void;
}
