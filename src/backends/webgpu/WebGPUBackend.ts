import type { CanvasBatch } from "../../coreTypes/CanvasBatch";
import type { Color } from "../../coreTypes/Color";
import type { Float2 } from "../../coreTypes/Vec";
import type { Limits, LimitsOptions } from "../../limits";
import { DEFAULT_LIMITS } from "../../limits";
import type { CpuTexture } from "../../textures/types";
import { assert } from "../../utils/assert";
import { checkTextureSize } from "../capacity";
import type { IRenderBackend, TextureFilter } from "../IRenderBackend";
import { samplerFor } from "./samplers";
import { WebGPUCanvasPipeline } from "./WebGPUCanvasPipeline";

export type WebGPUBackendOptions = {
  limits?: LimitsOptions;
  filter?: TextureFilter;
};

/**
 * WebGPU implementation of the render backend.
 *
 * Every texture lives in its own layer of one `texture_2d_array`, at the layer's origin.
 */
export class WebGPUBackend implements IRenderBackend {
  readonly type = "webgpu" as const;
  readonly limits: Limits;

  #device: GPUDevice;
  #context: GPUCanvasContext;
  #presentationFormat: GPUTextureFormat;
  #textures: GPUTexture;
  #textureScales: Float2[] = [];
  #pipeline: WebGPUCanvasPipeline;
  #encoder: GPUCommandEncoder | null = null;
  #renderPass: GPURenderPassEncoder | null = null;

  constructor(
    device: GPUDevice,
    context: GPUCanvasContext,
    presentationFormat: GPUTextureFormat,
    limits: Limits,
    filter: TextureFilter = "nearest",
  ) {
    this.#device = device;
    this.#context = context;
    this.#presentationFormat = presentationFormat;
    this.limits = limits;

    this.#textures = device.createTexture({
      label: "canvas textures",
      size: [limits.textureSize, limits.textureSize, limits.textureCount],
      format: "rgba8unorm",
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    });

    this.#pipeline = new WebGPUCanvasPipeline({
      device,
      presentationFormat,
      limits,
      textureView: this.#textures.createView({ dimension: "2d-array" }),
      sampler: device.createSampler(samplerFor(filter)),
    });
  }

  /**
   * Create a WebGPU backend attached to a canvas.
   */
  static async create(
    canvas: HTMLCanvasElement,
    options: WebGPUBackendOptions = {},
  ): Promise<WebGPUBackend> {
    const adapter = await navigator.gpu.requestAdapter();
    if (!adapter) {
      throw new Error("WebGPU not supported: no adapter found");
    }

    const device = await adapter.requestDevice();
    void device.lost.then((info) => {
      console.error("GPU Device lost", info);
    });

    const context = canvas.getContext("webgpu");
    assert(context, "Could not get WebGPU context from canvas");

    const presentationFormat = navigator.gpu.getPreferredCanvasFormat();
    context.configure({
      device,
      format: presentationFormat,
    });

    const limits: Limits = {
      ...DEFAULT_LIMITS,
      ...options.limits,
    };

    return new WebGPUBackend(
      device,
      context,
      presentationFormat,
      limits,
      options.filter,
    );
  }

  startFrame(clearColor: Color, loadOp: "clear" | "load"): void {
    this.#encoder = this.#device.createCommandEncoder();
    this.#renderPass = this.#encoder.beginRenderPass({
      label: "canvas frame",
      colorAttachments: [
        {
          view: this.#context.getCurrentTexture().createView(),
          clearValue: clearColor,
          loadOp,
          storeOp: "store",
        },
      ],
    });
    this.#pipeline.startFrame();
  }

  uploadTexture(texture: CpuTexture, index: number): void {
    checkTextureSize(this.limits, texture);
    assert(
      index >= 0 && index < this.limits.textureCount,
      `texture index ${index} is outside the texture array`,
    );

    this.#device.queue.writeTexture(
      { texture: this.#textures, origin: { x: 0, y: 0, z: index } },
      texture.data,
      { bytesPerRow: texture.width * 4, rowsPerImage: texture.height },
      {
        width: texture.width,
        height: texture.height,
        depthOrArrayLayers: 1,
      },
    );
    const size = this.limits.textureSize;
    const scale: Float2 = [texture.width / size, texture.height / size];
    this.#textureScales[index] = scale;
    this.#pipeline.setTextureExtent(index, scale);
  }

  drawBatch(batch: CanvasBatch): number {
    assert(this.#renderPass, "No render pass - did you call startFrame?");
    return this.#pipeline.processBatch(this.#renderPass, batch, (index) =>
      this.#textureScale(index),
    );
  }

  endFrame(): void {
    assert(this.#renderPass, "No render pass - did you call startFrame?");
    assert(this.#encoder, "No encoder - did you call startFrame?");

    this.#renderPass.end();
    this.#device.queue.submit([this.#encoder.finish()]);

    this.#renderPass = null;
    this.#encoder = null;
  }

  resize(_width: number, _height: number): void {
    // the context picks up the canvas size on the next getCurrentTexture()
  }

  destroy(): void {
    this.#pipeline.destroy();
    this.#textures.destroy();
    this.#device.destroy();
  }

  #textureScale(index: number): Float2 {
    // unknown indices sample the whole layer
    return this.#textureScales[index] ?? [1, 1];
  }

  /**
   * Get the GPU device for advanced operations.
   */
  get device(): GPUDevice {
    return this.#device;
  }

  get presentationFormat(): GPUTextureFormat {
    return this.#presentationFormat;
  }
}
