import type { CanvasBatch } from "../../coreTypes/CanvasBatch";
import type { Color } from "../../coreTypes/Color";
import type { Size } from "../../coreTypes/Size";
import type { Float4 } from "../../coreTypes/Vec";
import type { Limits, LimitsOptions } from "../../limits";
import { DEFAULT_LIMITS } from "../../limits";
import type { TextureSampler } from "../../shading/shapeCompositor";
import type { CpuTexture } from "../../textures/types";
import { assert } from "../../utils/assert";
import {
  checkFrameCapacity,
  checkTextureSize,
  emptyFrameUsage,
  recordBatch,
} from "../capacity";
import type { IRenderBackend, TextureFilter } from "../IRenderBackend";
import { Framebuffer } from "./Framebuffer";
import { rasterizeBatch } from "./rasterizer";
import { createTextureSampler } from "./sampler";

export type SoftwareBackendOptions = {
  limits?: LimitsOptions;
  filter?: TextureFilter;
  /** when set, each finished frame is copied into it with a 2d context */
  canvas?: HTMLCanvasElement;
};

/**
 * CPU implementation of the render backend. Runs the same quad generator and
 * shape compositor as the WebGPU shaders, one vertex and one pixel at a time.
 */
export class SoftwareBackend implements IRenderBackend {
  readonly type = "software" as const;
  readonly limits: Limits;

  #framebuffer: Framebuffer;
  #textures: CpuTexture[] = [];
  #sampler: TextureSampler;
  #canvas: HTMLCanvasElement | null;
  #inFrame = false;
  #usage = emptyFrameUsage();
  #fragments = 0;

  constructor(size: Size, options: SoftwareBackendOptions = {}) {
    this.limits = {
      ...DEFAULT_LIMITS,
      ...options.limits,
    };
    this.#framebuffer = new Framebuffer(size.width, size.height);
    this.#sampler = createTextureSampler(
      (index) => this.#textures[index],
      options.filter,
    );
    this.#canvas = options.canvas ?? null;
  }

  /**
   * Create a software backend drawing into a canvas.
   */
  static async create(
    canvas: HTMLCanvasElement,
    options: Omit<SoftwareBackendOptions, "canvas"> = {},
  ): Promise<SoftwareBackend> {
    return new SoftwareBackend(
      { width: canvas.width, height: canvas.height },
      { ...options, canvas },
    );
  }

  get width(): number {
    return this.#framebuffer.width;
  }

  get height(): number {
    return this.#framebuffer.height;
  }

  /**
   * Fragments shaded since the frame started.
   */
  get fragments(): number {
    return this.#fragments;
  }

  startFrame(clearColor: Color, loadOp: "clear" | "load"): void {
    if (loadOp === "clear") {
      this.#framebuffer.clear(clearColor);
    }
    this.#usage = emptyFrameUsage();
    this.#fragments = 0;
    this.#inFrame = true;
  }

  uploadTexture(texture: CpuTexture, index: number): void {
    checkTextureSize(this.limits, texture);
    assert(
      index >= 0 && index < this.limits.textureCount,
      `texture index ${index} is outside the texture array`,
    );
    this.#textures[index] = texture;
  }

  drawBatch(batch: CanvasBatch): number {
    assert(this.#inFrame, "No frame in progress - did you call startFrame?");
    if (batch.elements.length === 0) {
      return 0;
    }
    checkFrameCapacity(this.limits, this.#usage, batch);
    this.#fragments += rasterizeBatch(this.#framebuffer, batch, this.#sampler);
    recordBatch(this.#usage, batch);
    return 1;
  }

  endFrame(): void {
    assert(this.#inFrame, "No frame in progress - did you call startFrame?");
    this.#inFrame = false;
    if (this.#canvas) {
      this.#present(this.#canvas);
    }
  }

  resize(width: number, height: number): void {
    this.#framebuffer.resize(width, height);
  }

  destroy(): void {
    this.#textures = [];
    this.#canvas = null;
  }

  /**
   * RGBA8 copy of the framebuffer, top row first.
   */
  readPixels(): Uint8Array {
    return this.#framebuffer.toBytes();
  }

  /**
   * Straight RGBA of one pixel, as floats.
   */
  pixel(x: number, y: number): Float4 {
    assert(
      x >= 0 && x < this.width && y >= 0 && y < this.height,
      `pixel ${x},${y} is outside the ${this.width}x${this.height} framebuffer`,
    );
    return this.#framebuffer.pixel(x, y);
  }

  #present(canvas: HTMLCanvasElement) {
    const context = canvas.getContext("2d");
    assert(context, "Could not get 2d context from canvas");
    const image = new ImageData(
      new Uint8ClampedArray(this.readPixels()),
      this.width,
      this.height,
    );
    context.putImageData(image, 0, 0);
  }
}
