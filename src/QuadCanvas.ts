import type {
  BackendType,
  IRenderBackend,
  TextureFilter,
} from "./backends/mod";
import { detectBackend } from "./backends/mod";
import { SoftwareBackend } from "./backends/software/mod";
import { WebGPUBackend } from "./backends/webgpu/mod";
import { type ColorLike, toColor } from "./colors/mod";
import type { Brush } from "./coreTypes/Brush";
import type { CanvasBatch } from "./coreTypes/CanvasBatch";
import type { Color } from "./coreTypes/Color";
import type { DrawCommand, Glyph } from "./coreTypes/DrawCommand";
import type { ElementRecord } from "./coreTypes/Element";
import type { Size } from "./coreTypes/Size";
import type { Transform } from "./coreTypes/Transform";
import type { Limits, LimitsOptions } from "./limits";
import { Camera } from "./scene/Camera";
import {
  createBrush,
  glyphToElementRecord,
  toElementRecord,
  validateElement,
} from "./scene/commands";
import { StorageArena } from "./scene/StorageArena";
import { TextureRegistry } from "./textures/TextureRegistry";
import type { CpuTexture } from "./textures/types";
import { createSolidTexture } from "./textures/util";
import { assert } from "./utils/assert";

export type QuadCanvasOptions = {
  /** buffer and texture capacity, merged over DEFAULT_LIMITS */
  limits?: LimitsOptions;
  /** @default "auto" */
  backend?: BackendType | "auto";
  /** @default "white" */
  clearColor?: ColorLike;
  /**
   * How textures are sampled. "nearest" keeps pixel art crisp.
   *
   * @default "nearest"
   */
  filter?: TextureFilter;
};

export type StartFrameOptions = {
  /**
   * The load operation to use for the frame.
   *
   * **clear**: clear the target to the clear color.
   *
   * **load**: draw over the current contents.
   *
   * @default "clear"
   */
  loadOp?: "load" | "clear";
};

/**
 * Draws textured quads and rounded rectangles.
 *
 * Commands are collected with {@link render} and sent to the backend by {@link draw}
 * as one instanced draw of six vertices per element. A frame may hold several
 * bind/render/draw rounds, e.g. world content followed by a UI overlay.
 *
 * @example
 *
 * const canvas = await QuadCanvas.attach(document.querySelector("canvas"));
 *
 * canvas.startFrame();
 * canvas.bind(canvas.camera.getTransform());
 * canvas.render({
 *   kind: "roundedRect",
 *   position: [10, 10],
 *   size: [100, 40],
 *   brush: { bg: [0.2, 0.2, 0.8, 1], radius: [8, 8, 8, 8] },
 * });
 * canvas.draw();
 * canvas.endFrame();
 */
export class QuadCanvas<Backend extends IRenderBackend = IRenderBackend> {
  /**
   * diagnostics can be used as a rough gauge for performance.
   * besides frames, these stats are reset at the beginning of each frame.
   */
  diagnostics = {
    /** number of instanced draw calls issued this frame */
    drawCalls: 0,
    /** number of elements drawn this frame */
    elementsDrawn: 0,
    /** number of frames rendered */
    frames: 0,
  };

  /**
   * Used for draws when no transform has been bound.
   */
  camera: Camera;

  /**
   * the color the target is cleared to at the beginning of each frame
   */
  clearColor: Color;

  #backend: Backend;
  #elements: StorageArena<ElementRecord>;
  #brushes: StorageArena<Brush>;
  #textures: TextureRegistry;
  #transform: Transform | null = null;
  #whiteTexture: CpuTexture | null = null;
  #inFrame = false;

  /**
   * see {@link QuadCanvas.attach} and {@link QuadCanvas.headless} for creating an instance.
   */
  constructor(backend: Backend, size: Size, options: QuadCanvasOptions = {}) {
    this.#backend = backend;
    this.clearColor = toColor(options.clearColor ?? "white");
    this.camera = new Camera({ screen: size });

    const limits = backend.limits;
    this.#elements = new StorageArena("elements", limits.elementCount);
    this.#brushes = new StorageArena("brushes", limits.brushCount);
    this.#textures = new TextureRegistry(limits.textureCount);
  }

  /**
   * Attach to a canvas.
   *
   * @param canvas - drawn at its current `width` x `height`
   * @returns A promise that resolves to a QuadCanvas instance.
   *
   * @example
   *
   *   const canvas = document.createElement("canvas");
   *
   *   const quads = await QuadCanvas.attach(canvas, { backend: "software" });
   */
  static async attach(
    canvas: HTMLCanvasElement,
    options: QuadCanvasOptions = {},
  ): Promise<QuadCanvas> {
    const backendOption = options.backend ?? "auto";
    const backendType: BackendType =
      backendOption === "auto" ? await detectBackend() : backendOption;

    const backendOptions = { limits: options.limits, filter: options.filter };
    let backend: IRenderBackend;
    if (backendType === "webgpu") {
      backend = await WebGPUBackend.create(canvas, backendOptions);
    } else {
      backend = await SoftwareBackend.create(canvas, backendOptions);
    }

    return new QuadCanvas(
      backend,
      { width: canvas.width, height: canvas.height },
      options,
    );
  }

  /**
   * Draw into an offscreen framebuffer with the software backend.
   * Read the result back with `canvas.backend.readPixels()`.
   */
  static headless(
    size: Size,
    options: Omit<QuadCanvasOptions, "backend"> = {},
  ): QuadCanvas<SoftwareBackend> {
    const backend = new SoftwareBackend(size, {
      limits: options.limits,
      filter: options.filter,
    });
    return new QuadCanvas(backend, size, options);
  }

  get backend(): Backend {
    return this.#backend;
  }

  get backendType(): BackendType {
    return this.#backend.type;
  }

  /**
   * Returns the configured limits
   *
   * @example
   *
   * const elementLimit: number = canvas.limits.elementCount;
   */
  get limits(): Limits {
    return this.#backend.limits;
  }

  /**
   * Number of elements waiting for the next {@link draw}.
   */
  get pending(): number {
    return this.#elements.length;
  }

  /**
   * call resize when the target is resized, in pixels.
   */
  resize(width: number, height: number) {
    this.camera.resize({ width, height });
    this.#backend.resize(width, height);
  }

  /**
   * call startFrame before drawing anything.
   *
   * @example
   *
   * canvas.startFrame();
   * // render and draw
   * canvas.endFrame();
   */
  startFrame(options?: StartFrameOptions) {
    this.#backend.startFrame(this.clearColor, options?.loadOp ?? "clear");
    this.#inFrame = true;

    this.diagnostics.drawCalls = this.diagnostics.elementsDrawn = 0;
  }

  /**
   * Sets the transform for the elements drawn by the next {@link draw} calls.
   */
  bind(transform: Transform) {
    this.#transform = transform;
  }

  /**
   * Queues a command. The texture and brush are stored alongside it.
   */
  render(command: DrawCommand) {
    const brush =
      command.kind === "roundedRect"
        ? createBrush(command.brush)
        : createBrush();
    this.renderRecord(
      toElementRecord(command, 0, 0),
      brush,
      command.texture ?? this.#white(),
    );
  }

  /**
   * Queues a raw element. Its texture and brush indices are replaced by the
   * slots `texture` and `brush` are stored in.
   *
   * @returns Index of the element in the pending batch
   */
  renderRecord(
    element: ElementRecord,
    brush: Brush,
    texture: CpuTexture,
  ): number {
    validateElement(element);
    // nothing is stored unless the whole record fits
    this.#elements.reserve();
    this.#brushes.reserve();
    const textureIndex = this.#textures.store(texture);
    const brushIndex = this.#brushes.push(brush);
    return this.#elements.push({
      ...element,
      attrs: [element.attrs[0], textureIndex, brushIndex, element.attrs[3]],
    });
  }

  /**
   * Queues glyph quads laid out by a font library. They are drawn as images of `texture`.
   */
  renderGlyphs(glyphs: readonly Glyph[], texture: CpuTexture) {
    for (const glyph of glyphs) {
      this.renderRecord(glyphToElementRecord(glyph), createBrush(), texture);
    }
  }

  /**
   * Sends everything queued since the last draw to the backend as one batch.
   * Does nothing when nothing is queued.
   */
  draw() {
    if (this.#elements.isEmpty) {
      return;
    }
    if (!this.#inFrame) {
      console.warn(
        `QuadCanvas.draw called outside of a frame, dropping ${this.#elements.length} elements. Call startFrame first.`,
      );
      this.#elements.take();
      this.#brushes.take();
      return;
    }

    for (const { index, texture } of this.#textures.drainUploads()) {
      this.#backend.uploadTexture(texture, index);
    }

    const batch: CanvasBatch = {
      transform: this.#transform ?? this.camera.getTransform(),
      elements: this.#elements.take(),
      brushes: this.#brushes.take(),
    };
    this.diagnostics.drawCalls += this.#backend.drawBatch(batch);
    this.diagnostics.elementsDrawn += batch.elements.length;
  }

  /**
   * Draws anything still queued and finishes the frame.
   */
  endFrame() {
    assert(this.#inFrame, "No frame in progress - did you call startFrame?");
    try {
      this.draw();
      this.#backend.endFrame();
    } finally {
      this.#inFrame = false;
      this.diagnostics.frames++;
    }
  }

  /**
   * Release the backend's resources.
   *
   * Note that calling any methods on the instance after this result in undefined behavior.
   */
  destroy() {
    this.#backend.destroy();
  }

  #white(): CpuTexture {
    this.#whiteTexture ??= createSolidTexture("white");
    return this.#whiteTexture;
  }
}
