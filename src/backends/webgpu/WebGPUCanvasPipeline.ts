import {
  makeShaderDataDefinitions,
  makeStructuredView,
  type StructuredView,
} from "webgpu-utils";
import type { CanvasBatch } from "../../coreTypes/CanvasBatch";
import type { Float2 } from "../../coreTypes/Vec";
import type { Limits } from "../../limits";
import { VERTICES_PER_QUAD } from "../../shading/quadGenerator";
import {
  createGpuPipeline,
  defaultBlendState,
  getGpuPipelineDescriptor,
} from "../../utils/boilerplate";
import {
  checkFrameCapacity,
  emptyFrameUsage,
  recordBatch,
} from "../capacity";
import { packBrush, packElement, StagingBuffer } from "./packing";
import {
  codeWithLineNumbers,
  describeShader,
  findStruct,
  struct2Layout,
} from "./parser";
import canvasWgsl from "./wgsl/canvas.wgsl";

/** minUniformBufferOffsetAlignment guaranteed by every adapter */
const UNIFORM_ALIGNMENT = 256;

/** one vec2f per texture array layer */
const EXTENT_SIZE = 2 * Float32Array.BYTES_PER_ELEMENT;

export type WebGPUCanvasPipelineOptions = {
  label?: string;
  device: GPUDevice;
  presentationFormat: GPUTextureFormat;
  limits: Limits;
  /** view of the texture array, dimension "2d-array" */
  textureView: GPUTextureView;
  sampler: GPUSampler;
  blend?: GPUBlendState;
};

/**
 * Draws canvas batches with canvas.wgsl.
 *
 * Element and brush storage buffers are shared by all batches of a frame: each batch
 * is written after the previous one and drawn with `firstInstance` pointing at it, so
 * `instance_index` still addresses its elements. Each batch gets its own transform slot.
 */
export class WebGPUCanvasPipeline {
  readonly label: string;
  readonly code: string;

  #device: GPUDevice;
  #limits: Limits;
  #pipeline: GPURenderPipeline;

  #elements: StagingBuffer;
  #brushes: StagingBuffer;
  #elementBuffer: GPUBuffer;
  #brushBuffer: GPUBuffer;
  #extentBuffer: GPUBuffer;
  #transformValues: StructuredView;
  #transformStride: number;
  #transformBuffer: GPUBuffer;

  #sharedBindGroups: { group: number; bindGroup: GPUBindGroup }[];
  #transformBindGroups: GPUBindGroup[];

  #usage = emptyFrameUsage();

  constructor(options: WebGPUCanvasPipelineOptions) {
    const { device, limits } = options;
    this.label = options.label ?? "canvas";
    this.#device = device;
    this.#limits = limits;

    const shaderDescriptor = describeShader(this.label, canvasWgsl);
    this.code = shaderDescriptor.code;

    let module: GPUShaderModule;
    try {
      module = device.createShaderModule({
        label: this.label,
        code: shaderDescriptor.code,
      });
    } catch (e) {
      console.error(codeWithLineNumbers(shaderDescriptor.code));
      throw e;
    }

    const pipelineDescriptor = getGpuPipelineDescriptor(
      shaderDescriptor,
      module,
      options.presentationFormat,
      options.blend ?? defaultBlendState(),
    );
    this.#pipeline = createGpuPipeline(
      device,
      shaderDescriptor,
      pipelineDescriptor,
    );

    // storage layouts come from the shader so the packer can't drift from it
    this.#elements = new StagingBuffer(
      struct2Layout(findStruct(this.code, "Element")),
      limits.elementCount,
    );
    this.#brushes = new StagingBuffer(
      struct2Layout(findStruct(this.code, "Brush")),
      limits.brushCount,
    );
    this.#elementBuffer = device.createBuffer({
      label: `${this.label} elements`,
      size: this.#elements.byteLength,
      usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST,
    });
    this.#brushBuffer = device.createBuffer({
      label: `${this.label} brushes`,
      size: this.#brushes.byteLength,
      usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST,
    });

    this.#extentBuffer = device.createBuffer({
      label: `${this.label} texture extents`,
      size: EXTENT_SIZE * limits.textureCount,
      usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST,
    });

    const defs = makeShaderDataDefinitions(this.code);
    this.#transformValues = makeStructuredView(defs.uniforms.transform);
    this.#transformStride = alignTo(
      this.#transformValues.arrayBuffer.byteLength,
      UNIFORM_ALIGNMENT,
    );
    this.#transformBuffer = device.createBuffer({
      label: `${this.label} transforms`,
      size: this.#transformStride * limits.batchCount,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });

    this.#sharedBindGroups = this.#createSharedBindGroups(
      options.textureView,
      options.sampler,
    );
    this.#transformBindGroups = this.#createTransformBindGroups();
  }

  startFrame(): void {
    this.#usage = emptyFrameUsage();
  }

  /**
   * Records how much of texture array layer `index` holds texture data, as a
   * fraction of the layer. Sampling is clamped to it.
   */
  setTextureExtent(index: number, extent: Float2): void {
    this.#device.queue.writeBuffer(
      this.#extentBuffer,
      index * EXTENT_SIZE,
      new Float32Array(extent),
    );
  }

  /**
   * Uploads the batch and records one instanced draw.
   *
   * @param textureScale - fraction of a texture array layer covered by each texture
   * @returns Number of draw calls issued
   */
  processBatch(
    renderPass: GPURenderPassEncoder,
    batch: CanvasBatch,
    textureScale: (textureIndex: number) => Float2,
  ): number {
    const instanceCount = batch.elements.length;
    if (instanceCount === 0) {
      return 0;
    }
    checkFrameCapacity(this.#limits, this.#usage, batch);

    const firstInstance = this.#usage.elements;
    const brushBase = this.#usage.brushes;
    const slot = this.#usage.batches;
    const queue = this.#device.queue;

    for (let i = 0; i < instanceCount; i++) {
      packElement(this.#elements, firstInstance + i, batch.elements[i], {
        brushBase,
        textureScale,
      });
    }
    for (let i = 0; i < batch.brushes.length; i++) {
      packBrush(this.#brushes, brushBase + i, batch.brushes[i]);
    }

    const elementStride = this.#elements.layout.size;
    queue.writeBuffer(
      this.#elementBuffer,
      firstInstance * elementStride,
      this.#elements.bytes,
      firstInstance * elementStride,
      instanceCount * elementStride,
    );
    if (batch.brushes.length > 0) {
      const brushStride = this.#brushes.layout.size;
      queue.writeBuffer(
        this.#brushBuffer,
        brushBase * brushStride,
        this.#brushes.bytes,
        brushBase * brushStride,
        batch.brushes.length * brushStride,
      );
    }

    this.#transformValues.set({
      model: batch.transform.model,
      view: batch.transform.view,
      proj: batch.transform.proj,
    });
    queue.writeBuffer(
      this.#transformBuffer,
      slot * this.#transformStride,
      this.#transformValues.arrayBuffer,
    );

    renderPass.setPipeline(this.#pipeline);
    for (const { group, bindGroup } of this.#sharedBindGroups) {
      renderPass.setBindGroup(group, bindGroup);
    }
    renderPass.setBindGroup(2, this.#transformBindGroups[slot]);
    renderPass.draw(VERTICES_PER_QUAD, instanceCount, 0, firstInstance);

    recordBatch(this.#usage, batch);
    return 1;
  }

  destroy(): void {
    this.#elementBuffer.destroy();
    this.#brushBuffer.destroy();
    this.#extentBuffer.destroy();
    this.#transformBuffer.destroy();
  }

  #createSharedBindGroups(
    textureView: GPUTextureView,
    sampler: GPUSampler,
  ): { group: number; bindGroup: GPUBindGroup }[] {
    const device = this.#device;
    const elements = device.createBindGroup({
      label: `${this.label} elements bind group`,
      layout: this.#pipeline.getBindGroupLayout(0),
      entries: [{ binding: 4, resource: { buffer: this.#elementBuffer } }],
    });
    const textures = device.createBindGroup({
      label: `${this.label} textures bind group`,
      layout: this.#pipeline.getBindGroupLayout(1),
      entries: [
        { binding: 0, resource: textureView },
        { binding: 1, resource: sampler },
        { binding: 2, resource: { buffer: this.#extentBuffer } },
      ],
    });
    const brushes = device.createBindGroup({
      label: `${this.label} brushes bind group`,
      layout: this.#pipeline.getBindGroupLayout(3),
      entries: [{ binding: 4, resource: { buffer: this.#brushBuffer } }],
    });
    return [
      { group: 0, bindGroup: elements },
      { group: 1, bindGroup: textures },
      { group: 3, bindGroup: brushes },
    ];
  }

  #createTransformBindGroups(): GPUBindGroup[] {
    const layout = this.#pipeline.getBindGroupLayout(2);
    const size = this.#transformValues.arrayBuffer.byteLength;
    return Array.from({ length: this.#limits.batchCount }, (_, slot) =>
      this.#device.createBindGroup({
        label: `${this.label} transform bind group ${slot}`,
        layout,
        entries: [
          {
            binding: 0,
            resource: {
              buffer: this.#transformBuffer,
              offset: slot * this.#transformStride,
              size,
            },
          },
        ],
      }),
    );
  }
}

function alignTo(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}
