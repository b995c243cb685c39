import {
  makeBindGroupLayoutDescriptors,
  makeShaderDataDefinitions,
} from "webgpu-utils";
import type { ShaderDescriptor } from "../backends/webgpu/ShaderDescriptor";

// convenience functions to wrap verbose webgpu apis - not part of public api

export function getGpuPipelineDescriptor(
  shaderDescriptor: ShaderDescriptor,
  module: GPUShaderModule,
  presentationFormat: GPUTextureFormat,
  blend?: GPUBlendState,
): Omit<GPURenderPipelineDescriptor, "layout"> {
  const pipelineDescriptor: Omit<GPURenderPipelineDescriptor, "layout"> = {
    label: `${shaderDescriptor.label} pipeline`,
    vertex: {
      module,
      entryPoint: shaderDescriptor.vertexEntrypoint,
    },
    fragment: {
      module,
      entryPoint: shaderDescriptor.fragmentEntrypoint,
      targets: [
        {
          format: presentationFormat,
          blend,
        },
      ],
    },
    primitive: {
      // six vertices per quad, no vertex buffers
      topology: "triangle-list",
      cullMode: "none",
    },
  };

  return pipelineDescriptor;
}

/**
 * Straight alpha over.
 */
export function defaultBlendState(): GPUBlendState {
  return {
    color: {
      srcFactor: "src-alpha",
      dstFactor: "one-minus-src-alpha",
      operation: "add",
    },
    alpha: {
      srcFactor: "one",
      dstFactor: "one-minus-src-alpha",
      operation: "add",
    },
  };
}

export function createGpuPipeline(
  device: GPUDevice,
  shaderDescriptor: ShaderDescriptor,
  pipelineDescriptor: Omit<GPURenderPipelineDescriptor, "layout">,
): GPURenderPipeline {
  const defs = makeShaderDataDefinitions(shaderDescriptor.code);
  const descriptors = makeBindGroupLayoutDescriptors(defs, pipelineDescriptor);

  return device.createRenderPipeline({
    ...pipelineDescriptor,
    layout: device.createPipelineLayout({
      bindGroupLayouts: descriptors.map((d, i) =>
        device.createBindGroupLayout({
          label: `${shaderDescriptor.label} bind group layout ${i}`,
          ...d,
        }),
      ),
    }),
  });
}
