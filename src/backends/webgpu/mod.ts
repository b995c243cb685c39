export { packBrush, packElement, StagingBuffer } from "./packing";
export {
  codeWithLineNumbers,
  describeShader,
  findStruct,
  type StructLayout,
  struct2Layout,
} from "./parser";
export { pixelArtSampler, samplerFor, smoothSampler } from "./samplers";
export type { ShaderDescriptor } from "./ShaderDescriptor";
export { WebGPUBackend, type WebGPUBackendOptions } from "./WebGPUBackend";
export {
  WebGPUCanvasPipeline,
  type WebGPUCanvasPipelineOptions,
} from "./WebGPUCanvasPipeline";
export { default as canvasWgsl } from "./wgsl/canvas.wgsl";
