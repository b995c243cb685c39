// Backend abstraction layer

export {
  checkFrameCapacity,
  checkTextureSize,
  type FrameUsage,
} from "./capacity";
export { detectBackend, isWebGPUAvailable } from "./detection";
export type {
  BackendType,
  IRenderBackend,
  TextureFilter,
} from "./IRenderBackend";
export { SoftwareBackend } from "./software/mod";
export { WebGPUBackend } from "./webgpu/mod";
