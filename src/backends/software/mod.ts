export { Framebuffer } from "./Framebuffer";
export { rasterizeBatch, rasterizeTriangle } from "./rasterizer";
export { createTextureSampler, sampleLinear, sampleNearest } from "./sampler";
export { SoftwareBackend, type SoftwareBackendOptions } from "./SoftwareBackend";
