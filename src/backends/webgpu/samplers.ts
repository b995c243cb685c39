import type { TextureFilter } from "../IRenderBackend";

export const pixelArtSampler: GPUSamplerDescriptor = {
  magFilter: "nearest",
  minFilter: "nearest",
  addressModeU: "clamp-to-edge",
  addressModeV: "clamp-to-edge",
};

export const smoothSampler: GPUSamplerDescriptor = {
  magFilter: "linear",
  minFilter: "linear",
  addressModeU: "clamp-to-edge",
  addressModeV: "clamp-to-edge",
};

export function samplerFor(filter: TextureFilter): GPUSamplerDescriptor {
  return filter === "linear" ? smoothSampler : pixelArtSampler;
}
