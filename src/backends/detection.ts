import type { BackendType } from "./IRenderBackend";

/**
 * Detect the best available rendering backend.
 *
 * Tries WebGPU first, falls back to the software rasterizer.
 */
export async function detectBackend(): Promise<BackendType> {
  if (isWebGPUAvailable()) {
    try {
      const adapter = await navigator.gpu.requestAdapter();
      if (adapter) {
        return "webgpu";
      }
    } catch (e) {
      console.warn("WebGPU adapter request failed, using software backend", e);
    }
  }

  return "software";
}

/**
 * Check if WebGPU is available in the current environment.
 */
export function isWebGPUAvailable(): boolean {
  return typeof navigator !== "undefined" && "gpu" in navigator;
}
