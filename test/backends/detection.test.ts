import { afterEach, describe, expect, it, vi } from "vitest";
import {
  detectBackend,
  isWebGPUAvailable,
} from "../../src/backends/detection";

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function stubGpu(requestAdapter: () => Promise<unknown>) {
  vi.stubGlobal("navigator", { gpu: { requestAdapter } });
}

describe("detectBackend", () => {
  it("uses WebGPU when an adapter is available", async () => {
    stubGpu(async () => ({}));
    expect(isWebGPUAvailable()).toBe(true);
    expect(await detectBackend()).toBe("webgpu");
  });

  it("falls back to software without an adapter", async () => {
    stubGpu(async () => null);
    expect(await detectBackend()).toBe("software");
  });

  it("falls back to software without navigator.gpu", async () => {
    vi.stubGlobal("navigator", {});
    expect(isWebGPUAvailable()).toBe(false);
    expect(await detectBackend()).toBe("software");
  });

  it("warns when the adapter request fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const failure = new Error("adapter request failed");
    stubGpu(async () => {
      throw failure;
    });

    expect(await detectBackend()).toBe("software");
    expect(warn).toHaveBeenCalledWith(
      "WebGPU adapter request failed, using software backend",
      failure,
    );
  });
});
