import { describe, expect, it } from "vitest";
import { WebGPUBackend } from "../../../src/backends/webgpu/WebGPUBackend";
import type { CanvasBatch } from "../../../src/coreTypes/CanvasBatch";
import { ElementKind } from "../../../src/coreTypes/Element";
import { DEFAULT_LIMITS, type Limits } from "../../../src/limits";
import { identityTransform } from "../../../src/scene/Camera";
import { createSolidTexture } from "../../../src/textures/util";
import { bufferLabelled, createMockDevice } from "./mockDevice";

const limits: Limits = {
  ...DEFAULT_LIMITS,
  textureCount: 4,
  textureSize: 8,
};

function setup() {
  const gpu = createMockDevice();
  const swapchain = { createView: () => ({ label: "swapchain" }) };
  const context = {
    getCurrentTexture: () => swapchain,
  } as unknown as GPUCanvasContext;
  const backend = new WebGPUBackend(gpu.device, context, "bgra8unorm", limits);
  return { ...gpu, backend };
}

const batch: CanvasBatch = {
  transform: identityTransform(),
  elements: [
    {
      position: [0, 0],
      image: [0, 0],
      src: [0, 0],
      uv: [1, 1],
      size: [4, 4],
      reserved: [0, 0],
      attrs: [ElementKind.Image, 1, 0, 0],
    },
  ],
  brushes: [
    {
      fg: [1, 1, 1, 1],
      bg: [1, 1, 1, 1],
      radius: [0, 0, 0, 0],
      border: [0, 0, 0, 0],
    },
  ],
};

describe("WebGPUBackend", () => {
  it("allocates one texture array layer per texture", () => {
    const { mock, backend } = setup();
    expect(backend.type).toBe("webgpu");
    expect(mock.createTexture).toHaveBeenCalledWith({
      label: "canvas textures",
      size: [8, 8, 4],
      format: "rgba8unorm",
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    });
  });

  it("samples nearest texels by default", () => {
    const { mock } = setup();
    expect(mock.createSampler).toHaveBeenCalledWith(
      expect.objectContaining({ magFilter: "nearest", minFilter: "nearest" }),
    );
  });

  it("clears or loads the swapchain texture", () => {
    const { encoder, backend } = setup();
    backend.startFrame({ r: 0, g: 0, b: 1, a: 1 }, "load");

    expect(encoder.beginRenderPass).toHaveBeenCalledWith({
      label: "canvas frame",
      colorAttachments: [
        {
          view: { label: "swapchain" },
          clearValue: { r: 0, g: 0, b: 1, a: 1 },
          loadOp: "load",
          storeOp: "store",
        },
      ],
    });
  });

  it("uploads textures into their layer", () => {
    const { mock, texture, backend } = setup();
    const red = createSolidTexture("red", 2, 4);
    backend.uploadTexture(red, 3);

    expect(mock.queue.writeTexture).toHaveBeenCalledWith(
      { texture, origin: { x: 0, y: 0, z: 3 } },
      red.data,
      { bytesPerRow: 8, rowsPerImage: 4 },
      { width: 2, height: 4, depthOrArrayLayers: 1 },
    );
  });

  it("rejects textures that don't fit", () => {
    const { backend } = setup();
    expect(() =>
      backend.uploadTexture(createSolidTexture("red", 9, 1), 0),
    ).toThrow("CanvasTextureTooLarge: texture is 9x1, max is 8x8");
    expect(() =>
      backend.uploadTexture(createSolidTexture("red"), 4),
    ).toThrow("texture index 4 is outside the texture array");
  });

  it("scales texture regions by the uploaded size", () => {
    const { mock, backend } = setup();
    backend.uploadTexture(createSolidTexture("red", 2, 4), 1);
    backend.startFrame({ r: 0, g: 0, b: 0, a: 0 }, "clear");
    backend.drawBatch(batch);

    const elements = bufferLabelled(mock, "canvas elements");
    const [write] = mock.queue.writeBuffer.mock.calls.filter(
      ([buffer]) => buffer === elements,
    );
    const floats = new Float32Array(write[2]);
    expect(floats[24 / 4]).toBe(0.25);
    expect(floats[28 / 4]).toBe(0.5);
  });

  it("clamps sampling to the uploaded part of each layer", () => {
    const { mock, backend } = setup();
    const extents = bufferLabelled(mock, "canvas texture extents");
    backend.uploadTexture(createSolidTexture("red", 2, 4), 1);
    backend.uploadTexture(createSolidTexture("white"), 2);

    const writes = mock.queue.writeBuffer.mock.calls.filter(
      ([buffer]) => buffer === extents,
    );
    expect(writes.map(([, offset]) => offset)).toEqual([8, 16]);
    expect(Array.from(new Float32Array(writes[0][2]))).toEqual([0.25, 0.5]);
    expect(Array.from(new Float32Array(writes[1][2]))).toEqual([
      0.125, 0.125,
    ]);
  });

  it("submits the frame", () => {
    const { mock, renderPass, encoder, backend } = setup();
    backend.startFrame({ r: 0, g: 0, b: 0, a: 0 }, "clear");
    expect(backend.drawBatch(batch)).toBe(1);
    backend.endFrame();

    expect(renderPass.draw).toHaveBeenCalledWith(6, 1, 0, 0);
    expect(renderPass.end).toHaveBeenCalledTimes(1);
    expect(mock.queue.submit).toHaveBeenCalledWith([{ label: "commands" }]);
    expect(encoder.finish).toHaveBeenCalledTimes(1);
  });

  it("requires a frame to draw", () => {
    const { backend } = setup();
    expect(() => backend.drawBatch(batch)).toThrow(
      "No render pass - did you call startFrame?",
    );
    expect(() => backend.endFrame()).toThrow(
      "No render pass - did you call startFrame?",
    );
  });

  it("releases the device", () => {
    const { mock, texture, backend } = setup();
    backend.destroy();
    expect(texture.destroy).toHaveBeenCalledTimes(1);
    expect(mock.destroy).toHaveBeenCalledTimes(1);
  });
});
