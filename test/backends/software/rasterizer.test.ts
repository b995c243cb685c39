import { mat4 } from "wgpu-matrix";
import { describe, expect, it } from "vitest";
import { Framebuffer } from "../../../src/backends/software/Framebuffer";
import {
  rasterizeBatch,
  rasterizeTriangle,
} from "../../../src/backends/software/rasterizer";
import type { CanvasBatch } from "../../../src/coreTypes/CanvasBatch";
import { ElementKind, type ElementRecord } from "../../../src/coreTypes/Element";
import type { Transform } from "../../../src/coreTypes/Transform";
import type { Float2, Float4 } from "../../../src/coreTypes/Vec";
import { Camera } from "../../../src/scene/Camera";
import {
  cameraTransform,
  generateQuadVertex,
} from "../../../src/shading/quadGenerator";
import type { FragmentInput } from "../../../src/shading/shapeCompositor";

const SIZE = 4;

function pixels(): Transform {
  return new Camera({ screen: { width: SIZE, height: SIZE } }).getTransform();
}

function image(position: Float2, size: Float2): ElementRecord {
  return {
    position,
    image: [0, 0],
    src: [0, 0],
    uv: [1, 1],
    size,
    reserved: [0, 0],
    attrs: [ElementKind.Image, 0, 0, 0],
  };
}

function batch(elements: ElementRecord[], transform = pixels()): CanvasBatch {
  return { transform, elements, brushes: [] };
}

const halfWhite = (): Float4 => [1, 1, 1, 0.5];

describe("rasterizeBatch", () => {
  it("shades every pixel of a full-screen quad once", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const fragments = rasterizeBatch(
      fb,
      batch([image([0, 0], [SIZE, SIZE])]),
      halfWhite,
    );

    expect(fragments).toBe(16);
    // a pixel shaded twice would have accumulated 0.75
    for (let y = 0; y < SIZE; y++) {
      for (let x = 0; x < SIZE; x++) {
        expect(fb.pixel(x, y)[3]).toBe(0.5);
      }
    }
  });

  it("covers only the pixel centers inside the quad", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const fragments = rasterizeBatch(
      fb,
      batch([image([1, 1], [2, 2])]),
      halfWhite,
    );

    expect(fragments).toBe(4);
    expect(fb.pixel(0, 0)[3]).toBe(0);
    expect(fb.pixel(1, 1)[3]).toBe(0.5);
    expect(fb.pixel(2, 2)[3]).toBe(0.5);
    expect(fb.pixel(3, 3)[3]).toBe(0);
  });

  it("keeps centers on top and left edges and drops them on bottom and right", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const fragments = rasterizeBatch(
      fb,
      batch([image([0.5, 0.5], [1, 1])]),
      halfWhite,
    );

    expect(fragments).toBe(1);
    expect(fb.pixel(0, 0)[3]).toBe(0.5);
    expect(fb.pixel(1, 1)[3]).toBe(0);
  });

  it("clips to the target", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    expect(
      rasterizeBatch(fb, batch([image([-2, -2], [8, 8])]), halfWhite),
    ).toBe(16);
  });

  it("draws mirrored quads", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const transform = pixels();
    // x' = 4 - x flips the winding
    transform.model = mat4.multiply(
      mat4.translation([SIZE, 0, 0]),
      mat4.scaling([-1, 1, 1]),
    );
    const mirrored = batch([image([0, 0], [SIZE, SIZE])], transform);
    expect(rasterizeBatch(fb, mirrored, halfWhite)).toBe(16);
  });

  it("skips quads without area", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    expect(rasterizeBatch(fb, batch([image([1, 1], [0, 2])]), halfWhite)).toBe(
      0,
    );
  });

  it("blends instances in submission order", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const red = image([0, 0], [SIZE, SIZE]);
    const blue: ElementRecord = {
      ...image([0, 0], [SIZE, SIZE]),
      attrs: [ElementKind.Image, 1, 0, 0],
    };
    rasterizeBatch(fb, batch([red, blue]), (textureIndex) =>
      textureIndex === 0 ? [1, 0, 0, 1] : [0, 0, 1, 1],
    );
    expect(fb.pixel(2, 2)).toEqual([0, 0, 1, 1]);
  });
});

describe("rasterizeTriangle", () => {
  const element = image([0, 0], [SIZE, SIZE]);
  const camera = cameraTransform(pixels());
  const corner = (vertexIndex: number) =>
    generateQuadVertex(element, 0, vertexIndex, camera);

  it("takes flat values from the first vertex", () => {
    const inputs: FragmentInput[] = [];
    rasterizeTriangle(
      new Framebuffer(SIZE, SIZE),
      [corner(3), corner(4), corner(5)],
      (input) => {
        inputs.push(input);
        return [0, 0, 0, 0];
      },
    );

    expect(inputs.length).toBeGreaterThan(0);
    expect(inputs.every((input) => input.quadCorner === 2)).toBe(true);
  });

  it("interpolates local position to the pixel center", () => {
    const fb = new Framebuffer(SIZE, SIZE);
    const shade = (input: FragmentInput): Float4 => [
      input.localPosition[0] / SIZE,
      input.localPosition[1] / SIZE,
      0,
      1,
    ];
    rasterizeTriangle(fb, [corner(0), corner(1), corner(2)], shade);
    rasterizeTriangle(fb, [corner(3), corner(4), corner(5)], shade);

    const [x, y] = fb.pixel(1, 2);
    expect(x).toBeCloseTo(1.5 / SIZE, 5);
    expect(y).toBeCloseTo(2.5 / SIZE, 5);
  });
});
