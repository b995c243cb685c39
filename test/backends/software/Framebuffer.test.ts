import { describe, expect, it } from "vitest";
import { Framebuffer } from "../../../src/backends/software/Framebuffer";

describe("Framebuffer", () => {
  it("clears to a color", () => {
    const fb = new Framebuffer(2, 2);
    fb.clear({ r: 0, g: 0, b: 1, a: 1 });
    expect(fb.pixel(1, 1)).toEqual([0, 0, 1, 1]);
  });

  it("blends straight alpha over the target", () => {
    const fb = new Framebuffer(1, 1);
    fb.clear({ r: 0, g: 0, b: 1, a: 1 });
    fb.blend(0, 0, [1, 0, 0, 0.5]);
    expect(fb.pixel(0, 0)).toEqual([0.5, 0, 0.5, 1]);
  });

  it("accumulates alpha over a transparent target", () => {
    const fb = new Framebuffer(1, 1);
    fb.blend(0, 0, [1, 1, 1, 0.5]);
    fb.blend(0, 0, [1, 1, 1, 0.5]);
    expect(fb.pixel(0, 0)).toEqual([0.75, 0.75, 0.75, 0.75]);
  });

  it("clamps shader output", () => {
    const fb = new Framebuffer(1, 1);
    fb.blend(0, 0, [2, -1, 0.5, 1]);
    expect(fb.pixel(0, 0)).toEqual([1, 0, 0.5, 1]);
  });

  it("quantizes to bytes", () => {
    const fb = new Framebuffer(2, 1);
    fb.clear({ r: 1, g: 0.5, b: 0, a: 1 });
    expect(Array.from(fb.toBytes())).toEqual([255, 128, 0, 255, 255, 128, 0, 255]);
  });

  it("reallocates on resize", () => {
    const fb = new Framebuffer(1, 1);
    fb.resize(3, 2);
    expect(fb.width).toBe(3);
    expect(fb.height).toBe(2);
    expect(fb.toBytes().length).toBe(24);
  });
});
