import { describe, expect, it } from "vitest";
import { TextureRegistry } from "../../src/textures/TextureRegistry";
import { createSolidTexture, createTexture } from "../../src/textures/util";

describe("TextureRegistry", () => {
  it("gives the same texture the same index", () => {
    const registry = new TextureRegistry(4);
    const red = createSolidTexture("red");
    const blue = createSolidTexture("blue");

    expect(registry.store(red)).toBe(0);
    expect(registry.store(blue)).toBe(1);
    expect(registry.store(red)).toBe(0);
    expect(registry.size).toBe(2);
    expect(registry.get(1)).toBe(blue);
    expect(registry.has(red)).toBe(true);
  });

  it("throws a named error past capacity", () => {
    const registry = new TextureRegistry(1);
    registry.store(createSolidTexture("red"));
    expect(() => registry.store(createSolidTexture("red"))).toThrow(
      "CanvasTextureCap: unable to store texture, all 1 slots are used",
    );
  });

  it("drains each upload once", () => {
    const registry = new TextureRegistry(4);
    const red = createSolidTexture("red");
    const blue = createSolidTexture("blue");
    registry.store(red);
    registry.store(blue);

    expect(registry.drainUploads()).toEqual([
      { index: 0, texture: red },
      { index: 1, texture: blue },
    ]);
    expect(registry.drainUploads()).toEqual([]);

    registry.store(red);
    expect(registry.drainUploads()).toEqual([]);
  });
});

describe("createTexture", () => {
  it("checks the data length", () => {
    expect(() => createTexture(2, 2, new Uint8Array(12))).toThrow(
      "Texture data for 2x2 must be 16 bytes, got 12",
    );
  });

  it("rejects empty and fractional sizes", () => {
    expect(() => createTexture(0, 1, new Uint8Array(0))).toThrow(
      "Texture size must be positive, got 0x1",
    );
    expect(() => createTexture(1.5, 1, new Uint8Array(6))).toThrow(
      "Texture size must be whole texels, got 1.5x1",
    );
  });
});

describe("createSolidTexture", () => {
  it("fills every texel", () => {
    const texture = createSolidTexture([1, 0.5, 0, 1], 2, 1);
    expect(Array.from(texture.data)).toEqual([255, 128, 0, 255, 255, 128, 0, 255]);
  });
});
