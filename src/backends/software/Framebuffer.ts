import type { Color } from "../../coreTypes/Color";
import type { Float4 } from "../../coreTypes/Vec";

/**
 * Float RGBA color target, row-major with the top row first.
 * Colors are stored straight (not premultiplied), the way the shaders output them.
 */
export class Framebuffer {
  width: number;
  height: number;
  #data: Float32Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.#data = new Float32Array(width * height * 4);
  }

  resize(width: number, height: number) {
    if (width === this.width && height === this.height) {
      return;
    }
    this.width = width;
    this.height = height;
    this.#data = new Float32Array(width * height * 4);
  }

  clear(color: Color) {
    for (let i = 0; i < this.#data.length; i += 4) {
      this.#data[i] = color.r;
      this.#data[i + 1] = color.g;
      this.#data[i + 2] = color.b;
      this.#data[i + 3] = color.a;
    }
  }

  /**
   * Blends `src` over the pixel: `src-alpha, one-minus-src-alpha` for color
   * and `one, one-minus-src-alpha` for alpha.
   */
  blend(x: number, y: number, src: Float4) {
    const i = (y * this.width + x) * 4;
    const a = clamp01(src[3]);
    const keep = 1 - a;
    const data = this.#data;
    data[i] = clamp01(src[0]) * a + data[i] * keep;
    data[i + 1] = clamp01(src[1]) * a + data[i + 1] * keep;
    data[i + 2] = clamp01(src[2]) * a + data[i + 2] * keep;
    data[i + 3] = a + data[i + 3] * keep;
  }

  pixel(x: number, y: number): Float4 {
    const i = (y * this.width + x) * 4;
    const data = this.#data;
    return [data[i], data[i + 1], data[i + 2], data[i + 3]];
  }

  /**
   * Quantizes to RGBA8, as an unorm render target would.
   */
  toBytes(): Uint8Array {
    const bytes = new Uint8Array(this.#data.length);
    for (let i = 0; i < this.#data.length; i++) {
      bytes[i] = Math.round(clamp01(this.#data[i]) * 255);
    }
    return bytes;
  }
}

// color attachments clamp shader output to [0, 1]
function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}
