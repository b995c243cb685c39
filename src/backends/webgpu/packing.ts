import type { Brush } from "../../coreTypes/Brush";
import type { ElementRecord } from "../../coreTypes/Element";
import type { Float2, Float4, Uint4 } from "../../coreTypes/Vec";
import { memberOffset, type StructLayout } from "./parser";

/**
 * CPU mirror of a storage buffer holding `capacity` structs of one layout.
 */
export class StagingBuffer {
  readonly layout: StructLayout;
  readonly capacity: number;
  readonly bytes: ArrayBuffer;

  #f32: Float32Array;
  #u32: Uint32Array;

  constructor(layout: StructLayout, capacity: number) {
    this.layout = layout;
    this.capacity = capacity;
    this.bytes = new ArrayBuffer(layout.size * capacity);
    this.#f32 = new Float32Array(this.bytes);
    this.#u32 = new Uint32Array(this.bytes);
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  floats(index: number, member: string, values: Float2 | Float4) {
    const start = this.#wordIndex(index, member);
    for (let i = 0; i < values.length; i++) {
      this.#f32[start + i] = values[i];
    }
  }

  uints(index: number, member: string, values: Uint4) {
    const start = this.#wordIndex(index, member);
    for (let i = 0; i < values.length; i++) {
      this.#u32[start + i] = values[i];
    }
  }

  readFloat(index: number, member: string, component = 0): number {
    return this.#f32[this.#wordIndex(index, member) + component];
  }

  readUint(index: number, member: string, component = 0): number {
    return this.#u32[this.#wordIndex(index, member) + component];
  }

  #wordIndex(index: number, member: string): number {
    return (
      (index * this.layout.size + memberOffset(this.layout, member)) /
      Uint32Array.BYTES_PER_ELEMENT
    );
  }
}

export type ElementPackingOptions = {
  /** added to every brush index, the slot the batch's first brush lands in */
  brushBase: number;
  /** fraction of a texture array layer the texture covers */
  textureScale: (textureIndex: number) => Float2;
};

/**
 * Writes one element. `src` and `uv` are rescaled from the texture's own
 * normalized space to the texture array layer it was uploaded into.
 */
export function packElement(
  dst: StagingBuffer,
  index: number,
  element: ElementRecord,
  options: ElementPackingOptions,
) {
  const [textureScaleX, textureScaleY] = options.textureScale(element.attrs[1]);
  dst.floats(index, "position", element.position);
  dst.floats(index, "image", element.image);
  dst.floats(index, "src", [
    element.src[0] * textureScaleX,
    element.src[1] * textureScaleY,
  ]);
  dst.floats(index, "uv", [
    element.uv[0] * textureScaleX,
    element.uv[1] * textureScaleY,
  ]);
  dst.floats(index, "size", element.size);
  dst.floats(index, "reserved", element.reserved);
  dst.uints(index, "attrs", [
    element.attrs[0],
    element.attrs[1],
    element.attrs[2] + options.brushBase,
    element.attrs[3],
  ]);
}

export function packBrush(dst: StagingBuffer, index: number, brush: Brush) {
  dst.floats(index, "fg", brush.fg);
  dst.floats(index, "bg", brush.bg);
  dst.floats(index, "radius", brush.radius);
  dst.floats(index, "border", brush.border);
}
