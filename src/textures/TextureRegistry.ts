import { canvasError } from "../utils/errors";
import type { CpuTexture } from "./types";

/**
 * Assigns each distinct texture a stable index, which is what elements carry in `attrs[1]`.
 * Indices are never reused. Textures are uploaded to the backend lazily, see {@link drainUploads}.
 */
export class TextureRegistry {
  readonly capacity: number;

  #textures: CpuTexture[] = [];
  #indices = new Map<CpuTexture, number>();
  #pending: number[] = [];

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  /**
   * Returns the index of the texture, registering it on first use.
   */
  store(texture: CpuTexture): number {
    const existing = this.#indices.get(texture);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.#textures.length;
    if (index >= this.capacity) {
      throw canvasError(
        "CanvasTextureCap",
        `unable to store texture, all ${this.capacity} slots are used`,
      );
    }
    this.#textures.push(texture);
    this.#indices.set(texture, index);
    this.#pending.push(index);
    return index;
  }

  get(index: number): CpuTexture | undefined {
    return this.#textures[index];
  }

  has(texture: CpuTexture): boolean {
    return this.#indices.has(texture);
  }

  get size(): number {
    return this.#textures.length;
  }

  /**
   * Textures stored since the last call, in index order.
   */
  drainUploads(): { index: number; texture: CpuTexture }[] {
    const uploads = this.#pending.map((index) => ({
      index,
      texture: this.#textures[index],
    }));
    this.#pending = [];
    return uploads;
  }
}
