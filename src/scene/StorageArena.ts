import { canvasError } from "../utils/errors";

/**
 * Fixed-capacity, append-only array addressed by index. Records are written
 * during a frame and handed off in one piece with {@link take}.
 */
export class StorageArena<T> {
  readonly label: string;
  readonly capacity: number;

  #records: T[] = [];

  constructor(label: string, capacity: number) {
    this.label = label;
    this.capacity = capacity;
  }

  /**
   * Appends a record and returns its index.
   */
  push(value: T): number {
    this.reserve();
    this.#records.push(value);
    return this.#records.length - 1;
  }

  /**
   * Throws `CanvasStorageCap` unless `count` more records fit.
   */
  reserve(count = 1): void {
    if (this.#records.length + count > this.capacity) {
      throw canvasError(
        "CanvasStorageCap",
        `unable to push to ${this.label}, limit ${this.capacity} exceeded`,
      );
    }
  }

  /**
   * Appends all records and returns the index of the first one.
   * Nothing is appended when they don't all fit.
   */
  extend(values: readonly T[]): number {
    if (this.#records.length + values.length > this.capacity) {
      throw canvasError(
        "CanvasStorageCap",
        `unable to extend ${this.label} by ${values.length}, limit ${this.capacity} exceeded`,
      );
    }
    const start = this.#records.length;
    this.#records.push(...values);
    return start;
  }

  get(index: number): T | undefined {
    return this.#records[index];
  }

  get length(): number {
    return this.#records.length;
  }

  get isEmpty(): boolean {
    return this.#records.length === 0;
  }

  values(): readonly T[] {
    return this.#records;
  }

  /**
   * Returns everything written so far and starts over at index 0.
   */
  take(): T[] {
    const records = this.#records;
    this.#records = [];
    return records;
  }
}
