import type { Brush } from "./Brush";
import type { ElementRecord } from "./Element";
import type { Transform } from "./Transform";

/**
 * Everything a backend needs for one instanced draw: `elements.length` instances of six vertices.
 * Brush indices in `attrs[2]` are relative to `brushes`.
 */
export type CanvasBatch = {
  transform: Transform;
  elements: readonly ElementRecord[];
  brushes: readonly Brush[];
};
