export type CanvasErrorName =
  | "CanvasInvalidElement"
  | "CanvasStorageCap"
  | "CanvasTextureCap"
  | "CanvasTextureTooLarge"
  | "CanvasElementCap"
  | "CanvasBrushCap"
  | "CanvasBatchCap";

/**
 * Creates an error whose `name` identifies the failure, so callers can branch on it.
 *
 * @example
 *
 * try {
 *   canvas.render(command);
 * } catch (e) {
 *   if (e instanceof Error && e.name === "CanvasStorageCap") flushEarly();
 * }
 */
export function canvasError(name: CanvasErrorName, message: string): Error {
  const err = new Error(`${name}: ${message}`);
  err.name = name;
  return err;
}
