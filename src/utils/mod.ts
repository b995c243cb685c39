export { assert } from "./assert";
export { type CanvasErrorName, canvasError } from "./errors";
