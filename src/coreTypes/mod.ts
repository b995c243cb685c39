export type * from "./Brush";
export type * from "./CanvasBatch";
export type * from "./Color";
export type * from "./DrawCommand";
export type * from "./Size";
export type * from "./Transform";
export type * from "./Vec";
export { ElementKind, type ElementRecord } from "./Element";
