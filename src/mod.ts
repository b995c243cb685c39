export type * from "./coreTypes/mod";
export { ElementKind } from "./coreTypes/mod";

export type * from "./backends/IRenderBackend";

export * from "./limits";
export * from "./QuadCanvas";

export * as Colors from "./colors/mod";
export * as Scene from "./scene/mod";
export * as Shading from "./shading/mod";
export * as Backends from "./backends/mod";
export * as Textures from "./textures/mod";
export * as Utils from "./utils/mod";

export { Camera } from "./scene/Camera";
export { createSolidTexture, createTexture } from "./textures/util";
