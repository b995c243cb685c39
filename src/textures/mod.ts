export { TextureRegistry } from "./TextureRegistry";
export type { CpuTexture } from "./types";
export { createSolidTexture, createTexture } from "./util";
