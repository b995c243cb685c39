export {
  cameraTransform,
  generateQuadVertex,
  QUAD_VERTICES,
  type QuadVertex,
  VERTICES_PER_QUAD,
} from "./quadGenerator";
export { clamp, mix, quadrantRadius, roundedBoxSdf, smoothstep } from "./sdf";
export {
  type FragmentInput,
  type FragmentResources,
  shadeFragment,
  shadeImage,
  shadeRoundedRect,
  type TextureSampler,
} from "./shapeCompositor";
