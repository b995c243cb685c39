export { Camera, type CameraOptions, identityTransform } from "./Camera";
export {
  type CornerRadii,
  cornerRadii,
  createBrush,
  glyphToElementRecord,
  toElementRecord,
  validateElement,
} from "./commands";
export { StorageArena } from "./StorageArena";
