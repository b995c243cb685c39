import type { Brush } from "../coreTypes/Brush";
import type { DrawCommand, Glyph } from "../coreTypes/DrawCommand";
import { ElementKind, type ElementRecord } from "../coreTypes/Element";
import type { Float4 } from "../coreTypes/Vec";
import { canvasError } from "../utils/errors";

export type CornerRadii = {
  topLeft?: number;
  topRight?: number;
  bottomRight?: number;
  bottomLeft?: number;
};

/**
 * Orders named corner radii the way the shape compositor picks them.
 *
 * @example
 *
 * const brush = createBrush({ radius: cornerRadii({ topLeft: 8, topRight: 8 }) });
 */
export function cornerRadii(radii: CornerRadii | number): Float4 {
  if (typeof radii === "number") {
    return [radii, radii, radii, radii];
  }
  return [
    radii.bottomRight ?? 0,
    radii.topRight ?? 0,
    radii.bottomLeft ?? 0,
    radii.topLeft ?? 0,
  ];
}

/**
 * White fill, white border color, square corners, no border.
 */
export function createBrush(overrides: Partial<Brush> = {}): Brush {
  return {
    fg: overrides.fg ?? [1, 1, 1, 1],
    bg: overrides.bg ?? [1, 1, 1, 1],
    radius: overrides.radius ?? [0, 0, 0, 0],
    border: overrides.border ?? [0, 0, 0, 0],
  };
}

/**
 * Builds the shader-side record for a command. Texture and brush indices are resolved by the caller.
 */
export function toElementRecord(
  command: DrawCommand,
  textureIndex: number,
  brushIndex: number,
): ElementRecord {
  const kind =
    command.kind === "roundedRect" ? ElementKind.RoundedRect : ElementKind.Image;
  return {
    position: [command.position[0], command.position[1]],
    image: [0, 0],
    src: command.src ? [command.src[0], command.src[1]] : [0, 0],
    uv: command.uv ? [command.uv[0], command.uv[1]] : [1, 1],
    size: [command.size[0], command.size[1]],
    reserved: [0, 0],
    attrs: [kind, textureIndex, brushIndex, 0],
  };
}

/**
 * Glyph quads are plain images sampling the font atlas. Texture and brush
 * indices are left at 0 for the canvas to fill in.
 */
export function glyphToElementRecord(glyph: Glyph): ElementRecord {
  return {
    position: [glyph.position[0], glyph.position[1]],
    image: [0, 0],
    src: [glyph.src[0], glyph.src[1]],
    uv: [glyph.uv[0], glyph.uv[1]],
    size: [glyph.size[0], glyph.size[1]],
    reserved: [0, 0],
    attrs: [ElementKind.Image, 0, 0, 0],
  };
}

/**
 * Throws `CanvasInvalidElement` for records the shaders can't handle. Shape math divides by height.
 */
export function validateElement(element: ElementRecord): void {
  const values = [
    ...element.position,
    ...element.size,
    ...element.src,
    ...element.uv,
  ];
  if (!values.every(Number.isFinite)) {
    throw canvasError(
      "CanvasInvalidElement",
      `element has non-finite geometry: position=${element.position} size=${element.size} src=${element.src} uv=${element.uv}`,
    );
  }
  if (element.size[1] <= 0) {
    throw canvasError(
      "CanvasInvalidElement",
      `element height must be positive, got ${element.size[1]}`,
    );
  }
}
