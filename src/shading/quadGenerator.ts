import { type Mat4, mat4, vec4 } from "wgpu-matrix";
import type { ElementRecord } from "../coreTypes/Element";
import type { Transform } from "../coreTypes/Transform";
import type { Float2, Float4 } from "../coreTypes/Vec";

/** vertices emitted per element */
export const VERTICES_PER_QUAD = 6;

/**
 * Unit square corners for a triangle list of two triangles sharing the 0-2 diagonal.
 * `id` is the quad corner: 0 = (0,0), 1 = (1,0), 2 = (1,1), 3 = (0,1).
 */
export const QUAD_VERTICES: readonly { corner: Float2; id: number }[] = [
  { corner: [0, 0], id: 0 },
  { corner: [1, 0], id: 1 },
  { corner: [1, 1], id: 2 },
  { corner: [1, 1], id: 2 },
  { corner: [0, 1], id: 3 },
  { corner: [0, 0], id: 0 },
];

/**
 * Per-vertex outputs. `textureIndex`, `instanceIndex` and `quadCorner` are flat,
 * the rest is interpolated across the triangle.
 */
export type QuadVertex = {
  clipPosition: Float4;
  color: Float4;
  texCoord: Float2;
  textureIndex: number;
  instanceIndex: number;
  quadCorner: number;
  /** position inside the quad in pixels, independent of the camera */
  localPosition: Float2;
};

/**
 * `proj * view * model`
 */
export function cameraTransform(transform: Transform, dst?: Mat4): Mat4 {
  const projView = mat4.multiply(transform.proj, transform.view);
  return mat4.multiply(projView, transform.model, dst);
}

/**
 * Expands one corner of an element's quad. CPU twin of `vs_main` in canvas.wgsl.
 *
 * @param camera - combined transform, see {@link cameraTransform}
 */
export function generateQuadVertex(
  element: ElementRecord,
  instanceIndex: number,
  vertexIndex: number,
  camera: Mat4,
): QuadVertex {
  const { corner, id } = QUAD_VERTICES[vertexIndex % VERTICES_PER_QUAD];

  const localPosition: Float2 = [
    corner[0] * element.size[0],
    corner[1] * element.size[1],
  ];
  const clip = vec4.transformMat4(
    [
      localPosition[0] + element.position[0],
      localPosition[1] + element.position[1],
      0,
      1,
    ],
    camera,
  );

  return {
    clipPosition: [clip[0], clip[1], clip[2], clip[3]],
    color: [1, 1, 1, 1],
    texCoord: [
      element.src[0] + corner[0] * element.uv[0],
      element.src[1] + corner[1] * element.uv[1],
    ],
    textureIndex: element.attrs[1],
    instanceIndex,
    quadCorner: id,
    localPosition,
  };
}
