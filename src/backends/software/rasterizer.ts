import type { CanvasBatch } from "../../coreTypes/CanvasBatch";
import type { Float2, Float4 } from "../../coreTypes/Vec";
import {
  cameraTransform,
  generateQuadVertex,
  type QuadVertex,
  VERTICES_PER_QUAD,
} from "../../shading/quadGenerator";
import {
  type FragmentInput,
  shadeFragment,
  type TextureSampler,
} from "../../shading/shapeCompositor";
import type { Framebuffer } from "./Framebuffer";

type ScreenVertex = {
  x: number;
  y: number;
  /** depth after the perspective divide */
  z: number;
  /** 1 / clip w, for perspective-correct interpolation */
  invW: number;
  vertex: QuadVertex;
};

type Point = { x: number; y: number };

/**
 * Runs both stages over every element of the batch, blending into `target` in
 * submission order: instance by instance, two triangles each.
 *
 * @returns Number of fragments shaded
 */
export function rasterizeBatch(
  target: Framebuffer,
  batch: CanvasBatch,
  sample: TextureSampler,
): number {
  const camera = cameraTransform(batch.transform);
  const resources = {
    elements: batch.elements,
    brushes: batch.brushes,
    sample,
  };
  const shade = (input: FragmentInput) => shadeFragment(input, resources);

  let fragments = 0;
  for (let instance = 0; instance < batch.elements.length; instance++) {
    const element = batch.elements[instance];
    const vertices: QuadVertex[] = [];
    for (let v = 0; v < VERTICES_PER_QUAD; v++) {
      vertices.push(generateQuadVertex(element, instance, v, camera));
    }
    for (let v = 0; v < VERTICES_PER_QUAD; v += 3) {
      fragments += rasterizeTriangle(
        target,
        [vertices[v], vertices[v + 1], vertices[v + 2]],
        shade,
      );
    }
  }
  return fragments;
}

/**
 * Covers the pixels whose centers fall inside the triangle. Centers exactly on
 * an edge belong to it only for top and left edges, so triangles sharing an
 * edge never both shade a pixel. Flat values come from the first vertex.
 *
 * @returns Number of fragments shaded
 */
export function rasterizeTriangle(
  target: Framebuffer,
  triangle: [QuadVertex, QuadVertex, QuadVertex],
  shade: (input: FragmentInput) => Float4,
): number {
  const provoking = triangle[0];
  if (triangle.some((v) => v.clipPosition[3] <= 0)) {
    return 0;
  }

  const a = toScreen(triangle[0], target.width, target.height);
  let b = toScreen(triangle[1], target.width, target.height);
  let c = toScreen(triangle[2], target.width, target.height);
  let area = edge(a, b, c);
  if (area === 0) {
    return 0;
  }
  if (area < 0) {
    [b, c] = [c, b];
    area = -area;
  }

  const minX = Math.max(0, Math.floor(Math.min(a.x, b.x, c.x)));
  const maxX = Math.min(target.width - 1, Math.ceil(Math.max(a.x, b.x, c.x)));
  const minY = Math.max(0, Math.floor(Math.min(a.y, b.y, c.y)));
  const maxY = Math.min(
    target.height - 1,
    Math.ceil(Math.max(a.y, b.y, c.y)),
  );

  const topLeftBC = isTopLeft(b, c);
  const topLeftCA = isTopLeft(c, a);
  const topLeftAB = isTopLeft(a, b);

  let fragments = 0;
  for (let py = minY; py <= maxY; py++) {
    for (let px = minX; px <= maxX; px++) {
      const p = { x: px + 0.5, y: py + 0.5 };
      const wa = edge(b, c, p);
      const wb = edge(c, a, p);
      const wc = edge(a, b, p);
      if (
        !covers(wa, topLeftBC) ||
        !covers(wb, topLeftCA) ||
        !covers(wc, topLeftAB)
      ) {
        continue;
      }

      const ba = wa / area;
      const bb = wb / area;
      const bc = wc / area;
      const z = ba * a.z + bb * b.z + bc * c.z;
      if (z < 0 || z > 1) {
        continue;
      }

      // barycentrics in clip space
      const pa = ba * a.invW;
      const pb = bb * b.invW;
      const pc = bc * c.invW;
      const sum = pa + pb + pc;
      const weights: [number, number, number] = [pa / sum, pb / sum, pc / sum];
      const input = interpolate(
        [a.vertex, b.vertex, c.vertex],
        weights,
        provoking,
      );

      target.blend(px, py, shade(input));
      fragments++;
    }
  }
  return fragments;
}

function toScreen(
  vertex: QuadVertex,
  width: number,
  height: number,
): ScreenVertex {
  const [x, y, z, w] = vertex.clipPosition;
  return {
    x: ((x / w + 1) / 2) * width,
    y: ((1 - y / w) / 2) * height,
    z: z / w,
    invW: 1 / w,
    vertex,
  };
}

/**
 * Twice the signed area of `a b p`. Positive when `p` is clockwise from `a b` on screen.
 */
function edge(a: Point, b: Point, p: Point): number {
  return (b.x - a.x) * (p.y - a.y) - (b.y - a.y) * (p.x - a.x);
}

// for clockwise triangles in y-down screen space
function isTopLeft(from: Point, to: Point): boolean {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  return (dy === 0 && dx > 0) || dy < 0;
}

function covers(weight: number, topLeft: boolean): boolean {
  return weight > 0 || (weight === 0 && topLeft);
}

function interpolate(
  vertices: [QuadVertex, QuadVertex, QuadVertex],
  weights: [number, number, number],
  provoking: QuadVertex,
): FragmentInput {
  const [a, b, c] = vertices;
  const [wa, wb, wc] = weights;
  // constant attributes stay exact
  const lerp = (va: number, vb: number, vc: number) =>
    va === vb && vb === vc ? va : va * wa + vb * wb + vc * wc;

  const color: Float4 = [
    lerp(a.color[0], b.color[0], c.color[0]),
    lerp(a.color[1], b.color[1], c.color[1]),
    lerp(a.color[2], b.color[2], c.color[2]),
    lerp(a.color[3], b.color[3], c.color[3]),
  ];
  const texCoord: Float2 = [
    lerp(a.texCoord[0], b.texCoord[0], c.texCoord[0]),
    lerp(a.texCoord[1], b.texCoord[1], c.texCoord[1]),
  ];
  const localPosition: Float2 = [
    lerp(a.localPosition[0], b.localPosition[0], c.localPosition[0]),
    lerp(a.localPosition[1], b.localPosition[1], c.localPosition[1]),
  ];

  return {
    color,
    texCoord,
    textureIndex: provoking.textureIndex,
    instanceIndex: provoking.instanceIndex,
    quadCorner: provoking.quadCorner,
    localPosition,
  };
}
