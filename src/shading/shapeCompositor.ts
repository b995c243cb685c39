import { vec4 } from "wgpu-matrix";
import type { Brush } from "../coreTypes/Brush";
import { ElementKind, type ElementRecord } from "../coreTypes/Element";
import type { Float2, Float3, Float4 } from "../coreTypes/Vec";
import { mix, roundedBoxSdf, smoothstep } from "./sdf";

/**
 * Interpolated inputs of one fragment, see {@link QuadVertex}.
 */
export type FragmentInput = {
  color: Float4;
  texCoord: Float2;
  textureIndex: number;
  instanceIndex: number;
  quadCorner: number;
  localPosition: Float2;
};

/**
 * Samples texture `textureIndex` at normalized `texCoord`, returning straight RGBA.
 */
export type TextureSampler = (textureIndex: number, texCoord: Float2) => Float4;

export type FragmentResources = {
  elements: readonly ElementRecord[];
  brushes: readonly Brush[];
  sample: TextureSampler;
};

/** element height at which the edge smoothing band is 0.001 wide */
const REFERENCE_HEIGHT = 100;
const REFERENCE_SMOOTHNESS = 0.001;

/**
 * Final straight-alpha color of one fragment. CPU twin of `fs_main` in canvas.wgsl.
 */
export function shadeFragment(
  input: FragmentInput,
  resources: FragmentResources,
): Float4 {
  const element = resources.elements[input.instanceIndex];
  const sampled = resources.sample(input.textureIndex, input.texCoord);
  const texColor = vec4.multiply(sampled, input.color);
  const tex: Float4 = [texColor[0], texColor[1], texColor[2], texColor[3]];

  if (element.attrs[0] === ElementKind.RoundedRect) {
    return shadeRoundedRect(
      element,
      resources.brushes[element.attrs[2]],
      tex,
      input.localPosition,
    );
  }
  return shadeImage(tex);
}

export function shadeImage(texColor: Float4): Float4 {
  return texColor;
}

/**
 * Rounded rectangle with a border ring, anti-aliased with a band that scales with element height.
 * All shape math is done in units of the element height.
 */
export function shadeRoundedRect(
  element: ElementRecord,
  brush: Brush,
  texColor: Float4,
  localPosition: Float2,
): Float4 {
  const fg = vec4.multiply(brush.fg, texColor);
  const bg = vec4.multiply(brush.bg, texColor);

  const res = element.size[1];
  const border = brush.border[0];
  const borderFix = border / res;
  const borderColor: Float3 =
    border > 0 ? [fg[0], fg[1], fg[2]] : [bg[0], bg[1], bg[2]];
  // radii are declared at the outer edge; the ring hugs them after this shrink
  const radius: Float4 = [
    (brush.radius[0] - border) / res,
    (brush.radius[1] - border) / res,
    (brush.radius[2] - border) / res,
    (brush.radius[3] - border) / res,
  ];
  const smoothness = (REFERENCE_HEIGHT / res) * REFERENCE_SMOOTHNESS;

  const offset: Float2 = [
    (localPosition[0] - element.size[0] / 2) / res,
    (localPosition[1] - element.size[1] / 2) / res,
  ];
  const halfExtent: Float2 = [
    element.size[0] / 2 / res - borderFix,
    0.5 - borderFix,
  ];
  const d = roundedBoxSdf(offset, halfExtent, radius);

  const base: Float3 = d > 0 ? [1, 1, 1] : [bg[0], bg[1], bg[2]];
  const borderCoverage =
    1 -
    smoothstep(borderFix - smoothness, borderFix + smoothness, Math.abs(d));

  return [
    mix(base[0], borderColor[0], borderCoverage),
    mix(base[1], borderColor[1], borderCoverage),
    mix(base[2], borderColor[2], borderCoverage),
    d > 0 ? borderCoverage : 1,
  ];
}
