import type { Float2, Float4 } from "../../coreTypes/Vec";
import type { TextureSampler } from "../../shading/shapeCompositor";
import { clamp, mix } from "../../shading/sdf";
import type { CpuTexture } from "../../textures/types";
import type { TextureFilter } from "../IRenderBackend";

/** what an unwritten texture array layer reads as */
const EMPTY: Float4 = [0, 0, 0, 0];

/**
 * Clamp-to-edge sampler over CPU textures, the software twin of the samplers in
 * webgpu/samplers.ts.
 */
export function createTextureSampler(
  lookup: (textureIndex: number) => CpuTexture | undefined,
  filter: TextureFilter = "nearest",
): TextureSampler {
  return (textureIndex, texCoord) => {
    const texture = lookup(textureIndex);
    if (!texture) {
      return [...EMPTY];
    }
    return filter === "linear"
      ? sampleLinear(texture, texCoord)
      : sampleNearest(texture, texCoord);
  };
}

export function sampleNearest(texture: CpuTexture, texCoord: Float2): Float4 {
  const x = clamp(Math.floor(texCoord[0] * texture.width), 0, texture.width - 1);
  const y = clamp(
    Math.floor(texCoord[1] * texture.height),
    0,
    texture.height - 1,
  );
  return texel(texture, x, y);
}

export function sampleLinear(texture: CpuTexture, texCoord: Float2): Float4 {
  // texel centers sit at half-integer coordinates
  const u = texCoord[0] * texture.width - 0.5;
  const v = texCoord[1] * texture.height - 0.5;
  const x0 = Math.floor(u);
  const y0 = Math.floor(v);
  const fx = u - x0;
  const fy = v - y0;

  const clampX = (x: number) => clamp(x, 0, texture.width - 1);
  const clampY = (y: number) => clamp(y, 0, texture.height - 1);
  const t00 = texel(texture, clampX(x0), clampY(y0));
  const t10 = texel(texture, clampX(x0 + 1), clampY(y0));
  const t01 = texel(texture, clampX(x0), clampY(y0 + 1));
  const t11 = texel(texture, clampX(x0 + 1), clampY(y0 + 1));

  const out: Float4 = [0, 0, 0, 0];
  for (let c = 0; c < 4; c++) {
    out[c] = mix(mix(t00[c], t10[c], fx), mix(t01[c], t11[c], fx), fy);
  }
  return out;
}

function texel(texture: CpuTexture, x: number, y: number): Float4 {
  const i = (y * texture.width + x) * 4;
  const data = texture.data;
  return [data[i] / 255, data[i + 1] / 255, data[i + 2] / 255, data[i + 3] / 255];
}
