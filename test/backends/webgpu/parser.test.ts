import { describe, expect, it } from "vitest";
import { WgslReflect } from "wgsl_reflect";
import {
  codeWithLineNumbers,
  describeShader,
  findStruct,
  memberOffset,
  struct2Layout,
} from "../../../src/backends/webgpu/parser";
import canvasWgsl from "../../../src/backends/webgpu/wgsl/canvas.wgsl";
import {
  defaultBlendState,
  getGpuPipelineDescriptor,
} from "../../../src/utils/boilerplate";

describe("describeShader", () => {
  it("finds the canvas entry points", () => {
    const descriptor = describeShader("canvas", canvasWgsl);
    expect(descriptor.label).toBe("canvas");
    expect(descriptor.vertexEntrypoint).toBe("vs_main");
    expect(descriptor.fragmentEntrypoint).toBe("fs_main");
    expect(descriptor.code).toBe(canvasWgsl);
  });

  it("requires both stages", () => {
    const vertexOnly = `
@vertex
fn vs_main() -> @builtin(position) vec4f {
  return vec4f(0.0);
}
`;
    expect(() => describeShader("half", vertexOnly)).toThrow(
      'Shader "half" must have a @vertex and a @fragment entry point',
    );
  });
});

describe("canvas bindings", () => {
  it("reads texture extents beside the texture array", () => {
    const reflect = new WgslReflect(canvasWgsl);
    const extents = reflect.storage.find((v) => v.name === "texture_extents");
    expect(extents?.group).toBe(1);
    expect(extents?.binding).toBe(2);
  });
});

describe("struct layouts", () => {
  it("matches the element record", () => {
    const layout = struct2Layout(findStruct(canvasWgsl, "Element"));
    expect(layout.size).toBe(64);
    expect(layout.offsets).toEqual({
      position: 0,
      image: 8,
      src: 16,
      uv: 24,
      size: 32,
      reserved: 40,
      attrs: 48,
    });
  });

  it("matches the brush", () => {
    const layout = struct2Layout(findStruct(canvasWgsl, "Brush"));
    expect(layout.size).toBe(64);
    expect(layout.offsets).toEqual({ fg: 0, bg: 16, radius: 32, border: 48 });
  });

  it("fails on unknown structs and members", () => {
    expect(() => findStruct(canvasWgsl, "Sprite")).toThrow(
      'No struct named "Sprite" found in shader code',
    );
    const layout = struct2Layout(findStruct(canvasWgsl, "Brush"));
    expect(() => memberOffset(layout, "shadow")).toThrow(
      'Struct Brush has no member "shadow"',
    );
  });
});

describe("codeWithLineNumbers", () => {
  it("prefixes each line", () => {
    expect(codeWithLineNumbers("a\nb")).toBe("1: a\n2: b");
  });
});

describe("getGpuPipelineDescriptor", () => {
  it("targets the presentation format with the given blend", () => {
    const descriptor = describeShader("canvas", canvasWgsl);
    const module = { label: "canvas" } as unknown as GPUShaderModule;
    const blend = defaultBlendState();
    const pipeline = getGpuPipelineDescriptor(
      descriptor,
      module,
      "bgra8unorm",
      blend,
    );

    expect(pipeline.vertex.entryPoint).toBe("vs_main");
    expect(pipeline.fragment?.entryPoint).toBe("fs_main");
    expect(pipeline.fragment?.targets).toEqual([
      { format: "bgra8unorm", blend },
    ]);
    expect(pipeline.primitive?.topology).toBe("triangle-list");
  });

  it("blends straight alpha over the target", () => {
    expect(defaultBlendState()).toEqual({
      color: {
        srcFactor: "src-alpha",
        dstFactor: "one-minus-src-alpha",
        operation: "add",
      },
      alpha: {
        srcFactor: "one",
        dstFactor: "one-minus-src-alpha",
        operation: "add",
      },
    });
  });
});

