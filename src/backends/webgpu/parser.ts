import { type StructInfo, WgslReflect } from "wgsl_reflect";
import type { ShaderDescriptor } from "./ShaderDescriptor";

export function codeWithLineNumbers(code: string) {
  return code
    .split("\n")
    .map((line, index) => `${index + 1}: ${line}`)
    .join("\n");
}

/**
 * Byte layout of a WGSL struct as it sits in a storage or uniform buffer.
 */
export type StructLayout = {
  name: string;
  /** stride between array elements */
  size: number;
  /** byte offset of each member */
  offsets: Record<string, number>;
};

/**
 * Reflects a WGSL module into a descriptor, picking the single vertex and fragment entry points.
 */
export function describeShader(label: string, code: string): ShaderDescriptor {
  let ast: WgslReflect;
  try {
    ast = new WgslReflect(code);
  } catch (e) {
    console.error(codeWithLineNumbers(code));
    throw e;
  }

  const vertexEntrypoint = ast.entry.vertex[0]?.name;
  const fragmentEntrypoint = ast.entry.fragment[0]?.name;
  if (!vertexEntrypoint || !fragmentEntrypoint) {
    throw new Error(
      `Shader "${label}" must have a @vertex and a @fragment entry point`,
    );
  }

  return { label, code, vertexEntrypoint, fragmentEntrypoint };
}

export function findStruct(code: string, name: string): StructInfo {
  const ast = new WgslReflect(code);
  const struct = ast.structs.find((s) => s.name === name);
  if (!struct) {
    throw new Error(`No struct named "${name}" found in shader code`);
  }
  return struct;
}

export function struct2Layout(struct: StructInfo): StructLayout {
  const offsets: Record<string, number> = {};
  for (const member of struct.members) {
    offsets[member.name] = member.offset;
  }
  return { name: struct.name, size: struct.size, offsets };
}

/**
 * Looks up a member offset, failing loudly when the shader and the packer disagree on names.
 */
export function memberOffset(layout: StructLayout, member: string): number {
  const offset = layout.offsets[member];
  if (offset === undefined) {
    throw new Error(`Struct ${layout.name} has no member "${member}"`);
  }
  return offset;
}
