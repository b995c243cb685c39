/** Two floats, laid out like a WGSL `vec2f`. */
export type Float2 = [number, number];

/** Three floats, laid out like a WGSL `vec3f`. */
export type Float3 = [number, number, number];

/** Four floats, laid out like a WGSL `vec4f`. */
export type Float4 = [number, number, number, number];

/** Four unsigned integers, laid out like a WGSL `vec4u`. */
export type Uint4 = [number, number, number, number];
