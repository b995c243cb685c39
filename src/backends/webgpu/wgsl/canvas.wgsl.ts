export default /*wgsl*/ `
struct Element {
  position: vec2f,
  // reserved
  image: vec2f,
  // texture region origin and extent, normalized
  src: vec2f,
  uv: vec2f,
  // quad extent in pixels
  size: vec2f,
  // reserved
  reserved: vec2f,
  // kind, texture index, brush index, reserved
  attrs: vec4u,
}

struct Brush {
  fg: vec4f,
  bg: vec4f,
  // picked per quadrant, see rounded_box_sdf
  radius: vec4f,
  // x is the border width in pixels
  border: vec4f,
}

struct Transform {
  model: mat4x4f,
  view: mat4x4f,
  proj: mat4x4f,
}

struct VertexOutput {
  @builtin(position) clip_position: vec4f,
  @location(0) color: vec4f,
  @location(1) tex_coord: vec2f,
  @location(2) @interpolate(flat) texture_index: u32,
  @location(3) @interpolate(flat) instance_index: u32,
  @location(4) @interpolate(flat) quad_corner: u32,
  // pixel position inside the quad, before the camera
  @location(5) local_position: vec2f,
}

const ELEMENT_KIND_ROUNDED_RECT = 1u;

// two triangles sharing the (0,0)-(1,1) diagonal
const quad_corners = array(vec2f(0, 0), vec2f(1, 0), vec2f(1, 1), vec2f(1, 1), vec2f(0, 1), vec2f(0, 0));
const quad_corner_ids = array(0u, 1u, 2u, 2u, 3u, 0u);

@group(0) @binding(4) var<storage, read> elements: array<Element>;
@group(1) @binding(0) var textures: texture_2d_array<f32>;
@group(1) @binding(1) var texture_sampler: sampler;
// part of each layer its texture covers, as a fraction of the layer
@group(1) @binding(2) var<storage, read> texture_extents: array<vec2f>;
@group(2) @binding(0) var<uniform> transform: Transform;
@group(3) @binding(4) var<storage, read> brushes: array<Brush>;

@vertex
fn vs_main(
  @builtin(instance_index) instance_index: u32,
  @builtin(vertex_index) vertex_index: u32,
) -> VertexOutput {
  let element = elements[instance_index];
  let corner = quad_corners[vertex_index];
  let camera = transform.proj * transform.view * transform.model;
  let local_position = corner * element.size;

  var output: VertexOutput;
  output.clip_position = camera * vec4f(local_position + element.position, 0.0, 1.0);
  output.color = vec4f(1.0, 1.0, 1.0, 1.0);
  output.tex_coord = element.src + corner * element.uv;
  output.texture_index = element.attrs[1];
  output.instance_index = instance_index;
  output.quad_corner = quad_corner_ids[vertex_index];
  output.local_position = local_position;
  return output;
}

// x > 0 takes radius.xy, then y > 0 takes the first of the pair
fn rounded_box_sdf(p: vec2f, half_extent: vec2f, radius: vec4f) -> f32 {
  var r = select(radius.zw, radius.xy, p.x > 0.0);
  r.x = select(r.y, r.x, p.y > 0.0);
  let q = abs(p) - half_extent + r.x;
  return min(max(q.x, q.y), 0.0) + length(max(q, vec2f(0.0))) - r.x;
}

fn shade_image(tex_color: vec4f) -> vec4f {
  return tex_color;
}

fn shade_rounded_rect(element: Element, brush: Brush, tex_color: vec4f, local_position: vec2f) -> vec4f {
  let fg = brush.fg * tex_color;
  let bg = brush.bg * tex_color;

  // shape math is in units of element height
  let res = element.size.y;
  let border = brush.border.x;
  let border_fix = border / res;
  let border_color = select(bg.rgb, fg.rgb, border > 0.0);
  let radius = brush.radius - vec4f(border);
  let smoothness = (100.0 / res) * 0.001;

  let offset = (local_position - element.size / 2.0) / res;
  let half_extent = vec2f(element.size.x / 2.0 / res, 0.5) - border_fix;
  let d = rounded_box_sdf(offset, half_extent, radius / res);

  let base = select(bg.rgb, vec3f(1.0), d > 0.0);
  let border_coverage = 1.0 - smoothstep(border_fix - smoothness, border_fix + smoothness, abs(d));
  let rgb = mix(base, border_color, border_coverage);
  let alpha = select(1.0, border_coverage, d > 0.0);
  return vec4f(rgb, alpha);
}

@fragment
fn fs_main(input: VertexOutput) -> @location(0) vec4f {
  let element = elements[input.instance_index];
  // bilinear taps stay on the texture's own texels, never on the rest of the layer
  let half_texel = 0.5 / vec2f(textureDimensions(textures));
  let extent = texture_extents[input.texture_index];
  let tex_coord = clamp(input.tex_coord, half_texel, max(extent - half_texel, half_texel));
  // sampled before branching: textureSample needs uniform control flow
  let tex_color = textureSample(textures, texture_sampler, tex_coord, input.texture_index) * input.color;

  if (element.attrs[0] == ELEMENT_KIND_ROUNDED_RECT) {
    return shade_rounded_rect(element, brushes[element.attrs[2]], tex_color, input.local_position);
  }
  return shade_image(tex_color);
}
`;
