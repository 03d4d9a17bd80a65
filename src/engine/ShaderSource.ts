// ShaderSource — builds the WGSL module for one pipeline variant.
// Struct declarations and binding declarations come from the same layouts the
// host packs and binds with; only the UV remap and the fragment body differ
// between variants.

import { DISCARD_ALPHA_THRESHOLD } from "./Constants";
import { bindingLayoutFor, type BindingSlot } from "./Bindings";
import { DEFAULT_SHADING_CONSTANTS, validateVariant, type PipelineVariant, type ShadingConstants } from "./PipelineConfig";
import { GLOBAL_BLOCK, type UniformBlockLayout } from "./Uniforms";

export const VERTEX_ENTRY_POINT = "vs_main";
export const FRAGMENT_ENTRY_POINT = "fs_main";

/** WGSL float literal: integers keep a decimal point so they stay f32. */
export function wgslFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function structDeclaration(block: UniformBlockLayout): string {
  const fields = block.fields.map((f) => `  ${f.name}: ${f.type},`).join("\n");
  return `struct ${block.name} {\n${fields}\n}`;
}

function bindingDeclaration(group: number, { slot, name, resource }: BindingSlot): string {
  const prefix = `@group(${group}) @binding(${slot})`;
  switch (resource.kind) {
    case "uniform":
      return `${prefix} var<uniform> ${name}: ${resource.block.name};`;
    case "texture":
      return `${prefix} var ${name}: texture_2d<f32>;`;
    case "sampler":
      return `${prefix} var ${name}: sampler;`;
  }
}

function uvExpression(variant: PipelineVariant): string {
  switch (variant.windowing) {
    case "none":
      return "in.uv";
    case "plain":
      return "locals.uv_window.xy + locals.uv_window.zw * in.uv";
    case "inset":
      return "locals.uv_window.xy + vec2<f32>(UV_INSET) + (locals.uv_window.zw - vec2<f32>(2.0 * UV_INSET)) * in.uv";
  }
}

function fragmentBody(variant: PipelineVariant): string {
  if (!variant.textured) {
    return "  return vec4<f32>(in.uv.x, in.uv.y, DEBUG_UV_BLUE, 1.0);";
  }
  const sample = "  let color = textureSample(atlas_texture, atlas_sampler, in.uv);";
  if (!variant.discard) {
    return `${sample}\n  return color;`;
  }
  return [
    sample,
    "  if (color.a < DISCARD_ALPHA_THRESHOLD) {",
    "    discard;",
    "  }",
    "  return color;",
  ].join("\n");
}

export function buildShaderSource(
  variant: PipelineVariant,
  constants: ShadingConstants = DEFAULT_SHADING_CONSTANTS,
): string {
  validateVariant(variant);
  const layout = bindingLayoutFor(variant);

  const consts: string[] = [];
  if (variant.windowing === "inset") {
    consts.push(`const UV_INSET: f32 = ${wgslFloat(constants.uvInset)};`);
  }
  if (variant.discard) {
    consts.push(`const DISCARD_ALPHA_THRESHOLD: f32 = ${wgslFloat(DISCARD_ALPHA_THRESHOLD)};`);
  }
  if (!variant.textured) {
    consts.push(`const DEBUG_UV_BLUE: f32 = ${wgslFloat(constants.debugBlue)};`);
  }

  const bindings = layout.groups
    .flatMap(({ group, slots }) => slots.map((slot) => bindingDeclaration(group, slot)))
    .join("\n");

  return /* wgsl */ `${consts.join("\n")}

${structDeclaration(GLOBAL_BLOCK)}

${structDeclaration(layout.localBlock)}

${bindings}

struct VertexInput {
  @location(0) position: vec3<f32>,
  @location(1) normal: vec3<f32>,
  @location(2) uv: vec2<f32>,
}

struct VertexOutput {
  @builtin(position) clip_position: vec4<f32>,
  @location(0) uv: vec2<f32>,
}

@vertex
fn ${VERTEX_ENTRY_POINT}(in: VertexInput) -> VertexOutput {
  var out: VertexOutput;
  let world_position = locals.transform * vec4<f32>(in.position, 1.0);
  out.clip_position = globals.mvp * world_position;
  out.uv = ${uvExpression(variant)};
  return out;
}

@fragment
fn ${FRAGMENT_ENTRY_POINT}(in: VertexOutput) -> @location(0) vec4<f32> {
${fragmentBody(variant)}
}
`.trimStart();
}
