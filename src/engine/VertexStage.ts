// VertexStage — reference implementation of vs_main. Mirrors the generated
// WGSL operation for operation: local transform, then global, then the UV
// remap chosen by the variant.

import { vec2, vec4, type ReadonlyVec2 } from "gl-matrix";
import { FULL_UV_WINDOW } from "./Constants";
import { DEFAULT_SHADING_CONSTANTS, validateVariant, type PipelineVariant, type ShadingConstants, type Windowing } from "./PipelineConfig";
import type { GlobalUniforms, LocalUniforms, UvWindow } from "./Uniforms";
import type { Vertex } from "./Vertex";

export interface VertexOutput {
  clipPosition: vec4;
  uv: vec2;
}

export type VertexStage = (vertex: Vertex, globals: GlobalUniforms, locals: LocalUniforms) => VertexOutput;

/**
 * Maps a unit-square UV into the texture.
 *
 * A window with zero width or height collapses every UV onto one edge of the
 * window; that is the intended result, not an error.
 */
export function remapUv(out: vec2, uv: ReadonlyVec2, windowing: Windowing, window: UvWindow, inset: number): vec2 {
  switch (windowing) {
    case "none":
      return vec2.copy(out, uv);
    case "plain":
      return vec2.set(out, window[0] + window[2] * uv[0], window[1] + window[3] * uv[1]);
    case "inset":
      return vec2.set(
        out,
        window[0] + inset + (window[2] - 2 * inset) * uv[0],
        window[1] + inset + (window[3] - 2 * inset) * uv[1],
      );
  }
}

export function createVertexStage(
  variant: PipelineVariant,
  constants: ShadingConstants = DEFAULT_SHADING_CONSTANTS,
): VertexStage {
  validateVariant(variant);
  const { windowing } = variant;
  const inset = constants.uvInset;

  return (vertex, globals, locals) => {
    const world = vec4.fromValues(vertex.position[0], vertex.position[1], vertex.position[2], 1.0);
    vec4.transformMat4(world, world, locals.transform);
    const clipPosition = vec4.transformMat4(vec4.create(), world, globals.mvp);
    const uv = remapUv(vec2.create(), vertex.uv, windowing, locals.uvWindow ?? FULL_UV_WINDOW, inset);
    return { clipPosition, uv };
  };
}
