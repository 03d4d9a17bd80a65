// FragmentStage — reference implementation of fs_main.

import { vec4, type ReadonlyVec2 } from "gl-matrix";
import { DISCARD_ALPHA_THRESHOLD } from "./Constants";
import { DEFAULT_SHADING_CONSTANTS, validateVariant, variantKey, type PipelineVariant, type ShadingConstants } from "./PipelineConfig";
import type { SamplerOptions, Texture } from "./Texture";

/** A discarded fragment writes neither color nor depth. */
export type FragmentResult =
  | { kind: "color"; color: vec4 }
  | { kind: "discard" };

export type FragmentStage = (uv: ReadonlyVec2) => FragmentResult;

export interface TextureBinding {
  texture: Texture;
  sampler?: SamplerOptions;
}

export function isEffectivelyTransparent(alpha: number): boolean {
  return alpha < DISCARD_ALPHA_THRESHOLD;
}

export function createFragmentStage(
  variant: PipelineVariant,
  binding?: TextureBinding,
  constants: ShadingConstants = DEFAULT_SHADING_CONSTANTS,
): FragmentStage {
  validateVariant(variant);

  if (!variant.textured) {
    const blue = constants.debugBlue;
    return (uv) => ({ kind: "color", color: vec4.fromValues(uv[0], uv[1], blue, 1.0) });
  }

  if (!binding) {
    throw new Error(`createFragmentStage: variant ${variantKey(variant)} needs a texture binding`);
  }
  const { texture, sampler } = binding;

  if (!variant.discard) {
    return (uv) => ({ kind: "color", color: texture.sample(vec4.create(), uv, sampler) });
  }

  return (uv) => {
    const color = texture.sample(vec4.create(), uv, sampler);
    return isEffectivelyTransparent(color[3]) ? { kind: "discard" } : { kind: "color", color };
  };
}
