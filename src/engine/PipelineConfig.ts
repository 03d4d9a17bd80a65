// PipelineConfig — the variant space. Every combination the renderer can draw
// with is one PipelineVariant and gets its own compiled pipeline; nothing here
// turns into a per-pixel branch.

import { DEBUG_UV_BLUE, UV_INSET } from "./Constants";

/**
 * How vertex UVs map into the texture:
 *   none:  passed through unchanged
 *   plain: scaled into the atlas window
 *   inset: scaled into the window shrunk by a margin on every edge
 */
export type Windowing = "none" | "plain" | "inset";

export interface PipelineVariant {
  readonly windowing: Windowing;
  /** Samples the bound texture; otherwise the debug UV color is written. */
  readonly textured: boolean;
  /** Discards fragments whose sampled alpha is effectively zero. */
  readonly discard: boolean;
}

export const VARIANTS = {
  /** Untextured, colors each pixel by its UV. */
  debug: { windowing: "none", textured: false, discard: false },
  /** Whole texture, no cutout; transparency is left to blending. */
  textured: { windowing: "none", textured: true, discard: false },
  /** One atlas tile with alpha cutout. */
  atlas: { windowing: "plain", textured: true, discard: true },
  /** One atlas tile, inset against bleeding from its neighbours, with alpha cutout. */
  atlasInset: { windowing: "inset", textured: true, discard: true },
} as const satisfies Record<string, PipelineVariant>;

export interface ShadingConstants {
  /** Margin for the inset variant, in UV units. */
  uvInset: number;
  /** Blue channel of the debug color. */
  debugBlue: number;
}

export const DEFAULT_SHADING_CONSTANTS: ShadingConstants = {
  uvInset: UV_INSET,
  debugBlue: DEBUG_UV_BLUE,
};

export function validateVariant(variant: PipelineVariant): void {
  if (variant.discard && !variant.textured) {
    throw new Error(`Pipeline variant ${variantKey(variant)}: alpha cutout needs a texture`);
  }
}

export function validateShadingConstants(constants: ShadingConstants): void {
  const { uvInset, debugBlue } = constants;
  if (!Number.isFinite(uvInset) || uvInset < 0 || uvInset >= 0.5) {
    throw new Error(`uvInset must be in [0, 0.5), got ${uvInset}`);
  }
  if (!Number.isFinite(debugBlue)) {
    throw new Error(`debugBlue must be finite, got ${debugBlue}`);
  }
}

/** Stable cache key, e.g. "plain/textured/discard". */
export function variantKey(variant: PipelineVariant): string {
  return [
    variant.windowing,
    variant.textured ? "textured" : "debug",
    variant.discard ? "discard" : "keep",
  ].join("/");
}

export function isWindowed(variant: PipelineVariant): boolean {
  return variant.windowing !== "none";
}
