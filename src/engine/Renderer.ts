// Renderer — the types a host programs against: handles for uploaded
// resources, the per-draw and per-frame inputs, and renderer-wide options.

import type { ReadonlyMat4 } from "gl-matrix";
import { DEFAULT_SHADING_CONSTANTS, validateShadingConstants, type ShadingConstants } from "./PipelineConfig";
import type { SamplerOptions } from "./Texture";
import type { UvWindow } from "./Uniforms";

export interface MeshHandle {
  readonly indexCount: number;
}

export interface TextureHandle {
  readonly width: number;
  readonly height: number;
}

export interface TextureDesc {
  width: number;
  height: number;
  /** RGBA8, row-major from the top. */
  data: Uint8Array;
  /** Edge handling and filtering; out-of-range UVs are resolved here. */
  sampler?: SamplerOptions;
}

export interface Material {
  /** Without a texture the draw uses the debug variant. */
  texture?: TextureHandle;
  /** Atlas tile to sample; omitted means the whole texture, unwindowed. */
  uvWindow?: UvWindow;
  /** Pull the window in by the configured inset to avoid tile bleeding. */
  inset?: boolean;
  /** Discard effectively transparent texels. Default: true. */
  alphaCutout?: boolean;
}

export interface DrawCall {
  mesh: MeshHandle;
  /** Local (model) transform. */
  transform: ReadonlyMat4;
  material: Material;
}

export interface FrameUniforms {
  /** Camera view-projection, shared by every draw in the frame. */
  mvp: ReadonlyMat4;
}

export interface RenderTarget {
  color: GPUTextureView;
  depth: GPUTextureView;
}

export type Logger = Pick<Console, "log" | "warn">;

export interface RenderOptions {
  colorFormat: GPUTextureFormat;
  depthFormat: GPUTextureFormat;
  depthCompare: GPUCompareFunction;
  /** Color target blending; null writes fragments as-is. */
  blend: GPUBlendState | null;
  cullMode: GPUCullMode;
  clearColor: GPUColorDict;
  constants: ShadingConstants;
}

const PREMULTIPLIED_ALPHA: GPUBlendState = {
  color: { srcFactor: "one", dstFactor: "one-minus-src-alpha", operation: "add" },
  alpha: { srcFactor: "one", dstFactor: "one-minus-src-alpha", operation: "add" },
};

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  colorFormat: "bgra8unorm",
  depthFormat: "depth32float",
  depthCompare: "less-equal",
  blend: PREMULTIPLIED_ALPHA,
  cullMode: "none",
  clearColor: { r: 0.1, g: 0.2, b: 0.3, a: 1.0 },
  constants: DEFAULT_SHADING_CONSTANTS,
};

export type RenderOptionsInput = Partial<Omit<RenderOptions, "constants">> & {
  constants?: Partial<ShadingConstants>;
};

export function resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
  const options: RenderOptions = {
    ...DEFAULT_RENDER_OPTIONS,
    ...input,
    constants: { ...DEFAULT_RENDER_OPTIONS.constants, ...input.constants },
  };
  validateShadingConstants(options.constants);
  return options;
}
