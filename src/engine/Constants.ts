// Constants — fixed numbers shared by the WGSL generator and the reference stages.

import { vec4 } from "gl-matrix";

/** Sampled alpha below this discards the fragment in cutout variants. */
export const DISCARD_ALPHA_THRESHOLD = 0.001;

/** Default margin pulled in from every edge of an atlas window by the inset variant. */
export const UV_INSET = 0.01;

/** Blue channel written by the debug variant (red/green carry the UV). */
export const DEBUG_UV_BLUE = 0.5;

/** Window covering the whole texture: (x, y, w, h). */
export const FULL_UV_WINDOW = vec4.fromValues(0, 0, 1, 1);

// WebGPU's numeric flags. Browsers expose them as globals; Node does not,
// so fall back to the standard WebGPU values.
export const BufferUsage = {
  COPY_DST: typeof GPUBufferUsage !== "undefined" ? GPUBufferUsage.COPY_DST : 0x0008,
  INDEX: typeof GPUBufferUsage !== "undefined" ? GPUBufferUsage.INDEX : 0x0010,
  VERTEX: typeof GPUBufferUsage !== "undefined" ? GPUBufferUsage.VERTEX : 0x0020,
  UNIFORM: typeof GPUBufferUsage !== "undefined" ? GPUBufferUsage.UNIFORM : 0x0040,
} as const;

export const ShaderStage = {
  VERTEX: typeof GPUShaderStage !== "undefined" ? GPUShaderStage.VERTEX : 0x1,
  FRAGMENT: typeof GPUShaderStage !== "undefined" ? GPUShaderStage.FRAGMENT : 0x2,
} as const;

export const TextureUsage = {
  COPY_DST: typeof GPUTextureUsage !== "undefined" ? GPUTextureUsage.COPY_DST : 0x02,
  TEXTURE_BINDING: typeof GPUTextureUsage !== "undefined" ? GPUTextureUsage.TEXTURE_BINDING : 0x04,
  RENDER_ATTACHMENT: typeof GPUTextureUsage !== "undefined" ? GPUTextureUsage.RENDER_ATTACHMENT : 0x10,
} as const;
