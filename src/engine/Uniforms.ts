// Uniforms — the Global and Local uniform blocks: their byte layouts, the
// validation run once when a pipeline is built, and the packers that turn
// gl-matrix values into the exact bytes written to the GPU.

import type { ReadonlyMat4, ReadonlyVec4 } from "gl-matrix";
import { FULL_UV_WINDOW } from "./Constants";

/** Atlas sub-rectangle (x, y, w, h), normalized to [0, 1]. */
export type UvWindow = ReadonlyVec4;

export interface GlobalUniforms {
  /** Combined view-projection, column-major. */
  mvp: ReadonlyMat4;
}

export interface LocalUniforms {
  /** Object (model) transform, applied before the global one. */
  transform: ReadonlyMat4;
  /** Ignored by variants without windowing. Defaults to the full texture. */
  uvWindow?: UvWindow;
}

export type UniformType = "mat4x4<f32>" | "vec4<f32>";

export interface UniformField {
  name: string;
  type: UniformType;
  offset: number;
  size: number;
  align: number;
}

export interface UniformBlockLayout {
  /** WGSL struct name. */
  name: string;
  fields: readonly UniformField[];
  size: number;
}

const MAT4: Pick<UniformField, "type" | "size" | "align"> = { type: "mat4x4<f32>", size: 64, align: 16 };
const VEC4: Pick<UniformField, "type" | "size" | "align"> = { type: "vec4<f32>", size: 16, align: 16 };

export const GLOBAL_BLOCK: UniformBlockLayout = {
  name: "Globals",
  fields: [{ name: "mvp", offset: 0, ...MAT4 }],
  size: 64,
};

export const LOCAL_BLOCK: UniformBlockLayout = {
  name: "Locals",
  fields: [{ name: "transform", offset: 0, ...MAT4 }],
  size: 64,
};

export const WINDOWED_LOCAL_BLOCK: UniformBlockLayout = {
  name: "Locals",
  fields: [
    { name: "transform", offset: 0, ...MAT4 },
    { name: "uv_window", offset: 64, ...VEC4 },
  ],
  size: 80,
};

export function localBlockLayout(windowed: boolean): UniformBlockLayout {
  return windowed ? WINDOWED_LOCAL_BLOCK : LOCAL_BLOCK;
}

/**
 * Checks a block against WGSL uniform address-space rules: every field on its
 * alignment, no overlap, and a total size that is a multiple of 16 covering
 * every field.
 */
export function validateBlockLayout(layout: UniformBlockLayout): void {
  let end = 0;
  for (const field of layout.fields) {
    if (field.offset % field.align !== 0) {
      throw new Error(`${layout.name}.${field.name}: offset ${field.offset} is not ${field.align}-byte aligned`);
    }
    if (field.offset < end) {
      throw new Error(`${layout.name}.${field.name}: overlaps the previous field (offset ${field.offset} < ${end})`);
    }
    end = field.offset + field.size;
  }
  if (layout.size % 16 !== 0) {
    throw new Error(`${layout.name}: size ${layout.size} is not a multiple of 16`);
  }
  if (layout.size < end) {
    throw new Error(`${layout.name}: size ${layout.size} does not cover its fields (${end} bytes)`);
  }
}

/**
 * Rejects windows with a negative or non-finite component. A zero width or
 * height is allowed: every UV then samples the window's origin.
 */
export function validateUvWindow(window: UvWindow): void {
  for (let i = 0; i < 4; i++) {
    if (!Number.isFinite(window[i])) {
      throw new Error(`UV window component ${i} is not finite: ${window[i]}`);
    }
  }
  if (window[2] < 0 || window[3] < 0) {
    throw new Error(`UV window size must be non-negative, got (${window[2]}, ${window[3]})`);
  }
}

export function packGlobalUniforms(globals: GlobalUniforms) {
  const data = new Float32Array(GLOBAL_BLOCK.size / 4);
  data.set(globals.mvp, 0);
  return data;
}

export function packLocalUniforms(locals: LocalUniforms, layout: UniformBlockLayout) {
  const data = new Float32Array(layout.size / 4);
  for (const field of layout.fields) {
    const value = field.name === "uv_window" ? locals.uvWindow ?? FULL_UV_WINDOW : locals.transform;
    data.set(value, field.offset / 4);
  }
  return data;
}
