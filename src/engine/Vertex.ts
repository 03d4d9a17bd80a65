// Vertex — the per-vertex input and its interleaved GPU layout.
// Attributes are described once; stride and offsets are computed from the
// sizes so the packer and the pipeline's vertex buffer layout cannot drift.

import type { ReadonlyVec2, ReadonlyVec3 } from "gl-matrix";

export interface Vertex {
  position: ReadonlyVec3;
  /** Carried through to the GPU; no stage here reads it. */
  normal: ReadonlyVec3;
  uv: ReadonlyVec2;
}

export interface VertexAttribute {
  location: number; // shader @location(N)
  size: number;     // number of f32 components
}

export const VERTEX_ATTRIBUTES: readonly VertexAttribute[] = [
  { location: 0, size: 3 }, // position
  { location: 1, size: 3 }, // normal
  { location: 2, size: 2 }, // uv
];

export const FLOATS_PER_VERTEX = VERTEX_ATTRIBUTES.reduce((sum, a) => sum + a.size, 0);

const FORMATS: Record<number, GPUVertexFormat> = {
  1: "float32",
  2: "float32x2",
  3: "float32x3",
  4: "float32x4",
};

function bufferLayout(attributes: readonly VertexAttribute[]): GPUVertexBufferLayout {
  let offset = 0;
  const gpuAttributes: GPUVertexAttribute[] = [];
  for (const attr of attributes) {
    gpuAttributes.push({ shaderLocation: attr.location, offset, format: FORMATS[attr.size] });
    offset += attr.size * Float32Array.BYTES_PER_ELEMENT;
  }
  return { arrayStride: offset, stepMode: "vertex", attributes: gpuAttributes };
}

export const VERTEX_BUFFER_LAYOUT = bufferLayout(VERTEX_ATTRIBUTES);

/** Interleaves vertices as position, normal, uv. */
export function packVertices(vertices: readonly Vertex[]) {
  const data = new Float32Array(vertices.length * FLOATS_PER_VERTEX);
  vertices.forEach((v, i) => {
    const base = i * FLOATS_PER_VERTEX;
    data.set(v.position, base);
    data.set(v.normal, base + 3);
    data.set(v.uv, base + 6);
  });
  return data;
}
