// DefaultMeshes — unit quad and cube, centred on the origin, CCW front faces.
// UVs run from (0, 0) at the top left to (1, 1) at the bottom right, so a
// material's uvWindow maps straight onto an atlas tile.

import { vec3, type ReadonlyVec2, type ReadonlyVec3 } from "gl-matrix";
import type { Vertex } from "./Vertex";

export interface MeshData {
  vertices: Vertex[];
  indices: number[];
}

/** 1×1 square in the XY plane, facing +Z. */
export const QUAD: MeshData = {
  vertices: [
    { position: [-0.5, -0.5, 0], normal: [0, 0, 1], uv: [0, 1] },
    { position: [0.5, -0.5, 0], normal: [0, 0, 1], uv: [1, 1] },
    { position: [-0.5, 0.5, 0], normal: [0, 0, 1], uv: [0, 0] },
    { position: [0.5, 0.5, 0], normal: [0, 0, 1], uv: [1, 0] },
  ],
  indices: [0, 1, 3, 0, 3, 2],
};

// Shared corners, so normals point out of each corner rather than each face.
function corner(position: ReadonlyVec3, uv: ReadonlyVec2): Vertex {
  return { position, normal: vec3.normalize(vec3.create(), position), uv };
}

/** 1×1×1 cube. The back face is mirrored so its texture reads the right way from behind. */
export const CUBE: MeshData = {
  vertices: [
    corner([-0.5, -0.5, 0.5], [0, 1]), // 0 front bottom left
    corner([0.5, -0.5, 0.5], [1, 1]), // 1 front bottom right
    corner([-0.5, 0.5, 0.5], [0, 0]), // 2 front top left
    corner([0.5, 0.5, 0.5], [1, 0]), // 3 front top right
    corner([-0.5, -0.5, -0.5], [1, 1]), // 4 back bottom left
    corner([0.5, -0.5, -0.5], [0, 1]), // 5 back bottom right
    corner([-0.5, 0.5, -0.5], [1, 0]), // 6 back top left
    corner([0.5, 0.5, -0.5], [0, 0]), // 7 back top right
  ],
  indices: [
    0, 1, 3, 0, 3, 2, // front
    7, 5, 4, 6, 7, 4, // back
    2, 3, 7, 2, 7, 6, // top
    4, 5, 1, 4, 1, 0, // bottom
    4, 0, 2, 4, 2, 6, // left
    1, 5, 7, 1, 7, 3, // right
  ],
};
