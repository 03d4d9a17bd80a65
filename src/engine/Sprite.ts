// Sprite — an animation inside an atlas. Frames sit side by side in one row,
// starting at uvTopLeft, each uvSize wide.

import { vec4, type ReadonlyVec2 } from "gl-matrix";
import type { TextureHandle } from "./Renderer";
import type { UvWindow } from "./Uniforms";

export class Sprite {
  constructor(
    readonly texture: TextureHandle,
    readonly uvTopLeft: ReadonlyVec2,
    readonly uvSize: ReadonlyVec2,
    readonly frames: number,
  ) {
    if (!Number.isInteger(frames) || frames < 1) {
      throw new Error(`Sprite: frame count must be a positive integer, got ${frames}`);
    }
  }

  /** Window for a frame; frame numbers wrap around the animation. */
  uvWindow(frame: number): UvWindow {
    const index = ((frame % this.frames) + this.frames) % this.frames;
    const left = this.uvTopLeft[0] + this.uvSize[0] * index;
    return vec4.fromValues(left, this.uvTopLeft[1], this.uvSize[0], this.uvSize[1]);
  }
}
