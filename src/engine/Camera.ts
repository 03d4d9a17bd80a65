import { mat4, vec3 } from "gl-matrix";

export interface Perspective {
  /** Vertical field of view, radians. */
  fovY: number;
  aspect: number;
  near: number;
  far: number;
}

/**
 * Produces the Global block's mvp (view-projection). The projection targets
 * WebGPU's [0, 1] depth range and is rebuilt only after setProjection().
 */
export class Camera {
  eye: vec3 = vec3.fromValues(0, 0, 5);
  target: vec3 = vec3.fromValues(0, 0, 0);
  up: vec3 = vec3.fromValues(0, 1, 0);

  private _projection: Perspective;
  private _projectionMatrix: mat4 | null = null;

  constructor(projection: Perspective) {
    this._projection = { ...projection };
  }

  get projection(): Readonly<Perspective> {
    return this._projection;
  }

  setProjection(changes: Partial<Perspective>): void {
    this._projection = { ...this._projection, ...changes };
    this._projectionMatrix = null;
  }

  projectionMatrix(): mat4 {
    if (!this._projectionMatrix) {
      const { fovY, aspect, near, far } = this._projection;
      this._projectionMatrix = mat4.perspectiveZO(mat4.create(), fovY, aspect, near, far);
    }
    return this._projectionMatrix;
  }

  viewMatrix(out: mat4): mat4 {
    return mat4.lookAt(out, this.eye, this.target, this.up);
  }

  viewProjection(out: mat4): mat4 {
    const view = this.viewMatrix(mat4.create());
    return mat4.multiply(out, this.projectionMatrix(), view);
  }
}
