// Texture — a CPU-side RGBA image with WebGPU's sampling rules, used by the
// reference fragment stage. Filtering and edge handling take the same option
// names as GPUSamplerDescriptor so one object configures both paths.

import { vec4, type ReadonlyVec2 } from "gl-matrix";

export interface TextureOptions {
  width: number;
  height: number;
  /** RGBA, row-major from the top. Uint8Array is read as rgba8unorm. */
  data: Uint8Array | Float32Array;
}

export type SamplerOptions = Pick<GPUSamplerDescriptor, "addressModeU" | "addressModeV" | "magFilter">;

export const DEFAULT_SAMPLER: Required<SamplerOptions> = {
  addressModeU: "clamp-to-edge",
  addressModeV: "clamp-to-edge",
  magFilter: "nearest",
};

function applyAddressMode(i: number, n: number, mode: GPUAddressMode): number {
  if (mode === "repeat") {
    return ((i % n) + n) % n;
  }
  if (mode === "mirror-repeat") {
    const period = 2 * n;
    const m = ((i % period) + period) % period;
    return m < n ? m : period - 1 - m;
  }
  return Math.min(Math.max(i, 0), n - 1);
}

export function isValidTextureSize(width: number, height: number): boolean {
  return Number.isInteger(width) && Number.isInteger(height) && width >= 1 && height >= 1;
}

export class Texture {
  readonly width: number;
  readonly height: number;
  private readonly texels: Float32Array;

  constructor(options: TextureOptions) {
    const { width, height, data } = options;
    if (!isValidTextureSize(width, height)) {
      throw new Error(`Texture: invalid size ${width}x${height}`);
    }
    if (data.length !== width * height * 4) {
      throw new Error(`Texture: expected ${width * height * 4} RGBA components, got ${data.length}`);
    }
    this.width = width;
    this.height = height;
    this.texels = data instanceof Uint8Array
      ? Float32Array.from(data, (c) => c / 255)
      : Float32Array.from(data);
  }

  /** Reads one texel; coordinates must already be in range. */
  texel(out: vec4, x: number, y: number): vec4 {
    const i = (y * this.width + x) * 4;
    return vec4.set(out, this.texels[i], this.texels[i + 1], this.texels[i + 2], this.texels[i + 3]);
  }

  sample(out: vec4, uv: ReadonlyVec2, sampler: SamplerOptions = DEFAULT_SAMPLER): vec4 {
    const modeU = sampler.addressModeU ?? DEFAULT_SAMPLER.addressModeU;
    const modeV = sampler.addressModeV ?? DEFAULT_SAMPLER.addressModeV;

    if ((sampler.magFilter ?? DEFAULT_SAMPLER.magFilter) === "nearest") {
      const x = applyAddressMode(Math.floor(uv[0] * this.width), this.width, modeU);
      const y = applyAddressMode(Math.floor(uv[1] * this.height), this.height, modeV);
      return this.texel(out, x, y);
    }

    // Bilinear over texel centres.
    const fx = uv[0] * this.width - 0.5;
    const fy = uv[1] * this.height - 0.5;
    const x0 = Math.floor(fx);
    const y0 = Math.floor(fy);
    const tx = fx - x0;
    const ty = fy - y0;
    const xs = [applyAddressMode(x0, this.width, modeU), applyAddressMode(x0 + 1, this.width, modeU)];
    const ys = [applyAddressMode(y0, this.height, modeV), applyAddressMode(y0 + 1, this.height, modeV)];

    const tap = vec4.create();
    vec4.zero(out);
    for (let j = 0; j < 2; j++) {
      for (let i = 0; i < 2; i++) {
        const weight = (i === 0 ? 1 - tx : tx) * (j === 0 ? 1 - ty : ty);
        vec4.scaleAndAdd(out, out, this.texel(tap, xs[i], ys[j]), weight);
      }
    }
    return out;
  }
}
