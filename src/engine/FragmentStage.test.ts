import { describe, it, expect } from "vitest";
import { mat4 } from "gl-matrix";
import { createFragmentStage, isEffectivelyTransparent, type FragmentResult } from "./FragmentStage";
import { VARIANTS } from "./PipelineConfig";
import { Texture } from "./Texture";
import { createVertexStage } from "./VertexStage";

function solid(rgba: [number, number, number, number]): Texture {
  return new Texture({ width: 1, height: 1, data: new Float32Array(rgba) });
}

function colorOf(result: FragmentResult): number[] {
  if (result.kind !== "color") throw new Error("fragment was discarded");
  return Array.from(result.color);
}

describe("createFragmentStage — cutout", () => {
  it("discards texels below the alpha threshold", () => {
    const stage = createFragmentStage(VARIANTS.atlas, { texture: solid([1, 1, 1, 0]) });
    expect(stage([0.5, 0.5])).toEqual({ kind: "discard" });
    const faint = createFragmentStage(VARIANTS.atlas, { texture: solid([1, 1, 1, 0.0009]) });
    expect(faint([0.5, 0.5])).toEqual({ kind: "discard" });
  });

  it("keeps a texel at the threshold, unmodified", () => {
    const stage = createFragmentStage(VARIANTS.atlas, { texture: solid([0.2, 0.4, 0.6, 0.001]) });
    expect(colorOf(stage([0.5, 0.5]))).toEqual(Array.from(new Float32Array([0.2, 0.4, 0.6, 0.001])));
  });

  it("treats alpha at or above 0.001 as visible", () => {
    expect(isEffectivelyTransparent(0)).toBe(true);
    expect(isEffectivelyTransparent(0.0009)).toBe(true);
    expect(isEffectivelyTransparent(0.000999999)).toBe(true);
    expect(isEffectivelyTransparent(0.001)).toBe(false);
    expect(isEffectivelyTransparent(0.001000000005)).toBe(false);
    expect(isEffectivelyTransparent(Math.fround(0.001))).toBe(false);
    expect(isEffectivelyTransparent(1)).toBe(false);
  });

  describe("with linear filtering", () => {
    // alpha 0 on the left texel, 1 on the right, so the blended alpha is the
    // distance past the left texel centre (u = 0.25)
    const ramp = new Texture({ width: 2, height: 1, data: new Float32Array([1, 1, 1, 0, 1, 1, 1, 1]) });
    const stage = createFragmentStage(VARIANTS.atlas, { texture: ramp, sampler: { magFilter: "linear" } });

    it("keeps a blended alpha just above the threshold", () => {
      expect(colorOf(stage([0.2505000000025, 0.5]))[3]).toBe(Math.fround(0.001));
    });

    it("discards a blended alpha just below the threshold", () => {
      expect(stage([0.2504999995, 0.5])).toEqual({ kind: "discard" });
    });
  });
});

describe("createFragmentStage — no cutout", () => {
  it("writes fully transparent texels", () => {
    const stage = createFragmentStage(VARIANTS.textured, { texture: solid([0.5, 0.25, 0, 0]) });
    expect(colorOf(stage([0.5, 0.5]))).toEqual([0.5, 0.25, 0, 0]);
  });
});

describe("createFragmentStage — debug", () => {
  it("writes the UV, the blue constant and full alpha", () => {
    const stage = createFragmentStage(VARIANTS.debug);
    expect(colorOf(stage([0.25, 0.75]))).toEqual([0.25, 0.75, 0.5, 1]);
    expect(colorOf(stage([0, 1]))).toEqual([0, 1, 0.5, 1]);
  });

  it("uses the configured blue channel", () => {
    const stage = createFragmentStage(VARIANTS.debug, undefined, { uvInset: 0.01, debugBlue: 0.125 });
    expect(colorOf(stage([0.5, 0.5]))).toEqual([0.5, 0.5, 0.125, 1]);
  });
});

describe("createFragmentStage — preconditions", () => {
  it("fails at construction when a textured variant has no texture", () => {
    expect(() => createFragmentStage(VARIANTS.atlas)).toThrow(
      "createFragmentStage: variant plain/textured/discard needs a texture binding",
    );
  });

  it("rejects cutout on the debug variant", () => {
    expect(() => createFragmentStage({ windowing: "none", textured: false, discard: true })).toThrow(
      "alpha cutout needs a texture",
    );
  });
});

describe("vertex and fragment stages together", () => {
  const identity = mat4.create();

  it("outputs the source texel for a full window over an opaque white texture", () => {
    const vs = createVertexStage(VARIANTS.atlas);
    const fs = createFragmentStage(VARIANTS.atlas, {
      texture: new Texture({ width: 2, height: 2, data: new Uint8Array(16).fill(255) }),
    });
    for (const uv of [[0, 0], [0.5, 0.5], [1, 1]] as const) {
      const out = vs({ position: [0, 0, 0], normal: [0, 0, 1], uv }, { mvp: identity }, { transform: identity, uvWindow: [0, 0, 1, 1] });
      expect(colorOf(fs(out.uv))).toEqual([1, 1, 1, 1]);
    }
  });

  it("samples the right half of the atlas through a half window", () => {
    // left texel red, right texel green
    const atlas = new Texture({ width: 2, height: 1, data: new Uint8Array([255, 0, 0, 255, 0, 255, 0, 255]) });
    const vs = createVertexStage(VARIANTS.atlas);
    const fs = createFragmentStage(VARIANTS.atlas, { texture: atlas });
    const out = vs({ position: [0, 0, 0], normal: [0, 0, 1], uv: [0, 0] }, { mvp: identity }, { transform: identity, uvWindow: [0.5, 0, 0.5, 1] });
    expect(Array.from(out.uv)).toEqual([0.5, 0]);
    expect(colorOf(fs(out.uv))).toEqual([0, 1, 0, 1]);
  });
});
