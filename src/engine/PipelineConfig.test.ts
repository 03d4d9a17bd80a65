import { describe, it, expect } from "vitest";
import { selectVariant } from "./Material";
import {
  DEFAULT_SHADING_CONSTANTS,
  VARIANTS,
  isWindowed,
  validateShadingConstants,
  validateVariant,
  variantKey,
} from "./PipelineConfig";

describe("variantKey", () => {
  it("names every axis of the variant", () => {
    expect(variantKey(VARIANTS.debug)).toBe("none/debug/keep");
    expect(variantKey(VARIANTS.textured)).toBe("none/textured/keep");
    expect(variantKey(VARIANTS.atlas)).toBe("plain/textured/discard");
    expect(variantKey(VARIANTS.atlasInset)).toBe("inset/textured/discard");
  });
});

describe("validateVariant", () => {
  it("accepts the presets", () => {
    for (const variant of Object.values(VARIANTS)) {
      expect(() => validateVariant(variant)).not.toThrow();
    }
  });

  it("rejects cutout without a texture", () => {
    expect(() => validateVariant({ windowing: "none", textured: false, discard: true })).toThrow(
      "Pipeline variant none/debug/discard: alpha cutout needs a texture",
    );
  });
});

describe("isWindowed", () => {
  it("is false only for the pass-through policy", () => {
    expect(isWindowed(VARIANTS.debug)).toBe(false);
    expect(isWindowed(VARIANTS.atlas)).toBe(true);
    expect(isWindowed(VARIANTS.atlasInset)).toBe(true);
  });
});

describe("validateShadingConstants", () => {
  it("accepts the defaults", () => {
    expect(DEFAULT_SHADING_CONSTANTS).toEqual({ uvInset: 0.01, debugBlue: 0.5 });
    expect(() => validateShadingConstants(DEFAULT_SHADING_CONSTANTS)).not.toThrow();
  });

  it("rejects an inset that would swallow the window", () => {
    expect(() => validateShadingConstants({ uvInset: 0.5, debugBlue: 0 })).toThrow("uvInset must be in [0, 0.5), got 0.5");
    expect(() => validateShadingConstants({ uvInset: -0.01, debugBlue: 0 })).toThrow();
  });
});

describe("selectVariant", () => {
  const texture = { width: 16, height: 16 };

  it("uses the debug variant without a texture", () => {
    expect(selectVariant({})).toEqual(VARIANTS.debug);
    expect(selectVariant({ alphaCutout: true })).toEqual(VARIANTS.debug);
  });

  it("keeps the window on debug draws", () => {
    expect(selectVariant({ uvWindow: [0.5, 0, 0.5, 1] })).toEqual({ windowing: "plain", textured: false, discard: false });
    expect(selectVariant({ uvWindow: [0, 0, 0.5, 0.5], inset: true })).toEqual({
      windowing: "inset",
      textured: false,
      discard: false,
    });
  });

  it("samples the whole texture without a window", () => {
    expect(selectVariant({ texture, alphaCutout: false })).toEqual(VARIANTS.textured);
    expect(selectVariant({ texture })).toEqual({ windowing: "none", textured: true, discard: true });
  });

  it("windows into the atlas, inset on request", () => {
    expect(selectVariant({ texture, uvWindow: [0, 0, 0.5, 0.5] })).toEqual(VARIANTS.atlas);
    expect(selectVariant({ texture, uvWindow: [0, 0, 0.5, 0.5], inset: true })).toEqual(VARIANTS.atlasInset);
  });
});
