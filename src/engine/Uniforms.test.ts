import { describe, it, expect } from "vitest";
import { mat4 } from "gl-matrix";
import {
  GLOBAL_BLOCK,
  LOCAL_BLOCK,
  WINDOWED_LOCAL_BLOCK,
  localBlockLayout,
  packGlobalUniforms,
  packLocalUniforms,
  validateBlockLayout,
  validateUvWindow,
  type UniformBlockLayout,
} from "./Uniforms";

describe("uniform block layouts", () => {
  it("sizes the blocks at 64 and 64/80 bytes", () => {
    expect(GLOBAL_BLOCK.size).toBe(64);
    expect(localBlockLayout(false)).toBe(LOCAL_BLOCK);
    expect(localBlockLayout(true)).toBe(WINDOWED_LOCAL_BLOCK);
    expect(LOCAL_BLOCK.size).toBe(64);
    expect(WINDOWED_LOCAL_BLOCK.size).toBe(80);
    expect(WINDOWED_LOCAL_BLOCK.fields[1]).toMatchObject({ name: "uv_window", offset: 64 });
  });

  it("accepts the built-in layouts", () => {
    expect(() => validateBlockLayout(GLOBAL_BLOCK)).not.toThrow();
    expect(() => validateBlockLayout(LOCAL_BLOCK)).not.toThrow();
    expect(() => validateBlockLayout(WINDOWED_LOCAL_BLOCK)).not.toThrow();
  });

  it("rejects a misaligned field", () => {
    const bad: UniformBlockLayout = {
      name: "Bad",
      fields: [{ name: "v", type: "vec4<f32>", offset: 8, size: 16, align: 16 }],
      size: 32,
    };
    expect(() => validateBlockLayout(bad)).toThrow("Bad.v: offset 8 is not 16-byte aligned");
  });

  it("rejects overlapping fields", () => {
    const bad: UniformBlockLayout = {
      name: "Bad",
      fields: [
        { name: "m", type: "mat4x4<f32>", offset: 0, size: 64, align: 16 },
        { name: "v", type: "vec4<f32>", offset: 48, size: 16, align: 16 },
      ],
      size: 80,
    };
    expect(() => validateBlockLayout(bad)).toThrow("Bad.v: overlaps the previous field (offset 48 < 64)");
  });

  it("rejects a size that is not a multiple of 16 or too small", () => {
    const field = { name: "v", type: "vec4<f32>" as const, offset: 0, size: 16, align: 16 };
    expect(() => validateBlockLayout({ name: "Odd", fields: [field], size: 24 })).toThrow(
      "Odd: size 24 is not a multiple of 16",
    );
    expect(() => validateBlockLayout({ name: "Short", fields: [{ ...field, offset: 16 }], size: 16 })).toThrow(
      "Short: size 16 does not cover its fields (32 bytes)",
    );
  });
});

describe("packGlobalUniforms", () => {
  it("writes the matrix column-major", () => {
    const mvp = mat4.fromTranslation(mat4.create(), [1, 2, 3]);
    const data = packGlobalUniforms({ mvp });
    expect(data.length).toBe(16);
    expect(Array.from(data.subarray(12, 16))).toEqual([1, 2, 3, 1]);
    expect(data[0]).toBe(1);
  });
});

describe("packLocalUniforms", () => {
  const transform = mat4.fromScaling(mat4.create(), [2, 3, 4]);

  it("omits the window for the plain block", () => {
    const data = packLocalUniforms({ transform, uvWindow: [0.5, 0, 0.5, 1] }, LOCAL_BLOCK);
    expect(data.length).toBe(16);
    expect([data[0], data[5], data[10], data[15]]).toEqual([2, 3, 4, 1]);
  });

  it("appends the window after the transform", () => {
    const data = packLocalUniforms({ transform, uvWindow: [0.5, 0, 0.5, 1] }, WINDOWED_LOCAL_BLOCK);
    expect(data.length).toBe(20);
    expect(Array.from(data.subarray(16))).toEqual([0.5, 0, 0.5, 1]);
  });

  it("defaults the window to the whole texture", () => {
    const data = packLocalUniforms({ transform }, WINDOWED_LOCAL_BLOCK);
    expect(Array.from(data.subarray(16))).toEqual([0, 0, 1, 1]);
  });
});

describe("validateUvWindow", () => {
  it("accepts zero-sized windows", () => {
    expect(() => validateUvWindow([0.5, 0.5, 0, 0])).not.toThrow();
  });

  it("rejects negative sizes", () => {
    expect(() => validateUvWindow([0.5, 0.5, -0.25, 0.5])).toThrow(
      "UV window size must be non-negative, got (-0.25, 0.5)",
    );
  });

  it("rejects non-finite components", () => {
    expect(() => validateUvWindow([NaN, 0, 1, 1])).toThrow("UV window component 0 is not finite: NaN");
  });
});
