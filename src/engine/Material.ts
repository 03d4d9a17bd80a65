import type { Material } from "./Renderer";
import type { PipelineVariant, Windowing } from "./PipelineConfig";

/** Chooses the compiled pipeline a draw needs. Runs once per draw, never per pixel. */
export function selectVariant(material: Material): PipelineVariant {
  let windowing: Windowing = "none";
  if (material.uvWindow) {
    windowing = material.inset ? "inset" : "plain";
  }
  if (!material.texture) {
    // debug color still shows the remapped UVs
    return { windowing, textured: false, discard: false };
  }
  return { windowing, textured: true, discard: material.alphaCutout ?? true };
}
