export * from "./Constants";
export type { Vertex, VertexAttribute } from "./Vertex";
export { VERTEX_ATTRIBUTES, VERTEX_BUFFER_LAYOUT, FLOATS_PER_VERTEX, packVertices } from "./Vertex";
export type { GlobalUniforms, LocalUniforms, UvWindow, UniformBlockLayout, UniformField } from "./Uniforms";
export {
  GLOBAL_BLOCK,
  LOCAL_BLOCK,
  WINDOWED_LOCAL_BLOCK,
  localBlockLayout,
  packGlobalUniforms,
  packLocalUniforms,
  validateBlockLayout,
  validateUvWindow,
} from "./Uniforms";
export type { PipelineVariant, ShadingConstants, Windowing } from "./PipelineConfig";
export { VARIANTS, DEFAULT_SHADING_CONSTANTS, validateVariant, variantKey } from "./PipelineConfig";
export type { BindingLayout, BindingGroup, BindingSlot } from "./Bindings";
export { bindingLayoutFor, validateBindingLayout, bindGroupLayoutDescriptor } from "./Bindings";
export { remapUv, createVertexStage } from "./VertexStage";
export type { VertexOutput, VertexStage } from "./VertexStage";
export { createFragmentStage, isEffectivelyTransparent } from "./FragmentStage";
export type { FragmentResult, FragmentStage, TextureBinding } from "./FragmentStage";
export { Texture, DEFAULT_SAMPLER, isValidTextureSize } from "./Texture";
export type { TextureOptions, SamplerOptions } from "./Texture";
export { buildShaderSource } from "./ShaderSource";
export { createShadingPipeline, PipelineCache } from "./ShadingPipeline";
export type { ShadingPipeline } from "./ShadingPipeline";
export type {
  DrawCall,
  FrameUniforms,
  Logger,
  Material,
  MeshHandle,
  RenderOptions,
  RenderOptionsInput,
  RenderTarget,
  TextureDesc,
  TextureHandle,
} from "./Renderer";
export { DEFAULT_RENDER_OPTIONS, resolveRenderOptions } from "./Renderer";
export { selectVariant } from "./Material";
export { WebGPURenderer } from "./WebGPURenderer";
export { Camera } from "./Camera";
export type { Perspective } from "./Camera";
export { Sprite } from "./Sprite";
export { QUAD, CUBE } from "./DefaultMeshes";
export type { MeshData } from "./DefaultMeshes";
