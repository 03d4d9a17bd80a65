// ShadingPipeline — turns a PipelineVariant into a compiled GPURenderPipeline.
// All layout checks happen here, once, so nothing is re-derived per draw.

import {
  bindGroupLayoutDescriptor,
  bindingLayoutFor,
  validateBindingLayout,
  type BindingGroup,
} from "./Bindings";
import { validateVariant, variantKey, type PipelineVariant } from "./PipelineConfig";
import type { Logger, RenderOptions } from "./Renderer";
import { buildShaderSource, FRAGMENT_ENTRY_POINT, VERTEX_ENTRY_POINT } from "./ShaderSource";
import { GLOBAL_BLOCK, validateBlockLayout, type UniformBlockLayout } from "./Uniforms";
import { VERTEX_BUFFER_LAYOUT } from "./Vertex";

export interface ShadingPipeline {
  readonly key: string;
  readonly variant: PipelineVariant;
  readonly pipeline: GPURenderPipeline;
  /** Indexed by bind group number. */
  readonly bindGroupLayouts: readonly GPUBindGroupLayout[];
  readonly localBlock: UniformBlockLayout;
}

export type BindGroupLayoutFactory = (group: BindingGroup) => GPUBindGroupLayout;

export function createShadingPipeline(
  device: GPUDevice,
  variant: PipelineVariant,
  options: RenderOptions,
  layoutFor: BindGroupLayoutFactory = (group) => device.createBindGroupLayout(bindGroupLayoutDescriptor(group)),
): ShadingPipeline {
  validateVariant(variant);
  const layout = bindingLayoutFor(variant);
  validateBlockLayout(GLOBAL_BLOCK);
  validateBlockLayout(layout.localBlock);
  validateBindingLayout(layout);

  const key = variantKey(variant);
  const bindGroupLayouts = layout.groups.map(layoutFor);
  const module = device.createShaderModule({
    label: `shading ${key}`,
    code: buildShaderSource(variant, options.constants),
  });

  const pipeline = device.createRenderPipeline({
    label: `shading ${key}`,
    layout: device.createPipelineLayout({ bindGroupLayouts }),
    vertex: { module, entryPoint: VERTEX_ENTRY_POINT, buffers: [VERTEX_BUFFER_LAYOUT] },
    fragment: {
      module,
      entryPoint: FRAGMENT_ENTRY_POINT,
      targets: [{ format: options.colorFormat, blend: options.blend ?? undefined }],
    },
    primitive: { topology: "triangle-list", frontFace: "ccw", cullMode: options.cullMode },
    depthStencil: {
      format: options.depthFormat,
      depthWriteEnabled: true,
      depthCompare: options.depthCompare,
    },
  });

  return { key, variant, pipeline, bindGroupLayouts, localBlock: layout.localBlock };
}

/**
 * Builds each variant at most once. Bind group layouts are shared by
 * descriptor, so a bind group made for one pipeline binds on every pipeline
 * with the same group.
 */
export class PipelineCache {
  private pipelines = new Map<string, ShadingPipeline>();
  private layouts = new Map<string, GPUBindGroupLayout>();

  constructor(
    private device: GPUDevice,
    private options: RenderOptions,
    private logger: Logger = console,
  ) {}

  get size(): number {
    return this.pipelines.size;
  }

  get(variant: PipelineVariant): ShadingPipeline {
    const key = variantKey(variant);
    let entry = this.pipelines.get(key);
    if (!entry) {
      entry = createShadingPipeline(this.device, variant, this.options, (group) => this.bindGroupLayout(group));
      this.pipelines.set(key, entry);
      this.logger.log(`Compiled shading pipeline ${key}`);
    }
    return entry;
  }

  bindGroupLayout(group: BindingGroup): GPUBindGroupLayout {
    const descriptor = bindGroupLayoutDescriptor(group);
    const key = JSON.stringify(descriptor.entries);
    let layout = this.layouts.get(key);
    if (!layout) {
      layout = this.device.createBindGroupLayout(descriptor);
      this.layouts.set(key, layout);
    }
    return layout;
  }

  clear(): void {
    this.pipelines.clear();
    this.layouts.clear();
  }
}
