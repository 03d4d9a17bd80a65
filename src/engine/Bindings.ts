// Bindings — which resource sits in which group and slot. The WGSL generator,
// the bind group layouts and the renderer's bind groups are all derived from
// bindingLayoutFor(), so a slot is assigned in exactly one place.

import { ShaderStage } from "./Constants";
import { isWindowed, type PipelineVariant } from "./PipelineConfig";
import { GLOBAL_BLOCK, localBlockLayout, type UniformBlockLayout } from "./Uniforms";

export const UNIFORM_GROUP = 0;
export const GLOBAL_SLOT = 0;
export const LOCAL_SLOT = 1;

export const TEXTURE_GROUP = 1;
export const TEXTURE_SLOT = 0;
export const SAMPLER_SLOT = 1;

export type BindingResource =
  | { kind: "uniform"; block: UniformBlockLayout }
  | { kind: "texture" }
  | { kind: "sampler" };

export interface BindingSlot {
  slot: number;
  /** WGSL variable name. */
  name: string;
  resource: BindingResource;
}

export interface BindingGroup {
  group: number;
  slots: BindingSlot[];
}

export interface BindingLayout {
  groups: BindingGroup[];
  localBlock: UniformBlockLayout;
}

export function bindingLayoutFor(variant: PipelineVariant): BindingLayout {
  const localBlock = localBlockLayout(isWindowed(variant));
  const groups: BindingGroup[] = [
    {
      group: UNIFORM_GROUP,
      slots: [
        { slot: GLOBAL_SLOT, name: "globals", resource: { kind: "uniform", block: GLOBAL_BLOCK } },
        { slot: LOCAL_SLOT, name: "locals", resource: { kind: "uniform", block: localBlock } },
      ],
    },
  ];
  if (variant.textured) {
    groups.push({
      group: TEXTURE_GROUP,
      slots: [
        { slot: TEXTURE_SLOT, name: "atlas_texture", resource: { kind: "texture" } },
        { slot: SAMPLER_SLOT, name: "atlas_sampler", resource: { kind: "sampler" } },
      ],
    });
  }
  return { groups, localBlock };
}

/** Groups must run 0..n-1 without gaps, and slots within a group must be unique. */
export function validateBindingLayout(layout: BindingLayout): void {
  layout.groups.forEach((group, index) => {
    if (group.group !== index) {
      throw new Error(`Binding group ${group.group} is out of order (expected ${index})`);
    }
    const seen = new Set<number>();
    for (const { slot, name } of group.slots) {
      if (seen.has(slot)) {
        throw new Error(`Binding group ${group.group}: slot ${slot} (${name}) is assigned twice`);
      }
      seen.add(slot);
    }
  });
}

function layoutEntry({ slot, resource }: BindingSlot): GPUBindGroupLayoutEntry {
  switch (resource.kind) {
    case "uniform":
      return {
        binding: slot,
        visibility: ShaderStage.VERTEX,
        buffer: { type: "uniform", minBindingSize: resource.block.size },
      };
    case "texture":
      return {
        binding: slot,
        visibility: ShaderStage.FRAGMENT,
        texture: { sampleType: "float", viewDimension: "2d" },
      };
    case "sampler":
      return { binding: slot, visibility: ShaderStage.FRAGMENT, sampler: { type: "filtering" } };
  }
}

export function bindGroupLayoutDescriptor(group: BindingGroup): GPUBindGroupLayoutDescriptor {
  return {
    label: `shading group ${group.group}`,
    entries: group.slots.map(layoutEntry),
  };
}
