// WebGPURenderer — the host side of the shading core. Owns the uniform
// buffers, uploads meshes and textures, picks a compiled pipeline per draw
// and records one render pass per frame.
//
// Per frame:
//   1. Validate every draw (resources known, window valid) before encoding
//   2. Write the Global block once
//   3. Write each draw's Local block into its own slot buffer
//   4. One pass: switch pipeline only when the variant changes, draw indexed

import { BufferUsage, TextureUsage } from "./Constants";
import { bindingLayoutFor, GLOBAL_SLOT, LOCAL_SLOT, SAMPLER_SLOT, TEXTURE_GROUP, TEXTURE_SLOT, UNIFORM_GROUP } from "./Bindings";
import { selectVariant } from "./Material";
import { VARIANTS } from "./PipelineConfig";
import {
  resolveRenderOptions,
  type DrawCall,
  type FrameUniforms,
  type Logger,
  type MeshHandle,
  type RenderOptions,
  type RenderOptionsInput,
  type RenderTarget,
  type TextureDesc,
  type TextureHandle,
} from "./Renderer";
import { PipelineCache, type ShadingPipeline } from "./ShadingPipeline";
import { DEFAULT_SAMPLER, isValidTextureSize } from "./Texture";
import {
  GLOBAL_BLOCK,
  packGlobalUniforms,
  packLocalUniforms,
  validateUvWindow,
  type LocalUniforms,
  type UniformBlockLayout,
} from "./Uniforms";
import { packVertices, type Vertex } from "./Vertex";

interface GPUMesh {
  vertexBuffer: GPUBuffer;
  indexBuffer: GPUBuffer;
  indexCount: number;
}

interface GPUTextureBinding {
  texture: GPUTexture;
  bindGroup: GPUBindGroup;
}

/** One draw's Local block buffer and its group-0 bind group. */
interface LocalSlot {
  buffer: GPUBuffer;
  bindGroup: GPUBindGroup;
}

interface PreparedDraw {
  pipeline: ShadingPipeline;
  mesh: GPUMesh;
  texture: GPUTextureBinding | null;
  locals: LocalUniforms;
}

export class WebGPURenderer {
  readonly options: RenderOptions;
  private readonly pipelines: PipelineCache;
  private readonly globalBuffer: GPUBuffer;
  private readonly meshes = new WeakMap<MeshHandle, GPUMesh>();
  private readonly textures = new WeakMap<TextureHandle, GPUTextureBinding>();
  private readonly localSlots = new Map<UniformBlockLayout, LocalSlot[]>();
  private readonly ownedBuffers: GPUBuffer[] = [];
  private readonly ownedTextures: GPUTexture[] = [];
  private destroyed = false;

  constructor(
    private readonly device: GPUDevice,
    options: RenderOptionsInput = {},
    private readonly logger: Logger = console,
  ) {
    this.options = resolveRenderOptions(options);
    this.pipelines = new PipelineCache(device, this.options, logger);
    this.globalBuffer = this.createBuffer("globals", GLOBAL_BLOCK.size, BufferUsage.UNIFORM | BufferUsage.COPY_DST);
  }

  static async create(gpu: GPU, options: RenderOptionsInput = {}, logger: Logger = console): Promise<WebGPURenderer> {
    const adapter = await gpu.requestAdapter();
    if (!adapter) throw new Error("No WebGPU adapter found");
    const device = await adapter.requestDevice();
    void device.lost.then((info) => {
      logger.warn(`WebGPU device lost (${info.reason}): ${info.message}`);
    });
    return new WebGPURenderer(device, options, logger);
  }

  /** Number of distinct pipelines compiled so far. */
  get pipelineCount(): number {
    return this.pipelines.size;
  }

  createMesh(vertices: readonly Vertex[], indices: ArrayLike<number>): MeshHandle {
    this.assertAlive("createMesh");
    if (vertices.length === 0 || indices.length === 0) {
      throw new Error("WebGPURenderer.createMesh: mesh has no vertices or no indices");
    }
    const indexData = Uint32Array.from(indices);
    for (const index of indexData) {
      if (index >= vertices.length) {
        throw new Error(`WebGPURenderer.createMesh: index ${index} out of range (${vertices.length} vertices)`);
      }
    }

    const vertexData = packVertices(vertices);
    const vertexBuffer = this.createBuffer("vertices", vertexData.byteLength, BufferUsage.VERTEX | BufferUsage.COPY_DST);
    this.device.queue.writeBuffer(vertexBuffer, 0, vertexData);
    const indexBuffer = this.createBuffer("indices", indexData.byteLength, BufferUsage.INDEX | BufferUsage.COPY_DST);
    this.device.queue.writeBuffer(indexBuffer, 0, indexData);

    const handle: MeshHandle = { indexCount: indexData.length };
    this.meshes.set(handle, { vertexBuffer, indexBuffer, indexCount: indexData.length });
    return handle;
  }

  createTexture(desc: TextureDesc): TextureHandle {
    this.assertAlive("createTexture");
    const { width, height } = desc;
    if (!isValidTextureSize(width, height)) {
      throw new Error(`WebGPURenderer.createTexture: invalid size ${width}x${height}`);
    }
    if (desc.data.length !== width * height * 4) {
      throw new Error(`WebGPURenderer.createTexture: expected ${width * height * 4} bytes, got ${desc.data.length}`);
    }
    const device = this.device;
    const texture = device.createTexture({
      size: [width, height],
      format: "rgba8unorm",
      usage: TextureUsage.TEXTURE_BINDING | TextureUsage.COPY_DST,
    });
    this.ownedTextures.push(texture);
    device.queue.writeTexture({ texture }, new Uint8Array(desc.data), { bytesPerRow: width * 4 }, [width, height]);

    const sampling = { ...DEFAULT_SAMPLER, ...desc.sampler };
    const sampler = device.createSampler({ ...sampling, minFilter: sampling.magFilter });

    const group = bindingLayoutFor(VARIANTS.textured).groups[TEXTURE_GROUP];
    const bindGroup = device.createBindGroup({
      layout: this.pipelines.bindGroupLayout(group),
      entries: [
        { binding: TEXTURE_SLOT, resource: texture.createView() },
        { binding: SAMPLER_SLOT, resource: sampler },
      ],
    });

    const handle: TextureHandle = { width, height };
    this.textures.set(handle, { texture, bindGroup });
    return handle;
  }

  renderFrame(target: RenderTarget, frame: FrameUniforms, drawCalls: readonly DrawCall[]): void {
    this.assertAlive("renderFrame");
    const prepared = drawCalls.map((dc, i) => this.prepareDraw(dc, i));
    const device = this.device;

    device.queue.writeBuffer(this.globalBuffer, 0, packGlobalUniforms(frame));

    const encoder = device.createCommandEncoder({ label: "shading frame" });
    const pass = encoder.beginRenderPass({
      colorAttachments: [{
        view: target.color,
        clearValue: this.options.clearColor,
        loadOp: "clear",
        storeOp: "store",
      }],
      depthStencilAttachment: {
        view: target.depth,
        depthClearValue: 1.0,
        depthLoadOp: "clear",
        depthStoreOp: "store",
      },
    });

    const slotsUsed = new Map<UniformBlockLayout, number>();
    let current: ShadingPipeline | null = null;
    for (const draw of prepared) {
      if (draw.pipeline !== current) {
        pass.setPipeline(draw.pipeline.pipeline);
        current = draw.pipeline;
      }

      const block = draw.pipeline.localBlock;
      const index = slotsUsed.get(block) ?? 0;
      slotsUsed.set(block, index + 1);
      const slot = this.localSlot(draw.pipeline, index);
      device.queue.writeBuffer(slot.buffer, 0, packLocalUniforms(draw.locals, block));

      pass.setBindGroup(UNIFORM_GROUP, slot.bindGroup);
      if (draw.texture) pass.setBindGroup(TEXTURE_GROUP, draw.texture.bindGroup);
      pass.setVertexBuffer(0, draw.mesh.vertexBuffer);
      pass.setIndexBuffer(draw.mesh.indexBuffer, "uint32");
      pass.drawIndexed(draw.mesh.indexCount);
    }
    pass.end();

    device.queue.submit([encoder.finish()]);
  }

  destroy(): void {
    for (const buffer of this.ownedBuffers) buffer.destroy();
    for (const texture of this.ownedTextures) texture.destroy();
    this.ownedBuffers.length = 0;
    this.ownedTextures.length = 0;
    this.localSlots.clear();
    this.pipelines.clear();
    this.destroyed = true;
  }

  private assertAlive(method: string): void {
    if (this.destroyed) throw new Error(`WebGPURenderer.${method}: renderer destroyed`);
  }

  private prepareDraw(dc: DrawCall, index: number): PreparedDraw {
    const mesh = this.meshes.get(dc.mesh);
    if (!mesh) {
      throw new Error(`WebGPURenderer.renderFrame: draw ${index} uses a mesh this renderer did not create`);
    }

    const variant = selectVariant(dc.material);
    let texture: GPUTextureBinding | null = null;
    if (variant.textured && dc.material.texture) {
      texture = this.textures.get(dc.material.texture) ?? null;
      if (!texture) {
        throw new Error(`WebGPURenderer.renderFrame: draw ${index} uses a texture this renderer did not create`);
      }
    }

    const { uvWindow } = dc.material;
    if (uvWindow) validateUvWindow(uvWindow);

    return {
      pipeline: this.pipelines.get(variant),
      mesh,
      texture,
      locals: { transform: dc.transform, uvWindow },
    };
  }

  private localSlot(pipeline: ShadingPipeline, index: number): LocalSlot {
    const block = pipeline.localBlock;
    let pool = this.localSlots.get(block);
    if (!pool) {
      pool = [];
      this.localSlots.set(block, pool);
    }
    while (pool.length <= index) {
      const buffer = this.createBuffer("locals", block.size, BufferUsage.UNIFORM | BufferUsage.COPY_DST);
      const bindGroup = this.device.createBindGroup({
        layout: pipeline.bindGroupLayouts[UNIFORM_GROUP],
        entries: [
          { binding: GLOBAL_SLOT, resource: { buffer: this.globalBuffer } },
          { binding: LOCAL_SLOT, resource: { buffer } },
        ],
      });
      pool.push({ buffer, bindGroup });
    }
    return pool[index];
  }

  private createBuffer(label: string, size: number, usage: number): GPUBuffer {
    const buffer = this.device.createBuffer({ label, size, usage });
    this.ownedBuffers.push(buffer);
    return buffer;
  }
}
