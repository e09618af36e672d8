/**
 * Stereo Screen Renderer (WebGPU): curved-screen multiview pipeline.
 *
 * ## Pipeline
 *
 * 1. **Screen pass** (per view): draws the screen mesh with the active
 *    strategy's vertex/fragment entry points into layer `view` of the scene
 *    texture. Reads the source video texture.
 *
 * 2. **Temporal pass** (per view): blends the scene layer toward the
 *    view's history and writes two attachments in one pass: the display
 *    layer and the next history layer.
 *
 * 3. **Ambient pass**: blurs and vignettes display layer 0 into a small
 *    offscreen target.
 *
 * ## Multiview
 *
 * WebGPU has no multiview extension. Each view renders into its own layer
 * of a 2D array texture, and the view index reaches the shaders through a
 * per-view uniform bind group that both the screen and temporal pipelines
 * share.
 *
 * ## Per-frame state
 *
 * All uniform inputs arrive as a `FrameSnapshot` and are uploaded at the
 * start of `renderFrame()`. The only state that outlives a frame is the
 * history parity, advanced after submission for the views that ran.
 */

import { VIEW_COUNT, VIEW_INDICES, CAMERA_ARRAY_BUFFER_SIZE, packCameraArray, type ViewIndex } from './camera-array';
import { planFrame, passLabel, type FramePass } from './frame-plan';
import type { FrameSnapshot } from './frame-snapshot';
import { HistoryBuffer, type HistorySlot } from './history-buffer';
import { createPlaneMesh, type PlaneMesh } from './mesh';
import type { QualityParams } from './quality';
import {
  createWebGPUPass,
  createWebGPUFBOPass,
  FULLSCREEN_QUAD_LAYOUT,
  MODEL_VERTEX_LAYOUT,
  type WebGPUFBOPass,
  type WebGPURenderPass,
} from './render-pass-webgpu';
import { packScreenParams, SCREEN_PARAMS_BUFFER_SIZE, type ScreenParams } from './screen-params';
import { MODEL_BUFFER_SIZE } from './screen-transform';
import { resolveScreenStrategy, type ScreenRenderStrategy } from './screen-strategy';
import { packTemporalBlurParams, TEMPORAL_BLUR_BUFFER_SIZE } from './temporal-blend';
import {
  createArrayView,
  createFullscreenQuadBuffer,
  createIndexBuffer,
  createLayeredRenderTexture,
  createLayerView,
  createLinearSampler,
  createUniformBuffer,
  createVertexBuffer,
  FULLSCREEN_QUAD_VERTEX_COUNT,
} from './webgpu-utils';

// ---------------------------------------------------------------------------
// WGSL Shaders (imported from external files via Vite ?raw)
// ---------------------------------------------------------------------------

import SCREEN_VERTEX_WGSL from './shaders/screen/vertex.wgsl?raw';
import SCREEN_FRAGMENT_WGSL from './shaders/screen/fragment.wgsl?raw';
import FULLSCREEN_VERTEX_WGSL from './shaders/fullscreen-vertex.wgsl?raw';
import TEMPORAL_FRAGMENT_WGSL from './shaders/temporal/fragment.wgsl?raw';
import AMBIENT_FRAGMENT_WGSL from './shaders/ambient/fragment.wgsl?raw';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** History precision: accumulation in 8 bits bands visibly. */
export const HISTORY_FORMAT: GPUTextureFormat = 'rgba16float';

const SCENE_FORMAT: GPUTextureFormat = 'rgba8unorm';

/** View uniform: index(u32=4) → pad to 16. */
const VIEW_UNIFORM_SIZE = 16;

const CLEAR_BLACK: GPUColor = { r: 0, g: 0, b: 0, a: 1 };

const SLOTS: readonly HistorySlot[] = [0, 1];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScreenRendererConfig {
  /** Per-eye render target size, in pixels. */
  readonly eyeWidth: number;
  readonly eyeHeight: number;
  /** Display and ambient target format. Defaults to `rgba8unorm`. */
  readonly format?: GPUTextureFormat;
  /** Defaults to curved geometry with stereo sampling. */
  readonly strategy?: ScreenRenderStrategy;
  readonly quality: QualityParams;
}

export interface RenderFrameOptions {
  /** Views to render. Defaults to both. */
  readonly views?: readonly ViewIndex[];
  /** Run the ambient pass (when view 0 is rendered). Defaults to true. */
  readonly ambient?: boolean;
}

export interface RenderFrameResult {
  /** Two-layer display texture; layer `v` holds view `v`. */
  readonly display: GPUTexture;
  /** Ambient target, or null when the ambient pass did not run. */
  readonly ambient: GPUTexture | null;
  readonly passes: readonly FramePass[];
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export class ScreenRendererWebGPU {
  // ---- WebGPU core ----
  private readonly device: GPUDevice;
  private readonly format: GPUTextureFormat;
  private readonly quality: QualityParams;
  private strategy: ScreenRenderStrategy;
  private disposed = false;

  // ---- Shared resources ----
  private readonly sampler: GPUSampler;
  private readonly quadBuffer: GPUBuffer;
  private readonly mesh: PlaneMesh;
  private readonly meshVertexBuffer: GPUBuffer;
  private readonly meshIndexBuffer: GPUBuffer;

  // ---- Uniform buffers ----
  private readonly cameraBuffer: GPUBuffer;
  private readonly screenParamsBuffer: GPUBuffer;
  private readonly modelBuffer: GPUBuffer;
  private readonly blurBuffer: GPUBuffer;
  private readonly viewBuffers: readonly GPUBuffer[];

  // ---- Bind group layouts shared across passes ----
  private readonly sourceLayout: GPUBindGroupLayout;
  private readonly viewLayout: GPUBindGroupLayout;

  // ---- Passes ----
  private screenPass: WebGPURenderPass;
  private readonly temporalPass: WebGPURenderPass;
  private readonly ambientPass: WebGPUFBOPass;

  // ---- Bind groups ----
  private sourceBindGroup: GPUBindGroup | null = null;
  private screenUniformBindGroup: GPUBindGroup;
  private readonly viewBindGroups: readonly GPUBindGroup[];
  private temporalBindGroups: readonly GPUBindGroup[] = [];
  private ambientBindGroup: GPUBindGroup | null = null;

  // ---- Per-eye targets ----
  private eyeWidth = 0;
  private eyeHeight = 0;
  private sceneTexture: GPUTexture | null = null;
  private sceneLayerViews: readonly GPUTextureView[] = [];
  private displayTexture: GPUTexture | null = null;
  private displayLayerViews: readonly GPUTextureView[] = [];
  private history: HistoryBuffer<GPUTexture> | null = null;
  /** `historyLayerViews[slot][view]`. */
  private historyLayerViews: readonly (readonly GPUTextureView[])[] = [];

  constructor(device: GPUDevice, config: ScreenRendererConfig) {
    this.device = device;
    this.format = config.format ?? 'rgba8unorm';
    this.quality = config.quality;
    this.strategy = config.strategy ?? resolveScreenStrategy();

    // Shared resources.
    this.sampler = createLinearSampler(device);
    this.quadBuffer = createFullscreenQuadBuffer(device);
    this.mesh = createPlaneMesh(config.quality.meshRows, config.quality.meshColumns);
    this.meshVertexBuffer = createVertexBuffer(device, this.mesh.vertices, 'screen mesh vertices');
    this.meshIndexBuffer = createIndexBuffer(device, this.mesh.indices, 'screen mesh indices');

    // Uniform buffers (contents written per frame, except the view indices).
    this.cameraBuffer = createUniformBuffer(device, CAMERA_ARRAY_BUFFER_SIZE, 'cameras');
    this.screenParamsBuffer = createUniformBuffer(device, SCREEN_PARAMS_BUFFER_SIZE, 'screen params');
    this.modelBuffer = createUniformBuffer(device, MODEL_BUFFER_SIZE, 'model');
    this.blurBuffer = createUniformBuffer(device, TEMPORAL_BLUR_BUFFER_SIZE, 'temporal blur');
    this.viewBuffers = VIEW_INDICES.map((view) => {
      const buffer = createUniformBuffer(device, VIEW_UNIFORM_SIZE, `view ${view}`);
      device.queue.writeBuffer(buffer, 0, new Uint32Array([view, 0, 0, 0]));
      return buffer;
    });

    // Layouts shared between pipelines.
    this.sourceLayout = device.createBindGroupLayout({
      label: 'screen source',
      entries: [
        { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float' } },
        { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: {} },
      ],
    });
    this.viewLayout = device.createBindGroupLayout({
      label: 'view index',
      entries: [
        {
          binding: 0,
          visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
          buffer: { type: 'uniform' },
        },
      ],
    });

    // Pipelines.
    this.screenPass = this.createScreenPass(this.strategy);
    this.temporalPass = this.createTemporalPass();
    this.ambientPass = this.createAmbientPass();

    // Bind groups that never change.
    this.screenUniformBindGroup = this.createScreenUniformBindGroup();
    this.viewBindGroups = this.viewBuffers.map((buffer, view) =>
      device.createBindGroup({
        label: `view ${view}`,
        layout: this.viewLayout,
        entries: [{ binding: 0, resource: { buffer } }],
      })
    );

    this.resize(config.eyeWidth, config.eyeHeight);

    // Handle device loss.
    void device.lost.then((info) => {
      console.error(`[ScreenRenderer] WebGPU device lost (${info.reason}): ${info.message}`);
    });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  get activeStrategy(): ScreenRenderStrategy {
    return this.strategy;
  }

  get eyeSize(): readonly [number, number] {
    return [this.eyeWidth, this.eyeHeight];
  }

  /** Bind the source video texture (a side-by-side or mono frame). */
  setSource(view: GPUTextureView): void {
    this.sourceBindGroup = this.device.createBindGroup({
      label: 'screen source',
      layout: this.sourceLayout,
      entries: [
        { binding: 0, resource: view },
        { binding: 1, resource: this.sampler },
      ],
    });
  }

  /** Switch geometry or sampling; rebuilds only the screen pipeline. */
  setStrategy(strategy: ScreenRenderStrategy): void {
    if (strategy === this.strategy) return;
    this.strategy = strategy;
    this.screenPass.dispose();
    this.screenPass = this.createScreenPass(strategy);
    this.screenUniformBindGroup = this.createScreenUniformBindGroup();
  }

  /**
   * Reallocate the per-eye targets. History restarts from slot 0 for both
   * views (its previous contents no longer match the resolution).
   */
  resize(eyeWidth: number, eyeHeight: number): void {
    const width = Math.max(1, Math.round(eyeWidth));
    const height = Math.max(1, Math.round(eyeHeight));
    if (width === this.eyeWidth && height === this.eyeHeight && this.sceneTexture) return;

    this.disposeTargets();
    this.eyeWidth = width;
    this.eyeHeight = height;

    const device = this.device;
    const scene = createLayeredRenderTexture(device, width, height, VIEW_COUNT, SCENE_FORMAT, 'scene');
    const display = createLayeredRenderTexture(device, width, height, VIEW_COUNT, this.format, 'display');
    const history = new HistoryBuffer(
      createLayeredRenderTexture(device, width, height, VIEW_COUNT, HISTORY_FORMAT, 'history 0'),
      createLayeredRenderTexture(device, width, height, VIEW_COUNT, HISTORY_FORMAT, 'history 1')
    );

    this.sceneTexture = scene;
    this.displayTexture = display;
    this.history = history;
    this.sceneLayerViews = VIEW_INDICES.map((view) => createLayerView(scene, view));
    this.displayLayerViews = VIEW_INDICES.map((view) => createLayerView(display, view));
    this.historyLayerViews = SLOTS.map((slot) =>
      VIEW_INDICES.map((view) => createLayerView(history.slot(slot), view))
    );

    // Rebuild bind groups (reference newly created textures).
    const sceneArray = createArrayView(scene);
    this.temporalBindGroups = SLOTS.map((slot) =>
      device.createBindGroup({
        label: `temporal (history ${slot})`,
        layout: this.temporalPass.bindGroupLayouts[0],
        entries: [
          { binding: 0, resource: sceneArray },
          { binding: 1, resource: createArrayView(history.slot(slot)) },
          { binding: 2, resource: this.sampler },
          { binding: 3, resource: { buffer: this.blurBuffer } },
        ],
      })
    );
    this.ambientBindGroup = device.createBindGroup({
      label: 'ambient',
      layout: this.ambientPass.bindGroupLayouts[0],
      entries: [
        { binding: 0, resource: createArrayView(display) },
        { binding: 1, resource: this.sampler },
        { binding: 2, resource: { buffer: this.screenParamsBuffer } },
      ],
    });
  }

  /**
   * Upload the snapshot, encode the frame plan into one command buffer and
   * submit it. History advances for every view whose temporal pass ran.
   */
  renderFrame(snapshot: FrameSnapshot, options: RenderFrameOptions = {}): RenderFrameResult {
    if (this.disposed) {
      throw new Error('[ScreenRenderer] renderFrame() called after dispose().');
    }
    const source = this.sourceBindGroup;
    if (!source) {
      throw new Error('[ScreenRenderer] renderFrame() called before setSource().');
    }
    const display = this.displayTexture;
    const history = this.history;
    const ambientBindGroup = this.ambientBindGroup;
    if (!display || !history || !ambientBindGroup) {
      throw new Error('[ScreenRenderer] Render targets are not allocated.');
    }

    const passes = planFrame({ views: options.views, ambient: options.ambient });
    this.uploadSnapshot(snapshot);

    const encoder = this.device.createCommandEncoder({ label: `frame ${snapshot.frameIndex}` });
    let ambient: GPUTexture | null = null;

    for (const pass of passes) {
      switch (pass.kind) {
        case 'screen':
          this.encodeScreenPass(encoder, pass.view, source);
          break;
        case 'temporal':
          this.encodeTemporalPass(encoder, pass.view, history);
          break;
        case 'ambient':
          this.fitAmbientTarget(snapshot.screen);
          this.encodeAmbientPass(encoder, ambientBindGroup);
          ambient = this.ambientPass.outputTexture;
          break;
      }
    }

    this.device.queue.submit([encoder.finish()]);

    for (const pass of passes) {
      if (pass.kind === 'temporal') history.swap(pass.view);
    }

    return { display, ambient, passes };
  }

  /** Release all GPU resources. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.disposeTargets();

    this.cameraBuffer.destroy();
    this.screenParamsBuffer.destroy();
    this.modelBuffer.destroy();
    this.blurBuffer.destroy();
    for (const buffer of this.viewBuffers) buffer.destroy();

    this.quadBuffer.destroy();
    this.meshVertexBuffer.destroy();
    this.meshIndexBuffer.destroy();

    this.screenPass.dispose();
    this.temporalPass.dispose();
    this.ambientPass.dispose();
    this.sourceBindGroup = null;
  }

  // -----------------------------------------------------------------------
  // Pipeline creation
  // -----------------------------------------------------------------------

  private createScreenPass(strategy: ScreenRenderStrategy): WebGPURenderPass {
    return createWebGPUPass(this.device, {
      name: `screen ${strategy.label}`,
      vertexShader: SCREEN_VERTEX_WGSL,
      fragmentShader: SCREEN_FRAGMENT_WGSL,
      vertexEntryPoint: strategy.vertexEntryPoint,
      fragmentEntryPoint: strategy.fragmentEntryPoint,
      vertexBufferLayouts: [MODEL_VERTEX_LAYOUT],
      colorTargets: [{ format: SCENE_FORMAT }],
      primitive: { topology: 'triangle-list', cullMode: 'none' },
      bindGroupLayouts: [
        this.sourceLayout,
        [
          // binding 0: camera array
          { binding: 0, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
          // binding 1: screen params (curvature in vertex, mapping in fragment)
          {
            binding: 1,
            visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
            buffer: { type: 'uniform' },
          },
          // binding 2: model matrix
          { binding: 2, visibility: GPUShaderStage.VERTEX, buffer: { type: 'uniform' } },
        ],
        this.viewLayout,
      ],
    });
  }

  private createTemporalPass(): WebGPURenderPass {
    return createWebGPUPass(this.device, {
      name: 'temporal',
      vertexShader: FULLSCREEN_VERTEX_WGSL,
      fragmentShader: TEMPORAL_FRAGMENT_WGSL,
      vertexBufferLayouts: [FULLSCREEN_QUAD_LAYOUT],
      colorTargets: [{ format: this.format }, { format: HISTORY_FORMAT }],
      bindGroupLayouts: [
        [
          // binding 0: scene color (all views)
          { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float', viewDimension: '2d-array' } },
          // binding 1: history read slot (all views)
          { binding: 1, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float', viewDimension: '2d-array' } },
          // binding 2: sampler
          { binding: 2, visibility: GPUShaderStage.FRAGMENT, sampler: {} },
          // binding 3: blur params
          { binding: 3, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } },
        ],
        this.viewLayout,
      ],
    });
  }

  private createAmbientPass(): WebGPUFBOPass {
    const width = this.quality.ambientWidth;
    return createWebGPUFBOPass(this.device, {
      name: 'ambient',
      vertexShader: FULLSCREEN_VERTEX_WGSL,
      fragmentShader: AMBIENT_FRAGMENT_WGSL,
      vertexBufferLayouts: [FULLSCREEN_QUAD_LAYOUT],
      colorTargets: [{ format: this.format }],
      bindGroupLayouts: [
        [
          // binding 0: display (layer 0 is sampled)
          { binding: 0, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: 'float', viewDimension: '2d-array' } },
          // binding 1: sampler
          { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: {} },
          // binding 2: screen params (ambient width, aspect ratio)
          { binding: 2, visibility: GPUShaderStage.FRAGMENT, buffer: { type: 'uniform' } },
        ],
      ],
      outputWidth: width,
      outputHeight: width,
      outputFormat: this.format,
    });
  }

  private createScreenUniformBindGroup(): GPUBindGroup {
    return this.device.createBindGroup({
      label: 'screen uniforms',
      layout: this.screenPass.bindGroupLayouts[1],
      entries: [
        { binding: 0, resource: { buffer: this.cameraBuffer } },
        { binding: 1, resource: { buffer: this.screenParamsBuffer } },
        { binding: 2, resource: { buffer: this.modelBuffer } },
      ],
    });
  }

  // -----------------------------------------------------------------------
  // Per-frame helpers
  // -----------------------------------------------------------------------

  private uploadSnapshot(snapshot: FrameSnapshot): void {
    const queue = this.device.queue;
    queue.writeBuffer(this.cameraBuffer, 0, packCameraArray(snapshot.cameras));
    queue.writeBuffer(this.screenParamsBuffer, 0, packScreenParams(snapshot.screen));
    queue.writeBuffer(this.modelBuffer, 0, new Float32Array(snapshot.model));

    const blur = this.quality.temporalBlend
      ? snapshot.blur
      : { ...snapshot.blur, historyDecay: 0 };
    queue.writeBuffer(this.blurBuffer, 0, packTemporalBlurParams(blur));
  }

  /** Ambient target: `ambientWidth` wide, height from the source aspect ratio. */
  private fitAmbientTarget(screen: ScreenParams): void {
    const width = screen.ambientWidth;
    const height = Math.max(1, Math.round(width / screen.aspectRatio));
    if (width !== this.ambientPass.width || height !== this.ambientPass.height) {
      this.ambientPass.resize(this.device, width, height);
    }
  }

  private encodeScreenPass(encoder: GPUCommandEncoder, view: ViewIndex, source: GPUBindGroup): void {
    const pass = encoder.beginRenderPass({
      label: passLabel({ kind: 'screen', view }),
      colorAttachments: [{
        view: this.sceneLayerViews[view],
        clearValue: CLEAR_BLACK,
        loadOp: 'clear',
        storeOp: 'store',
      }],
    });

    pass.setPipeline(this.screenPass.pipeline);
    pass.setBindGroup(0, source);
    pass.setBindGroup(1, this.screenUniformBindGroup);
    pass.setBindGroup(2, this.viewBindGroups[view]);
    pass.setVertexBuffer(0, this.meshVertexBuffer);
    pass.setIndexBuffer(this.meshIndexBuffer, 'uint32');
    pass.drawIndexed(this.mesh.indexCount);
    pass.end();
  }

  private encodeTemporalPass(
    encoder: GPUCommandEncoder,
    view: ViewIndex,
    history: HistoryBuffer<GPUTexture>
  ): void {
    const pass = encoder.beginRenderPass({
      label: passLabel({ kind: 'temporal', view }),
      colorAttachments: [
        {
          view: this.displayLayerViews[view],
          clearValue: CLEAR_BLACK,
          loadOp: 'clear',
          storeOp: 'store',
        },
        {
          view: this.historyLayerViews[history.writeIndex(view)][view],
          clearValue: CLEAR_BLACK,
          loadOp: 'clear',
          storeOp: 'store',
        },
      ],
    });

    pass.setPipeline(this.temporalPass.pipeline);
    pass.setBindGroup(0, this.temporalBindGroups[history.readIndex(view)]);
    pass.setBindGroup(1, this.viewBindGroups[view]);
    pass.setVertexBuffer(0, this.quadBuffer);
    pass.draw(FULLSCREEN_QUAD_VERTEX_COUNT);
    pass.end();
  }

  private encodeAmbientPass(encoder: GPUCommandEncoder, bindGroup: GPUBindGroup): void {
    const pass = encoder.beginRenderPass({
      label: passLabel({ kind: 'ambient' }),
      colorAttachments: [{
        view: this.ambientPass.outputView,
        clearValue: CLEAR_BLACK,
        loadOp: 'clear',
        storeOp: 'store',
      }],
    });

    pass.setPipeline(this.ambientPass.pipeline);
    pass.setBindGroup(0, bindGroup);
    pass.setVertexBuffer(0, this.quadBuffer);
    pass.draw(FULLSCREEN_QUAD_VERTEX_COUNT);
    pass.end();
  }

  // -----------------------------------------------------------------------
  // Cleanup
  // -----------------------------------------------------------------------

  /** Destroy per-eye textures and clear bind groups that reference them. */
  private disposeTargets(): void {
    this.sceneTexture?.destroy();
    this.sceneTexture = null;
    this.displayTexture?.destroy();
    this.displayTexture = null;
    if (this.history) {
      this.history.slot(0).destroy();
      this.history.slot(1).destroy();
      this.history = null;
    }

    this.sceneLayerViews = [];
    this.displayLayerViews = [];
    this.historyLayerViews = [];

    // Bind groups reference destroyed textures; invalidate them.
    this.temporalBindGroups = [];
    this.ambientBindGroup = null;
  }
}
