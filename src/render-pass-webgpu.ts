/**
 * WebGPU Render Pass Framework: pipeline and bind group layout management.
 *
 * - Pipeline state objects bake blend and target config at creation
 * - Bind group layouts are explicit and ordered by group index, so a layout
 *   can be shared between pipelines (the per-view group is)
 * - No mutable state machine
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single WebGPU render pass with its pipeline and bind group layouts. */
export interface WebGPURenderPass {
  readonly name: string;
  readonly pipeline: GPURenderPipeline;
  /** One layout per bind group, indexed by group number. */
  readonly bindGroupLayouts: readonly GPUBindGroupLayout[];
  dispose(): void;
}

/** A WebGPU render pass that outputs to an offscreen texture. */
export interface WebGPUFBOPass extends WebGPURenderPass {
  outputTexture: GPUTexture;
  outputView: GPUTextureView;
  width: number;
  height: number;
  resize(device: GPUDevice, w: number, h: number, format?: GPUTextureFormat): void;
}

/**
 * A bind group layout for one group: either fresh entries, or a layout
 * created elsewhere that this pipeline shares.
 */
export type BindGroupLayoutSource = readonly GPUBindGroupLayoutEntry[] | GPUBindGroupLayout;

/** Configuration for creating a WebGPU render pass. */
export interface WebGPURenderPassConfig {
  readonly name: string;
  readonly vertexShader: string;
  readonly fragmentShader: string;
  /** Defaults to `vs_main`. */
  readonly vertexEntryPoint?: string;
  /** Defaults to `fs_main`. */
  readonly fragmentEntryPoint?: string;
  readonly vertexBufferLayouts: GPUVertexBufferLayout[];
  readonly colorTargets: GPUColorTargetState[];
  readonly primitive?: GPUPrimitiveState;
  readonly bindGroupLayouts: readonly BindGroupLayoutSource[];
}

/** Configuration for creating a WebGPU FBO pass. */
export interface WebGPUFBOPassConfig extends WebGPURenderPassConfig {
  readonly outputWidth: number;
  readonly outputHeight: number;
  readonly outputFormat?: GPUTextureFormat;
}

// ---------------------------------------------------------------------------
// Pass creation
// ---------------------------------------------------------------------------

/**
 * Create a WebGPU render pass with explicit bind group layouts.
 */
export function createWebGPUPass(
  device: GPUDevice,
  config: WebGPURenderPassConfig
): WebGPURenderPass {
  const bindGroupLayouts = config.bindGroupLayouts.map((source, group) =>
    isBindGroupLayout(source)
      ? source
      : device.createBindGroupLayout({
          label: `${config.name} group ${group}`,
          entries: [...source],
        })
  );

  const pipelineLayout = device.createPipelineLayout({
    label: config.name,
    bindGroupLayouts,
  });

  const pipeline = device.createRenderPipeline({
    label: config.name,
    layout: pipelineLayout,
    vertex: {
      module: device.createShaderModule({ label: `${config.name} vertex`, code: config.vertexShader }),
      entryPoint: config.vertexEntryPoint ?? 'vs_main',
      buffers: config.vertexBufferLayouts,
    },
    fragment: {
      module: device.createShaderModule({ label: `${config.name} fragment`, code: config.fragmentShader }),
      entryPoint: config.fragmentEntryPoint ?? 'fs_main',
      targets: config.colorTargets,
    },
    primitive: config.primitive ?? { topology: 'triangle-strip' },
  });

  return {
    name: config.name,
    pipeline,
    bindGroupLayouts,
    dispose() {
      // Pipelines and layouts are garbage collected; nothing to destroy.
    },
  };
}

/**
 * Create a WebGPU FBO pass that renders to an offscreen texture.
 */
export function createWebGPUFBOPass(
  device: GPUDevice,
  config: WebGPUFBOPassConfig
): WebGPUFBOPass {
  const basePass = createWebGPUPass(device, config);
  const format = config.outputFormat ?? 'rgba8unorm';
  const outputTexture = createOutputTexture(device, config.outputWidth, config.outputHeight, format, config.name);

  return {
    ...basePass,
    outputTexture,
    outputView: outputTexture.createView(),
    width: config.outputWidth,
    height: config.outputHeight,
    resize(dev: GPUDevice, w: number, h: number, fmt?: GPUTextureFormat) {
      this.outputTexture.destroy();
      this.outputTexture = createOutputTexture(dev, w, h, fmt ?? format, config.name);
      this.outputView = this.outputTexture.createView();
      this.width = w;
      this.height = h;
    },
    dispose() {
      this.outputTexture.destroy();
      basePass.dispose();
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isBindGroupLayout(source: BindGroupLayoutSource): source is GPUBindGroupLayout {
  return !Array.isArray(source);
}

function createOutputTexture(
  device: GPUDevice,
  width: number,
  height: number,
  format: GPUTextureFormat,
  label: string
): GPUTexture {
  return device.createTexture({
    label,
    size: [width, height],
    format,
    usage:
      GPUTextureUsage.RENDER_ATTACHMENT |
      GPUTextureUsage.TEXTURE_BINDING |
      GPUTextureUsage.COPY_SRC,
  });
}

// ---------------------------------------------------------------------------
// Common vertex buffer layouts
// ---------------------------------------------------------------------------

/** Fullscreen quad vertex buffer layout: position (vec2). */
export const FULLSCREEN_QUAD_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: 8,
  attributes: [
    { shaderLocation: 0, offset: 0, format: 'float32x2' },
  ],
};

/** Screen mesh vertex buffer layout: position (vec3) + uv (vec2). */
export const MODEL_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: 20,
  attributes: [
    { shaderLocation: 0, offset: 0, format: 'float32x3' },
    { shaderLocation: 1, offset: 12, format: 'float32x2' },
  ],
};
