/**
 * In-process stand-in for a WebGPU device.
 *
 * Records every resource, write and encoded pass so tests can assert on
 * what the renderer asked the GPU to do. Nothing is rasterized.
 */

export class FakeBuffer {
  readonly label: string;
  readonly size: number;
  readonly usage: number;
  readonly data: ArrayBuffer;
  destroyed = false;

  constructor(descriptor: GPUBufferDescriptor) {
    this.label = descriptor.label ?? '';
    this.size = descriptor.size;
    this.usage = descriptor.usage;
    this.data = new ArrayBuffer(descriptor.size);
  }

  getMappedRange(): ArrayBuffer {
    return this.data;
  }

  unmap(): void {}

  destroy(): void {
    this.destroyed = true;
  }

  f32(): Float32Array {
    return new Float32Array(this.data);
  }

  u32(): Uint32Array {
    return new Uint32Array(this.data);
  }
}

export class FakeTextureView {
  constructor(
    readonly texture: FakeTexture,
    readonly descriptor: GPUTextureViewDescriptor,
  ) {}
}

export class FakeTexture {
  readonly label: string;
  readonly size: readonly number[];
  readonly format: GPUTextureFormat;
  readonly usage: number;
  destroyed = false;

  constructor(descriptor: GPUTextureDescriptor) {
    this.label = descriptor.label ?? '';
    this.size = Array.isArray(descriptor.size) ? [...descriptor.size] : [];
    this.format = descriptor.format;
    this.usage = descriptor.usage;
  }

  createView(descriptor: GPUTextureViewDescriptor = {}): FakeTextureView {
    return new FakeTextureView(this, descriptor);
  }

  destroy(): void {
    this.destroyed = true;
  }
}

export class FakeBindGroup {
  readonly label: string;
  constructor(readonly descriptor: GPUBindGroupDescriptor) {
    this.label = descriptor.label ?? '';
  }
}

export class FakePipeline {
  readonly label: string;
  constructor(readonly descriptor: GPURenderPipelineDescriptor) {
    this.label = descriptor.label ?? '';
  }
}

export interface RecordedDraw {
  readonly indexed: boolean;
  readonly count: number;
}

export class FakeRenderPass {
  readonly label: string;
  readonly attachments: FakeTextureView[];
  pipeline: FakePipeline | null = null;
  readonly bindGroups = new Map<number, FakeBindGroup>();
  readonly vertexBuffers = new Map<number, FakeBuffer>();
  indexBuffer: { buffer: FakeBuffer; format: GPUIndexFormat } | null = null;
  readonly draws: RecordedDraw[] = [];
  ended = false;

  constructor(descriptor: GPURenderPassDescriptor) {
    this.label = descriptor.label ?? '';
    this.attachments = [];
    for (const attachment of descriptor.colorAttachments) {
      if (attachment && attachment.view instanceof FakeTextureView) {
        this.attachments.push(attachment.view);
      }
    }
  }

  setPipeline(pipeline: FakePipeline): void {
    this.pipeline = pipeline;
  }

  setBindGroup(index: number, group: FakeBindGroup): void {
    this.bindGroups.set(index, group);
  }

  setVertexBuffer(slot: number, buffer: FakeBuffer): void {
    this.vertexBuffers.set(slot, buffer);
  }

  setIndexBuffer(buffer: FakeBuffer, format: GPUIndexFormat): void {
    this.indexBuffer = { buffer, format };
  }

  draw(count: number): void {
    this.draws.push({ indexed: false, count });
  }

  drawIndexed(count: number): void {
    this.draws.push({ indexed: true, count });
  }

  end(): void {
    this.ended = true;
  }
}

export class FakeCommandBuffer {
  constructor(
    readonly label: string,
    readonly passes: readonly FakeRenderPass[],
  ) {}
}

export class FakeCommandEncoder {
  readonly passes: FakeRenderPass[] = [];
  constructor(readonly label: string) {}

  beginRenderPass(descriptor: GPURenderPassDescriptor): FakeRenderPass {
    const pass = new FakeRenderPass(descriptor);
    this.passes.push(pass);
    return pass;
  }

  finish(): FakeCommandBuffer {
    return new FakeCommandBuffer(this.label, this.passes);
  }
}

export interface RecordedWrite {
  readonly buffer: FakeBuffer;
  readonly offset: number;
  readonly byteLength: number;
}

export class FakeQueue {
  readonly writes: RecordedWrite[] = [];
  readonly submitted: FakeCommandBuffer[] = [];

  writeBuffer(buffer: FakeBuffer, offset: number, data: ArrayBuffer | ArrayBufferView): void {
    const bytes = data instanceof ArrayBuffer
      ? new Uint8Array(data)
      : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    new Uint8Array(buffer.data).set(bytes, offset);
    this.writes.push({ buffer, offset, byteLength: bytes.byteLength });
  }

  submit(commandBuffers: FakeCommandBuffer[]): void {
    this.submitted.push(...commandBuffers);
  }
}

export class FakeDevice {
  readonly queue = new FakeQueue();
  readonly buffers: FakeBuffer[] = [];
  readonly textures: FakeTexture[] = [];
  readonly pipelines: FakePipeline[] = [];
  readonly bindGroups: FakeBindGroup[] = [];
  readonly lost: Promise<GPUDeviceLostInfo>;
  private resolveLost: (info: GPUDeviceLostInfo) => void = () => {};

  constructor() {
    this.lost = new Promise((resolve) => {
      this.resolveLost = resolve;
    });
  }

  /** Resolve `lost` the way a browser does on device loss. */
  loseDevice(reason: GPUDeviceLostReason, message: string): void {
    this.resolveLost({ reason, message } as unknown as GPUDeviceLostInfo);
  }

  createBuffer(descriptor: GPUBufferDescriptor): FakeBuffer {
    const buffer = new FakeBuffer(descriptor);
    this.buffers.push(buffer);
    return buffer;
  }

  createTexture(descriptor: GPUTextureDescriptor): FakeTexture {
    const texture = new FakeTexture(descriptor);
    this.textures.push(texture);
    return texture;
  }

  createSampler(descriptor: GPUSamplerDescriptor = {}): { descriptor: GPUSamplerDescriptor } {
    return { descriptor };
  }

  createBindGroupLayout(descriptor: GPUBindGroupLayoutDescriptor): { descriptor: GPUBindGroupLayoutDescriptor } {
    return { descriptor };
  }

  createPipelineLayout(descriptor: GPUPipelineLayoutDescriptor): { descriptor: GPUPipelineLayoutDescriptor } {
    return { descriptor };
  }

  createShaderModule(descriptor: GPUShaderModuleDescriptor): { code: string } {
    return { code: descriptor.code };
  }

  createRenderPipeline(descriptor: GPURenderPipelineDescriptor): FakePipeline {
    const pipeline = new FakePipeline(descriptor);
    this.pipelines.push(pipeline);
    return pipeline;
  }

  createBindGroup(descriptor: GPUBindGroupDescriptor): FakeBindGroup {
    const group = new FakeBindGroup(descriptor);
    this.bindGroups.push(group);
    return group;
  }

  createCommandEncoder(descriptor: GPUCommandEncoderDescriptor = {}): FakeCommandEncoder {
    return new FakeCommandEncoder(descriptor.label ?? '');
  }

  asGPUDevice(): GPUDevice {
    return this as unknown as GPUDevice;
  }

  /** Live (not destroyed) buffer with the given label. */
  buffer(label: string): FakeBuffer {
    const found = this.buffers.find((b) => b.label === label && !b.destroyed);
    if (!found) throw new Error(`no live buffer "${label}"`);
    return found;
  }

  /** Live (not destroyed) texture with the given label. */
  texture(label: string): FakeTexture {
    const found = this.textures.find((t) => t.label === label && !t.destroyed);
    if (!found) throw new Error(`no live texture "${label}"`);
    return found;
  }

  lastFrame(): FakeCommandBuffer {
    const frame = this.queue.submitted[this.queue.submitted.length - 1];
    if (!frame) throw new Error('nothing submitted');
    return frame;
  }
}
