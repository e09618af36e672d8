/**
 * WebGPU Utilities: shared helpers for the stereo screen renderer.
 *
 * Provides buffer creation, layered render targets, sampler factories, and
 * fullscreen quad geometry.
 */

// ---------------------------------------------------------------------------
// Fullscreen quad
// ---------------------------------------------------------------------------

/** Fullscreen quad vertices: triangle strip covering [-1, 1] NDC. */
const FULLSCREEN_QUAD_VERTICES = new Float32Array([
  -1, -1,
   1, -1,
  -1,  1,
   1,  1,
]);

/** Vertex count of the fullscreen quad strip. */
export const FULLSCREEN_QUAD_VERTEX_COUNT = 4;

/**
 * Create a GPU buffer containing a fullscreen quad (triangle strip, 4 vertices).
 */
export function createFullscreenQuadBuffer(device: GPUDevice): GPUBuffer {
  return createVertexBuffer(device, FULLSCREEN_QUAD_VERTICES, 'fullscreen quad');
}

// ---------------------------------------------------------------------------
// Buffer creation
// ---------------------------------------------------------------------------

/**
 * Create a GPU vertex buffer from Float32Array data.
 */
export function createVertexBuffer(device: GPUDevice, data: Float32Array, label?: string): GPUBuffer {
  const buffer = device.createBuffer({
    label,
    size: data.byteLength,
    usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    mappedAtCreation: true,
  });
  new Float32Array(buffer.getMappedRange()).set(data);
  buffer.unmap();
  return buffer;
}

/**
 * Create a GPU index buffer from Uint32Array data (mesh grids exceed 65535 vertices).
 */
export function createIndexBuffer(device: GPUDevice, data: Uint32Array, label?: string): GPUBuffer {
  const buffer = device.createBuffer({
    label,
    size: data.byteLength,
    usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
    mappedAtCreation: true,
  });
  new Uint32Array(buffer.getMappedRange()).set(data);
  buffer.unmap();
  return buffer;
}

/**
 * Create a GPU uniform buffer of the given byte size.
 */
export function createUniformBuffer(device: GPUDevice, byteSize: number, label?: string): GPUBuffer {
  // Uniform buffers must be aligned to 16 bytes.
  const alignedSize = Math.ceil(byteSize / 16) * 16;
  return device.createBuffer({
    label,
    size: alignedSize,
    usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
  });
}

// ---------------------------------------------------------------------------
// Texture creation
// ---------------------------------------------------------------------------

/**
 * Create a 2D array texture with one layer per view, usable as a render
 * attachment (one layer at a time) and as a sampled `texture_2d_array`.
 */
export function createLayeredRenderTexture(
  device: GPUDevice,
  width: number,
  height: number,
  layers: number,
  format: GPUTextureFormat = 'rgba8unorm',
  label?: string
): GPUTexture {
  return device.createTexture({
    label,
    size: [width, height, layers],
    dimension: '2d',
    format,
    usage:
      GPUTextureUsage.RENDER_ATTACHMENT |
      GPUTextureUsage.TEXTURE_BINDING |
      GPUTextureUsage.COPY_SRC,
  });
}

/** View of a single layer, for use as a color attachment. */
export function createLayerView(texture: GPUTexture, layer: number): GPUTextureView {
  return texture.createView({
    dimension: '2d',
    baseArrayLayer: layer,
    arrayLayerCount: 1,
  });
}

/** View of every layer, for sampling as `texture_2d_array`. */
export function createArrayView(texture: GPUTexture): GPUTextureView {
  return texture.createView({ dimension: '2d-array' });
}

// ---------------------------------------------------------------------------
// Sampler factories
// ---------------------------------------------------------------------------

/** Create a linear-filtering, clamp-to-edge sampler. */
export function createLinearSampler(device: GPUDevice): GPUSampler {
  return device.createSampler({
    magFilter: 'linear',
    minFilter: 'linear',
    addressModeU: 'clamp-to-edge',
    addressModeV: 'clamp-to-edge',
  });
}
