/**
 * CPU image model used by the reference shading stages.
 *
 * Pixels are linear RGBA floats, row-major, top row first (matching the
 * WebGPU texture origin). Sampling mirrors a linear, clamp-to-edge
 * `GPUSampler`: texel centers sit at half-integer coordinates.
 */

/** One RGBA color. */
export type Rgba = readonly [number, number, number, number];

export interface RgbaImage {
  readonly width: number;
  readonly height: number;
  /** `width * height * 4` floats. */
  readonly data: Float32Array;
}

export function createImage(width: number, height: number, fill: Rgba = [0, 0, 0, 0]): RgbaImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new Error(`[Image] Invalid dimensions ${width}x${height}.`);
  }
  const data = new Float32Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill[0];
    data[i + 1] = fill[1];
    data[i + 2] = fill[2];
    data[i + 3] = fill[3];
  }
  return { width, height, data };
}

/** Fetch a texel, clamping the coordinates to the image bounds. */
export function readPixel(image: RgbaImage, x: number, y: number): Rgba {
  const cx = Math.min(Math.max(x, 0), image.width - 1);
  const cy = Math.min(Math.max(y, 0), image.height - 1);
  const i = (cy * image.width + cx) * 4;
  const d = image.data;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

export function writePixel(image: RgbaImage, x: number, y: number, color: Rgba): void {
  const i = (y * image.width + x) * 4;
  image.data[i] = color[0];
  image.data[i + 1] = color[1];
  image.data[i + 2] = color[2];
  image.data[i + 3] = color[3];
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Bilinear, clamp-to-edge sample at normalized coordinates. */
export function sampleImage(image: RgbaImage, u: number, v: number): Rgba {
  const x = u * image.width - 0.5;
  const y = v * image.height - 0.5;
  const x0 = Math.floor(x);
  const y0 = Math.floor(y);
  const fx = x - x0;
  const fy = y - y0;

  const a = readPixel(image, x0, y0);
  const b = readPixel(image, x0 + 1, y0);
  const c = readPixel(image, x0, y0 + 1);
  const d = readPixel(image, x0 + 1, y0 + 1);

  const out: [number, number, number, number] = [0, 0, 0, 0];
  for (let k = 0; k < 4; k++) {
    out[k] = lerp(lerp(a[k], b[k], fx), lerp(c[k], d[k], fx), fy);
  }
  return out;
}

/**
 * Evaluate a fragment function at every pixel center, like a fullscreen
 * draw into a `width` x `height` target.
 */
export function renderImage(
  width: number,
  height: number,
  fragment: (u: number, v: number) => Rgba,
): RgbaImage {
  const image = createImage(width, height);
  for (let y = 0; y < height; y++) {
    const v = (y + 0.5) / height;
    for (let x = 0; x < width; x++) {
      writePixel(image, x, y, fragment((x + 0.5) / width, v));
    }
  }
  return image;
}
