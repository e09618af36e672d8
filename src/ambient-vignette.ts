/**
 * Ambient Vignette Stage: CPU reference for `shaders/ambient/fragment.wgsl`.
 *
 * A 3x3 weighted blur of the left-eye display image, darkened radially:
 *
 *   vignette = 1 - smoothstep(0.35, 0.5, length(clamp(uv, 0, 1) - 0.5))
 *
 * Tap spacing is `1 / ambientWidth` horizontally and
 * `aspectRatio / ambientWidth` vertically, which keeps the kernel square on
 * screen. Ambient light is not stereo: the stage always reads view 0.
 */

import { clamp, smoothstep } from './shading-math';
import { renderImage, type Rgba, type RgbaImage } from './image';
import type { ScreenParams } from './screen-params';

export const VIGNETTE_INNER = 0.35;
export const VIGNETTE_OUTER = 0.5;

export interface KernelTap {
  readonly dx: -1 | 0 | 1;
  readonly dy: -1 | 0 | 1;
  readonly weight: number;
}

const CORNER = 0.0625;
const EDGE = 0.125;
const CENTER = 0.25;

/** Nine taps; weights sum to 1. */
export const AMBIENT_KERNEL: readonly KernelTap[] = [
  { dx: -1, dy: -1, weight: CORNER },
  { dx: 0, dy: -1, weight: EDGE },
  { dx: 1, dy: -1, weight: CORNER },
  { dx: -1, dy: 0, weight: EDGE },
  { dx: 0, dy: 0, weight: CENTER },
  { dx: 1, dy: 0, weight: EDGE },
  { dx: -1, dy: 1, weight: CORNER },
  { dx: 0, dy: 1, weight: EDGE },
  { dx: 1, dy: 1, weight: CORNER },
];

type AmbientParams = Pick<ScreenParams, 'ambientWidth' | 'aspectRatio'>;

export function vignetteFactor(u: number, v: number): number {
  const x = clamp(u, 0, 1) - 0.5;
  const y = clamp(v, 0, 1) - 0.5;
  return 1 - smoothstep(VIGNETTE_INNER, VIGNETTE_OUTER, Math.hypot(x, y));
}

/** UV distance between neighboring taps. */
export function ambientStep(params: AmbientParams): [number, number] {
  return [1 / params.ambientWidth, params.aspectRatio / params.ambientWidth];
}

/** Shade one ambient pixel from a left-eye sampler. */
export function ambientPixel(
  sampleLeft: (u: number, v: number) => Rgba,
  u: number,
  v: number,
  params: AmbientParams,
): Rgba {
  const [stepU, stepV] = ambientStep(params);
  let r = 0;
  let g = 0;
  let b = 0;
  for (const tap of AMBIENT_KERNEL) {
    const c = sampleLeft(u + tap.dx * stepU, v + tap.dy * stepV);
    r += c[0] * tap.weight;
    g += c[1] * tap.weight;
    b += c[2] * tap.weight;
  }
  const vignette = vignetteFactor(u, v);
  return [r * vignette, g * vignette, b * vignette, 1];
}

/** Shade a full ambient target of `width` x `height`. */
export function ambientImage(
  sampleLeft: (u: number, v: number) => Rgba,
  width: number,
  height: number,
  params: AmbientParams,
): RgbaImage {
  return renderImage(width, height, (u, v) => ambientPixel(sampleLeft, u, v, params));
}
