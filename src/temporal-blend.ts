/**
 * Temporal Blend Stage: CPU reference for `shaders/temporal/fragment.wgsl`.
 *
 * Blends the current frame toward the previous frame's history, then gates
 * the result by luminance so that near-black regions do not accumulate
 * codec noise:
 *
 *   mixed      = mix(current, history, historyDecay)
 *   brightness = smoothstep(0.05, 0.35, luminance(mixed))
 *   display    = (mixed.rgb * brightness, 1)
 *   history'   = (mixed.rgb, 1)
 *
 * Both outputs come from the same evaluation, matching the two color
 * attachments of the GPU pass. `historyDecay` is used as given; callers
 * clamp it (see `buildTemporalBlurParams`).
 */

import { getJitter } from './jitter';
import { clamp, mix, smoothstep } from './shading-math';
import { createImage, sampleImage, writePixel, type Rgba, type RgbaImage } from './image';

/** Rec. 709 luminance weights. */
export const LUMINANCE_WEIGHTS = [0.2126, 0.7152, 0.0722] as const;

/** Luminance below which the output is black. */
export const GATE_LOW = 0.05;

/** Luminance above which the output is unattenuated. */
export const GATE_HIGH = 0.35;

export interface TemporalBlurParams {
  /** Sub-pixel sampling offset for the current frame. */
  readonly jitter: readonly [number, number];
  /** Jitter-to-UV scale. */
  readonly scale: readonly [number, number];
  /** Output resolution in pixels. */
  readonly resolution: readonly [number, number];
  /** Blend weight toward history, expected in [0, 1]. */
  readonly historyDecay: number;
}

/** WGSL: jitter(8) + scale(8) + resolution(8) + history_decay(4) = 28 → 32. */
export const TEMPORAL_BLUR_BUFFER_SIZE = 32;

export interface TemporalBlendResult {
  readonly color: Rgba;
  readonly history: Rgba;
}

export function luminance(color: Rgba): number {
  return (
    color[0] * LUMINANCE_WEIGHTS[0] +
    color[1] * LUMINANCE_WEIGHTS[1] +
    color[2] * LUMINANCE_WEIGHTS[2]
  );
}

/** Blend one pixel. */
export function temporalBlendPixel(
  current: Rgba,
  history: Rgba,
  historyDecay: number,
): TemporalBlendResult {
  const r = mix(current[0], history[0], historyDecay);
  const g = mix(current[1], history[1], historyDecay);
  const b = mix(current[2], history[2], historyDecay);
  const brightness = smoothstep(GATE_LOW, GATE_HIGH, luminance([r, g, b, 1]));
  return {
    color: [r * brightness, g * brightness, b * brightness, 1],
    history: [r, g, b, 1],
  };
}

/**
 * Run the stage over whole images.
 *
 * `current` is sampled at `uv + jitter * scale`, `history` at `uv`. Output
 * size is `params.resolution`.
 */
export function temporalBlendImage(
  current: RgbaImage,
  history: RgbaImage,
  params: TemporalBlurParams,
): { display: RgbaImage; history: RgbaImage } {
  const [width, height] = params.resolution;
  const display = createImage(width, height);
  const nextHistory = createImage(width, height);
  const du = params.jitter[0] * params.scale[0];
  const dv = params.jitter[1] * params.scale[1];

  for (let y = 0; y < height; y++) {
    const v = (y + 0.5) / height;
    for (let x = 0; x < width; x++) {
      const u = (x + 0.5) / width;
      const result = temporalBlendPixel(
        sampleImage(current, u + du, v + dv),
        sampleImage(history, u, v),
        params.historyDecay,
      );
      writePixel(display, x, y, result.color);
      writePixel(nextHistory, x, y, result.history);
    }
  }

  return { display, history: nextHistory };
}

/**
 * Caller-side construction of the per-frame params: clamps the decay and
 * derives jitter from the frame index.
 */
export function buildTemporalBlurParams(
  frameIndex: number,
  resolution: readonly [number, number],
  historyDecay: number,
  scale: readonly [number, number] = [1, 1],
): TemporalBlurParams {
  return {
    jitter: getJitter(frameIndex, resolution),
    scale,
    resolution,
    historyDecay: clamp(historyDecay, 0, 1),
  };
}

export function packTemporalBlurParams(params: TemporalBlurParams): ArrayBuffer {
  const buf = new ArrayBuffer(TEMPORAL_BLUR_BUFFER_SIZE);
  const data = new Float32Array(buf);
  data[0] = params.jitter[0];
  data[1] = params.jitter[1];
  data[2] = params.scale[0];
  data[3] = params.scale[1];
  data[4] = params.resolution[0];
  data[5] = params.resolution[1];
  data[6] = params.historyDecay;
  return buf;
}
