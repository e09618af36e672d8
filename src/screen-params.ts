/**
 * ScreenParams: the uniform shared by the screen and ambient passes.
 *
 * WGSL layout (`struct ScreenParams` in the screen and ambient shaders):
 *
 *   x_curvature f32 | y_curvature f32 | eye_offset f32 | y_offset f32 |
 *   x_offset f32 | aspect_ratio f32 | screen_width u32 | ambient_width u32 |
 *   stereo_x f32 | stereo_y f32
 *
 * Ten 4-byte scalars = 40 bytes, padded to 48 for the uniform buffer.
 */

import type { ScreenConfig } from './config';
import { eyeAspectRatio, stereoFlags, type StereoMode } from './stereo-mode';

export interface ScreenParams {
  readonly xCurvature: number;
  readonly yCurvature: number;
  /** View index used as the symmetric pivot when picking a half (0 or 1). */
  readonly eyeOffset: number;
  /** UV-space mirror offset on the vertical axis (0 = none, 1 = flipped). */
  readonly yOffset: number;
  /** UV-space mirror offset on the horizontal axis (0 = none, 1 = flipped). */
  readonly xOffset: number;
  readonly aspectRatio: number;
  /** Sampling width of the screen pass, in texels. */
  readonly screenWidth: number;
  /** Sampling width of the ambient pass, in texels. */
  readonly ambientWidth: number;
  readonly stereoX: 0 | 1;
  readonly stereoY: 0 | 1;
}

/** Byte size of the WGSL struct. */
export const SCREEN_PARAMS_STRUCT_SIZE = 40;

/** Byte size of the uniform buffer holding the struct. */
export const SCREEN_PARAMS_BUFFER_SIZE = 48;

/** Description of the current capture, as reported by the video source. */
export interface SourceDescriptor {
  readonly width: number;
  readonly height: number;
  readonly stereoMode: StereoMode;
}

/**
 * Convert user configuration plus the current source into the uniform.
 *
 * `swapEyes` becomes the pivot view (1 when swapped), and each flip flag
 * becomes a mirror offset of 1.
 */
export function buildScreenParams(
  config: ScreenConfig,
  source: SourceDescriptor,
  sampling: { readonly screenWidth: number; readonly ambientWidth: number },
): ScreenParams {
  const flags = stereoFlags(source.stereoMode);
  return {
    xCurvature: config.xCurvature,
    yCurvature: config.yCurvature,
    eyeOffset: config.swapEyes ? 1 : 0,
    yOffset: config.flipY ? 1 : 0,
    xOffset: config.flipX ? 1 : 0,
    aspectRatio: eyeAspectRatio(source.stereoMode, source.width, source.height),
    screenWidth: Math.max(1, Math.round(sampling.screenWidth)),
    ambientWidth: Math.max(1, Math.round(sampling.ambientWidth)),
    stereoX: flags.stereoX,
    stereoY: flags.stereoY,
  };
}

/** Serialize to the WGSL struct layout. */
export function packScreenParams(params: ScreenParams): ArrayBuffer {
  const buf = new ArrayBuffer(SCREEN_PARAMS_BUFFER_SIZE);
  const f32 = new Float32Array(buf);
  const u32 = new Uint32Array(buf);

  f32[0] = params.xCurvature;
  f32[1] = params.yCurvature;
  f32[2] = params.eyeOffset;
  f32[3] = params.yOffset;
  f32[4] = params.xOffset;
  f32[5] = params.aspectRatio;
  u32[6] = params.screenWidth;
  u32[7] = params.ambientWidth;
  f32[8] = params.stereoX;
  f32[9] = params.stereoY;
  // [10], [11]: padding

  return buf;
}
