/**
 * Stereo UV Mapper: CPU reference for `stereo_uv()` / `legacy_uv()` in
 * `shaders/screen/fragment.wgsl`.
 *
 * Symmetric form, per axis (shown for X):
 *
 *   d   = 1 + stereoX                       (1 = whole image, 2 = one half)
 *   off = |view - eyeOffset| / 2 * stereoX
 *   u'  = |u - xOffset| / d + off
 *
 * `eyeOffset` names the view that samples the first half, so swapping eyes
 * is a parameter change. An offset of 1 mirrors the axis through `|...|`.
 * With a flag at 0 the offset term vanishes and the whole source maps 1:1
 * for every view.
 */

import type { UV } from './curvature';
import type { ScreenParams } from './screen-params';

type MappingParams = Pick<
  ScreenParams,
  'eyeOffset' | 'xOffset' | 'yOffset' | 'stereoX' | 'stereoY'
>;

export function mapStereoUV(uv: UV, view: number, params: MappingParams): [number, number] {
  const divisorX = 2 - (1 - params.stereoX);
  const divisorY = 2 - (1 - params.stereoY);
  const eye = Math.abs(view - params.eyeOffset) / 2;
  return [
    Math.abs(uv[0] - params.xOffset) / divisorX + eye * params.stereoX,
    Math.abs(uv[1] - params.yOffset) / divisorY + eye * params.stereoY,
  ];
}

/** Mono sampling: the symmetric mapping pinned to view 0. */
export function mapMonoUV(uv: UV, params: MappingParams): [number, number] {
  return mapStereoUV(uv, 0, params);
}

/**
 * Direct halving used by the low-feature pipeline: view 0 reads the left
 * half, view 1 the right. No pivot, no mirroring, no vertical split.
 */
export function mapStereoUVLegacy(uv: UV, view: number): [number, number] {
  return [uv[0] / 2 + view / 2, uv[1]];
}
