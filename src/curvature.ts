/**
 * Curvature Projector: CPU reference for `vs_curved` / `vs_flat`.
 *
 * The flat plane is pushed along -Z by an amount that is largest at the UV
 * center and zero on the border:
 *
 *   dx = (u - 0.5) * 2,  dy = (v - 0.5) * 2
 *   z' = z - (1 - dx²) * xCurvature - (1 - dy²) * yCurvature
 *
 * The two axes add; either may be zero independently.
 */

import { mat4, vec4, type Mat4, type Vec4 } from 'wgpu-matrix';
import type { ScreenParams } from './screen-params';

export type Vec3Tuple = readonly [number, number, number];
export type UV = readonly [number, number];

/** Depth displacement applied at `uv` (always <= 0 for positive curvature). */
export function curvatureOffset(
  uv: UV,
  params: Pick<ScreenParams, 'xCurvature' | 'yCurvature'>,
): number {
  return curvePosition([0, 0, 0], uv, params)[2];
}

/** Displaced model-space position. */
export function curvePosition(
  position: Vec3Tuple,
  uv: UV,
  params: Pick<ScreenParams, 'xCurvature' | 'yCurvature'>,
): [number, number, number] {
  const dx = (uv[0] - 0.5) * 2;
  const dy = (uv[1] - 0.5) * 2;
  const z = position[2] - (1 - dx * dx) * params.xCurvature - (1 - dy * dy) * params.yCurvature;
  return [position[0], position[1], z];
}

/** `viewProjection * model * curve(position)`, as clip coordinates. */
export function projectCurvedVertex(
  position: Vec3Tuple,
  uv: UV,
  params: Pick<ScreenParams, 'xCurvature' | 'yCurvature'>,
  viewProjection: Mat4,
  model: Mat4,
): Vec4 {
  const curved = curvePosition(position, uv, params);
  const mvp = mat4.multiply(viewProjection, model);
  return vec4.transformMat4([curved[0], curved[1], curved[2], 1], mvp);
}

/** `viewProjection * position`: no model transform, no curvature. */
export function projectFlatVertex(position: Vec3Tuple, viewProjection: Mat4): Vec4 {
  return vec4.transformMat4([position[0], position[1], position[2], 1], viewProjection);
}
