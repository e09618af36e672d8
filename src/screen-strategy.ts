/**
 * Screen render strategies.
 *
 * The screen pass comes in a closed set of variants: geometry
 * `{flat, curved}` × sampling `{stereo, mono, legacy}`. A variant only
 * chooses which vertex and fragment entry points run (and, on the CPU
 * side, which reference functions compose); the pass code is shared.
 *
 * - `curved`: model transform + curvature (`vs_curved`).
 * - `flat`: neither; positions are already in tracking space (`vs_flat`).
 * - `stereo`: symmetric offset/flip mapping, per view (`fs_stereo`).
 * - `mono`: symmetric mapping pinned to view 0 (`fs_mono`).
 * - `legacy`: direct halving without offsets (`fs_legacy`).
 */

import type { Mat4, Vec4 } from 'wgpu-matrix';
import { selectViewProjection, type CameraArray, type ViewIndex } from './camera-array';
import { projectCurvedVertex, projectFlatVertex, type UV, type Vec3Tuple } from './curvature';
import type { ScreenParams } from './screen-params';
import { mapMonoUV, mapStereoUV, mapStereoUVLegacy } from './stereo-uv';

export type ScreenGeometry = 'flat' | 'curved';
export type ScreenSampling = 'stereo' | 'mono' | 'legacy';

export type VertexEntryPoint = 'vs_curved' | 'vs_flat';
export type FragmentEntryPoint = 'fs_stereo' | 'fs_mono' | 'fs_legacy';

/** Uniform inputs the strategies read. */
export interface StrategyUniforms {
  readonly cameras: CameraArray;
  readonly screen: ScreenParams;
  readonly model: Mat4;
}

export interface ScreenRenderStrategy {
  readonly geometry: ScreenGeometry;
  readonly sampling: ScreenSampling;
  readonly label: string;
  readonly vertexEntryPoint: VertexEntryPoint;
  readonly fragmentEntryPoint: FragmentEntryPoint;
  /** Clip-space position of a mesh vertex for `view`. */
  projectVertex(position: Vec3Tuple, uv: UV, view: ViewIndex, uniforms: StrategyUniforms): Vec4;
  /** Source-texture UV for a screen UV and `view`. */
  mapUV(uv: UV, view: ViewIndex, screen: ScreenParams): [number, number];
}

const VERTEX_ENTRY: Record<ScreenGeometry, VertexEntryPoint> = {
  curved: 'vs_curved',
  flat: 'vs_flat',
};

const FRAGMENT_ENTRY: Record<ScreenSampling, FragmentEntryPoint> = {
  stereo: 'fs_stereo',
  mono: 'fs_mono',
  legacy: 'fs_legacy',
};

const projectors: Record<ScreenGeometry, ScreenRenderStrategy['projectVertex']> = {
  curved: (position, uv, view, uniforms) =>
    projectCurvedVertex(
      position,
      uv,
      uniforms.screen,
      selectViewProjection(uniforms.cameras, view),
      uniforms.model,
    ),
  flat: (position, _uv, view, uniforms) =>
    projectFlatVertex(position, selectViewProjection(uniforms.cameras, view)),
};

const mappers: Record<ScreenSampling, ScreenRenderStrategy['mapUV']> = {
  stereo: (uv, view, screen) => mapStereoUV(uv, view, screen),
  mono: (uv, _view, screen) => mapMonoUV(uv, screen),
  legacy: (uv, view) => mapStereoUVLegacy(uv, view),
};

function buildStrategy(geometry: ScreenGeometry, sampling: ScreenSampling): ScreenRenderStrategy {
  return Object.freeze({
    geometry,
    sampling,
    label: `${geometry}-${sampling}`,
    vertexEntryPoint: VERTEX_ENTRY[geometry],
    fragmentEntryPoint: FRAGMENT_ENTRY[sampling],
    projectVertex: projectors[geometry],
    mapUV: mappers[sampling],
  });
}

const GEOMETRIES: readonly ScreenGeometry[] = ['curved', 'flat'];
const SAMPLINGS: readonly ScreenSampling[] = ['stereo', 'mono', 'legacy'];

/** Every variant, in a fixed order (curved first, stereo first). */
export const SCREEN_STRATEGIES: readonly ScreenRenderStrategy[] = GEOMETRIES.flatMap((geometry) =>
  SAMPLINGS.map((sampling) => buildStrategy(geometry, sampling)),
);

export function resolveScreenStrategy(
  geometry: ScreenGeometry = 'curved',
  sampling: ScreenSampling = 'stereo',
): ScreenRenderStrategy {
  const strategy = SCREEN_STRATEGIES.find(
    (s) => s.geometry === geometry && s.sampling === sampling,
  );
  if (!strategy) {
    throw new Error(`[ScreenStrategy] Unknown variant ${geometry}-${sampling}.`);
  }
  return strategy;
}
