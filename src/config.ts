/**
 * Screen configuration for the stereoscreen pipeline.
 *
 * These are the user-facing knobs. They are converted into the per-frame
 * `ScreenParams` uniform by `buildScreenParams()` (see `screen-params.ts`);
 * the shaders never see this object directly.
 */

import type { RenderFrameOptions } from './screen-renderer-webgpu';
import type { ScreenPlacement } from './screen-transform';
import { isSideBySide, type StereoMode } from './stereo-mode';
import { buildTemporalBlurParams, type TemporalBlurParams } from './temporal-blend';

export const SCREEN_CONFIG = {
  /** Maximum inward depth at the horizontal center, in model units. */
  xCurvature: 0.4,

  /** Maximum inward depth at the vertical center, in model units. */
  yCurvature: 0.08,

  /**
   * Treat view 1 as the left eye. Some capture paths deliver the halves
   * swapped; this flips which half each eye samples without touching the
   * shader.
   */
  swapEyes: true,

  /** Mirror the source horizontally. */
  flipX: false,

  /** Mirror the source vertically. */
  flipY: false,

  /** Distance from the viewer to the screen center, in meters. */
  distance: 20.0,

  /** Screen width in meters. */
  scale: 40.0,

  /**
   * Blend weight toward the previous frame in the temporal pass (0-1).
   *
   * 0 disables temporal smoothing; values near 1 produce long trails.
   */
  historyDecay: 0.5,

  /** Render the ambient lighting pass. */
  ambientEnabled: true,
} as const;

export interface ScreenConfig {
  readonly xCurvature: number;
  readonly yCurvature: number;
  readonly swapEyes: boolean;
  readonly flipX: boolean;
  readonly flipY: boolean;
  readonly distance: number;
  readonly scale: number;
  readonly historyDecay: number;
  readonly ambientEnabled: boolean;
}

/** Settings that can be flipped at runtime. */
export type ToggleSetting = 'swapEyes' | 'flipX' | 'flipY';

const NUMERIC_KEYS = [
  'xCurvature',
  'yCurvature',
  'distance',
  'scale',
  'historyDecay',
] as const;

/**
 * Fill in defaults and replace non-finite numbers.
 *
 * Invalid numeric fields fall back to their `SCREEN_CONFIG` value with a
 * console warning; they never reach the GPU.
 */
export function resolveScreenConfig(overrides: Partial<ScreenConfig> = {}): ScreenConfig {
  const numbers: Record<(typeof NUMERIC_KEYS)[number], number> = {
    xCurvature: SCREEN_CONFIG.xCurvature,
    yCurvature: SCREEN_CONFIG.yCurvature,
    distance: SCREEN_CONFIG.distance,
    scale: SCREEN_CONFIG.scale,
    historyDecay: SCREEN_CONFIG.historyDecay,
  };

  for (const key of NUMERIC_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (Number.isFinite(value)) {
      numbers[key] = value;
    } else {
      console.warn(`[ScreenConfig] Ignoring non-finite ${key} (${value}), using ${numbers[key]}.`);
    }
  }

  if (numbers.scale <= 0) {
    console.warn(`[ScreenConfig] Ignoring non-positive scale (${numbers.scale}), using ${SCREEN_CONFIG.scale}.`);
    numbers.scale = SCREEN_CONFIG.scale;
  }

  return {
    ...numbers,
    swapEyes: overrides.swapEyes ?? SCREEN_CONFIG.swapEyes,
    flipX: overrides.flipX ?? SCREEN_CONFIG.flipX,
    flipY: overrides.flipY ?? SCREEN_CONFIG.flipY,
    ambientEnabled: overrides.ambientEnabled ?? SCREEN_CONFIG.ambientEnabled,
  };
}

/**
 * Flip one boolean setting.
 *
 * Mirroring a side-by-side frame horizontally also moves each eye's half to
 * the other side, so `flipX` swaps the eyes as well to keep each eye on its
 * own image.
 */
export function toggleSetting(
  config: ScreenConfig,
  setting: ToggleSetting,
  mode: StereoMode,
): ScreenConfig {
  switch (setting) {
    case 'swapEyes':
      return { ...config, swapEyes: !config.swapEyes };
    case 'flipX':
      return {
        ...config,
        flipX: !config.flipX,
        swapEyes: isSideBySide(mode) ? !config.swapEyes : config.swapEyes,
      };
    case 'flipY':
      return { ...config, flipY: !config.flipY };
  }
}

// ---------------------------------------------------------------------------
// Per-frame wiring
// ---------------------------------------------------------------------------

/** Placement for `ScreenTransform`: the configured distance and width. */
export function screenPlacement(config: ScreenConfig, aspectRatio: number): ScreenPlacement {
  return { distance: config.distance, scale: config.scale, aspectRatio };
}

/** Temporal params for one frame, using the configured history decay. */
export function temporalBlurFromConfig(
  config: ScreenConfig,
  frameIndex: number,
  resolution: readonly [number, number],
): TemporalBlurParams {
  return buildTemporalBlurParams(frameIndex, resolution, config.historyDecay);
}

/** `renderFrame()` options the config controls. */
export function frameOptions(config: ScreenConfig): RenderFrameOptions {
  return { ambient: config.ambientEnabled };
}
