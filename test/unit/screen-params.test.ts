/**
 * Unit tests for screen configuration: defaults and fallbacks, runtime
 * toggles, conversion to the ScreenParams uniform and its byte layout.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  SCREEN_CONFIG,
  frameOptions,
  resolveScreenConfig,
  screenPlacement,
  temporalBlurFromConfig,
  toggleSetting,
} from '../../src/config';
import {
  buildScreenParams,
  packScreenParams,
  SCREEN_PARAMS_BUFFER_SIZE,
} from '../../src/screen-params';
import { ScreenTransform } from '../../src/screen-transform';
import { eyeAspectRatio, stereoFlags } from '../../src/stereo-mode';
import { buildTemporalBlurParams } from '../../src/temporal-blend';

afterEach(() => {
  vi.restoreAllMocks();
});

const SAMPLING = { screenWidth: 1920, ambientWidth: 128 };

// ---------------------------------------------------------------------------
// Config resolution
// ---------------------------------------------------------------------------

describe('resolveScreenConfig', () => {
  it('returns the defaults with no overrides', () => {
    expect(resolveScreenConfig()).toEqual({ ...SCREEN_CONFIG });
  });

  it('keeps finite overrides', () => {
    const config = resolveScreenConfig({ xCurvature: 0, distance: 5, flipY: true });
    expect(config.xCurvature).toBe(0);
    expect(config.distance).toBe(5);
    expect(config.flipY).toBe(true);
  });

  it('falls back on non-finite numbers with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = resolveScreenConfig({ xCurvature: Number.NaN, yCurvature: 0.1 });

    expect(config.xCurvature).toBe(0.4);
    expect(config.yCurvature).toBe(0.1);
    expect(warn).toHaveBeenCalledOnce();
    expect(warn).toHaveBeenCalledWith('[ScreenConfig] Ignoring non-finite xCurvature (NaN), using 0.4.');
  });

  it('falls back on a non-positive scale', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resolveScreenConfig({ scale: -5 }).scale).toBe(40);
    expect(warn).toHaveBeenCalledWith('[ScreenConfig] Ignoring non-positive scale (-5), using 40.');
  });
});

// ---------------------------------------------------------------------------
// Toggles
// ---------------------------------------------------------------------------

describe('toggleSetting', () => {
  const base = resolveScreenConfig();

  it('flips swapEyes alone', () => {
    const next = toggleSetting(base, 'swapEyes', 'full-sbs');
    expect(next.swapEyes).toBe(false);
    expect(next.flipX).toBe(false);
  });

  it('swaps eyes along with a horizontal flip of a side-by-side frame', () => {
    const next = toggleSetting(base, 'flipX', 'sbs');
    expect(next.flipX).toBe(true);
    expect(next.swapEyes).toBe(false);
  });

  it('leaves the eyes alone when flipping a mono frame', () => {
    const next = toggleSetting(base, 'flipX', 'mono');
    expect(next.flipX).toBe(true);
    expect(next.swapEyes).toBe(true);
  });

  it('does not mutate its input', () => {
    toggleSetting(base, 'flipY', 'mono');
    expect(base.flipY).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// ScreenParams
// ---------------------------------------------------------------------------

describe('buildScreenParams', () => {
  it('maps a full side-by-side source with the default config', () => {
    const params = buildScreenParams(
      resolveScreenConfig(),
      { width: 3840, height: 1080, stereoMode: 'full-sbs' },
      SAMPLING
    );
    expect(params).toEqual({
      xCurvature: 0.4,
      yCurvature: 0.08,
      eyeOffset: 1,
      yOffset: 0,
      xOffset: 0,
      aspectRatio: 1920 / 1080,
      screenWidth: 1920,
      ambientWidth: 128,
      stereoX: 1,
      stereoY: 0,
    });
  });

  it('keeps the whole width for half side-by-side', () => {
    const params = buildScreenParams(
      resolveScreenConfig(),
      { width: 1920, height: 1080, stereoMode: 'sbs' },
      SAMPLING
    );
    expect(params.aspectRatio).toBe(1920 / 1080);
    expect(params.stereoX).toBe(1);
  });

  it('clears the stereo flags for mono and maps flips to offsets', () => {
    const params = buildScreenParams(
      resolveScreenConfig({ swapEyes: false, flipX: true, flipY: true }),
      { width: 1280, height: 720, stereoMode: 'mono' },
      { screenWidth: 1919.6, ambientWidth: 0.2 }
    );
    expect(params.stereoX).toBe(0);
    expect(params.stereoY).toBe(0);
    expect(params.eyeOffset).toBe(0);
    expect(params.xOffset).toBe(1);
    expect(params.yOffset).toBe(1);
    expect(params.screenWidth).toBe(1920);
    expect(params.ambientWidth).toBe(1);
  });
});

describe('stereo mode helpers', () => {
  it('reports split flags per mode', () => {
    expect(stereoFlags('full-sbs')).toEqual({ stereoX: 1, stereoY: 0 });
    expect(stereoFlags('mono')).toEqual({ stereoX: 0, stereoY: 0 });
  });

  it('rejects an empty frame', () => {
    expect(() => eyeAspectRatio('sbs', 0, 1080)).toThrow('[StereoMode] Invalid frame size 0x1080.');
  });
});

describe('packScreenParams', () => {
  it('writes ten scalars with the widths as u32', () => {
    const params = buildScreenParams(
      resolveScreenConfig({ flipY: true }),
      { width: 3840, height: 1080, stereoMode: 'full-sbs' },
      SAMPLING
    );
    const buf = packScreenParams(params);
    const f32 = new Float32Array(buf);
    const u32 = new Uint32Array(buf);

    expect(buf.byteLength).toBe(SCREEN_PARAMS_BUFFER_SIZE);
    expect(f32[0]).toBe(Math.fround(0.4));
    expect(f32[1]).toBe(Math.fround(0.08));
    expect(f32[2]).toBe(1);
    expect(f32[3]).toBe(1);
    expect(f32[4]).toBe(0);
    expect(f32[5]).toBe(Math.fround(1920 / 1080));
    expect(u32[6]).toBe(1920);
    expect(u32[7]).toBe(128);
    expect(f32[8]).toBe(1);
    expect(f32[9]).toBe(0);
    expect(u32[10]).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Per-frame wiring
// ---------------------------------------------------------------------------

describe('config wiring', () => {
  it('places the screen at the configured distance and width', () => {
    const config = resolveScreenConfig({ distance: 10, scale: 8 });
    const placement = screenPlacement(config, 2);
    expect(placement).toEqual({ distance: 10, scale: 8, aspectRatio: 2 });

    // half width 4, half height 8 / (2 * 2) = 2
    const model = new ScreenTransform(placement).modelMatrix;
    expect(model[0]).toBe(4);
    expect(model[5]).toBe(2);
    expect(model[14]).toBe(-10);
  });

  it('feeds the configured history decay to the temporal params', () => {
    const config = resolveScreenConfig({ historyDecay: 0.25 });
    expect(temporalBlurFromConfig(config, 3, [64, 32])).toEqual(buildTemporalBlurParams(3, [64, 32], 0.25));
  });

  it('clamps an out-of-range history decay', () => {
    const config = resolveScreenConfig({ historyDecay: 4 });
    expect(temporalBlurFromConfig(config, 0, [64, 32]).historyDecay).toBe(1);
  });

  it('turns the ambient pass off through the frame options', () => {
    expect(frameOptions(resolveScreenConfig())).toEqual({ ambient: true });
    expect(frameOptions(resolveScreenConfig({ ambientEnabled: false }))).toEqual({ ambient: false });
  });
});
