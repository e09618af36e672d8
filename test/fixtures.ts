import type { ScreenParams } from '../src/screen-params';

/** Stereo side-by-side params with eye_offset 0 and no flips. */
export function makeScreenParams(overrides: Partial<ScreenParams> = {}): ScreenParams {
  return {
    xCurvature: 0.4,
    yCurvature: 0.08,
    eyeOffset: 0,
    yOffset: 0,
    xOffset: 0,
    aspectRatio: 16 / 9,
    screenWidth: 1920,
    ambientWidth: 128,
    stereoX: 1,
    stereoY: 0,
    ...overrides,
  };
}
