/**
 * Per-frame uniform snapshot.
 *
 * Everything the passes read from uniforms for one frame, captured once and
 * handed to `renderFrame()` explicitly. Matrices are copied on capture, so a
 * caller mutating its own matrices afterwards does not change a frame that
 * is already described.
 *
 * The snapshot and its tuples are frozen. The matrices are `Float32Array`
 * copies, which cannot be frozen: `renderFrame()` uploads them as they are
 * at call time, and later writes into them only reach frames rendered from
 * this snapshot again.
 */

import { mat4, type Mat4 } from 'wgpu-matrix';
import { createCameraArray, type CameraArray } from './camera-array';
import type { ScreenParams } from './screen-params';
import type { TemporalBlurParams } from './temporal-blend';

export interface FrameSnapshot {
  readonly frameIndex: number;
  readonly cameras: CameraArray;
  readonly screen: ScreenParams;
  readonly model: Mat4;
  readonly blur: TemporalBlurParams;
}

export function createFrameSnapshot(input: FrameSnapshot): FrameSnapshot {
  return Object.freeze({
    frameIndex: input.frameIndex,
    cameras: Object.freeze(createCameraArray(input.cameras[0], input.cameras[1])),
    screen: Object.freeze({ ...input.screen }),
    model: mat4.clone(input.model),
    blur: Object.freeze({
      jitter: Object.freeze([input.blur.jitter[0], input.blur.jitter[1]] as const),
      scale: Object.freeze([input.blur.scale[0], input.blur.scale[1]] as const),
      resolution: Object.freeze([input.blur.resolution[0], input.blur.resolution[1]] as const),
      historyDecay: input.blur.historyDecay,
    }),
  });
}
