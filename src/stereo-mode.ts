/**
 * Layout of the captured frame.
 *
 * - `full-sbs`: left and right eye images at full resolution, concatenated
 *   horizontally. The frame is twice as wide as one eye.
 * - `sbs`: half side-by-side. Each eye is squeezed to half width, so the
 *   frame has the aspect ratio of one eye.
 * - `mono`: a single image shown to both eyes.
 */
export type StereoMode = 'full-sbs' | 'sbs' | 'mono';

/** Binary split flags uploaded as `stereo_x` / `stereo_y`. */
export interface StereoFlags {
  readonly stereoX: 0 | 1;
  readonly stereoY: 0 | 1;
}

export function stereoFlags(mode: StereoMode): StereoFlags {
  return mode === 'mono' ? { stereoX: 0, stereoY: 0 } : { stereoX: 1, stereoY: 0 };
}

/** Whether horizontal flipping also exchanges the eye halves. */
export function isSideBySide(mode: StereoMode): boolean {
  return mode !== 'mono';
}

/** Aspect ratio (width / height) of the image one eye sees. */
export function eyeAspectRatio(mode: StereoMode, frameWidth: number, frameHeight: number): number {
  if (frameWidth <= 0 || frameHeight <= 0) {
    throw new Error(`[StereoMode] Invalid frame size ${frameWidth}x${frameHeight}.`);
  }
  const width = mode === 'full-sbs' ? frameWidth / 2 : frameWidth;
  return width / frameHeight;
}
