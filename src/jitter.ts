/**
 * Sub-pixel jitter for the temporal pass.
 *
 * Offsets follow the Halton (2, 3) low-discrepancy sequence, remapped to
 * [-1, 1] and divided by the output resolution so one unit of jitter is one
 * pixel.
 */

/** Number of distinct jitter positions before the sequence repeats. */
export const JITTER_SEQUENCE_LENGTH = 16;

/** Radical inverse of `index` in base `base`. */
export function halton(index: number, base: number): number {
  let f = 1;
  let r = 0;
  let i = index;
  while (i > 0) {
    f /= base;
    r += f * (i % base);
    i = Math.floor(i / base);
  }
  return r;
}

/** Jitter for a frame, in UV units. Frame 0 maps to Halton index 1. */
export function getJitter(frameIndex: number, resolution: readonly [number, number]): [number, number] {
  const index = (frameIndex % JITTER_SEQUENCE_LENGTH) + 1;
  return [
    (2 * halton(index, 2) - 1) / resolution[0],
    (2 * halton(index, 3) - 1) / resolution[1],
  ];
}
