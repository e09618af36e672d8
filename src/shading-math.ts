/**
 * Scalar helpers with WGSL built-in semantics.
 *
 * The CPU reference stages call these instead of ad-hoc math so that each
 * line reads the same as its shader counterpart.
 */

/** WGSL `clamp(x, lo, hi)`. */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(Math.max(x, lo), hi);
}

/** WGSL `mix(a, b, t)`, evaluated as `a * (1 - t) + b * t`. */
export function mix(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

/** WGSL `smoothstep(edge0, edge1, x)`: cubic Hermite between the edges. */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp((x - edge0) / (edge1 - edge0), 0, 1);
  return t * t * (3 - 2 * t);
}
