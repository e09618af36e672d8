/**
 * Multiview Camera Array.
 *
 * Two view-projection matrices, one per eye, stored the way the vertex
 * stage reads them (`array<mat4x4<f32>, 2>`, column-major). The renderer
 * picks an entry per draw through the view index; this module never
 * mutates an array after it is built.
 */

import { mat4, type Mat4 } from 'wgpu-matrix';

export type ViewIndex = 0 | 1;

export const VIEW_COUNT = 2;

export const VIEW_INDICES: readonly ViewIndex[] = [0, 1];

export type CameraArray = readonly [Mat4, Mat4];

/** Byte size of the camera uniform buffer. */
export const CAMERA_ARRAY_BUFFER_SIZE = VIEW_COUNT * 64;

/** Default near plane, in meters. */
export const DEFAULT_NEAR = 0.1;

/** Eye field of view as signed angles from the view axis, in radians. */
export interface FieldOfView {
  readonly angleLeft: number;
  readonly angleRight: number;
  readonly angleUp: number;
  readonly angleDown: number;
}

/** Tracked eye pose: position in meters, orientation as (x, y, z, w). */
export interface EyePose {
  readonly position: readonly [number, number, number];
  readonly orientation: readonly [number, number, number, number];
}

export function isViewIndex(value: number): value is ViewIndex {
  return value === 0 || value === 1;
}

/**
 * Asymmetric perspective projection from tangent angles, with the far plane
 * at infinity. Depth maps `z = -near` to 0 and `z → -∞` to 1.
 */
export function projectionFromTangents(fov: FieldOfView, near = DEFAULT_NEAR): Mat4 {
  const tanLeft = Math.tan(fov.angleLeft);
  const tanRight = Math.tan(fov.angleRight);
  const tanUp = Math.tan(fov.angleUp);
  const tanDown = Math.tan(fov.angleDown);
  const width = tanRight - tanLeft;
  const height = tanUp - tanDown;

  // Column-major: each row below is one column.
  return mat4.create(
    2 / width, 0, 0, 0,
    0, 2 / height, 0, 0,
    (tanRight + tanLeft) / width, (tanUp + tanDown) / height, -1, -1,
    0, 0, -near, 0,
  );
}

/** World matrix of a tracked pose (translation · rotation). */
export function worldFromPose(pose: EyePose): Mat4 {
  const translation = mat4.translation([pose.position[0], pose.position[1], pose.position[2]]);
  const rotation = mat4.fromQuat([
    pose.orientation[0],
    pose.orientation[1],
    pose.orientation[2],
    pose.orientation[3],
  ]);
  return mat4.multiply(translation, rotation);
}

/** `projection * inverse(world)`. Throws when the pose is degenerate. */
export function viewProjectionFromPose(pose: EyePose, fov: FieldOfView, near = DEFAULT_NEAR): Mat4 {
  const world = worldFromPose(pose);
  const det = mat4.determinant(world);
  if (!Number.isFinite(det) || Math.abs(det) < 1e-12) {
    throw new Error('[CameraArray] Eye pose world matrix is not invertible.');
  }
  return mat4.multiply(projectionFromTangents(fov, near), mat4.inverse(world));
}

/** Copy two matrices into a camera array. */
export function createCameraArray(left: Mat4, right: Mat4): CameraArray {
  return [mat4.clone(left), mat4.clone(right)];
}

export function identityCameraArray(): CameraArray {
  return [mat4.identity(), mat4.identity()];
}

/**
 * Entry for a view index.
 *
 * The GPU path has no bounds check; this is the caller-side guard the
 * orchestrator runs before it hands out view indices.
 */
export function selectViewProjection(cameras: CameraArray, view: number): Mat4 {
  if (!isViewIndex(view)) {
    throw new Error(`[CameraArray] View index ${view} is outside [0, ${VIEW_COUNT - 1}].`);
  }
  return cameras[view];
}

/** Serialize to `array<mat4x4<f32>, 2>`. */
export function packCameraArray(cameras: CameraArray): ArrayBuffer {
  const buf = new ArrayBuffer(CAMERA_ARRAY_BUFFER_SIZE);
  const data = new Float32Array(buf);
  data.set(cameras[0], 0);
  data.set(cameras[1], 16);
  return buf;
}
