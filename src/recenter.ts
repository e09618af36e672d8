/**
 * Recentering: rebuild the reference orientation from where the user is
 * looking, so the screen lands straight ahead.
 *
 * With the horizon locked only yaw is kept and the screen stays level.
 * Unlocked, pitch is kept too (useful when lying down).
 */

import { quat, vec3, type Quat } from 'wgpu-matrix';

export function recenterOrientation(
  headOrientation: readonly [number, number, number, number],
  horizonLocked: boolean,
): Quat {
  const head = quat.create(
    headOrientation[0],
    headOrientation[1],
    headOrientation[2],
    headOrientation[3],
  );
  const look = vec3.transformQuat([0, 0, 1], head);
  const yaw = quat.fromAxisAngle([0, 1, 0], Math.atan2(look[0], look[2]));
  if (horizonLocked) return yaw;

  const horizontal = Math.hypot(look[0], look[2]);
  const pitch = -Math.atan2(look[1], horizontal);
  return quat.multiply(yaw, quat.fromAxisAngle([1, 0, 0], pitch));
}
