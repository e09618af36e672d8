import { describe, it, expect } from 'vitest';
import { quat, vec3 } from 'wgpu-matrix';
import { recenterOrientation } from '../../src/recenter';

function toTuple(q: ArrayLike<number>): [number, number, number, number] {
  return [q[0], q[1], q[2], q[3]];
}

describe('recenterOrientation', () => {
  it('is the identity for a head looking straight ahead', () => {
    const result = recenterOrientation([0, 0, 0, 1], true);
    expect(result[0]).toBeCloseTo(0, 10);
    expect(result[1]).toBeCloseTo(0, 10);
    expect(result[2]).toBeCloseTo(0, 10);
    expect(result[3]).toBeCloseTo(1, 10);
  });

  it('keeps a pure yaw', () => {
    const head = quat.fromAxisAngle([0, 1, 0], Math.PI / 2);
    const result = recenterOrientation(toTuple(head), true);
    for (let i = 0; i < 4; i++) {
      expect(result[i]).toBeCloseTo(head[i], 5);
    }
  });

  it('drops pitch and roll when the horizon is locked', () => {
    const head = quat.multiply(
      quat.fromAxisAngle([0, 1, 0], 0.5),
      quat.fromAxisAngle([1, 0, 0], 0.3)
    );
    const result = recenterOrientation(toTuple(head), true);
    expect(result[0]).toBeCloseTo(0, 6);
    expect(result[2]).toBeCloseTo(0, 6);
  });

  it('looks where the head looks when the horizon is free', () => {
    const head = quat.multiply(
      quat.fromAxisAngle([0, 1, 0], 0.5),
      quat.fromAxisAngle([1, 0, 0], 0.3)
    );
    const result = recenterOrientation(toTuple(head), false);
    const expected = vec3.transformQuat([0, 0, 1], head);
    const actual = vec3.transformQuat([0, 0, 1], result);
    for (let i = 0; i < 3; i++) {
      expect(actual[i]).toBeCloseTo(expected[i], 5);
    }
  });
});
