// ============================================
// Quaternion Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import {
  IDENTITY,
  conjugate,
  difference,
  equals,
  fromAngularVelocity,
  fromAxisAngle,
  inverseRotateVector,
  isUnit,
  multiply,
  norm,
  normalize,
  rotateVector,
  toAxisAngle,
  type Quat,
} from '../quaternion';
import { SpaceError } from '../errors';
import type { Vec3 } from '../math';
import { expectQuat, expectVec, thrownBy } from './helpers';

const UP: Vec3 = { x: 0, y: 0, z: 1 };
const EAST: Vec3 = { x: 1, y: 0, z: 0 };

const samples: Quat[] = [
  { w: 1, x: 0, y: 0, z: 0 },
  fromAxisAngle({ x: 1, y: 2, z: 3 }, 0.7),
  fromAxisAngle({ x: -4, y: 0.5, z: 0 }, 2.9),
  fromAxisAngle({ x: 0, y: 0, z: 1 }, 5.5),
  normalize({ w: -0.3, x: 0.2, y: -0.9, z: 0.1 }),
];

describe('quaternion math', () => {
  describe('multiply', () => {
    it('leaves a quaternion unchanged when multiplied by the identity', () => {
      const q = samples[1];
      expectQuat(multiply(q, IDENTITY), q);
      expectQuat(multiply(IDENTITY, q), q);
    });

    it.each(samples)('q ⊗ conj(q) normalizes to the identity (%o)', (q) => {
      expectQuat(normalize(multiply(q, conjugate(q))), IDENTITY);
    });

    it('is not commutative: a ⊗ b rotates by b first', () => {
      const aboutUp = fromAxisAngle(UP, Math.PI / 2);
      const aboutEast = fromAxisAngle(EAST, Math.PI / 2);
      const north = { x: 0, y: 1, z: 0 };

      // east-axis turn lifts north to up; the up-axis turn then leaves it there
      expectVec(rotateVector(north, multiply(aboutUp, aboutEast)), { x: 0, y: 0, z: 1 });
      // up-axis turn swings north to west; the east-axis turn leaves west alone
      expectVec(rotateVector(north, multiply(aboutEast, aboutUp)), { x: -1, y: 0, z: 0 });
    });
  });

  describe('normalize', () => {
    it('scales to unit norm', () => {
      const q = normalize({ w: 2, x: 0, y: 0, z: 0 });
      expect(q).toEqual({ w: 1, x: 0, y: 0, z: 0 });
      expect(norm(normalize({ w: 1, x: 2, y: 3, z: 4 }))).toBeCloseTo(1, 12);
    });

    it('rejects the zero quaternion', () => {
      const error = thrownBy(() => normalize({ w: 0, x: 0, y: 0, z: 0 }));
      expect(error).toBeInstanceOf(SpaceError);
      expect(error).toMatchObject({ kind: 'NonUnitQuaternion' });
    });

    it('reports unit norm within tolerance', () => {
      expect(isUnit({ w: 1 + 1e-8, x: 0, y: 0, z: 0 }, 1e-6)).toBe(true);
      expect(isUnit({ w: 1.1, x: 0, y: 0, z: 0 }, 1e-6)).toBe(false);
    });
  });

  describe('rotateVector', () => {
    it('turns east to north with +90° about up', () => {
      expectVec(rotateVector(EAST, fromAxisAngle(UP, Math.PI / 2)), { x: 0, y: 1, z: 0 });
    });

    it('is undone by inverseRotateVector', () => {
      const q = samples[2];
      const v = { x: 3, y: -7, z: 0.5 };
      expectVec(inverseRotateVector(rotateVector(v, q), q), v);
    });

    it('preserves length', () => {
      const v = { x: 3, y: 4, z: 12 };
      const r = rotateVector(v, samples[4]);
      expect(Math.sqrt(r.x * r.x + r.y * r.y + r.z * r.z)).toBeCloseTo(13, 9);
    });
  });

  describe('axis-angle', () => {
    it('recovers axis and angle', () => {
      const { axis, angle } = toAxisAngle(fromAxisAngle({ x: 0, y: 0, z: 2 }, 1.2));
      expectVec(axis, UP);
      expect(angle).toBeCloseTo(1.2, 9);
    });

    it('keeps angles past half a turn', () => {
      const { angle } = toAxisAngle(fromAxisAngle(UP, 1.5 * Math.PI));
      expect(angle).toBeCloseTo(1.5 * Math.PI, 9);
    });

    it('keeps precision for very small angles', () => {
      const { axis, angle } = toAxisAngle(fromAxisAngle(UP, 1e-7));
      expectVec(axis, UP);
      expect(angle / 1e-7).toBeCloseTo(1, 9);

      expect(toAxisAngle(fromAxisAngle(EAST, 1e-9)).angle / 1e-9).toBeCloseTo(1, 9);
    });

    it('returns angle 0 about up for the identity', () => {
      expect(toAxisAngle(IDENTITY)).toEqual({ axis: { x: 0, y: 0, z: 1 }, angle: 0 });
    });

    it('treats a zero axis as no rotation', () => {
      expect(fromAxisAngle({ x: 0, y: 0, z: 0 }, 3)).toEqual({ w: 1, x: 0, y: 0, z: 0 });
    });
  });

  describe('fromAngularVelocity', () => {
    it('scales the per-second angle by dt', () => {
      const spin = fromAxisAngle(UP, Math.PI / 2);
      expectQuat(fromAngularVelocity(spin, 0.5), fromAxisAngle(UP, Math.PI / 4));
      expectQuat(fromAngularVelocity(spin, 2), fromAxisAngle(UP, Math.PI));
    });

    it('handles spins faster than half a turn per second', () => {
      const spin = fromAxisAngle(UP, 1.5 * Math.PI);
      expectQuat(fromAngularVelocity(spin, 0.5), fromAxisAngle(UP, 0.75 * Math.PI));
    });

    it('accumulates very slow spins', () => {
      const crawl = fromAxisAngle(UP, 1e-9);
      const turned = fromAngularVelocity(crawl, 1000);

      expect(equals(turned, IDENTITY)).toBe(false);
      expect(toAxisAngle(turned).angle / 1e-6).toBeCloseTo(1, 9);
    });

    it('is the identity for dt = 0', () => {
      expectQuat(fromAngularVelocity(samples[1], 0), IDENTITY);
    });

    it('is the identity for a null spin', () => {
      expect(fromAngularVelocity(IDENTITY, 3)).toEqual({ w: 1, x: 0, y: 0, z: 0 });
    });
  });

  describe('difference / equals', () => {
    it('difference(a, b) composes back to b', () => {
      const [, a, b] = samples;
      expectQuat(multiply(a, difference(a, b)), b);
    });

    it('treats q and -q as the same orientation', () => {
      const q = samples[1];
      expect(equals(q, { w: -q.w, x: -q.x, y: -q.y, z: -q.z })).toBe(true);
      expect(equals(q, samples[2])).toBe(false);
    });
  });
});
