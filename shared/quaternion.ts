// ============================================
// Quaternion Math
// Orientation and spin helpers for the coordinate engine
// ============================================
//
// Convention (used everywhere, including frame transforms):
// - Hamilton quaternions, q = w + xi + yj + zk
// - multiply(a, b) is the Hamilton product a ⊗ b
// - rotating a vector v by q is q ⊗ (0, v) ⊗ q*
// - so a ⊗ b rotates by b first, then by a

import { SpaceError, SpaceErrorKind } from './errors';
import type { Vec3 } from './math';

export interface Quat {
  w: number;
  x: number;
  y: number;
  z: number;
}

export interface AxisAngle {
  /** Unit rotation axis */
  axis: Vec3;
  /** Rotation angle in radians, [0, 2π] */
  angle: number;
}

/** The null rotation. */
export const IDENTITY: Readonly<Quat> = Object.freeze({ w: 1, x: 0, y: 0, z: 0 });

export function quat(w = 1, x = 0, y = 0, z = 0): Quat {
  return { w, x, y, z };
}

/**
 * Hamilton product a ⊗ b.
 * Not commutative: applied to a vector, b acts first.
 */
export function multiply(a: Quat, b: Quat): Quat {
  return {
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w,
  };
}

export function conjugate(q: Quat): Quat {
  return { w: q.w, x: -q.x, y: -q.y, z: -q.z };
}

export function norm(q: Quat): number {
  return Math.hypot(q.w, q.x, q.y, q.z);
}

export function dot(a: Quat, b: Quat): number {
  return a.w * b.w + a.x * b.x + a.y * b.y + a.z * b.z;
}

/**
 * Scale to unit norm.
 * Throws NonUnitQuaternion for a zero or non-finite quaternion, which has no orientation.
 */
export function normalize(q: Quat): Quat {
  const n = norm(q);
  if (n === 0 || !Number.isFinite(n)) {
    throw new SpaceError(SpaceErrorKind.NonUnitQuaternion, 'cannot normalize a zero or non-finite quaternion', {
      quaternion: { ...q },
    });
  }
  return { w: q.w / n, x: q.x / n, y: q.y / n, z: q.z / n };
}

export function isUnit(q: Quat, tolerance: number): boolean {
  return Math.abs(norm(q) - 1) <= tolerance;
}

/**
 * Compare two orientations within epsilon.
 * q and -q describe the same orientation, so both signs are accepted.
 */
export function equals(a: Quat, b: Quat, epsilon = 1e-9): boolean {
  const same =
    Math.abs(a.w - b.w) <= epsilon &&
    Math.abs(a.x - b.x) <= epsilon &&
    Math.abs(a.y - b.y) <= epsilon &&
    Math.abs(a.z - b.z) <= epsilon;
  if (same) return true;
  return (
    Math.abs(a.w + b.w) <= epsilon &&
    Math.abs(a.x + b.x) <= epsilon &&
    Math.abs(a.y + b.y) <= epsilon &&
    Math.abs(a.z + b.z) <= epsilon
  );
}

/**
 * Rotate a vector by a unit quaternion: q ⊗ (0, v) ⊗ q*
 *
 * Expanded form of the sandwich product:
 *   t = 2 (q.xyz × v)
 *   v' = v + w t + q.xyz × t
 */
export function rotateVector(v: Vec3, q: Quat): Vec3 {
  const tx = 2 * (q.y * v.z - q.z * v.y);
  const ty = 2 * (q.z * v.x - q.x * v.z);
  const tz = 2 * (q.x * v.y - q.y * v.x);
  return {
    x: v.x + q.w * tx + (q.y * tz - q.z * ty),
    y: v.y + q.w * ty + (q.z * tx - q.x * tz),
    z: v.z + q.w * tz + (q.x * ty - q.y * tx),
  };
}

/** Rotate a vector by the inverse (conjugate) of a unit quaternion. */
export function inverseRotateVector(v: Vec3, q: Quat): Vec3 {
  return rotateVector(v, conjugate(q));
}

/**
 * Build the unit quaternion that rotates by `radians` about `axis`.
 * A zero axis yields the identity.
 */
export function fromAxisAngle(axis: Vec3, radians: number): Quat {
  const len = Math.hypot(axis.x, axis.y, axis.z);
  if (len === 0) {
    return { ...IDENTITY };
  }
  const half = radians / 2;
  const s = Math.sin(half) / len;
  return { w: Math.cos(half), x: axis.x * s, y: axis.y * s, z: axis.z * s };
}

/**
 * Break a quaternion into axis and angle.
 * For a null rotation the axis is arbitrary; +Z (up) is returned.
 */
export function toAxisAngle(q: Quat): AxisAngle {
  const u = normalize(q);
  // atan2 of the vector part keeps precision for tiny angles, where acos(w) does not
  const s = Math.hypot(u.x, u.y, u.z);
  if (s === 0) {
    return { axis: { x: 0, y: 0, z: 1 }, angle: 0 };
  }
  return { axis: { x: u.x / s, y: u.y / s, z: u.z / s }, angle: 2 * Math.atan2(s, u.w) };
}

/**
 * Orientation change accumulated over `dt` seconds by a spin quaternion.
 * `rotation` is the rotation performed per second; the result is rotation^dt
 * (same axis, angle scaled by dt). dt = 0 gives the identity.
 */
export function fromAngularVelocity(rotation: Quat, dt: number): Quat {
  const { axis, angle } = toAxisAngle(rotation);
  if (angle === 0) {
    return { ...IDENTITY };
  }
  return fromAxisAngle(axis, angle * dt);
}

/**
 * Rotation taking `a` to `b`: conj(a) ⊗ b.
 */
export function difference(a: Quat, b: Quat): Quat {
  return multiply(conjugate(a), b);
}

export function isFiniteQuat(q: Quat): boolean {
  return Number.isFinite(q.w) && Number.isFinite(q.x) && Number.isFinite(q.y) && Number.isFinite(q.z);
}
