// ============================================
// Shared Vector Math
// Pure 3D vector helpers used by the coordinate engine
// X = east, Y = north, Z = up
// ============================================

/**
 * 3D vector of doubles.
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** The origin. Frozen so it can be shared safely. */
export const ZERO: Readonly<Vec3> = Object.freeze({ x: 0, y: 0, z: 0 });

/** Unit vector pointing north (+Y). Used as the "forward" axis of a heading. */
export const NORTH: Readonly<Vec3> = Object.freeze({ x: 0, y: 1, z: 0 });

export function vec3(x = 0, y = 0, z = 0): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

/** Subtract b from a */
export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  };
}

/**
 * Calculate magnitude (length) of a 3D vector
 */
export function magnitude(v: Vec3): number {
  return Math.hypot(v.x, v.y, v.z);
}

/**
 * Normalize a 3D vector to unit length
 * Returns the zero vector for a zero-length input (no direction to keep)
 */
export function normalize(v: Vec3): Vec3 {
  const mag = magnitude(v);
  if (mag === 0) {
    return { x: 0, y: 0, z: 0 };
  }
  return { x: v.x / mag, y: v.y / mag, z: v.z / mag };
}

/**
 * Calculate 3D distance between two positions
 */
export function distance(a: Vec3, b: Vec3): number {
  return Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z);
}

/** Check if two vectors are equal within epsilon (per component) */
export function equals(a: Vec3, b: Vec3, epsilon = 1e-9): boolean {
  return (
    Math.abs(a.x - b.x) <= epsilon &&
    Math.abs(a.y - b.y) <= epsilon &&
    Math.abs(a.z - b.z) <= epsilon
  );
}

export function isFiniteVec3(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
