// ============================================
// Sphere Math Utilities
// Cartesian <-> spherical / cylindrical conversion for bearings
// Used by: server SpaceSession bearings, client readouts
// ============================================
//
// Navigational convention, degrees throughout:
// - rho:   distance from origin
// - theta: elevation above the horizon (XY plane), -90 (nadir) .. 90 (zenith)
// - phi:   azimuth clockwise from north (+Y) toward east (+X), -180 .. 180
//   North: phi = 0, East: phi = 90, West: phi = -90, South: phi = ±180

import { toDegrees, toRadians, type Vec3 } from './math';

/**
 * Spherical coordinates in the navigational convention above.
 */
export interface Spherical {
  rho: number;
  theta: number;
  phi: number;
}

/**
 * Cylindrical coordinates: horizontal range, azimuth (same convention as
 * Spherical.phi) and height.
 */
export interface Cylindrical {
  rho: number;
  phi: number;
  z: number;
}

/**
 * Wrap an azimuth in degrees into [-180, 180].
 * 180 stays 180 and -180 stays -180; anything beyond wraps around.
 */
export function normalizeAzimuth(degrees: number): number {
  if (degrees >= -180 && degrees <= 180) return degrees;
  const wrapped = ((((degrees + 180) % 360) + 360) % 360) - 180;
  return wrapped;
}

/**
 * Azimuth of the horizontal part of a vector, clockwise from north.
 * Straight up/down (or the origin) has no azimuth; 0 is returned.
 */
function azimuth(x: number, y: number): number {
  if (x === 0 && y === 0) return 0;
  return toDegrees(Math.atan2(x, y));
}

/**
 * Convert a Cartesian vector to spherical coordinates.
 * The origin maps to (0, 0, 0): it carries no direction.
 */
export function toSpherical(v: Vec3): Spherical {
  // hypot: no overflow for huge components, no underflow for tiny ones
  const rho = Math.hypot(v.x, v.y, v.z);
  if (rho === 0) {
    return { rho: 0, theta: 0, phi: 0 };
  }

  // Rounding can push z / rho a hair past ±1 for vectors on the vertical axis
  const sinTheta = Math.max(-1, Math.min(1, v.z / rho));
  return {
    rho,
    theta: toDegrees(Math.asin(sinTheta)),
    phi: azimuth(v.x, v.y),
  };
}

/**
 * Convert spherical coordinates back to a Cartesian vector.
 * rho = 0 yields exactly the zero vector.
 */
export function fromSpherical({ rho, theta, phi }: Spherical): Vec3 {
  if (rho === 0) {
    return { x: 0, y: 0, z: 0 };
  }
  const t = toRadians(theta);
  const p = toRadians(phi);
  const horizontal = rho * Math.cos(t);
  return {
    x: horizontal * Math.sin(p),
    y: horizontal * Math.cos(p),
    z: rho * Math.sin(t),
  };
}

/**
 * Convert a Cartesian vector to cylindrical coordinates (range, azimuth, height).
 */
export function toCylindrical(v: Vec3): Cylindrical {
  return {
    rho: Math.hypot(v.x, v.y),
    phi: azimuth(v.x, v.y),
    z: v.z,
  };
}

export function fromCylindrical({ rho, phi, z }: Cylindrical): Vec3 {
  if (rho === 0) {
    return { x: 0, y: 0, z };
  }
  const p = toRadians(phi);
  return {
    x: rho * Math.sin(p),
    y: rho * Math.cos(p),
    z,
  };
}
