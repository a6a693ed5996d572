// ============================================
// Frame Transform
// One entity's kinematic state as measured from another's frame
// ============================================

import { cross, sub, type Vec3 } from '../math';
import {
  conjugate,
  difference,
  inverseRotateVector,
  multiply,
  normalize,
  toAxisAngle,
  type Quat,
} from '../quaternion';
import { toSpherical, type Spherical } from '../sphereMath';
import type { Coordinates } from './Coordinates';
import { freezeState, type KinematicState, type RelativeSnapshot } from './types';

export interface FrameTransformOptions {
  /**
   * Also remove the apparent velocity caused by the viewer's own spin
   * (v_rel -= ω_viewer × r_rel, in the viewer's axes).
   * Off by default: relative velocity is translational only.
   */
  rotatingFrame?: boolean;
}

/**
 * Angular velocity vector (rad/s) of a per-second spin quaternion, in the
 * axes the spin is applied in.
 */
export function angularVelocityVector(rotation: Quat): Vec3 {
  const { axis, angle } = toAxisAngle(rotation);
  return { x: axis.x * angle, y: axis.y * angle, z: axis.z * angle };
}

/**
 * Express a spin quaternion in the axes of `frame`: conj(frame) ⊗ q ⊗ frame.
 */
function spinInFrame(spin: Quat, frame: Quat): Quat {
  return multiply(multiply(conjugate(frame), spin), frame);
}

/**
 * Compute `subject` as seen by an observer co-located and co-oriented with
 * `viewer`. Works on plain states, so detached snapshots can be compared too.
 *
 * 1. position = conj(Vh) applied to (S.position - V.position)
 * 2. velocity = conj(Vh) applied to (S.velocity - V.velocity)
 * 3. heading  = conj(Vh) ⊗ S.heading
 * 4. rotation = difference(conj(Vh) ⊗ V.rotation ⊗ Vh, conj(Vh) ⊗ S.rotation ⊗ Vh)
 *
 * Operand order is significant throughout (see quaternion.ts for the convention).
 */
export function relativeBetween(
  subject: KinematicState,
  viewer: KinematicState,
  options: FrameTransformOptions = {}
): RelativeSnapshot {
  const viewHeading = viewer.heading;

  const position = inverseRotateVector(sub(subject.position, viewer.position), viewHeading);
  let velocity = inverseRotateVector(sub(subject.velocity, viewer.velocity), viewHeading);

  const heading = normalize(multiply(conjugate(viewHeading), subject.heading));

  const subjectSpin = spinInFrame(subject.rotation, viewHeading);
  const viewerSpin = spinInFrame(viewer.rotation, viewHeading);
  const rotation = normalize(difference(viewerSpin, subjectSpin));

  if (options.rotatingFrame) {
    // Spin is applied in body axes (heading ⊗ rotation^dt), so it is already in the viewer's axes
    const omega = angularVelocityVector(viewer.rotation);
    velocity = sub(velocity, cross(omega, position));
  }

  return freezeState({ position, velocity, heading, rotation });
}

/**
 * relativeBetween for two live entities. Reads both, mutates neither.
 */
export function relativeTo(
  subject: Coordinates,
  viewer: Coordinates,
  options: FrameTransformOptions = {}
): RelativeSnapshot {
  return relativeBetween(subject.getState(), viewer.getState(), options);
}

/**
 * Player-facing bearing of `subject` from `viewer`: the relative position in
 * spherical coordinates (range, elevation, azimuth).
 */
export function bearingOf(subject: Coordinates, viewer: Coordinates): Spherical {
  return toSpherical(relativeTo(subject, viewer).position);
}
