// ============================================
// Coordinates
// Per-entity kinematic state: a VectorStore slot plus orientation
// ============================================

import { SPACE_CONFIG } from '../constants';
import { SpaceError, SpaceErrorKind } from '../errors';
import { magnitude, NORTH, type Vec3 } from '../math';
import {
  fromCylindrical,
  fromSpherical,
  toCylindrical,
  toSpherical,
  type Cylindrical,
  type Spherical,
} from '../sphereMath';
import {
  fromAngularVelocity,
  IDENTITY,
  isFiniteQuat,
  isUnit,
  multiply,
  norm,
  normalize,
  rotateVector,
  type Quat,
} from '../quaternion';
import { freezeState, type KinematicSnapshot, type KinematicState, type SlotId } from './types';
import type { VectorStore } from './VectorStore';

export interface CoordinatesOptions {
  position?: Vec3;
  velocity?: Vec3;
  heading?: Quat;
  rotation?: Quat;
  /** Allowed | |q| - 1 | for heading/rotation sets */
  tolerance?: number;
}

/**
 * Coordinates - the unit of kinematic state for one entity.
 *
 * Position and velocity live in the owning VectorStore and are reached only
 * through this entity's slot. Heading (orientation) and rotation (spin per
 * second) are unit quaternions held here and renormalized every integration
 * step.
 */
export class Coordinates {
  private readonly store: VectorStore;
  private readonly tolerance: number;
  private heading: Quat = { ...IDENTITY };
  private rotation: Quat = { ...IDENTITY };
  private slotId: SlotId;
  private alive = true;

  constructor(store: VectorStore, options: CoordinatesOptions = {}) {
    this.store = store;
    this.tolerance = options.tolerance ?? SPACE_CONFIG.UNIT_QUATERNION_TOLERANCE;
    this.slotId = store.allocate();

    // Release the slot if any initial value is rejected
    try {
      if (options.position) this.setPosition(options.position);
      if (options.velocity) this.setVelocity(options.velocity);
      if (options.heading) this.setHeading(options.heading);
      if (options.rotation) this.setRotation(options.rotation);
    } catch (error) {
      store.free(this.slotId);
      this.alive = false;
      throw error;
    }
  }

  get slot(): SlotId {
    return this.slotId;
  }

  /**
   * False after destroy(), and after the owning store freed the slot (clear()).
   */
  get isAlive(): boolean {
    return this.alive && this.store.isLive(this.slotId);
  }

  // ============================================
  // Integration
  // ============================================

  /**
   * Advance this entity by dt seconds.
   * position += velocity * dt; heading = normalize(heading ⊗ rotation^dt).
   * Velocity and rotation are left as they are.
   */
  integrate(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new SpaceError(SpaceErrorKind.InvalidTimeStep, `time step must be finite and >= 0, got ${dt}`, {
        slot: this.slotId,
        dt,
      });
    }

    // Orientation first: if it fails the position is still untouched
    const nextHeading = normalize(multiply(this.heading, fromAngularVelocity(this.rotation, dt)));
    this.store.advance(this.slotId, dt);
    this.heading = nextHeading;
  }

  // ============================================
  // Reads
  // ============================================

  getPosition(): Vec3 {
    return this.store.getPosition(this.slotId);
  }

  getVelocity(): Vec3 {
    return this.store.getVelocity(this.slotId);
  }

  getHeading(): Quat {
    this.assertAlive();
    return { ...this.heading };
  }

  getRotation(): Quat {
    this.assertAlive();
    return { ...this.rotation };
  }

  /**
   * Unit vector this entity is facing: north (+Y) rotated by the heading.
   */
  facing(): Vec3 {
    this.assertAlive();
    return rotateVector(NORTH, this.heading);
  }

  speed(): number {
    return magnitude(this.getVelocity());
  }

  // Spherical (range, elevation, azimuth) and cylindrical views of the
  // absolute vectors. Setters write through to the store.

  getPositionSpherical(): Spherical {
    return toSpherical(this.getPosition());
  }

  getVelocitySpherical(): Spherical {
    return toSpherical(this.getVelocity());
  }

  getPositionCylindrical(): Cylindrical {
    return toCylindrical(this.getPosition());
  }

  getVelocityCylindrical(): Cylindrical {
    return toCylindrical(this.getVelocity());
  }

  /**
   * Full absolute state as a plain (mutable) value.
   */
  getState(): KinematicState {
    return {
      position: this.getPosition(),
      velocity: this.getVelocity(),
      heading: this.getHeading(),
      rotation: this.getRotation(),
    };
  }

  /**
   * Detached, frozen copy of the absolute state.
   */
  snapshot(): KinematicSnapshot {
    return freezeState(this.getState());
  }

  // ============================================
  // Writes
  // ============================================

  setPosition(v: Vec3): void {
    this.store.setPosition(this.slotId, v);
  }

  setVelocity(v: Vec3): void {
    this.store.setVelocity(this.slotId, v);
  }

  setPositionSpherical(s: Spherical): void {
    this.setPosition(fromSpherical(s));
  }

  setVelocitySpherical(s: Spherical): void {
    this.setVelocity(fromSpherical(s));
  }

  setPositionCylindrical(c: Cylindrical): void {
    this.setPosition(fromCylindrical(c));
  }

  setVelocityCylindrical(c: Cylindrical): void {
    this.setVelocity(fromCylindrical(c));
  }

  /** Apply a velocity change (external forces) in place. */
  addVelocity(dv: Vec3): void {
    this.store.addVelocity(this.slotId, dv);
  }

  setHeading(q: Quat): void {
    this.assertAlive();
    this.heading = this.checkUnit(q, 'heading');
  }

  setRotation(q: Quat): void {
    this.assertAlive();
    this.rotation = this.checkUnit(q, 'rotation');
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Free this entity's slot. Safe to call more than once.
   */
  destroy(): void {
    if (!this.alive) return;
    this.alive = false;
    if (this.store.isLive(this.slotId)) {
      this.store.free(this.slotId);
    }
  }

  private assertAlive(): void {
    if (!this.isAlive) {
      throw new SpaceError(SpaceErrorKind.InvalidIndex, `coordinates for slot ${this.slotId} are no longer live`, {
        slot: this.slotId,
      });
    }
  }

  /**
   * Accept a quaternion within tolerance of unit norm, renormalized.
   */
  private checkUnit(q: Quat, field: 'heading' | 'rotation'): Quat {
    if (!isFiniteQuat(q) || !isUnit(q, this.tolerance)) {
      throw new SpaceError(SpaceErrorKind.NonUnitQuaternion, `${field} must be a unit quaternion`, {
        slot: this.slotId,
        field,
        norm: norm(q),
        tolerance: this.tolerance,
      });
    }
    return normalize(q);
  }
}
