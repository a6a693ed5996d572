// ============================================
// Vector Store
// ============================================

import { SPACE_CONFIG } from '../constants';
import { SpaceError, SpaceErrorKind } from '../errors';
import { isFiniteVec3, type Vec3 } from '../math';
import {
  createSlotId,
  getSlotGeneration,
  getSlotIndex,
  INDEX_RANGE,
  MAX_GENERATION,
  type SlotId,
} from './types';

export interface VectorStoreOptions {
  /** Slots allocated up front; storage doubles on demand */
  initialCapacity?: number;
  /** Hard cap on slots; allocation beyond it throws OutOfCapacity */
  maxCapacity?: number;
}

/**
 * VectorStore - contiguous storage of absolute position and velocity for
 * every live entity in one domain.
 *
 * Structure of Arrays: slot i owns doubles [3i, 3i+3) of `positions` and of
 * `velocities`. Entities hold only a SlotId into the store, never a copy of
 * the vectors, so per-tick updates stay authoritative in one place.
 *
 * Slots are recycled through a free-index stack. Each slot carries a
 * generation that is bumped on free(); a SlotId minted for an earlier
 * generation is rejected with InvalidIndex instead of reading the new
 * occupant.
 */
export class VectorStore {
  private positions: Float64Array;
  private velocities: Float64Array;
  private generations: Uint32Array;
  private live: Uint8Array;
  private freeIndices: number[] = [];
  private highWater = 0;
  private liveSlots = 0;
  private readonly maxCapacity: number;

  constructor(options: VectorStoreOptions = {}) {
    const maxCapacity = options.maxCapacity ?? SPACE_CONFIG.MAX_SLOT_CAPACITY;
    if (!Number.isInteger(maxCapacity) || maxCapacity < 1 || maxCapacity > INDEX_RANGE) {
      throw new RangeError(`maxCapacity must be an integer in [1, ${INDEX_RANGE}], got ${maxCapacity}`);
    }
    const initialCapacity = Math.min(
      Math.max(1, options.initialCapacity ?? SPACE_CONFIG.INITIAL_SLOT_CAPACITY),
      maxCapacity
    );

    this.maxCapacity = maxCapacity;
    this.positions = new Float64Array(initialCapacity * 3);
    this.velocities = new Float64Array(initialCapacity * 3);
    this.generations = new Uint32Array(initialCapacity);
    this.live = new Uint8Array(initialCapacity);
  }

  // ============================================
  // Slot Lifecycle
  // ============================================

  /**
   * Allocate a slot with zero position and velocity.
   * Reuses the most recently freed slot first.
   */
  allocate(): SlotId {
    let index = this.freeIndices.pop();

    if (index === undefined) {
      if (this.highWater === this.capacity) {
        this.grow();
      }
      index = this.highWater++;
      this.generations[index] = 1;
    }

    const base = index * 3;
    this.positions.fill(0, base, base + 3);
    this.velocities.fill(0, base, base + 3);
    this.live[index] = 1;
    this.liveSlots++;

    return createSlotId(index, this.generations[index]);
  }

  /**
   * Release a slot for reuse. The SlotId (and any copy of it) is dead afterward.
   */
  free(slot: SlotId): void {
    const index = this.resolve(slot);
    const generation = this.generations[index];

    this.live[index] = 0;
    this.generations[index] = generation >= MAX_GENERATION ? 1 : generation + 1;
    this.freeIndices.push(index);
    this.liveSlots--;
  }

  /**
   * Check whether a SlotId still refers to a live slot.
   */
  isLive(slot: SlotId): boolean {
    if (!Number.isInteger(slot) || slot < 0) return false;
    const index = getSlotIndex(slot);
    return (
      index < this.highWater &&
      this.live[index] === 1 &&
      this.generations[index] === getSlotGeneration(slot)
    );
  }

  /**
   * Free every live slot. Outstanding SlotIds all become stale.
   */
  clear(): void {
    this.forEachLive((slot) => this.free(slot));
  }

  // ============================================
  // Vector Access
  // ============================================

  getPosition(slot: SlotId): Vec3 {
    return this.read(this.positions, this.resolve(slot));
  }

  setPosition(slot: SlotId, v: Vec3): void {
    this.write(this.positions, this.resolve(slot), v, 'position');
  }

  getVelocity(slot: SlotId): Vec3 {
    return this.read(this.velocities, this.resolve(slot));
  }

  setVelocity(slot: SlotId, v: Vec3): void {
    this.write(this.velocities, this.resolve(slot), v, 'velocity');
  }

  /**
   * Add a velocity change (impulse / force * dt) in place.
   */
  addVelocity(slot: SlotId, dv: Vec3): void {
    const index = this.resolve(slot);
    const current = this.read(this.velocities, index);
    this.write(
      this.velocities,
      index,
      { x: current.x + dv.x, y: current.y + dv.y, z: current.z + dv.z },
      'velocity'
    );
  }

  /**
   * position += velocity * dt for one slot, in place.
   * Throws NonFiniteState (leaving the slot untouched) if the result overflows.
   */
  advance(slot: SlotId, dt: number): void {
    const index = this.resolve(slot);
    const base = index * 3;
    const p = this.positions;
    const v = this.velocities;

    const x = p[base] + v[base] * dt;
    const y = p[base + 1] + v[base + 1] * dt;
    const z = p[base + 2] + v[base + 2] * dt;
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
      throw new SpaceError(SpaceErrorKind.NonFiniteState, 'integration produced a non-finite position', {
        slot,
        dt,
      });
    }

    p[base] = x;
    p[base + 1] = y;
    p[base + 2] = z;
  }

  // ============================================
  // Iteration
  // ============================================

  /**
   * Visit every live slot once, in index order.
   * Callback form avoids allocating an array on the per-tick hot path.
   */
  forEachLive(callback: (slot: SlotId, index: number) => void): void {
    const end = this.highWater;
    for (let index = 0; index < end; index++) {
      if (this.live[index] === 1) {
        callback(createSlotId(index, this.generations[index]), index);
      }
    }
  }

  get liveCount(): number {
    return this.liveSlots;
  }

  get capacity(): number {
    return this.live.length;
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Validate a SlotId and return its index. Throws InvalidIndex for freed,
   * reused, out-of-range or malformed handles.
   */
  private resolve(slot: SlotId): number {
    if (!this.isLive(slot)) {
      throw new SpaceError(SpaceErrorKind.InvalidIndex, `slot ${slot} is not live`, {
        slot,
        index: Number.isInteger(slot) && slot >= 0 ? getSlotIndex(slot) : undefined,
      });
    }
    return getSlotIndex(slot);
  }

  private read(array: Float64Array, index: number): Vec3 {
    const base = index * 3;
    return { x: array[base], y: array[base + 1], z: array[base + 2] };
  }

  private write(array: Float64Array, index: number, v: Vec3, field: string): void {
    if (!isFiniteVec3(v)) {
      throw new SpaceError(SpaceErrorKind.NonFiniteState, `${field} must be finite`, {
        index,
        field,
        value: { x: v.x, y: v.y, z: v.z },
      });
    }
    const base = index * 3;
    array[base] = v.x;
    array[base + 1] = v.y;
    array[base + 2] = v.z;
  }

  private grow(): void {
    const current = this.capacity;
    if (current >= this.maxCapacity) {
      throw new SpaceError(SpaceErrorKind.OutOfCapacity, `vector store is full (${this.maxCapacity} slots)`, {
        capacity: current,
      });
    }
    const next = Math.min(current * 2, this.maxCapacity);

    const positions = new Float64Array(next * 3);
    positions.set(this.positions);
    const velocities = new Float64Array(next * 3);
    velocities.set(this.velocities);
    const generations = new Uint32Array(next);
    generations.set(this.generations);
    const live = new Uint8Array(next);
    live.set(this.live);

    this.positions = positions;
    this.velocities = velocities;
    this.generations = generations;
    this.live = live;
  }
}
