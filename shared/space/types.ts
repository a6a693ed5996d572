// ============================================
// Coordinate Engine Core Types
// ============================================

import type { Vec3 } from '../math';
import type { Quat } from '../quaternion';

/**
 * Slot handle into a VectorStore - just a number.
 * Packs the slot index (low INDEX_BITS) with the slot's generation, so a
 * handle kept past free() no longer matches the slot and is rejected.
 */
export type SlotId = number;

export const INDEX_BITS = 20;
export const INDEX_RANGE = 2 ** INDEX_BITS;
/** Generations wrap at 2^32; combined with INDEX_RANGE this stays a safe integer. */
export const MAX_GENERATION = 2 ** 32 - 1;

export function createSlotId(index: number, generation: number): SlotId {
  return generation * INDEX_RANGE + index;
}

export function getSlotIndex(slot: SlotId): number {
  return slot % INDEX_RANGE;
}

export function getSlotGeneration(slot: SlotId): number {
  return Math.floor(slot / INDEX_RANGE);
}

/**
 * Full kinematic state of one entity in some frame.
 */
export interface KinematicState {
  position: Vec3;
  velocity: Vec3;
  /** Orientation relative to the frame */
  heading: Quat;
  /** Spin: rotation performed per second */
  rotation: Quat;
}

/**
 * Detached, immutable result of a frame transform.
 * Not backed by a VectorStore; never mutated after construction.
 */
export type RelativeSnapshot = Readonly<{
  position: Readonly<Vec3>;
  velocity: Readonly<Vec3>;
  heading: Readonly<Quat>;
  rotation: Readonly<Quat>;
}>;

/** Detached copy of an entity's absolute state (same shape as RelativeSnapshot). */
export type KinematicSnapshot = RelativeSnapshot;

export function freezeState(state: KinematicState): RelativeSnapshot {
  return Object.freeze({
    position: Object.freeze({ ...state.position }),
    velocity: Object.freeze({ ...state.velocity }),
    heading: Object.freeze({ ...state.heading }),
    rotation: Object.freeze({ ...state.rotation }),
  });
}
