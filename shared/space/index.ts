// ============================================
// Space Package Exports
// ============================================

export { VectorStore } from './VectorStore';
export type { VectorStoreOptions } from './VectorStore';
export { Coordinates } from './Coordinates';
export type { CoordinatesOptions } from './Coordinates';
export { relativeTo, relativeBetween, bearingOf, angularVelocityVector } from './FrameTransform';
export type { FrameTransformOptions } from './FrameTransform';

export {
  createSlotId,
  getSlotIndex,
  getSlotGeneration,
  freezeState,
  INDEX_BITS,
  INDEX_RANGE,
  MAX_GENERATION,
} from './types';
export type { SlotId, KinematicState, RelativeSnapshot, KinematicSnapshot } from './types';
