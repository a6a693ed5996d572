// ============================================
// Shared Types & Constants
// Used by the authoritative server and by any client-side readout
// ============================================

// Space module - vector storage, per-entity coordinates, frame transforms
export * from './space';

// Vector math
export * as Vec3Math from './math';
export type { Vec3 } from './math';

// Quaternion math (orientation and spin)
export * as QuatMath from './quaternion';
export type { Quat, AxisAngle } from './quaternion';

// Spherical / cylindrical bearing conversion
export * from './sphereMath';

// Configuration constants (SPACE_CONFIG, TUNABLE_CONFIGS)
export * from './constants';

// Error taxonomy
export * from './errors';
