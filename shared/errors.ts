// ============================================
// Coordinate Engine Errors
// ============================================

/**
 * Failure kinds raised by the coordinate engine.
 * Using const object for type safety while keeping string values.
 */
export const SpaceErrorKind = {
  /** Use of a freed, out-of-range or unknown slot / entity handle */
  InvalidIndex: 'InvalidIndex',
  /** Allocation past the store's maximum capacity */
  OutOfCapacity: 'OutOfCapacity',
  /** Orientation set with a quaternion outside the unit-norm tolerance */
  NonUnitQuaternion: 'NonUnitQuaternion',
  /** NaN or Infinity written to (or produced for) kinematic state */
  NonFiniteState: 'NonFiniteState',
  /** Negative or non-finite integration step */
  InvalidTimeStep: 'InvalidTimeStep',
  /** Frame transform requested between entities of different domains */
  DomainMismatch: 'DomainMismatch',
  /** Serialized entity record failed validation */
  InvalidSerial: 'InvalidSerial',
} as const;

export type SpaceErrorKind = (typeof SpaceErrorKind)[keyof typeof SpaceErrorKind];

export class SpaceError extends Error {
  constructor(
    public readonly kind: SpaceErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(`${kind}: ${message}`);
    this.name = 'SpaceError';
  }
}

export function isSpaceError(error: unknown, kind?: SpaceErrorKind): error is SpaceError {
  return error instanceof SpaceError && (kind === undefined || error.kind === kind);
}
