// ============================================
// Entity Serialization
// Plain-JSON records of an entity's kinematic state
// ============================================

import { SpaceError, SpaceErrorKind, type KinematicState, type Quat, type Vec3 } from '#shared';

type Triple = [number, number, number];
type Quad = [number, number, number, number];

/**
 * Serialized entity. `type` names the record kind; `data` holds vectors as
 * [x, y, z] and quaternions as [w, x, y, z].
 */
export interface SerializedEntity {
  type: 'Coordinates';
  data: {
    pos: Triple;
    vel: Triple;
    heading: Quad;
    rotation: Quad;
    domain: number;
  };
}

export function serializeState(state: KinematicState, domain: number): SerializedEntity {
  const { position: p, velocity: v, heading: h, rotation: r } = state;
  return {
    type: 'Coordinates',
    data: {
      pos: [p.x, p.y, p.z],
      vel: [v.x, v.y, v.z],
      heading: [h.w, h.x, h.y, h.z],
      rotation: [r.w, r.x, r.y, r.z],
      domain,
    },
  };
}

// ============================================
// Parsing
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(message: string, details: Record<string, unknown> = {}): never {
  throw new SpaceError(SpaceErrorKind.InvalidSerial, message, details);
}

function readNumbers(value: unknown, length: number, field: string): number[] {
  if (!Array.isArray(value) || value.length !== length) {
    fail(`${field} must be an array of ${length} numbers`, { field });
  }
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      fail(`${field} must contain only finite numbers`, { field });
    }
    numbers.push(item);
  }
  return numbers;
}

function readVec3(value: unknown, field: string): Vec3 {
  const [x, y, z] = readNumbers(value, 3, field);
  return { x, y, z };
}

function readQuat(value: unknown, field: string): Quat {
  const [w, x, y, z] = readNumbers(value, 4, field);
  return { w, x, y, z };
}

/**
 * Validate an unknown value (e.g. parsed JSON) as a SerializedEntity and
 * return its state and domain. Throws InvalidSerial on any malformed field.
 * Unit-norm checks happen when the state is applied to an entity.
 */
export function parseSerializedEntity(value: unknown): { state: KinematicState; domain: number } {
  if (!isRecord(value) || value.type !== 'Coordinates') {
    fail('record must be an object with type "Coordinates"');
  }
  const data = value.data;
  if (!isRecord(data)) {
    fail('record is missing its data object');
  }
  const domain = data.domain;
  if (typeof domain !== 'number' || !Number.isInteger(domain) || domain < 0) {
    fail('domain must be a non-negative integer', { field: 'domain' });
  }

  return {
    state: {
      position: readVec3(data.pos, 'pos'),
      velocity: readVec3(data.vel, 'vel'),
      heading: readQuat(data.heading, 'heading'),
      rotation: readQuat(data.rotation, 'rotation'),
    },
    domain,
  };
}
