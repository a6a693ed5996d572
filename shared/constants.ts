// ============================================
// Coordinate Engine Constants & Configuration
// Runtime-tunable values and static configuration
// ============================================

// Runtime config that can be overridden by the host (subset of SPACE_CONFIG keys)
export const TUNABLE_CONFIGS = [
  'INITIAL_SLOT_CAPACITY',
  'MAX_SLOT_CAPACITY',
  'UNIT_QUATERNION_TOLERANCE',
  'SLOW_TICK_MS',
] as const;

export type TunableConfigKey = (typeof TUNABLE_CONFIGS)[number];

export const SPACE_CONFIG = {
  // Vector storage
  INITIAL_SLOT_CAPACITY: 64, // Slots allocated up front per domain (doubles on demand)
  MAX_SLOT_CAPACITY: 1 << 20, // Hard cap per domain; allocation past this is OutOfCapacity

  // Orientation
  UNIT_QUATERNION_TOLERANCE: 1e-6, // Allowed | |q| - 1 | before a set is rejected

  // Ticks
  SLOW_TICK_MS: 10, // Log a per-system breakdown when a tick takes longer than this

  // Domains
  DEFAULT_DOMAIN: 0, // Domain every session starts with
};

export type SpaceConfig = typeof SPACE_CONFIG;
