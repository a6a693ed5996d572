// ============================================
// Runtime Configuration
// SPACE_CONFIG with runtime and environment overrides
// ============================================

import { SPACE_CONFIG, TUNABLE_CONFIGS, type TunableConfigKey } from '#shared';
import { logger } from './logger';

// Runtime config overrides (applied on top of SPACE_CONFIG)
const configOverrides: Map<TunableConfigKey, number> = new Map();

/**
 * Environment variable carrying an override for a tunable key,
 * e.g. MAX_SLOT_CAPACITY -> SPACE_MAX_SLOT_CAPACITY
 */
export function envKeyFor(key: TunableConfigKey): string {
  return `SPACE_${key}`;
}

function isTunable(key: string): key is TunableConfigKey {
  return (TUNABLE_CONFIGS as readonly string[]).includes(key);
}

function readEnvOverride(key: TunableConfigKey): number | undefined {
  const raw = process.env[envKeyFor(key)];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn({ key, raw, event: 'config_env_invalid' }, `Ignoring non-numeric ${envKeyFor(key)}=${raw}`);
    return undefined;
  }
  return value;
}

// ============================================
// Config Access (with overrides)
// ============================================

/**
 * Get a config value: runtime override, then SPACE_* environment variable,
 * then the SPACE_CONFIG default.
 */
export function getConfig(key: keyof typeof SPACE_CONFIG): number {
  if (isTunable(key)) {
    const override = configOverrides.get(key) ?? readEnvOverride(key);
    if (override !== undefined) {
      return override;
    }
  }
  return SPACE_CONFIG[key];
}

/**
 * Override a tunable value for this process.
 */
export function setConfigOverride(key: TunableConfigKey, value: number): void {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Config override for ${key} must be finite, got ${value}`);
  }
  configOverrides.set(key, value);
  logger.info({ key, value, event: 'config_override' }, `Config ${key} set to ${value}`);
}

export function resetConfigOverrides(): void {
  configOverrides.clear();
}

/**
 * Current values of every tunable key (for debugging)
 */
export function getTunableSnapshot(): Record<TunableConfigKey, number> {
  return {
    INITIAL_SLOT_CAPACITY: getConfig('INITIAL_SLOT_CAPACITY'),
    MAX_SLOT_CAPACITY: getConfig('MAX_SLOT_CAPACITY'),
    UNIT_QUATERNION_TOLERANCE: getConfig('UNIT_QUATERNION_TOLERANCE'),
    SLOW_TICK_MS: getConfig('SLOW_TICK_MS'),
  };
}
