// ============================================
// Coordinate Engine - Server Entry
// Public API consumed by the host's tick scheduler, game logic,
// targeting and state-broadcast layers
// ============================================

export * from './space';
export { getConfig, setConfigOverride, resetConfigOverrides, getTunableSnapshot, envKeyFor } from './config';
export { logger, perfLogger } from './logger';
