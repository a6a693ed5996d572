// ============================================
// Space Module Exports
// ============================================

export { SpaceSession } from './SpaceSession';
export type { EntityHandle, DomainId, SpawnOptions, SpaceSessionOptions } from './SpaceSession';
export { serializeState, parseSerializedEntity } from './serialization';
export type { SerializedEntity } from './serialization';
export { SystemRunner, IntegrationSystem, SystemPriority } from './systems';
export type { System, TickReport, EntityFailure, SystemFailure } from './systems';
