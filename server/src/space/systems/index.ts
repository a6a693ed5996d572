// ============================================
// Space Systems Index
// ============================================

export { SystemRunner } from './SystemRunner';
export { IntegrationSystem } from './IntegrationSystem';
export { SystemPriority } from './types';
export type { System, TickReport, EntityFailure, SystemFailure } from './types';
