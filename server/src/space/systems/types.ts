// ============================================
// Space System Types
// ============================================

import type { SpaceErrorKind } from '#shared';
import type { SpaceSession } from '../SpaceSession';

/**
 * One entity that failed during a tick. Failures are per entity: the rest of
 * the tick still runs.
 */
export interface EntityFailure {
  entity: number;
  system: string;
  kind: SpaceErrorKind | 'Unknown';
  message: string;
}

/**
 * A system that threw as a whole (logged, then skipped for this tick).
 */
export interface SystemFailure {
  system: string;
  message: string;
}

/**
 * Outcome of SpaceSession.tick()
 */
export interface TickReport {
  /** Step length in seconds */
  deltaTime: number;
  /** Entities successfully integrated */
  integrated: number;
  failures: EntityFailure[];
  systemErrors: SystemFailure[];
  /** Wall time spent in systems */
  durationMs: number;
}

/**
 * Base System interface
 * The integration pass and any host-provided systems (forces, thrust) implement this
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every tick
   * @param space The session holding all entities
   * @param deltaTime Step length in seconds
   * @param report Per-tick report to record entity failures into
   */
  update(space: SpaceSession, deltaTime: number, report: TickReport): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * External forces must change velocity before the kinematic pass reads it.
 */
export const SystemPriority = {
  // Host-provided forces, thrust, impulses (write velocity / rotation)
  FORCES: 200,

  // Kinematic integration (position += velocity * dt, heading *= rotation^dt)
  INTEGRATION: 500,

  // Post-integration readers (state broadcast, collision checks)
  OBSERVERS: 900,
} as const;
