// ============================================
// Integration System
// Advances every live entity by one tick
// ============================================

import { isSpaceError } from '#shared';
import type { SpaceSession } from '../SpaceSession';
import type { System, TickReport } from './types';
import { logIntegrationFailure } from '../../logger';

/**
 * IntegrationSystem - the kinematic pass
 *
 * One pass over every domain's live slots. Each entity integrates
 * independently (position += velocity * dt, heading composed with
 * rotation^dt), so one failing entity is recorded in the tick report and
 * skipped while the rest still move.
 */
export class IntegrationSystem implements System {
  readonly name = 'IntegrationSystem';

  update(space: SpaceSession, deltaTime: number, report: TickReport): void {
    space.forEachEntity((entity, coords) => {
      try {
        coords.integrate(deltaTime);
        report.integrated++;
      } catch (error) {
        const kind = isSpaceError(error) ? error.kind : 'Unknown';
        const message = error instanceof Error ? error.message : String(error);
        report.failures.push({ entity, system: this.name, kind, message });
        logIntegrationFailure(entity, kind, message);
      }
    });
  }
}
