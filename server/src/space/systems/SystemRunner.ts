// ============================================
// Space System Runner
// Manages and executes all systems in priority order
// ============================================

import type { SpaceSession } from '../SpaceSession';
import type { System, TickReport } from './types';
import { logger, perfLogger } from '../../logger';
import { getConfig } from '../../config';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all systems of one session
 *
 * Systems are executed in priority order (lower numbers first).
 * Systems registered with equal priority run in registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority (Array.prototype.sort is stable)
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Remove a system by name. Returns true if one was removed.
   */
  unregister(name: string): boolean {
    const before = this.systems.length;
    this.systems = this.systems.filter(({ system }) => system.name !== name);
    return this.systems.length !== before;
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when tick is slow
   */
  update(space: SpaceSession, deltaTime: number, report: TickReport): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(space, deltaTime, report);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        report.systemErrors.push({ system: system.name, message });
        logger.error({
          event: 'system_error',
          system: system.name,
          error: message,
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Continue with next system - one system must not stall the tick
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;
    report.durationMs = totalMs;

    if (totalMs > getConfig('SLOW_TICK_MS')) {
      // Sort by time descending to show slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5) // Only show systems that took > 0.5ms
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        entities: space.entityCount,
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
