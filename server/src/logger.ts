import pino from 'pino';
import type { SpaceErrorKind } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'space.log')
 * @param component - Component name for filtering (e.g., 'space', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',         // Rotate at 10MB
      limit: { count: 5 }, // Keep last 5 rotated files
      mkdir: true,         // Create logs dir if needed
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component }, // Add component field to all log entries
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Entity and domain lifecycle, integration failures
export const logger = createLogger('space.log', 'space');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Space Events
// ============================================

/**
 * Log an entity spawn
 */
export function logEntitySpawned(entity: number, domain: number) {
  logger.debug({ entity, domain, event: 'entity_spawned' }, `Entity ${entity} spawned in domain ${domain}`);
}

/**
 * Log an entity despawn
 */
export function logEntityDespawned(entity: number, domain: number) {
  logger.debug({ entity, domain, event: 'entity_despawned' }, `Entity ${entity} despawned`);
}

export function logDomainCreated(domain: number) {
  logger.info({ domain, event: 'domain_created' }, `Domain ${domain} created`);
}

/**
 * Log domain removal along with how many entities went with it
 */
export function logDomainRemoved(domain: number, despawned: number) {
  logger.info(
    { domain, despawned, event: 'domain_removed' },
    `Domain ${domain} removed (${despawned} entities despawned)`
  );
}

/**
 * Log a single entity failing to integrate. Other entities are unaffected.
 */
export function logIntegrationFailure(entity: number, kind: SpaceErrorKind | 'Unknown', message: string) {
  logger.warn(
    { entity, kind, event: 'integration_failed' },
    `Entity ${entity} failed to integrate: ${message}`
  );
}

/**
 * Log a restored entity (from a serialized record)
 */
export function logEntityRestored(entity: number, domain: number) {
  logger.info({ entity, domain, event: 'entity_restored' }, `Entity ${entity} restored into domain ${domain}`);
}
