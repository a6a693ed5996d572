// ============================================
// Space Session
// Authoritative kinematic state for one game session
// ============================================

import {
  Coordinates,
  fromSpherical,
  getSlotIndex,
  relativeTo,
  SpaceError,
  SpaceErrorKind,
  toSpherical,
  VectorStore,
  type Cylindrical,
  type FrameTransformOptions,
  type KinematicSnapshot,
  type Quat,
  type RelativeSnapshot,
  type Spherical,
  type Vec3,
} from '#shared';
import { getConfig } from '../config';
import {
  logDomainCreated,
  logDomainRemoved,
  logEntityDespawned,
  logEntityRestored,
  logEntitySpawned,
} from '../logger';
import { parseSerializedEntity, serializeState, type SerializedEntity } from './serialization';
import { IntegrationSystem, SystemPriority, SystemRunner, type System, type TickReport } from './systems';

/** Entity handle handed to the host - just a number, never reused within a session. */
export type EntityHandle = number;

/** Domain identifier. Entities interact only within their own domain. */
export type DomainId = number;

export interface SpawnOptions {
  domain?: DomainId;
  position?: Vec3;
  velocity?: Vec3;
  heading?: Quat;
  rotation?: Quat;
}

export interface SpaceSessionOptions {
  initialCapacity?: number;
  maxCapacity?: number;
  tolerance?: number;
}

/**
 * A locality with its own VectorStore. occupants[slotIndex] maps a live
 * slot back to the entity holding it.
 */
interface Domain {
  id: DomainId;
  store: VectorStore;
  occupants: Array<EntityRecord | undefined>;
}

interface EntityRecord {
  handle: EntityHandle;
  domain: Domain;
  coords: Coordinates;
}

/**
 * SpaceSession - the coordinate engine's public surface for one session.
 *
 * Owns:
 * - Domains (each with its own VectorStore), starting with the default domain
 * - Entity lifecycle (spawn, despawn, serialize, restore)
 * - The tick: systems in priority order, integration included
 * - Queries: per-entity getters, frame transforms, bearings
 *
 * Sessions are constructed explicitly and share no state with each other.
 */
export class SpaceSession {
  private nextEntityHandle = 1;
  private nextDomainId: DomainId;
  private domains = new Map<DomainId, Domain>();
  private entities = new Map<EntityHandle, EntityRecord>();
  private runner = new SystemRunner();
  private ticking = false;
  private tickCount = 0;

  private readonly initialCapacity: number;
  private readonly maxCapacity: number;
  private readonly tolerance: number;

  constructor(options: SpaceSessionOptions = {}) {
    this.initialCapacity = options.initialCapacity ?? getConfig('INITIAL_SLOT_CAPACITY');
    this.maxCapacity = options.maxCapacity ?? getConfig('MAX_SLOT_CAPACITY');
    this.tolerance = options.tolerance ?? getConfig('UNIT_QUATERNION_TOLERANCE');

    const defaultDomain = getConfig('DEFAULT_DOMAIN');
    this.nextDomainId = defaultDomain;
    this.createDomain();

    this.runner.register(new IntegrationSystem(), SystemPriority.INTEGRATION);
  }

  // ============================================
  // Domains
  // ============================================

  createDomain(): DomainId {
    const id = this.nextDomainId++;
    this.domains.set(id, {
      id,
      store: new VectorStore({ initialCapacity: this.initialCapacity, maxCapacity: this.maxCapacity }),
      occupants: [],
    });
    logDomainCreated(id);
    return id;
  }

  /**
   * Remove a domain and despawn every entity in it.
   * Returns the number of entities despawned.
   */
  removeDomain(id: DomainId): number {
    const domain = this.getDomain(id);
    let despawned = 0;
    for (const record of [...this.entities.values()]) {
      if (record.domain === domain) {
        this.despawnEntity(record.handle);
        despawned++;
      }
    }
    this.domains.delete(id);
    logDomainRemoved(id, despawned);
    return despawned;
  }

  hasDomain(id: DomainId): boolean {
    return this.domains.has(id);
  }

  getDomainIds(): DomainId[] {
    return Array.from(this.domains.keys());
  }

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Spawn an entity. Heading and rotation default to the identity,
   * position and velocity to zero.
   */
  spawnEntity(options: SpawnOptions = {}): EntityHandle {
    const domain = this.getDomain(options.domain ?? getConfig('DEFAULT_DOMAIN'));
    const coords = new Coordinates(domain.store, {
      position: options.position,
      velocity: options.velocity,
      heading: options.heading,
      rotation: options.rotation,
      tolerance: this.tolerance,
    });

    const handle = this.nextEntityHandle++;
    const record: EntityRecord = { handle, domain, coords };
    this.entities.set(handle, record);
    domain.occupants[getSlotIndex(coords.slot)] = record;

    logEntitySpawned(handle, domain.id);
    return handle;
  }

  /**
   * Despawn an entity and free its slot. The handle is dead afterward.
   */
  despawnEntity(handle: EntityHandle): void {
    const record = this.getRecord(handle);
    record.domain.occupants[getSlotIndex(record.coords.slot)] = undefined;
    record.coords.destroy();
    this.entities.delete(handle);
    logEntityDespawned(handle, record.domain.id);
  }

  hasEntity(handle: EntityHandle): boolean {
    return this.entities.has(handle);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  getDomainOf(handle: EntityHandle): DomainId {
    return this.getRecord(handle).domain.id;
  }

  /**
   * Direct access to an entity's Coordinates, for systems that apply forces.
   */
  getCoordinates(handle: EntityHandle): Coordinates {
    return this.getRecord(handle).coords;
  }

  /**
   * Visit every live entity once: domain by domain, in slot order.
   */
  forEachEntity(callback: (handle: EntityHandle, coords: Coordinates, domain: DomainId) => void): void {
    for (const domain of this.domains.values()) {
      const occupants = domain.occupants;
      domain.store.forEachLive((_slot, index) => {
        const record = occupants[index];
        if (record) {
          callback(record.handle, record.coords, domain.id);
        }
      });
    }
  }

  // ============================================
  // Tick
  // ============================================

  /**
   * Register a host system (forces, observers) to run every tick.
   */
  registerSystem(system: System, priority: number): void {
    this.runner.register(system, priority);
  }

  unregisterSystem(name: string): boolean {
    return this.runner.unregister(name);
  }

  getSystemNames(): string[] {
    return this.runner.getSystemNames();
  }

  /**
   * Advance the session by dt seconds: every registered system in priority
   * order, the integration pass included. Entity failures are collected in the
   * report; they never abort the tick.
   */
  tick(dt: number): TickReport {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new SpaceError(SpaceErrorKind.InvalidTimeStep, `time step must be finite and >= 0, got ${dt}`, { dt });
    }
    if (this.ticking) {
      throw new Error('SpaceSession.tick() called from inside a tick');
    }

    const report: TickReport = { deltaTime: dt, integrated: 0, failures: [], systemErrors: [], durationMs: 0 };
    this.ticking = true;
    try {
      this.runner.update(this, dt, report);
    } finally {
      this.ticking = false;
    }
    this.tickCount++;
    return report;
  }

  // ============================================
  // Per-entity State
  // ============================================

  getPosition(handle: EntityHandle): Vec3 {
    return this.getRecord(handle).coords.getPosition();
  }

  getVelocity(handle: EntityHandle): Vec3 {
    return this.getRecord(handle).coords.getVelocity();
  }

  getHeading(handle: EntityHandle): Quat {
    return this.getRecord(handle).coords.getHeading();
  }

  getRotation(handle: EntityHandle): Quat {
    return this.getRecord(handle).coords.getRotation();
  }

  getFacing(handle: EntityHandle): Vec3 {
    return this.getRecord(handle).coords.facing();
  }

  setPosition(handle: EntityHandle, position: Vec3): void {
    this.getRecord(handle).coords.setPosition(position);
  }

  setVelocity(handle: EntityHandle, velocity: Vec3): void {
    this.getRecord(handle).coords.setVelocity(velocity);
  }

  setHeading(handle: EntityHandle, heading: Quat): void {
    this.getRecord(handle).coords.setHeading(heading);
  }

  setRotation(handle: EntityHandle, rotation: Quat): void {
    this.getRecord(handle).coords.setRotation(rotation);
  }

  // Spherical / cylindrical views of the absolute vectors

  getPositionSpherical(handle: EntityHandle): Spherical {
    return this.getRecord(handle).coords.getPositionSpherical();
  }

  setPositionSpherical(handle: EntityHandle, position: Spherical): void {
    this.getRecord(handle).coords.setPositionSpherical(position);
  }

  getVelocitySpherical(handle: EntityHandle): Spherical {
    return this.getRecord(handle).coords.getVelocitySpherical();
  }

  setVelocitySpherical(handle: EntityHandle, velocity: Spherical): void {
    this.getRecord(handle).coords.setVelocitySpherical(velocity);
  }

  getPositionCylindrical(handle: EntityHandle): Cylindrical {
    return this.getRecord(handle).coords.getPositionCylindrical();
  }

  setPositionCylindrical(handle: EntityHandle, position: Cylindrical): void {
    this.getRecord(handle).coords.setPositionCylindrical(position);
  }

  getVelocityCylindrical(handle: EntityHandle): Cylindrical {
    return this.getRecord(handle).coords.getVelocityCylindrical();
  }

  setVelocityCylindrical(handle: EntityHandle, velocity: Cylindrical): void {
    this.getRecord(handle).coords.setVelocityCylindrical(velocity);
  }

  snapshot(handle: EntityHandle): KinematicSnapshot {
    return this.getRecord(handle).coords.snapshot();
  }

  // ============================================
  // Frame Queries
  // ============================================

  /**
   * State of `subject` as measured from `viewer`'s frame.
   * Both must live in the same domain.
   */
  relativeTo(subject: EntityHandle, viewer: EntityHandle, options?: FrameTransformOptions): RelativeSnapshot {
    const s = this.getRecord(subject);
    const v = this.getRecord(viewer);
    if (s.domain !== v.domain) {
      throw new SpaceError(
        SpaceErrorKind.DomainMismatch,
        `entity ${subject} (domain ${s.domain.id}) and entity ${viewer} (domain ${v.domain.id}) do not share a domain`,
        { subject, viewer, subjectDomain: s.domain.id, viewerDomain: v.domain.id }
      );
    }
    return relativeTo(s.coords, v.coords, options);
  }

  /**
   * Bearing readout of `subject` from `viewer`: range, elevation, azimuth.
   */
  bearing(subject: EntityHandle, viewer: EntityHandle): Spherical {
    return toSpherical(this.relativeTo(subject, viewer).position);
  }

  toSpherical(v: Vec3): Spherical {
    return toSpherical(v);
  }

  fromSpherical(s: Spherical): Vec3 {
    return fromSpherical(s);
  }

  // ============================================
  // Serialization
  // ============================================

  serializeEntity(handle: EntityHandle): SerializedEntity {
    const record = this.getRecord(handle);
    return serializeState(record.coords.getState(), record.domain.id);
  }

  /**
   * Spawn a new entity from a serialized record (e.g. parsed JSON).
   * The record's domain must exist in this session.
   */
  restoreEntity(serial: unknown): EntityHandle {
    const { state, domain } = parseSerializedEntity(serial);
    if (!this.domains.has(domain)) {
      throw new SpaceError(SpaceErrorKind.InvalidSerial, `domain ${domain} does not exist in this session`, {
        domain,
      });
    }
    const handle = this.spawnEntity({ domain, ...state });
    logEntityRestored(handle, domain);
    return handle;
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Debug: get stats about the session.
   */
  getStats(): {
    entities: number;
    ticks: number;
    domains: Record<string, { live: number; capacity: number }>;
    systems: string[];
  } {
    const domains: Record<string, { live: number; capacity: number }> = {};
    for (const [id, domain] of this.domains) {
      domains[id] = { live: domain.store.liveCount, capacity: domain.store.capacity };
    }
    return {
      entities: this.entities.size,
      ticks: this.tickCount,
      domains,
      systems: this.runner.getSystemNames(),
    };
  }

  private getDomain(id: DomainId): Domain {
    const domain = this.domains.get(id);
    if (!domain) {
      throw new SpaceError(SpaceErrorKind.InvalidIndex, `domain ${id} does not exist`, { domain: id });
    }
    return domain;
  }

  private getRecord(handle: EntityHandle): EntityRecord {
    const record = this.entities.get(handle);
    if (!record) {
      throw new SpaceError(SpaceErrorKind.InvalidIndex, `entity ${handle} is not live`, { entity: handle });
    }
    return record;
  }
}
