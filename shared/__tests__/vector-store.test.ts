// ============================================
// VectorStore Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { VectorStore } from '../space/VectorStore';
import { createSlotId, getSlotGeneration, getSlotIndex, INDEX_RANGE } from '../space/types';
import { SpaceError } from '../errors';
import { thrownBy } from './helpers';

describe('slot ids', () => {
  it('packs index and generation', () => {
    const slot = createSlotId(5, 3);
    expect(slot).toBe(3 * INDEX_RANGE + 5);
    expect(getSlotIndex(slot)).toBe(5);
    expect(getSlotGeneration(slot)).toBe(3);
  });

  it('uses 20 index bits', () => {
    expect(createSlotId(0, 1)).toBe(1048576);
  });
});

describe('VectorStore', () => {
  let store: VectorStore;

  beforeEach(() => {
    store = new VectorStore({ initialCapacity: 2, maxCapacity: 8 });
  });

  describe('allocate', () => {
    it('hands out zeroed slots', () => {
      const slot = store.allocate();
      expect(store.getPosition(slot)).toEqual({ x: 0, y: 0, z: 0 });
      expect(store.getVelocity(slot)).toEqual({ x: 0, y: 0, z: 0 });
      expect(store.isLive(slot)).toBe(true);
      expect(store.liveCount).toBe(1);
    });

    it('starts at index 0, generation 1', () => {
      expect(store.allocate()).toBe(createSlotId(0, 1));
      expect(store.allocate()).toBe(createSlotId(1, 1));
    });

    it('grows past the initial capacity and keeps stored values', () => {
      const a = store.allocate();
      const b = store.allocate();
      store.setPosition(a, { x: 1, y: 2, z: 3 });
      store.setVelocity(b, { x: -4, y: 5, z: -6 });

      const c = store.allocate();

      expect(store.capacity).toBe(4);
      expect(store.getPosition(a)).toEqual({ x: 1, y: 2, z: 3 });
      expect(store.getVelocity(b)).toEqual({ x: -4, y: 5, z: -6 });
      expect(getSlotIndex(c)).toBe(2);
    });

    it('throws OutOfCapacity at the maximum', () => {
      const small = new VectorStore({ initialCapacity: 1, maxCapacity: 2 });
      small.allocate();
      small.allocate();

      const error = thrownBy(() => small.allocate());
      expect(error).toBeInstanceOf(SpaceError);
      expect(error).toMatchObject({ kind: 'OutOfCapacity' });
      expect(small.liveCount).toBe(2);
    });

    it('rejects an invalid maximum', () => {
      expect(() => new VectorStore({ maxCapacity: 0 })).toThrow(RangeError);
      expect(() => new VectorStore({ maxCapacity: INDEX_RANGE + 1 })).toThrow(RangeError);
    });
  });

  describe('free', () => {
    it('reuses the freed index under a new generation', () => {
      const first = store.allocate();
      store.setPosition(first, { x: 9, y: 9, z: 9 });
      store.free(first);

      const second = store.allocate();

      expect(getSlotIndex(second)).toBe(getSlotIndex(first));
      expect(second).not.toBe(first);
      expect(getSlotGeneration(second)).toBe(2);
      expect(store.getPosition(second)).toEqual({ x: 0, y: 0, z: 0 });
    });

    it('rejects a stale id after reuse', () => {
      const first = store.allocate();
      store.free(first);
      store.allocate();

      expect(store.isLive(first)).toBe(false);
      const error = thrownBy(() => store.getPosition(first));
      expect(error).toMatchObject({ kind: 'InvalidIndex' });
    });

    it('reuses the most recently freed slot first', () => {
      const a = store.allocate();
      store.allocate();
      const c = store.allocate();
      store.free(a);
      store.free(c);

      expect(getSlotIndex(store.allocate())).toBe(2);
      expect(getSlotIndex(store.allocate())).toBe(0);
    });

    it('rejects a double free', () => {
      const slot = store.allocate();
      store.free(slot);

      expect(thrownBy(() => store.free(slot))).toMatchObject({ kind: 'InvalidIndex' });
      expect(store.liveCount).toBe(0);
    });
  });

  describe('vector access', () => {
    it('round-trips position and velocity', () => {
      const slot = store.allocate();
      store.setPosition(slot, { x: 1.5, y: -2, z: 1e6 });
      store.setVelocity(slot, { x: 0, y: 0.25, z: -3 });

      expect(store.getPosition(slot)).toEqual({ x: 1.5, y: -2, z: 1e6 });
      expect(store.getVelocity(slot)).toEqual({ x: 0, y: 0.25, z: -3 });
    });

    it('returns copies, not views', () => {
      const slot = store.allocate();
      const read = store.getPosition(slot);
      read.x = 42;
      expect(store.getPosition(slot).x).toBe(0);
    });

    it('adds velocity in place', () => {
      const slot = store.allocate();
      store.setVelocity(slot, { x: 1, y: 1, z: 1 });
      store.addVelocity(slot, { x: 0.5, y: -1, z: 2 });
      expect(store.getVelocity(slot)).toEqual({ x: 1.5, y: 0, z: 3 });
    });

    it('rejects non-finite values and keeps the old ones', () => {
      const slot = store.allocate();
      store.setPosition(slot, { x: 1, y: 2, z: 3 });

      expect(thrownBy(() => store.setPosition(slot, { x: NaN, y: 0, z: 0 }))).toMatchObject({
        kind: 'NonFiniteState',
      });
      expect(thrownBy(() => store.setVelocity(slot, { x: 0, y: Infinity, z: 0 }))).toMatchObject({
        kind: 'NonFiniteState',
      });
      expect(store.getPosition(slot)).toEqual({ x: 1, y: 2, z: 3 });
    });

    it('rejects malformed ids', () => {
      store.allocate();
      expect(thrownBy(() => store.getPosition(-1))).toMatchObject({ kind: 'InvalidIndex' });
      expect(thrownBy(() => store.getPosition(1.5))).toMatchObject({ kind: 'InvalidIndex' });
      expect(thrownBy(() => store.getPosition(createSlotId(5, 1)))).toMatchObject({ kind: 'InvalidIndex' });
    });
  });

  describe('advance', () => {
    it('moves position by velocity * dt', () => {
      const slot = store.allocate();
      store.setPosition(slot, { x: 1, y: 2, z: 3 });
      store.setVelocity(slot, { x: 2, y: 0, z: -1 });

      store.advance(slot, 0.5);

      expect(store.getPosition(slot)).toEqual({ x: 2, y: 2, z: 2.5 });
      expect(store.getVelocity(slot)).toEqual({ x: 2, y: 0, z: -1 });
    });

    it('leaves the slot untouched on overflow', () => {
      const slot = store.allocate();
      store.setPosition(slot, { x: 1e308, y: 0, z: 0 });
      store.setVelocity(slot, { x: 1e308, y: 1, z: 0 });

      expect(thrownBy(() => store.advance(slot, 10))).toMatchObject({ kind: 'NonFiniteState' });
      expect(store.getPosition(slot)).toEqual({ x: 1e308, y: 0, z: 0 });
    });
  });

  describe('iteration', () => {
    it('visits live slots in index order, skipping freed ones', () => {
      const a = store.allocate();
      const b = store.allocate();
      const c = store.allocate();
      store.free(b);

      const seen: number[] = [];
      store.forEachLive((slot) => seen.push(slot));

      expect(seen).toEqual([a, c]);
    });

    it('clear() frees everything', () => {
      const a = store.allocate();
      store.allocate();
      store.clear();

      expect(store.liveCount).toBe(0);
      expect(store.isLive(a)).toBe(false);
    });
  });
});
