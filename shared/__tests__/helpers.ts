// ============================================
// Shared test helpers
// ============================================

import { expect } from 'vitest';
import type { Vec3 } from '../math';
import type { Quat } from '../quaternion';

export function expectVec(actual: Vec3, expected: Vec3, digits = 9): void {
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
  expect(actual.z).toBeCloseTo(expected.z, digits);
}

export function expectQuat(actual: Quat, expected: Quat, digits = 9): void {
  expect(actual.w).toBeCloseTo(expected.w, digits);
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
  expect(actual.z).toBeCloseTo(expected.z, digits);
}

/**
 * Run fn and return whatever it threw. Fails the test if it returns normally.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
