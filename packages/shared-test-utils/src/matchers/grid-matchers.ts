import { expect } from 'vitest';
import type { ComponentValue, GridDescriptor } from '@gridbind/core';

/**
 * Custom Vitest matchers for materialized values and descriptors
 */

interface GridMatchers<R = unknown> {
  /**
   * Assert that a materialized value lists the components of `expected` in reverse order
   */
  toBeIndexReversalOf(expected: readonly ComponentValue[]): R;

  /**
   * Assert that a grid descriptor has the expected number of dimensions
   */
  toHaveRank(expected: number): R;
}

declare module 'vitest' {
  interface Assertion<T = any> extends GridMatchers<T> {}
  interface AsymmetricMatchersContaining extends GridMatchers {}
}

function format(values: readonly ComponentValue[]): string {
  return `[${values.map((v) => (typeof v === 'bigint' ? `${v}n` : String(v))).join(', ')}]`;
}

export const gridMatchers = {
  toBeIndexReversalOf(received: readonly ComponentValue[], expected: readonly ComponentValue[]) {
    const n = expected.length;
    const pass = received.length === n && received.every((value, i) => value === expected[n - 1 - i]);

    return {
      pass,
      message: () =>
        pass
          ? `Expected ${format(received)} not to be the index reversal of ${format(expected)}`
          : `Expected ${format(received)} to be the index reversal of ${format(expected)}`,
      actual: received,
      expected: [...expected].reverse(),
    };
  },

  toHaveRank(received: GridDescriptor, expected: number) {
    const actual = received.rank;
    const pass = actual === expected;

    return {
      pass,
      message: () =>
        pass
          ? `Expected descriptor not to have rank ${expected}, but it does`
          : `Expected descriptor to have rank ${expected}, but got ${actual}`,
      actual,
      expected,
    };
  },
};

/**
 * Setup grid matchers for Vitest
 * Call this in your test setup file or at the beginning of test suites
 */
export function setupGridMatchers(): void {
  expect.extend(gridMatchers);
}
