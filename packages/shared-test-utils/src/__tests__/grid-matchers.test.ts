/**
 * Tests for the shared matchers and fixtures
 */

import { describe, test, expect, beforeAll } from 'vitest';
import { GridDescriptor } from '@gridbind/core';
import { setupGridMatchers, gridMatchers, GridFixtures, createGrid } from '../index.js';

beforeAll(() => {
  setupGridMatchers();
});

describe('toBeIndexReversalOf', () => {
  test('passes for the reversed sequence', () => {
    expect([3, 2, 1]).toBeIndexReversalOf([1, 2, 3]);
    expect([7n, 5n]).toBeIndexReversalOf([5n, 7n]);
  });

  test('fails for the same order', () => {
    expect([1, 2, 3]).not.toBeIndexReversalOf([1, 2, 3]);
  });

  test('fails for different lengths', () => {
    expect([2, 1]).not.toBeIndexReversalOf([1, 2, 3]);
  });

  test('reports both sequences', () => {
    const result = gridMatchers.toBeIndexReversalOf([1, 2], [1, 2]);
    expect(result.pass).toBe(false);
    expect(result.message()).toBe('Expected [1, 2] to be the index reversal of [1, 2]');
    expect(result.expected).toEqual([2, 1]);
  });
});

describe('toHaveRank', () => {
  test('checks the descriptor rank', () => {
    expect(GridDescriptor.create([1, 2, 3], [0, 0, 0])).toHaveRank(3);
    expect(GridDescriptor.create([1], [0])).not.toHaveRank(2);
  });

  test('reports the actual rank', () => {
    const result = gridMatchers.toHaveRank(GridDescriptor.create([1, 2], [1, 1]), 1);
    expect(result.message()).toBe('Expected descriptor to have rank 1, but got 2');
  });
});

describe('GridFixtures', () => {
  test('every fixture builds a descriptor of matching rank', () => {
    for (const fixture of Object.values(GridFixtures)) {
      const grid = createGrid(fixture);
      expect(grid).toHaveRank(fixture.offset.length);
      expect(grid.offset).toEqual(fixture.offset);
      expect(grid.stride).toEqual(fixture.stride);
    }
  });
});
