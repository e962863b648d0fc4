/**
 * Descriptor fixtures shared by the gridbind test suites
 */

import { GridDescriptor } from '@gridbind/core';

export interface GridFixture {
  description: string;
  offset: readonly number[];
  stride: readonly number[];
}

/**
 * Collection of descriptor fixtures organized by rank
 */
export const GridFixtures = {
  line: {
    description: 'Rank-1 grid with a positive stride',
    offset: [5],
    stride: [4],
  },
  planar: {
    description: 'Rank-2 grid with distinct offsets and strides',
    offset: [10, 20],
    stride: [2, 3],
  },
  reversed: {
    description: 'Rank-2 grid walking backwards',
    offset: [100, 50],
    stride: [-1, -2],
  },
  broadcast: {
    description: 'Rank-3 grid with zero strides on the outer dimensions',
    offset: [7, 0, 3],
    stride: [0, 1, 0],
  },
  identity: {
    description: 'Rank-3 grid whose values are the coordinate itself',
    offset: [0, 0, 0],
    stride: [1, 1, 1],
  },
} as const satisfies Record<string, GridFixture>;

/**
 * Build the descriptor of a fixture
 */
export function createGrid(fixture: GridFixture): GridDescriptor {
  return GridDescriptor.create(fixture.offset, fixture.stride);
}
