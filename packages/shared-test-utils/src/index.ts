/**
 * @gridbind/test-utils
 *
 * Shared test utilities for the gridbind monorepo
 */

// Matchers
export { setupGridMatchers, gridMatchers } from './matchers/grid-matchers.js';

// Fixtures
export { GridFixtures, createGrid, type GridFixture } from './fixtures/grid-fixtures.js';
