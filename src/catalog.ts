import type { TestUnit } from './types.js';

/** Directories under the project root that routines are resolved from. */
export const SEARCH_SUBDIRECTORIES: readonly string[] = [
  'utilities',
  'solver',
  'Initialization_groundtruth',
];

export const TEST_CATALOG: readonly TestUnit[] = [
  { name: 'diagnostic', routine: 'diagnostic_test' },
  { name: 'simple-algorithm', routine: 'simple_test' },
];

/** Routine used by the engine check; prints the engine and toolbox versions. */
export const CHECK_ROUTINE = 'ver';
