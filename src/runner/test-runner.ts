import type { Logger, TestReport, TestResult, TestUnit } from '../types.js';
import type { EngineHandle } from '../engine/engine-handle.js';
import { runTestUnit } from './test-unit.js';

export interface RunAllOptions {
  logger?: Logger;
  onResult?: (result: TestResult) => void;
}

/**
 * Run every unit of the catalog once, in order, against one engine.
 * A failed unit never stops the run.
 */
export async function runAll(
  handle: EngineHandle,
  catalog: readonly TestUnit[],
  options: RunAllOptions = {},
): Promise<TestReport> {
  if (catalog.length === 0) {
    throw new Error('Test catalog is empty');
  }

  const logger = options.logger ?? console;
  const startTime = Date.now();
  const results: TestResult[] = [];
  let testsPassed = 0;

  for (let i = 0; i < catalog.length; i++) {
    const unit = catalog[i];

    logger.log(`\n[${i + 1}/${catalog.length}] Running: ${unit.name}`);

    const result = await runTestUnit(handle, unit, logger);
    results.push(result);

    if (result.status === 'success') {
      testsPassed++;
    }

    options.onResult?.(result);
  }

  return {
    testsPassed,
    totalTests: catalog.length,
    failed: catalog.length - testsPassed,
    results,
    durationMs: Date.now() - startTime,
  };
}
