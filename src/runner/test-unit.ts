import type { Logger, TestResult, TestUnit } from '../types.js';
import type { EngineHandle } from '../engine/engine-handle.js';
import { RemoteInvocationError } from '../errors.js';

/**
 * Run one unit. A routine that fails inside the engine is a failed result;
 * every other error is not the unit's to handle and propagates.
 */
export async function runTestUnit(
  handle: EngineHandle,
  unit: TestUnit,
  logger: Logger = console,
): Promise<TestResult> {
  const startTime = Date.now();

  try {
    const { stdout } = await handle.invoke(unit.routine, unit.args);
    const durationMs = Date.now() - startTime;

    logger.log(`  ✓ PASSED (${durationMs}ms)`);

    return {
      testName: unit.name,
      routine: unit.routine,
      status: 'success',
      output: stdout,
      durationMs,
    };
  } catch (error) {
    if (!(error instanceof RemoteInvocationError)) {
      throw error;
    }

    logger.log(`  ✗ FAILED: ${error.message}`);

    return {
      testName: unit.name,
      routine: unit.routine,
      status: 'failure',
      error: error.message,
      output: '',
      durationMs: Date.now() - startTime,
    };
  }
}
