import * as fs from 'fs';
import * as path from 'path';
import type {
  ExitCode,
  Logger,
  RunResult,
  TestReport,
  TestResult,
  TestUnit,
} from './types.js';
import type { EngineHandle } from './engine/engine-handle.js';
import {
  DirectoryNotFound,
  EngineUnavailable,
  RemoteInvocationError,
  errorMessage,
} from './errors.js';
import { CHECK_ROUTINE, SEARCH_SUBDIRECTORIES, TEST_CATALOG } from './catalog.js';
import { configurePaths } from './runner/path-configurator.js';
import { runAll } from './runner/test-runner.js';
import { formatSummary } from './utils/report.js';

export interface OrchestratorOptions {
  projectDir: string;
  createEngine: (projectDir: string) => EngineHandle;
  catalog?: readonly TestUnit[];
  subdirectories?: readonly string[];
  logger?: Logger;
  onResult?: (result: TestResult) => void;
}

export interface OrchestrationResult {
  exitCode: ExitCode;
  report: TestReport | null;
}

export function resolveProjectDirectory(projectDir: string): string {
  const resolved = path.resolve(projectDir);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw new DirectoryNotFound(resolved);
  }
  return resolved;
}

export function verdict(result: RunResult): ExitCode {
  return result.testsPassed === result.totalTests ? 0 : 1;
}

/**
 * Start the engine, run `body` with it and stop it on every way out of
 * `body`. A start failure is thrown before anything needs releasing. A stop
 * failure is reported and never replaces the body's result or error.
 */
export async function withEngine<T>(
  engine: EngineHandle,
  logger: Logger,
  body: (engine: EngineHandle) => Promise<T>,
): Promise<T> {
  logger.log('Starting engine...');
  await engine.start();
  logger.log('✓ Engine started');

  try {
    return await body(engine);
  } finally {
    try {
      await engine.stop();
      logger.log('✓ Engine stopped');
    } catch (error) {
      logger.warn(`⚠️  Failed to stop engine: ${errorMessage(error)}`);
    }
  }
}

function describeFatal(error: unknown): string {
  if (error instanceof DirectoryNotFound) {
    return `✗ ${error.message}`;
  }
  if (error instanceof EngineUnavailable) {
    return `✗ Engine error: ${error.message}`;
  }
  if (error instanceof RemoteInvocationError) {
    return `✗ ${error.routine} failed: ${error.message}`;
  }
  return `✗ Unexpected error: ${errorMessage(error)}`;
}

export async function orchestrate(
  options: OrchestratorOptions,
): Promise<OrchestrationResult> {
  const logger = options.logger ?? console;
  const catalog = options.catalog ?? TEST_CATALOG;
  const subdirectories = options.subdirectories ?? SEARCH_SUBDIRECTORIES;

  try {
    const projectDir = resolveProjectDirectory(options.projectDir);
    logger.log(`Working directory: ${projectDir}`);

    const engine = options.createEngine(projectDir);

    const report = await withEngine(engine, logger, async (handle) => {
      const paths = await configurePaths(
        handle,
        projectDir,
        subdirectories,
        logger,
      );
      if (!paths.ok) {
        return null;
      }
      return runAll(handle, catalog, { logger, onResult: options.onResult });
    });

    if (!report) {
      return { exitCode: 1, report: null };
    }

    for (const line of formatSummary(report)) {
      logger.log(line);
    }

    return { exitCode: verdict(report), report };
  } catch (error) {
    logger.error(describeFatal(error));
    return { exitCode: 1, report: null };
  }
}

/** Start the engine, have it print its version information, stop it. */
export async function checkEngine(
  options: Pick<OrchestratorOptions, 'projectDir' | 'createEngine' | 'logger'>,
): Promise<ExitCode> {
  const logger = options.logger ?? console;

  try {
    const projectDir = resolveProjectDirectory(options.projectDir);
    const engine = options.createEngine(projectDir);

    const { stdout } = await withEngine(engine, logger, (handle) =>
      handle.invoke(CHECK_ROUTINE),
    );

    logger.log(stdout.trimEnd());
    logger.log('✓ Engine connectivity check passed');
    return 0;
  } catch (error) {
    logger.error(describeFatal(error));
    return 1;
  }
}
