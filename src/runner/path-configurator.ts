import * as path from 'path';
import type { Logger } from '../types.js';
import type { EngineHandle } from '../engine/engine-handle.js';
import { ConfigurationError } from '../errors.js';

export type PathConfiguration =
  | { ok: true; paths: string[] }
  | {
      ok: false;
      paths: string[];
      failedPath: string;
      error: ConfigurationError;
    };

export function searchPathsFor(
  baseDirectory: string,
  subdirectories: readonly string[],
): string[] {
  return [
    baseDirectory,
    ...subdirectories.map((name) => path.join(baseDirectory, name)),
  ];
}

/**
 * Register the base directory, then each subdirectory, in that order.
 * Stops at the first rejected path: a partial set is not usable.
 */
export async function configurePaths(
  handle: EngineHandle,
  baseDirectory: string,
  subdirectories: readonly string[],
  logger: Logger = console,
): Promise<PathConfiguration> {
  const registered: string[] = [];

  for (const directory of searchPathsFor(baseDirectory, subdirectories)) {
    try {
      await handle.addSearchPath(directory);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      logger.log(`✗ Failed to set engine search paths: ${error.message}`);
      return { ok: false, paths: registered, failedPath: directory, error };
    }
    registered.push(directory);
  }

  logger.log('✓ Engine search paths configured');
  return { ok: true, paths: registered };
}
