import * as path from 'path';
import type { EngineFlavor } from './types.js';

export const DEFAULT_IMAGES: Record<EngineFlavor, string> = {
  octave: 'gnuoctave/octave:9.2.0',
  matlab: 'mathworks/matlab:r2022b',
};

export const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';

// Forwarded into the engine container when present on the host.
const PASSTHROUGH_ENV = ['MLM_LICENSE_FILE'];

export interface CliOptions {
  project?: string;
  engine?: string;
  image?: string;
  socket?: string;
  keepContainer?: boolean;
  output?: string;
  verbose?: boolean;
  check?: boolean;
}

export interface HarnessConfig {
  projectDir: string;
  flavor: EngineFlavor;
  image: string;
  socketPath: string;
  engineEnv: Record<string, string>;
  keepContainer: boolean;
  outputFile?: string;
  verbose: boolean;
  check: boolean;
}

export function parseEngineFlavor(value: string): EngineFlavor {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'octave' || normalized === 'matlab') {
    return normalized;
  }
  throw new Error(
    `Unknown engine "${value}". Must be "octave" or "matlab"`,
  );
}

/**
 * Merge CLI options, environment and defaults. Flags win over the
 * environment, which wins over defaults.
 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): HarnessConfig {
  const flavor = parseEngineFlavor(
    options.engine ?? env.HARNESS_ENGINE ?? 'octave',
  );

  const engineEnv: Record<string, string> = {};
  for (const key of PASSTHROUGH_ENV) {
    const value = env[key];
    if (value) {
      engineEnv[key] = value;
    }
  }

  return {
    projectDir: path.resolve(cwd, options.project ?? env.HARNESS_PROJECT_DIR ?? '.'),
    flavor,
    image: options.image ?? env.HARNESS_ENGINE_IMAGE ?? DEFAULT_IMAGES[flavor],
    socketPath:
      options.socket ?? env.HARNESS_DOCKER_SOCKET ?? DEFAULT_SOCKET_PATH,
    engineEnv,
    keepContainer: options.keepContainer ?? false,
    outputFile: options.output,
    verbose: options.verbose ?? false,
    check: options.check ?? false,
  };
}
