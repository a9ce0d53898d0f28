import { Command } from 'commander';
import type { ExitCode, Logger } from './types.js';
import { resolveConfig, type CliOptions, type HarnessConfig } from './config.js';
import type { EngineHandle } from './engine/engine-handle.js';
import { DockerEngine } from './engine/docker-engine.js';
import { errorMessage } from './errors.js';
import { checkEngine, orchestrate } from './orchestrator.js';
import { writeReport } from './utils/report.js';

export interface CliDependencies {
  createEngine?: (config: HarnessConfig, projectDir: string) => EngineHandle;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function dockerEngineFor(config: HarnessConfig, projectDir: string): EngineHandle {
  return new DockerEngine({
    image: config.image,
    flavor: config.flavor,
    projectDir,
    socketPath: config.socketPath,
    env: config.engineEnv,
    keepContainer: config.keepContainer,
  });
}

/** One harness run for the given flags; never throws, always yields an exit code. */
export async function runCli(
  options: CliOptions,
  deps: CliDependencies = {},
): Promise<ExitCode> {
  const logger = deps.logger ?? console;
  const engineFactory = deps.createEngine ?? dockerEngineFor;

  try {
    const config = resolveConfig(options, deps.env, deps.cwd);

    logger.log('=== Engine test harness ===');
    logger.log(`Engine: ${config.flavor} (${config.image})`);

    const createEngine = (projectDir: string) =>
      engineFactory(config, projectDir);

    if (config.check) {
      return await checkEngine({
        projectDir: config.projectDir,
        createEngine,
        logger,
      });
    }

    const { exitCode, report } = await orchestrate({
      projectDir: config.projectDir,
      createEngine,
      logger,
      onResult: config.verbose
        ? (result) => {
            if (result.output.trim()) {
              logger.log(result.output.trimEnd());
            }
          }
        : undefined,
    });

    if (report && config.outputFile) {
      const outputPath = writeReport(config.outputFile, report);
      logger.log(`\nReport written to: ${outputPath}`);
    }

    return exitCode;
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

export function createProgram(deps: CliDependencies = {}): Command {
  return new Command()
    .name('engine-harness')
    .description(
      'Run the project test routines inside a containerized Octave or MATLAB engine',
    )
    .version('1.0.0')
    .option('-p, --project <dir>', 'Project directory (default: current directory)')
    .option('--engine <flavor>', 'Engine to run: octave or matlab')
    .option('--image <image>', 'Container image that provides the engine')
    .option('--socket <path>', 'Docker socket path')
    .option('--keep-container', 'Keep the engine container after the run')
    .option('-o, --output <file>', 'Output JSON report to file')
    .option('--verbose', 'Print engine output of each test routine')
    .option('--check', 'Only check that the engine starts and responds')
    .action(async (options: CliOptions) => {
      process.exit(await runCli(options, deps));
    });
}
