import Docker from 'dockerode';
import { PassThrough } from 'stream';
import { finished } from 'stream/promises';
import type { EngineFlavor, InvocationResult } from '../types.js';
import {
  EngineUnavailable,
  RemoteInvocationError,
  errorMessage,
} from '../errors.js';
import { EngineHandle } from './engine-handle.js';
import {
  buildInvocationScript,
  engineCommand,
  readinessCommand,
} from './engine-command.js';

export interface DockerEngineOptions {
  image: string;
  flavor: EngineFlavor;
  projectDir: string;
  socketPath?: string;
  env?: Record<string, string>;
  keepContainer?: boolean;
  containerName?: string;
  /** `uid:gid` the engine runs as; defaults to the host user. */
  user?: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === 404
  );
}

// Files the routines write into the project stay owned by the caller.
function hostUser(): string | undefined {
  if (process.getuid && process.getgid) {
    return `${process.getuid()}:${process.getgid()}`;
  }
  return undefined;
}

function failureMessage(result: CommandResult): string {
  const stderr = result.stderr.trim();
  if (stderr) {
    return stderr;
  }
  const stdout = result.stdout.trim();
  if (stdout) {
    return stdout;
  }
  return `Engine exited with code ${result.exitCode}`;
}

/**
 * Engine session hosted in a single long-lived container. The project is
 * bind-mounted read-write at its host path, so host paths are engine paths
 * and routines can save results next to their sources. Each routine runs as
 * an exec in that container.
 */
export class DockerEngine extends EngineHandle {
  private docker: Docker;
  private container: Docker.Container | null = null;
  private readonly searchPaths: string[] = [];

  constructor(private readonly options: DockerEngineOptions) {
    super();
    this.docker = new Docker({
      socketPath: options.socketPath ?? '/var/run/docker.sock',
    });
  }

  get registeredPaths(): readonly string[] {
    return this.searchPaths;
  }

  protected async launch(): Promise<void> {
    if (!(await this.imageExists())) {
      await this.pullImage();
    }

    const user = this.options.user ?? hostUser();
    // An arbitrary uid has no home directory in the image.
    const envArray: string[] = user ? ['HOME=/tmp'] : [];
    if (this.options.env) {
      for (const [key, value] of Object.entries(this.options.env)) {
        envArray.push(`${key}=${value}`);
      }
    }

    const projectDir = this.options.projectDir;
    const container = await this.docker.createContainer({
      Image: this.options.image,
      // Keep the container idle; routines arrive as execs.
      Entrypoint: ['tail', '-f', '/dev/null'],
      Tty: false,
      User: user,
      WorkingDir: projectDir,
      Env: envArray.length > 0 ? envArray : undefined,
      HostConfig: {
        Binds: [`${projectDir}:${projectDir}:rw`],
        AutoRemove: false,
      },
      name: this.options.containerName,
    });
    this.container = container;

    try {
      await container.start();

      const ready = await this.exec(readinessCommand(this.options.flavor));
      if (ready.exitCode !== 0) {
        throw new EngineUnavailable(
          `Engine did not become ready: ${failureMessage(ready)}`,
        );
      }
    } catch (error) {
      try {
        await this.removeContainer();
      } catch (cleanupError) {
        throw new EngineUnavailable(
          `${errorMessage(error)} (container cleanup also failed: ${errorMessage(cleanupError)})`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  protected async registerSearchPath(directory: string): Promise<void> {
    const result = await this.exec(['test', '-d', directory]);
    if (result.exitCode !== 0) {
      throw new Error('directory is not visible inside the engine');
    }
    this.searchPaths.push(directory);
  }

  protected async call(
    routine: string,
    args: readonly string[],
  ): Promise<InvocationResult> {
    const script = buildInvocationScript(this.searchPaths, routine, args);
    const result = await this.exec(engineCommand(this.options.flavor, script));

    if (result.exitCode !== 0) {
      throw new RemoteInvocationError(
        routine,
        failureMessage(result),
        result.exitCode,
      );
    }

    return { stdout: result.stdout, stderr: result.stderr };
  }

  protected async shutdown(): Promise<void> {
    if (this.options.keepContainer) {
      return;
    }
    await this.removeContainer();
  }

  private async removeContainer(): Promise<void> {
    const container = this.container;
    this.container = null;
    if (container) {
      await container.remove({ force: true });
    }
  }

  private async exec(command: string[]): Promise<CommandResult> {
    if (!this.container) {
      throw new Error('Engine container is not running');
    }

    const exec = await this.container.exec({
      Cmd: command,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: this.options.projectDir,
    });
    const stream = await exec.start({ hijack: true, stdin: false });

    let stdout = '';
    let stderr = '';

    const stdoutStream = new PassThrough();
    const stderrStream = new PassThrough();

    stdoutStream.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    stderrStream.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

    // stdin is never written, so only the readable side has to end.
    await finished(stream, { writable: false });
    stdoutStream.end();
    stderrStream.end();
    await Promise.all([finished(stdoutStream), finished(stderrStream)]);

    const info = await exec.inspect();

    return {
      exitCode: info.ExitCode ?? 1,
      stdout,
      stderr,
    };
  }

  private async imageExists(): Promise<boolean> {
    try {
      await this.docker.getImage(this.options.image).inspect();
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  private async pullImage(): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(
      this.options.image,
    );

    return new Promise((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
