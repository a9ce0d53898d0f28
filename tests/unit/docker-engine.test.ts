import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { PassThrough } from 'stream';
import { DockerEngine } from '../../src/engine/docker-engine.js';
import {
  ConfigurationError,
  EngineUnavailable,
  RemoteInvocationError,
} from '../../src/errors.js';

interface ExecResponse {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

interface FakeDockerState {
  socketPaths: string[];
  created: Record<string, unknown>[];
  execs: string[][];
  responses: ExecResponse[];
  imagePresent: boolean;
  pulled: string[];
  started: number;
  removed: number;
  removeError: string | null;
}

const fake = vi.hoisted(
  (): FakeDockerState => ({
    socketPaths: [],
    created: [],
    execs: [],
    responses: [],
    imagePresent: true,
    pulled: [],
    started: 0,
    removed: 0,
    removeError: null,
  }),
);

vi.mock('dockerode', async () => {
  const { PassThrough } = await import('stream');
  const pending = new WeakMap<PassThrough, ExecResponse>();

  class FakeContainer {
    async start(): Promise<void> {
      fake.started++;
    }

    async remove(): Promise<void> {
      fake.removed++;
      if (fake.removeError) {
        throw new Error(fake.removeError);
      }
    }

    async exec(options: { Cmd: string[] }) {
      fake.execs.push(options.Cmd);
      const response = fake.responses.shift() ?? { exitCode: 0 };
      return {
        start: async () => {
          const stream = new PassThrough();
          pending.set(stream, response);
          return stream;
        },
        inspect: async () => ({ ExitCode: response.exitCode }),
      };
    }
  }

  class FakeDocker {
    modem = {
      demuxStream(
        stream: PassThrough,
        stdout: PassThrough,
        stderr: PassThrough,
      ): void {
        const response = pending.get(stream);
        if (response?.stdout) stdout.write(response.stdout);
        if (response?.stderr) stderr.write(response.stderr);
        stream.end();
        stream.resume();
      },
      followProgress(
        _stream: PassThrough,
        onFinished: (err: Error | null) => void,
      ): void {
        onFinished(null);
      },
    };

    constructor(options: { socketPath: string }) {
      fake.socketPaths.push(options.socketPath);
    }

    getImage() {
      return {
        inspect: async () => {
          if (!fake.imagePresent) {
            throw Object.assign(new Error('no such image'), { statusCode: 404 });
          }
          return {};
        },
      };
    }

    async pull(image: string) {
      fake.pulled.push(image);
      const stream = new PassThrough();
      stream.end();
      return stream;
    }

    async createContainer(options: Record<string, unknown>) {
      fake.created.push(options);
      return new FakeContainer();
    }
  }

  return { default: FakeDocker };
});

function engine(
  overrides: { keepContainer?: boolean; user?: string } = {},
): DockerEngine {
  return new DockerEngine({
    image: 'gnuoctave/octave:9.2.0',
    flavor: 'octave',
    projectDir: '/project',
    env: { MLM_LICENSE_FILE: '27000@license-host' },
    user: '1000:1000',
    ...overrides,
  });
}

describe('DockerEngine', () => {
  beforeEach(() => {
    fake.socketPaths.length = 0;
    fake.created.length = 0;
    fake.execs.length = 0;
    fake.responses.length = 0;
    fake.pulled.length = 0;
    fake.imagePresent = true;
    fake.started = 0;
    fake.removed = 0;
    fake.removeError = null;
  });

  it('connects to the default Docker socket', () => {
    engine();

    expect(fake.socketPaths).toEqual(['/var/run/docker.sock']);
  });

  it('creates an idle container with the project mounted read-write', async () => {
    const handle = engine();

    await handle.start();

    expect(handle.state).toBe('running');
    expect(fake.created).toHaveLength(1);
    expect(fake.created[0]).toMatchObject({
      Image: 'gnuoctave/octave:9.2.0',
      Entrypoint: ['tail', '-f', '/dev/null'],
      User: '1000:1000',
      WorkingDir: '/project',
      Env: ['HOME=/tmp', 'MLM_LICENSE_FILE=27000@license-host'],
      HostConfig: { Binds: ['/project:/project:rw'] },
    });
    expect(fake.started).toBe(1);
    expect(fake.execs).toEqual([
      ['octave-cli', '--quiet', '--no-init-file', '--eval', 'disp(version);'],
    ]);
    expect(fake.pulled).toEqual([]);
  });

  it('pulls the image when it is not present locally', async () => {
    fake.imagePresent = false;

    await engine().start();

    expect(fake.pulled).toEqual(['gnuoctave/octave:9.2.0']);
  });

  it('removes the container when the readiness check fails', async () => {
    fake.responses.push({ exitCode: 127, stderr: 'octave-cli: not found\n' });
    const handle = engine();

    const started = handle.start();

    await expect(started).rejects.toBeInstanceOf(EngineUnavailable);
    await expect(started).rejects.toThrow(
      'Engine did not become ready: octave-cli: not found',
    );
    expect(fake.removed).toBe(1);
    expect(handle.state).toBe('stopped');
  });

  it('runs the engine as the host user by default', async () => {
    const handle = new DockerEngine({
      image: 'gnuoctave/octave:9.2.0',
      flavor: 'octave',
      projectDir: '/project',
    });

    await handle.start();

    const getuid = process.getuid;
    const getgid = process.getgid;
    const expected =
      getuid && getgid ? `${getuid()}:${getgid()}` : undefined;
    expect(fake.created[0].User).toBe(expected);
  });

  it('keeps the readiness error when the container cannot be removed', async () => {
    fake.responses.push({ exitCode: 127, stderr: 'octave-cli: not found\n' });
    fake.removeError = 'removal of container is already in progress';
    const handle = engine();

    const started = handle.start();

    await expect(started).rejects.toBeInstanceOf(EngineUnavailable);
    await expect(started).rejects.toThrow(
      'Engine did not become ready: octave-cli: not found (container cleanup also failed: removal of container is already in progress)',
    );
    expect(handle.state).toBe('stopped');
  });

  it('registers a search path that exists in the container', async () => {
    const handle = engine();
    await handle.start();

    await handle.addSearchPath('/project/solver');

    expect(fake.execs[1]).toEqual(['test', '-d', '/project/solver']);
    expect(handle.registeredPaths).toEqual(['/project/solver']);
  });

  it('rejects a search path missing from the container', async () => {
    const handle = engine();
    await handle.start();
    fake.responses.push({ exitCode: 1 });

    await expect(handle.addSearchPath('/project/missing')).rejects.toThrow(
      ConfigurationError,
    );
    expect(handle.registeredPaths).toEqual([]);
  });

  it('invokes a routine with the registered paths and returns its output', async () => {
    const handle = engine();
    await handle.start();
    await handle.addSearchPath('/project');
    fake.responses.push({ exitCode: 0, stdout: 'diagnostics ok\n' });

    const result = await handle.invoke('diagnostic_test');

    expect(result).toEqual({ stdout: 'diagnostics ok\n', stderr: '' });
    expect(fake.execs[2]).toEqual([
      'octave-cli',
      '--quiet',
      '--no-init-file',
      '--eval',
      [
        "addpath('/project');",
        'try',
        '  diagnostic_test;',
        'catch err',
        "  fprintf(2, '%s\\n', err.message);",
        '  exit(1);',
        'end',
      ].join('\n'),
    ]);
  });

  it('raises RemoteInvocationError with the engine message on failure', async () => {
    const handle = engine();
    await handle.start();
    fake.responses.push({ exitCode: 1, stderr: 'Undefined function: solve_GD\n' });

    const invoked = handle.invoke('simple_test');

    await expect(invoked).rejects.toBeInstanceOf(RemoteInvocationError);
    await expect(invoked).rejects.toMatchObject({
      routine: 'simple_test',
      message: 'Undefined function: solve_GD',
      exitCode: 1,
    });
  });

  it('falls back to the exit code when the engine prints nothing', async () => {
    const handle = engine();
    await handle.start();
    fake.responses.push({ exitCode: 2 });

    await expect(handle.invoke('simple_test')).rejects.toThrow(
      'Engine exited with code 2',
    );
  });

  it('removes the container on stop', async () => {
    const handle = engine();
    await handle.start();

    await handle.stop();
    await handle.stop();

    expect(fake.removed).toBe(1);
  });

  it('leaves the container in place when asked to keep it', async () => {
    const handle = engine({ keepContainer: true });
    await handle.start();

    await handle.stop();

    expect(fake.removed).toBe(0);
    expect(handle.state).toBe('stopped');
  });
});
