export class HarnessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarnessError';
  }
}

export class DirectoryNotFound extends HarnessError {
  constructor(public readonly directory: string) {
    super(`Project directory not found: ${directory}`);
    this.name = 'DirectoryNotFound';
  }
}

export class EngineUnavailable extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineUnavailable';
  }
}

export class ConfigurationError extends HarnessError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot add search path ${path}: ${message}`, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a routine fails inside the engine. The message is the
 * engine's own diagnostic, not a description of the transport.
 */
export class RemoteInvocationError extends HarnessError {
  constructor(
    public readonly routine: string,
    message: string,
    public readonly exitCode: number,
  ) {
    super(message);
    this.name = 'RemoteInvocationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
