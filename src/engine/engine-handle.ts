import type { EngineState, InvocationResult } from '../types.js';
import {
  ConfigurationError,
  EngineUnavailable,
  errorMessage,
} from '../errors.js';

/**
 * One engine session. Subclasses supply the backend; this class owns the
 * lifecycle so every backend enforces the same transitions:
 *
 *   not-started -> running -> stopped
 *
 * A failed start goes straight to stopped. The backend is expected to have
 * released anything it half-acquired before rethrowing.
 */
export abstract class EngineHandle {
  private currentState: EngineState = 'not-started';

  get state(): EngineState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'not-started') {
      throw new Error(`Engine cannot be started while ${this.currentState}`);
    }

    try {
      await this.launch();
    } catch (error) {
      this.currentState = 'stopped';
      if (error instanceof EngineUnavailable) {
        throw error;
      }
      throw new EngineUnavailable(errorMessage(error), { cause: error });
    }

    this.currentState = 'running';
  }

  async addSearchPath(directory: string): Promise<void> {
    this.assertRunning('addSearchPath');

    try {
      await this.registerSearchPath(directory);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(directory, errorMessage(error), {
        cause: error,
      });
    }
  }

  async invoke(
    routine: string,
    args: readonly string[] = [],
  ): Promise<InvocationResult> {
    this.assertRunning('invoke');
    return this.call(routine, args);
  }

  async stop(): Promise<void> {
    if (this.currentState !== 'running') {
      return;
    }
    // Mark first: a release that throws is not attempted again.
    this.currentState = 'stopped';
    await this.shutdown();
  }

  private assertRunning(operation: string): void {
    if (this.currentState !== 'running') {
      throw new Error(
        `Cannot ${operation} while the engine is ${this.currentState}`,
      );
    }
  }

  protected abstract launch(): Promise<void>;

  protected abstract registerSearchPath(directory: string): Promise<void>;

  /** Must throw RemoteInvocationError when the routine itself fails. */
  protected abstract call(
    routine: string,
    args: readonly string[],
  ): Promise<InvocationResult>;

  protected abstract shutdown(): Promise<void>;
}
