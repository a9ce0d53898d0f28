export type EngineState = 'not-started' | 'running' | 'stopped';

export type EngineFlavor = 'octave' | 'matlab';

export type ExitCode = 0 | 1;

export type Outcome =
  | { status: 'success' }
  | { status: 'failure'; error: string };

export interface TestUnit {
  name: string;
  routine: string;
  args?: readonly string[];
}

export interface InvocationResult {
  stdout: string;
  stderr: string;
}

export type TestResult = Outcome & {
  testName: string;
  routine: string;
  output: string;
  durationMs: number;
};

export interface RunResult {
  testsPassed: number;
  totalTests: number;
}

export interface TestReport extends RunResult {
  failed: number;
  results: TestResult[];
  durationMs: number;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
