import type { EngineFlavor } from '../types.js';

const ROUTINE_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function isRoutineName(name: string): boolean {
  return ROUTINE_NAME.test(name);
}

/**
 * Script evaluated by the engine for one routine call. Search paths are
 * re-added on every call because each call is a fresh interpreter inside
 * the session container.
 */
export function buildInvocationScript(
  searchPaths: readonly string[],
  routine: string,
  args: readonly string[] = [],
): string {
  if (!isRoutineName(routine)) {
    throw new Error(`Invalid routine name: "${routine}"`);
  }

  const call =
    args.length > 0
      ? `${routine}(${args.map(quoteString).join(', ')});`
      : `${routine};`;

  return [
    ...searchPaths.map((p) => `addpath(${quoteString(p)});`),
    'try',
    `  ${call}`,
    'catch err',
    "  fprintf(2, '%s\\n', err.message);",
    '  exit(1);',
    'end',
  ].join('\n');
}

export function engineCommand(flavor: EngineFlavor, script: string): string[] {
  switch (flavor) {
    case 'octave':
      return ['octave-cli', '--quiet', '--no-init-file', '--eval', script];
    case 'matlab':
      return ['matlab', '-batch', script];
  }
}

/** Command that only succeeds once the engine can evaluate code. */
export function readinessCommand(flavor: EngineFlavor): string[] {
  return engineCommand(flavor, 'disp(version);');
}
