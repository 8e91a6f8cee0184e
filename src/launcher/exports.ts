import { LaunchEnvironment } from '../types';

/**
 * Single-quote a value for POSIX shells.
 */
export function quoteShellValue(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render assignments as `export NAME='value'` lines, suitable for
 * `eval "$(launch-env --print)"` in a calling shell.
 */
export function formatExports(assignments: LaunchEnvironment): string {
  return Object.entries(assignments)
    .map(([name, value]) => `export ${name}=${quoteShellValue(value)}\n`)
    .join('');
}
