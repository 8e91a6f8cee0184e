/**
 * Launcher error codes:
 * invalid_arguments, environment_mismatch, spawn_failed
 */
export type LaunchErrorCode = 'invalid_arguments' | 'environment_mismatch' | 'spawn_failed';

const EXIT_CODES: Record<LaunchErrorCode, number> = {
  invalid_arguments: 2,
  environment_mismatch: 1,
  spawn_failed: 1,
};

/**
 * Custom error class for launcher failures.
 * `exitCode` is what the CLI exits with when this error reaches it.
 */
export class LaunchError extends Error {
  public readonly exitCode: number;

  constructor(
    public code: LaunchErrorCode,
    message: string,
    public details?: unknown[]
  ) {
    super(message);
    this.name = 'LaunchError';
    this.exitCode = EXIT_CODES[code];
  }
}

export default LaunchError;
