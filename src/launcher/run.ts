import { constants } from 'os';
import execa from 'execa';
import { InitializerOptions, withLaunchEnvironment } from '../environment';
import { LaunchError } from '../errors';
import { runStartupAssertions } from '../startup';
import logger from '../utils/logger';

export interface LaunchOptions extends InitializerOptions {
  /** Base environment for the child. Defaults to process.env; never mutated. */
  env?: NodeJS.ProcessEnv;
}

type SignalName = keyof typeof constants.signals;

function isSignal(name: string): name is SignalName {
  return name in constants.signals;
}

function signalExitCode(signal: string): number {
  return 128 + (isSignal(signal) ? constants.signals[signal] : 0);
}

/**
 * Build the child environment from the base plus the launch profile, then
 * run `command` with it and wait for it.
 * Resolves to the child's exit code (128 + signal number when killed).
 */
export async function launch(
  command: string,
  args: readonly string[] = [],
  options: LaunchOptions = {}
): Promise<number> {
  const env = withLaunchEnvironment(options.env ?? process.env, { tokenPath: options.tokenPath });
  runStartupAssertions(env);

  logger.info({ command, args }, 'Launching');

  let result: execa.ExecaReturnValue;
  try {
    result = await execa(command, args, {
      env,
      extendEnv: false,
      stdio: 'inherit',
      reject: false,
    });
  } catch (error) {
    throw new LaunchError('spawn_failed', `Failed to start ${command}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (result.signal) {
    logger.warn({ command, signal: result.signal }, 'Child terminated by signal');
    return signalExitCode(result.signal);
  }

  if (typeof result.exitCode !== 'number') {
    throw new LaunchError('spawn_failed', `Failed to start ${command}`, [result.command]);
  }

  logger.info({ command, exitCode: result.exitCode }, 'Child exited');
  return result.exitCode;
}
