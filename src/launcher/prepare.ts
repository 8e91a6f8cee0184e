import { applyLaunchEnvironment, InitializerOptions } from '../environment';
import { runStartupAssertions } from '../startup';
import { LaunchEnvironment } from '../types';

/**
 * Apply the launch profile to `env` and verify the result.
 */
export function prepareLaunchEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  options: InitializerOptions = {}
): LaunchEnvironment {
  const assignments = applyLaunchEnvironment(env, options);
  runStartupAssertions(env);
  return assignments;
}
