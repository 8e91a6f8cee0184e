/**
 * Startup Assertions - Launch Environment Verification
 *
 * Runs after the launch profile is applied and before anything is started
 * or printed. Aborts the launch if the environment does not hold the profile.
 */
import { LaunchError } from '../errors';
import {
  ENV_DEFAULTS,
  FIXED_ENV,
  MAPBOX_TOKEN_VAR,
  THREAD_LIMIT,
  THREAD_LIMIT_VARS,
  isUnsetOrEmpty,
} from '../environment/profile';
import { AssertionResult } from '../types';
import logger from '../utils/logger';

/**
 * Variables that must hold exactly their profile value.
 */
const UNCONDITIONAL_VARS: ReadonlyArray<readonly [string, string]> = [
  ...THREAD_LIMIT_VARS.map((name) => [name, THREAD_LIMIT] as const),
  ...Object.entries(FIXED_ENV),
];

/**
 * Check `env` against the launch profile. Never throws.
 */
export function verifyLaunchEnvironment(env: NodeJS.ProcessEnv): AssertionResult {
  const mismatched: string[] = [];
  const missing: string[] = [];

  for (const [name, expected] of UNCONDITIONAL_VARS) {
    if (env[name] !== expected) {
      mismatched.push(name);
    }
  }

  for (const name of Object.keys(ENV_DEFAULTS)) {
    if (isUnsetOrEmpty(env[name])) {
      missing.push(name);
    }
  }

  return {
    valid: mismatched.length === 0 && missing.length === 0,
    mismatched,
    missing,
    tokenPresent: !isUnsetOrEmpty(env[MAPBOX_TOKEN_VAR]),
  };
}

/**
 * Verify an environment and log the outcome.
 * The token value is never logged.
 *
 * Environments built by the initializer always pass; the mismatch branch
 * covers env objects that callers assemble themselves.
 *
 * @throws LaunchError (environment_mismatch) if the profile does not hold
 */
export function runStartupAssertions(env: NodeJS.ProcessEnv = process.env): AssertionResult {
  const result = verifyLaunchEnvironment(env);

  if (!result.valid) {
    logger.error(
      { mismatched: result.mismatched, missing: result.missing },
      'STARTUP ASSERTION FAILED: launch environment does not match profile'
    );
    throw new LaunchError(
      'environment_mismatch',
      `Launch environment does not match profile: ${[...result.mismatched, ...result.missing].join(', ')}`,
      [...result.mismatched, ...result.missing]
    );
  }

  if (!result.tokenPresent) {
    logger.info(`${MAPBOX_TOKEN_VAR} not available, navigation features will run without it`);
  }

  logger.info(
    {
      agnosVersion: env.AGNOS_VERSION,
      passive: env.PASSIVE,
      fingerprint: env.FINGERPRINT,
      tokenPresent: result.tokenPresent,
    },
    'Launch environment assertion complete'
  );

  return result;
}

export default {
  verifyLaunchEnvironment,
  runStartupAssertions,
};
