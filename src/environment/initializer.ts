/**
 * Environment Initializer
 *
 * Resolves the launch profile against an existing environment into a mapping
 * of assignments, and applies that mapping once at the root of the process
 * tree so every child launched afterwards inherits it.
 */
import { LaunchEnvironment } from '../types';
import logger from '../utils/logger';
import {
  ENV_DEFAULTS,
  FIXED_ENV,
  MAPBOX_TOKEN_PATH,
  MAPBOX_TOKEN_VAR,
  THREAD_LIMIT,
  THREAD_LIMIT_VARS,
  isUnsetOrEmpty,
} from './profile';
import { readToken } from './token';

export interface InitializerOptions {
  tokenPath?: string;
}

/**
 * Compute the assignments the launch profile makes on top of `base`.
 * Insertion order of the result follows the order assignments are made.
 */
export function resolveLaunchEnvironment(
  base: NodeJS.ProcessEnv,
  options: InitializerOptions = {}
): LaunchEnvironment {
  const assignments: LaunchEnvironment = {};

  for (const name of THREAD_LIMIT_VARS) {
    assignments[name] = THREAD_LIMIT;
  }

  for (const [name, value] of Object.entries(ENV_DEFAULTS)) {
    if (isUnsetOrEmpty(base[name])) {
      assignments[name] = value;
    }
  }

  for (const [name, value] of Object.entries(FIXED_ENV)) {
    assignments[name] = value;
  }

  // Token lookup runs after every fixed assignment.
  const token = readToken(options.tokenPath ?? MAPBOX_TOKEN_PATH);
  if (token !== undefined) {
    assignments[MAPBOX_TOKEN_VAR] = token;
  }

  return assignments;
}

/**
 * Resolve and write the launch profile into `target` (the current process
 * environment by default). Returns the assignments made.
 */
export function applyLaunchEnvironment(
  target: NodeJS.ProcessEnv = process.env,
  options: InitializerOptions = {}
): LaunchEnvironment {
  const assignments = resolveLaunchEnvironment(target, options);

  for (const [name, value] of Object.entries(assignments)) {
    target[name] = value;
  }

  logger.debug(
    {
      assigned: Object.keys(assignments).filter((name) => name !== MAPBOX_TOKEN_VAR),
      tokenAssigned: MAPBOX_TOKEN_VAR in assignments,
    },
    'Launch environment applied'
  );

  return assignments;
}

/**
 * Build a complete environment for a child process without touching `base`.
 */
export function withLaunchEnvironment(
  base: NodeJS.ProcessEnv,
  options: InitializerOptions = {}
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return { ...env, ...resolveLaunchEnvironment(base, options) };
}
