export {
  resolveLaunchEnvironment,
  applyLaunchEnvironment,
  withLaunchEnvironment,
  type InitializerOptions,
} from './initializer';

export { readToken, normalizeTokenContent } from './token';

export {
  THREAD_LIMIT_VARS,
  THREAD_LIMIT,
  ENV_DEFAULTS,
  FIXED_ENV,
  MAPBOX_TOKEN_VAR,
  MAPBOX_TOKEN_PATH,
  isUnsetOrEmpty,
} from './profile';
