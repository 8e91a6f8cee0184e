/**
 * Launch profile - the fixed set of variables prepared for the downstream
 * application before it starts.
 */

/**
 * Thread-count caps for the numeric libraries loaded by the downstream
 * application. Always overwritten.
 */
export const THREAD_LIMIT_VARS = [
  'OMP_NUM_THREADS',
  'MKL_NUM_THREADS',
  'NUMEXPR_NUM_THREADS',
  'OPENBLAS_NUM_THREADS',
  'VECLIB_MAXIMUM_THREADS',
] as const;

export const THREAD_LIMIT = '1';

/**
 * Defaults applied only when the variable is unset or empty.
 */
export const ENV_DEFAULTS = Object.freeze({
  AGNOS_VERSION: '8.2',
  PASSIVE: '1',
});

/**
 * Fixed values, always overwritten.
 */
export const FIXED_ENV = Object.freeze({
  STAGING_ROOT: '/data/safe_staging',
  SKIP_FW_QUERY: '1',
  FINGERPRINT: 'VOLKSWAGEN SHARAN 2ND GEN',
});

export const MAPBOX_TOKEN_VAR = 'MAPBOX_TOKEN';
export const MAPBOX_TOKEN_PATH = '/data/media/0/dp_nav_mapbox_token';

export function isUnsetOrEmpty(value: string | undefined): boolean {
  return value === undefined || value === '';
}
