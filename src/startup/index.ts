/**
 * Startup Module
 *
 * Exports the checks run before the downstream application starts.
 */
export {
  verifyLaunchEnvironment,
  runStartupAssertions,
} from './assertions';

export type { AssertionResult } from '../types';
