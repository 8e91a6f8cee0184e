/**
 * Shared types for launch-env
 */

/**
 * Variable assignments made by the launch profile, in the order they were
 * resolved.
 */
export type LaunchEnvironment = Record<string, string>;

export interface AssertionResult {
  valid: boolean;
  mismatched: string[];  // unconditional vars not holding their profile value
  missing: string[];     // defaulted vars left unset or empty
  tokenPresent: boolean;
}

export interface CliArgs {
  help: boolean;
  print: boolean;
  tokenPath: string;
  command: string[];
}
