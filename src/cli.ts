#!/usr/bin/env node
import { parseArgs } from 'util';
import { z, ZodError } from 'zod';
import { config } from './config';
import { LaunchError } from './errors';
import { formatExports, launch, prepareLaunchEnvironment } from './launcher';
import { CliArgs } from './types';
import logger from './utils/logger';

export const USAGE = `Usage:
  launch-env [--token-path <path>] --print
  launch-env [--token-path <path>] [--] <command> [args...]

Options:
  --print               Print the launch environment as shell export lines
  --token-path <path>   Read the navigation token from <path>
  -h, --help            Show this help
`;

const CliArgsSchema = z
  .object({
    help: z.boolean(),
    print: z.boolean(),
    tokenPath: z.string().min(1, '--token-path must not be empty'),
    command: z.array(z.string()),
  })
  .superRefine((args, ctx) => {
    if (args.help) {
      return;
    }
    if (args.print && args.command.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['command'],
        message: '--print does not take a command',
      });
    }
    if (!args.print && args.command.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['command'],
        message: 'a command to launch is required',
      });
    }
  });

/**
 * Split argv into launcher options and the command to launch. Launcher
 * options end at `--` or at the first argument that is not an option, so
 * the command keeps its own flags.
 */
function splitArgv(argv: readonly string[]): { options: string[]; command: string[] } {
  const options: string[] = [];
  let index = 0;

  while (index < argv.length) {
    const arg = argv[index];
    if (arg === '--') {
      index += 1;
      break;
    }
    if (!arg.startsWith('-')) {
      break;
    }
    options.push(arg);
    if (arg === '--token-path' && index + 1 < argv.length) {
      options.push(argv[index + 1]);
      index += 1;
    }
    index += 1;
  }

  return { options, command: argv.slice(index) };
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { options, command } = splitArgv(argv);

  let values: { print?: boolean; help?: boolean; 'token-path'?: string };
  try {
    ({ values } = parseArgs({
      args: options,
      options: {
        print: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        'token-path': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new LaunchError(
      'invalid_arguments',
      error instanceof Error ? error.message : String(error)
    );
  }

  try {
    return CliArgsSchema.parse({
      help: values.help ?? false,
      print: values.print ?? false,
      tokenPath: values['token-path'] ?? config.tokenPath,
      command,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw new LaunchError(
        'invalid_arguments',
        error.errors.map((e) => e.message).join('; '),
        error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
      );
    }
    throw error;
  }
}

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = parseCliArgs(argv);

    if (args.help) {
      process.stdout.write(USAGE);
      return 0;
    }

    if (args.print) {
      const assignments = prepareLaunchEnvironment(process.env, { tokenPath: args.tokenPath });
      process.stdout.write(formatExports(assignments));
      return 0;
    }

    const [command, ...commandArgs] = args.command;
    return await launch(command, commandArgs, { tokenPath: args.tokenPath });
  } catch (error) {
    if (error instanceof LaunchError) {
      logger.error({ code: error.code, details: error.details }, error.message);
      if (error.code === 'invalid_arguments') {
        process.stderr.write(USAGE);
      }
      return error.exitCode;
    }
    logger.error({ err: error }, 'Unexpected launcher failure');
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'Launcher crashed');
      process.exitCode = 1;
    }
  );
}
