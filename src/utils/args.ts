import path from 'node:path';

import { isDirectory } from './fs.js';

export interface ParsedArgs {
  /** `help`, `version`, a Terraform subcommand, or '' when none was given. */
  command: string;
  args: string[];
  flags: string[];
  /** The configuration directory Terraform will read, or '' for the working directory. */
  configDir: string;
}

const HELP_FLAGS = new Set(['-h', '-help', '--help']);
const VERSION_FLAGS = new Set(['-version', '--version']);

/** Flags that take a value, which may follow as the next argument (`-var env=prod`). */
const VALUE_FLAGS = new Set([
  '-backend-config',
  '-backup',
  '-chdir',
  '-from-module',
  '-generate-config-out',
  '-lock-timeout',
  '-out',
  '-parallelism',
  '-plugin-dir',
  '-replace',
  '-state',
  '-state-out',
  '-target',
  '-var',
  '-var-file',
]);

/** Subcommands whose last positional argument is the configuration directory. */
const TRAILING_DIR_COMMANDS = new Set([
  'console',
  'destroy',
  'get',
  'graph',
  'init',
  'plan',
  'refresh',
  'validate',
]);

/**
 * Split Terraform-style arguments into command, positionals and flags and work out
 * which directory the command operates on.
 */
export function parseArgs(
  argv: readonly string[],
  isDir: (target: string) => boolean = isDirectory,
): ParsedArgs {
  let command = '';
  let chdir = '';
  const args: string[] = [];
  const flags: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg.startsWith('-')) {
      if (!command && HELP_FLAGS.has(arg)) {
        command = 'help';
        continue;
      }
      if (!command && VERSION_FLAGS.has(arg)) {
        command = 'version';
        continue;
      }
      flags.push(arg);
      const value = VALUE_FLAGS.has(arg) ? argv[i + 1] : undefined;
      if (value !== undefined) {
        flags.push(value);
        i++;
      }
      if (!command && arg.startsWith('-chdir=')) chdir = arg.slice('-chdir='.length);
      else if (!command && arg === '-chdir' && value !== undefined) chdir = value;
    } else if (!command) {
      command = arg;
    } else {
      args.push(arg);
    }
  }

  let positional = '';
  if (command === 'apply') {
    const dirOrPlan = args[0];
    if (dirOrPlan !== undefined && isDir(chdir ? path.join(chdir, dirOrPlan) : dirOrPlan)) {
      positional = dirOrPlan;
    }
  } else if (command === 'force-unlock') {
    if (args.length === 2) positional = args[1] ?? '';
  } else if (TRAILING_DIR_COMMANDS.has(command)) {
    positional = args.at(-1) ?? '';
  }

  // -chdir moves Terraform before it reads any positional directory
  const configDir = chdir && positional ? path.join(chdir, positional) : chdir || positional;
  return { command, args, flags, configDir };
}
