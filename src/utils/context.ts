import { envFlag } from './config.js';
import { createLogger } from './logger.js';

import type { Logger } from './logger.js';

export interface CLIContext {
  logger: Logger;
  /** Working directory commands resolve relative paths against. */
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface CLIContextOptions {
  verbose?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function createCLIContext(opts: CLIContextOptions = {}): CLIContext {
  const env = opts.env ?? process.env;
  return {
    logger: createLogger({ verbose: opts.verbose === true || envFlag(env.TFWEAVE_VERBOSE) }),
    cwd: opts.cwd ?? process.cwd(),
    env,
  };
}
