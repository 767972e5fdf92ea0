import { deleteFiles } from '../core/workflow.js';
import { loadConfig } from '../utils/config.js';

import type { CLIContext } from '../utils/context.js';
import type { Command } from 'commander';

export function registerCleanCommand(
  program: Command,
  createCtx: (opts: { verbose?: boolean }) => CLIContext,
): void {
  program
    .command('clean')
    .argument('[patterns...]', 'File patterns to remove (default: *.tf.json *.tfvars.json)')
    .option('--exclude <pattern...>', 'Name patterns to keep')
    .description('Remove rendered files from the working directory')
    .action(async (patterns: string[], flags: { exclude?: string[] }) => {
      const opts = program.opts<{ verbose?: boolean }>();
      const ctx = createCtx({ verbose: opts.verbose });

      try {
        const config = await loadConfig(ctx.cwd, ctx.env);
        const removed = await deleteFiles({
          patterns: patterns.length > 0 ? patterns : config.clean.patterns,
          exclude: flags.exclude ?? config.clean.exclude,
          cwd: ctx.cwd,
          logger: ctx.logger,
        });
        ctx.logger.debug(`removed ${removed.length} file(s)`);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        ctx.logger.error(msg);
        process.exitCode = 1;
      }
    });
}
