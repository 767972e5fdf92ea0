import { z } from 'zod';

export const DEFAULT_CLEAN_PATTERNS = ['*.tf.json', '*.tfvars.json'] as const;
export const DEFAULT_MIRROR_EXCLUDE = ['.*', '_*'] as const;

const CleanConfigSchema = z
  .object({
    patterns: z.array(z.string().min(1)).default([...DEFAULT_CLEAN_PATTERNS]),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .default({});

export const ProjectConfigSchema = z
  .object({
    source_dirs: z.array(z.string().min(1)).min(1).default(['.']),
    terraform: z.string().min(1).optional(),
    indent: z.number().int().min(0).max(8).default(2),
    mirror: z.array(z.string().min(1)).default([]),
    clean: CleanConfigSchema,
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Settings after `tfweave.toml` and environment overrides are combined. */
export interface ResolvedConfig {
  sourceDirs: string[];
  terraform?: string;
  indent: number;
  mirror: string[];
  clean: { patterns: string[]; exclude: string[] };
  verbose: boolean;
  captureOutput: boolean;
  /** The file the settings came from, when one exists. */
  file?: string;
}
