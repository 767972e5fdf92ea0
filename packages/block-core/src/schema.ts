import { z } from 'zod';

import { DEFAULT_PROVIDER_LABEL, policyFor } from './categories.js';
import { fromDocument } from './document.js';
import { BlockParseError } from './types.js';

import type { BlockItem, ConfigMap, ConfigValue, Fragment, SourceKind } from './types.js';

export const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(ConfigValueSchema),
  ]),
);

export const ConfigMapSchema: z.ZodType<ConfigMap> = z.record(ConfigValueSchema);

const NameSchema = z.string().min(1);

export const CategorySchema = z.enum([
  'terraform',
  'provider',
  'resource',
  'data',
  'module',
  'variable',
  'output',
  'locals',
  'tfvars',
]);

const FragmentSchema = z
  .object({
    kind: z.literal('fragment'),
    category: CategorySchema,
    type: NameSchema,
    label: NameSchema.optional(),
    body: ConfigValueSchema,
  })
  .strict()
  .superRefine((fragment, ctx) => {
    const { depth } = policyFor(fragment.category);
    if (fragment.category === 'provider') {
      if (fragment.label === DEFAULT_PROVIDER_LABEL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `provider alias '${DEFAULT_PROVIDER_LABEL}' is reserved`,
          path: ['label'],
        });
      }
      return;
    }
    if (depth === 2 && fragment.label === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${fragment.category} blocks need a label`,
        path: ['label'],
      });
    }
    if (depth < 2 && fragment.label !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${fragment.category} blocks take no label`,
        path: ['label'],
      });
    }
    if (depth === 0 && fragment.type !== 'terraform') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "terraform blocks use the type 'terraform'",
        path: ['type'],
      });
    }
    if (depth === 0 && !isMap(fragment.body)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'terraform block body must be a mapping',
        path: ['body'],
      });
    }
  });

const ExportDeclarationSchema = z
  .object({
    kind: z.literal('export'),
    name: NameSchema,
    value: ConfigValueSchema,
  })
  .strict();

const ExportRequestSchema = z
  .object({
    kind: z.literal('request'),
    from: z.literal('export'),
    source: NameSchema,
    key: NameSchema,
  })
  .strict();

const VariableRequestSchema = z
  .object({
    kind: z.literal('request'),
    from: z.literal('variable'),
    name: NameSchema,
  })
  .strict();

export const BlockItemSchema = z.union([
  FragmentSchema,
  ExportDeclarationSchema,
  ExportRequestSchema,
  VariableRequestSchema,
]);

function isMap(value: unknown): value is ConfigMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${where}${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate one value yielded by a producer.
 * Typed items come back deep-copied and frozen; plain documents are split into fragments.
 * Values sources may only produce `tfvars` fragments, config sources never do.
 */
export function parseYielded(value: unknown, kind: SourceKind = 'config'): BlockItem[] {
  let items: BlockItem[];
  if (isMap(value) && typeof value['kind'] === 'string') {
    const result = BlockItemSchema.safeParse(value);
    if (!result.success) {
      throw new BlockParseError(`invalid ${value['kind']} item: ${describeIssues(result.error)}`);
    }
    items = [result.data];
  } else {
    const document = ConfigMapSchema.safeParse(value);
    if (!document.success) {
      throw new BlockParseError(`invalid document: ${describeIssues(document.error)}`);
    }
    items = fromDocument(document.data, kind).map((fragment) => parseFragment(fragment));
  }
  for (const item of items) {
    if (item.kind !== 'fragment') continue;
    const isValue = item.category === 'tfvars';
    if (isValue !== (kind === 'values')) {
      throw new BlockParseError(
        kind === 'values'
          ? `values sources cannot define ${item.category} blocks`
          : 'tfvars values belong in a *.tfvars source',
      );
    }
  }
  return items.map((item) => deepFreeze(item));
}

export function parseFragment(value: unknown): Fragment {
  const result = FragmentSchema.safeParse(value);
  if (!result.success) {
    throw new BlockParseError(`invalid fragment: ${describeIssues(result.error)}`);
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
