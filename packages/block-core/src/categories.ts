import type { Category, Fragment } from './types.js';

export interface CategoryPolicy {
  category: Category;
  /** Number of identity segments below the category: 0 (terraform), 1 (name) or 2 (type + label). */
  depth: 0 | 1 | 2;
  /** Several sources may contribute to the same key; bodies are deep-merged. */
  mergeable: boolean;
  /** Later scalars and sequences replace earlier ones instead of conflicting. */
  allowOverride: boolean;
  destination: 'tree' | 'variables';
}

export const DEFAULT_PROVIDER_LABEL = 'default';

export const CATEGORY_POLICIES: Readonly<Record<Category, CategoryPolicy>> = {
  terraform: {
    category: 'terraform',
    depth: 0,
    mergeable: true,
    allowOverride: false,
    destination: 'tree',
  },
  provider: {
    category: 'provider',
    depth: 2,
    mergeable: true,
    allowOverride: false,
    destination: 'tree',
  },
  resource: {
    category: 'resource',
    depth: 2,
    mergeable: false,
    allowOverride: false,
    destination: 'tree',
  },
  data: { category: 'data', depth: 2, mergeable: false, allowOverride: false, destination: 'tree' },
  module: {
    category: 'module',
    depth: 1,
    mergeable: false,
    allowOverride: false,
    destination: 'tree',
  },
  variable: {
    category: 'variable',
    depth: 1,
    mergeable: false,
    allowOverride: false,
    destination: 'tree',
  },
  output: {
    category: 'output',
    depth: 1,
    mergeable: false,
    allowOverride: false,
    destination: 'tree',
  },
  locals: {
    category: 'locals',
    depth: 1,
    mergeable: false,
    allowOverride: false,
    destination: 'tree',
  },
  tfvars: {
    category: 'tfvars',
    depth: 1,
    mergeable: true,
    allowOverride: true,
    destination: 'variables',
  },
};

/** Top-level keys Terraform accepts in a *.tf.json document, in encoding order. */
export const DOCUMENT_CATEGORIES: readonly Category[] = [
  'terraform',
  'provider',
  'variable',
  'locals',
  'data',
  'resource',
  'module',
  'output',
];

export function policyFor(category: Category): CategoryPolicy {
  return CATEGORY_POLICIES[category];
}

/** Identity segments of a fragment below its category, e.g. `['aws_s3_bucket', 'logs']`. */
export function identityOf(fragment: Pick<Fragment, 'category' | 'type' | 'label'>): string[] {
  const { depth } = policyFor(fragment.category);
  if (depth === 0) return [];
  if (depth === 1) return [fragment.type];
  return [fragment.type, fragment.label ?? DEFAULT_PROVIDER_LABEL];
}

/** Dotted rendering of a label key: `resource.aws_s3_bucket.logs`, `variable.region`, `terraform`. */
export function formatLabelKey(fragment: Pick<Fragment, 'category' | 'type' | 'label'>): string {
  return [fragment.category, ...identityOf(fragment)].join('.');
}
