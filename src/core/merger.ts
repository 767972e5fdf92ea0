import { identityOf, policyFor } from '@tfweave/block-core';

import { MergeConflictError, ShapeConflictError } from './errors.js';

import type { CategoryPolicy, ConfigMap, ConfigValue, Fragment } from '@tfweave/block-core';

export interface MergeOptions {
  /** Dotted location of `incoming`, used in conflict messages. */
  path: string;
  policy: Pick<CategoryPolicy, 'allowOverride'>;
  /** Sources involved at this location, for diagnostics. */
  sources: readonly string[];
}

type Shape = 'scalar' | 'sequence' | 'mapping';

function shapeOf(value: ConfigValue): Shape {
  if (Array.isArray(value)) return 'sequence';
  if (value !== null && typeof value === 'object') return 'mapping';
  return 'scalar';
}

function isMapping(value: ConfigValue | undefined): value is ConfigMap {
  return value !== undefined && shapeOf(value) === 'mapping';
}

export function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map((entry) => cloneValue(entry));
  if (isMapping(value)) {
    const out: ConfigMap = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = cloneValue(entry);
    }
    return out;
  }
  return value;
}

/** Combine two values at one location; the result never aliases `incoming`. */
export function mergeValues(
  existing: ConfigValue | undefined,
  incoming: ConfigValue,
  options: MergeOptions,
): ConfigValue {
  if (existing === undefined) return cloneValue(incoming);

  const existingShape = shapeOf(existing);
  const incomingShape = shapeOf(incoming);
  if (existingShape !== incomingShape) {
    throw new ShapeConflictError(options.path, options.sources, existing, incoming);
  }

  switch (existingShape) {
    case 'scalar': {
      if (existing === incoming) return existing;
      if (options.policy.allowOverride) return incoming;
      throw new MergeConflictError(options.path, options.sources, existing, incoming);
    }
    case 'sequence': {
      const before = Array.isArray(existing) ? existing : [];
      const after = Array.isArray(incoming) ? incoming.map((entry) => cloneValue(entry)) : [];
      return options.policy.allowOverride ? after : [...before, ...after];
    }
    case 'mapping': {
      if (!isMapping(existing) || !isMapping(incoming)) return existing;
      mergeInto(existing, incoming, options);
      return existing;
    }
  }
}

/** Key-wise merge of `incoming` into `target`, mutating `target`. */
export function mergeInto(target: ConfigMap, incoming: ConfigMap, options: MergeOptions): void {
  for (const [key, value] of Object.entries(incoming)) {
    const path = options.path ? `${options.path}.${key}` : key;
    const current = Object.hasOwn(target, key) ? target[key] : undefined;
    target[key] = mergeValues(current, value, { ...options, path });
  }
}

/**
 * Place a fragment body into an identity-keyed tree (`category → type → label → body`),
 * merging with whatever is already at that location.
 */
export function mergeFragment(
  tree: ConfigMap,
  fragment: Fragment,
  sources: readonly string[],
): void {
  const policy = policyFor(fragment.category);
  const segments = [fragment.category, ...identityOf(fragment)];
  const last = segments.pop() ?? fragment.category;

  let parent: ConfigMap = tree;
  const walked: string[] = [];
  for (const segment of segments) {
    walked.push(segment);
    const child = Object.hasOwn(parent, segment) ? parent[segment] : undefined;
    if (child === undefined) {
      const created: ConfigMap = {};
      parent[segment] = created;
      parent = created;
      continue;
    }
    if (!isMapping(child)) {
      throw new ShapeConflictError(walked.join('.'), sources, child, {});
    }
    parent = child;
  }

  const path = [...walked, last].join('.');
  const current = Object.hasOwn(parent, last) ? parent[last] : undefined;
  parent[last] = mergeValues(current, fragment.body, { path, policy, sources });
}
