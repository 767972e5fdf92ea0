/**
 * Conversion between Terraform JSON documents and fragments.
 * Pure functions; no I/O.
 */

import { DEFAULT_PROVIDER_LABEL, DOCUMENT_CATEGORIES } from './categories.js';
import { BlockParseError } from './types.js';

import type { Category, ConfigMap, ConfigValue, Fragment, SourceKind } from './types.js';

function isMap(value: ConfigValue | undefined): value is ConfigMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDocumentCategory(key: string): key is Category {
  return (DOCUMENT_CATEGORIES as readonly string[]).includes(key);
}

/** Terraform JSON allows a list of objects wherever an object of blocks is expected. */
function mapsOf(value: ConfigValue, where: string): ConfigMap[] {
  if (isMap(value)) return [value];
  if (Array.isArray(value) && value.every((entry) => isMap(entry))) {
    return value.filter((entry): entry is ConfigMap => isMap(entry));
  }
  throw new BlockParseError(`${where} must be an object or a list of objects`);
}

function providerFragments(value: ConfigValue): Fragment[] {
  const out: Fragment[] = [];
  for (const group of mapsOf(value, 'provider')) {
    for (const [name, configs] of Object.entries(group)) {
      for (const body of mapsOf(configs, `provider.${name}`)) {
        const alias = body['alias'];
        if (alias !== undefined && typeof alias !== 'string') {
          throw new BlockParseError(`provider.${name} alias must be a string`);
        }
        out.push({ kind: 'fragment', category: 'provider', type: name, label: alias, body });
      }
    }
  }
  return out;
}

function labelledFragments(category: 'resource' | 'data', value: ConfigValue): Fragment[] {
  const out: Fragment[] = [];
  for (const group of mapsOf(value, category)) {
    for (const [type, labels] of Object.entries(group)) {
      for (const byLabel of mapsOf(labels, `${category}.${type}`)) {
        for (const [label, body] of Object.entries(byLabel)) {
          out.push({ kind: 'fragment', category, type, label, body });
        }
      }
    }
  }
  return out;
}

function namedFragments(category: Category, value: ConfigValue): Fragment[] {
  const out: Fragment[] = [];
  for (const group of mapsOf(value, category)) {
    for (const [name, body] of Object.entries(group)) {
      out.push({ kind: 'fragment', category, type: name, body });
    }
  }
  return out;
}

/**
 * Split a document into fragments in key order.
 * Config documents use the *.tf.json layout; values documents are flat `{ name: value }` maps.
 */
export function fromDocument(document: ConfigMap, kind: SourceKind = 'config'): Fragment[] {
  if (kind === 'values') {
    return Object.entries(document).map(([name, value]) => ({
      kind: 'fragment',
      category: 'tfvars',
      type: name,
      body: value,
    }));
  }

  const fragments: Fragment[] = [];
  for (const [key, value] of Object.entries(document)) {
    if (!isDocumentCategory(key)) {
      throw new BlockParseError(`unknown top-level block type '${key}'`);
    }
    switch (key) {
      case 'terraform': {
        for (const body of mapsOf(value, 'terraform')) {
          fragments.push({ kind: 'fragment', category: 'terraform', type: 'terraform', body });
        }
        break;
      }
      case 'provider': {
        fragments.push(...providerFragments(value));
        break;
      }
      case 'resource':
      case 'data': {
        fragments.push(...labelledFragments(key, value));
        break;
      }
      default: {
        fragments.push(...namedFragments(key, value));
      }
    }
  }
  return fragments;
}

function encodeProviders(byName: ConfigMap): ConfigMap {
  const out: ConfigMap = {};
  for (const [name, byLabel] of Object.entries(byName)) {
    if (!isMap(byLabel)) {
      out[name] = byLabel;
      continue;
    }
    const labels = Object.keys(byLabel);
    if (labels.length === 1 && labels[0] === DEFAULT_PROVIDER_LABEL) {
      out[name] = byLabel[DEFAULT_PROVIDER_LABEL];
      continue;
    }
    const aliases = labels.filter((label) => label !== DEFAULT_PROVIDER_LABEL).sort();
    const ordered = labels.includes(DEFAULT_PROVIDER_LABEL)
      ? [DEFAULT_PROVIDER_LABEL, ...aliases]
      : aliases;
    out[name] = ordered.map((label) => byLabel[label]);
  }
  return out;
}

/**
 * Encode an identity-keyed tree (`category → type → label → body`) as the document
 * Terraform reads. Values trees become the flat *.tfvars.json map.
 */
export function encodeDocument(tree: ConfigMap, kind: SourceKind = 'config'): ConfigMap {
  if (kind === 'values') {
    const values = tree['tfvars'];
    return isMap(values) ? { ...values } : {};
  }
  const document: ConfigMap = {};
  for (const category of DOCUMENT_CATEGORIES) {
    const section = tree[category];
    if (section === undefined) continue;
    document[category] = category === 'provider' && isMap(section) ? encodeProviders(section) : section;
  }
  return document;
}
