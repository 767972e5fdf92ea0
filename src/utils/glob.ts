import { promises as fs } from 'node:fs';
import path from 'node:path';

const cache = new Map<string, RegExp>();

function toRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close).replaceAll('\\', '\\\\');
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      source += `[${body}]`;
      i = close;
    } else {
      source += ch.replace(/[.+^${}()|\\]/g, '\\$&');
    }
  }
  const re = new RegExp(`^${source}$`, 's');
  cache.set(pattern, re);
  return re;
}

/** Shell-style name match: `*`, `?`, `[abc]` and `[!abc]`. Leading dots are not special. */
export function matchesPattern(name: string, pattern: string): boolean {
  return toRegExp(pattern).test(name);
}

function hasWildcard(segment: string): boolean {
  return /[*?[]/.test(segment);
}

async function expand(base: string, segments: readonly string[]): Promise<string[]> {
  const [head, ...rest] = segments;
  if (head === undefined) return [base];
  if (head === '**') {
    // zero or more directories; symlinked directories are not descended into
    const out = await expand(base, rest);
    let dirs: string[];
    try {
      dirs = (await fs.readdir(base, { withFileTypes: true }))
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch {
      return out;
    }
    for (const dir of dirs) {
      out.push(...(await expand(path.join(base, dir), segments)));
    }
    return out;
  }
  if (!hasWildcard(head)) {
    const next = path.join(base, head);
    if (rest.length === 0) {
      try {
        await fs.lstat(next);
        return [next];
      } catch {
        return [];
      }
    }
    return expand(next, rest);
  }

  let entries: string[];
  try {
    entries = await fs.readdir(base);
  } catch {
    return [];
  }
  const out: string[] = [];
  for (const entry of entries.sort()) {
    if (!matchesPattern(entry, head)) continue;
    out.push(...(await expand(path.join(base, entry), rest)));
  }
  return out;
}

/**
 * Paths matching any of `patterns` (relative to `cwd`, wildcards allowed in every
 * segment, `**` for any depth of directories), skipping those whose base name
 * matches an `exclude` pattern.
 * Returns absolute paths, first match order, without duplicates.
 */
export async function findPaths(
  patterns: readonly string[],
  exclude: readonly string[] = [],
  cwd: string = process.cwd(),
): Promise<string[]> {
  const seen = new Set<string>();
  for (const pattern of patterns) {
    const absolute = path.resolve(cwd, pattern);
    const root = path.parse(absolute).root;
    const segments = absolute.slice(root.length).split(path.sep).filter(Boolean);
    for (const match of await expand(root, segments)) {
      const name = path.basename(match);
      if (exclude.some((p) => matchesPattern(name, p))) continue;
      seen.add(match);
    }
  }
  return [...seen];
}
