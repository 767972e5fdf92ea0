import { describe, expect, it } from 'vitest';

import { MergeConflictError, ShapeConflictError } from '../../../src/core/errors.js';
import { mergeFragment, mergeInto, mergeValues } from '../../../src/core/merger.js';

import type { ConfigMap } from '@tfweave/block-core';

const strict = { path: 'x', policy: { allowOverride: false }, sources: ['a.tf', 'b.tf'] };
const override = { ...strict, policy: { allowOverride: true } };

describe('mergeValues', () => {
  it('adopts a copy when nothing is there yet', () => {
    const incoming = { tags: { team: 'core' } };
    const merged = mergeValues(undefined, incoming, strict);

    expect(merged).toEqual(incoming);
    expect(merged).not.toBe(incoming);
  });

  it('keeps equal scalars', () => {
    expect(mergeValues('eu-west-1', 'eu-west-1', strict)).toBe('eu-west-1');
  });

  it('raises on unequal scalars with path, sources and both values', () => {
    let caught: unknown;
    try {
      mergeValues('a', 'b', strict);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MergeConflictError);
    expect(caught).toMatchObject({ path: 'x', existing: 'a', incoming: 'b', sources: ['a.tf', 'b.tf'] });
    expect(caught).toHaveProperty(
      'message',
      'conflicting values for x: "a" vs "b" (sources: a.tf, b.tf)',
    );
  });

  it('lets the incoming scalar win under override', () => {
    expect(mergeValues(1, 2, override)).toBe(2);
  });

  it('concatenates sequences, or replaces them under override', () => {
    expect(mergeValues([1, 2], [3], strict)).toEqual([1, 2, 3]);
    expect(mergeValues([1, 2], [3], override)).toEqual([3]);
  });

  it('treats null as a scalar', () => {
    expect(mergeValues(null, null, strict)).toBeNull();
    expect(() => mergeValues(null, {}, strict)).toThrow(ShapeConflictError);
  });

  it('raises on shape mismatches even under override', () => {
    expect(() => mergeValues({ a: 1 }, [1], override)).toThrow(ShapeConflictError);
    expect(() => mergeValues('s', ['s'], strict)).toThrow(
      'cannot merge ["s"] into "s" at x (sources: a.tf, b.tf)',
    );
  });
});

describe('mergeInto', () => {
  it('merges mappings key by key and reports the dotted path', () => {
    const target: ConfigMap = { tags: { team: 'core' }, size: 1 };
    mergeInto(target, { tags: { env: 'prod' } }, { ...strict, path: 'resource.x.y' });
    expect(target).toEqual({ tags: { team: 'core', env: 'prod' }, size: 1 });

    expect(() =>
      mergeInto(target, { tags: { team: 'web' } }, { ...strict, path: 'resource.x.y' }),
    ).toThrow('conflicting values for resource.x.y.tags.team: "core" vs "web"');
  });

  it('is order independent for disjoint keys', () => {
    const a: ConfigMap = {};
    mergeInto(a, { x: 1 }, strict);
    mergeInto(a, { y: [1] }, strict);
    const b: ConfigMap = {};
    mergeInto(b, { y: [1] }, strict);
    mergeInto(b, { x: 1 }, strict);
    expect(a).toEqual(b);
  });

  it('combines fragments from different sources into one mapping', () => {
    const target: ConfigMap = {};
    mergeInto(target, { a: { x: 1 } }, strict);
    mergeInto(target, { a: { y: 2 } }, strict);
    expect(target).toEqual({ a: { x: 1, y: 2 } });

    expect(() => mergeInto(target, { a: { x: 2 } }, strict)).toThrow(MergeConflictError);
  });
});

describe('mergeFragment', () => {
  it('places fragments under category, type and label', () => {
    const tree: ConfigMap = {};
    mergeFragment(
      tree,
      { kind: 'fragment', category: 'provider', type: 'aws', body: { region: 'eu-west-1' } },
      ['a.tf'],
    );
    mergeFragment(
      tree,
      { kind: 'fragment', category: 'provider', type: 'aws', body: { profile: 'ops' } },
      ['a.tf', 'b.tf'],
    );
    mergeFragment(
      tree,
      { kind: 'fragment', category: 'terraform', type: 'terraform', body: { required_version: '>= 1.5' } },
      ['a.tf'],
    );

    expect(tree).toEqual({
      provider: { aws: { default: { region: 'eu-west-1', profile: 'ops' } } },
      terraform: { required_version: '>= 1.5' },
    });
  });

  it('does not alias the fragment body', () => {
    const body = { tags: { team: 'core' } };
    const tree: ConfigMap = {};
    mergeFragment(tree, { kind: 'fragment', category: 'variable', type: 'tags', body }, ['a.tf']);
    mergeFragment(
      tree,
      { kind: 'fragment', category: 'variable', type: 'tags', body: { tags: { env: 'dev' } } },
      ['a.tf'],
    );
    expect(body).toEqual({ tags: { team: 'core' } });
  });
});
