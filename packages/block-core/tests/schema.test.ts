import { z } from 'zod';
import { describe, expect, it } from 'vitest';

import {
  BlockParseError,
  exportValue,
  lookup,
  need,
  parseYielded,
  provider,
  resource,
  tfvar,
  variableRequest,
} from '../src/index.js';

describe('parseYielded', () => {
  it('returns typed items deep-frozen', () => {
    const [item] = parseYielded(resource('aws_s3_bucket', 'logs', { tags: { team: 'core' } }));

    expect(item).toEqual({
      kind: 'fragment',
      category: 'resource',
      type: 'aws_s3_bucket',
      label: 'logs',
      body: { tags: { team: 'core' } },
    });
    expect(Object.isFrozen(item)).toBe(true);
    if (item?.kind === 'fragment') {
      expect(Object.isFrozen(item.body)).toBe(true);
    }
  });

  it('does not freeze the caller object', () => {
    const body = { bucket: 'acme-logs' };
    parseYielded(resource('aws_s3_bucket', 'logs', body));
    expect(Object.isFrozen(body)).toBe(false);
  });

  it('passes exports and requests through', () => {
    expect(parseYielded(exportValue('vpcId', 'v-1'))).toEqual([
      { kind: 'export', name: 'vpcId', value: 'v-1' },
    ]);
    expect(parseYielded(lookup('net.tf', 'vpcId'))).toEqual([
      { kind: 'request', from: 'export', source: 'net.tf', key: 'vpcId' },
    ]);
    expect(parseYielded(variableRequest('region'))).toEqual([
      { kind: 'request', from: 'variable', name: 'region' },
    ]);
  });

  it('requires labels on resources', () => {
    expect(() =>
      parseYielded({ kind: 'fragment', category: 'resource', type: 'aws_vpc', body: {} }),
    ).toThrow('invalid fragment item: label: resource blocks need a label');
  });

  it('rejects values that cannot be written as JSON', () => {
    expect(() => parseYielded(resource('aws_vpc', 'main', { cidr: Number.POSITIVE_INFINITY }))).toThrow(
      BlockParseError,
    );
    expect(() => parseYielded({ locals: { when: () => 'now' } })).toThrow(BlockParseError);
  });

  it('reserves the default provider alias', () => {
    expect(() => parseYielded(provider('aws', {}, { alias: 'default' }))).toThrow(
      "label: provider alias 'default' is reserved",
    );
  });

  it('splits plain documents', () => {
    expect(parseYielded({ locals: { a: 1 } })).toEqual([
      { kind: 'fragment', category: 'locals', type: 'a', body: 1 },
    ]);
  });

  it('keeps tfvars and config categories apart', () => {
    expect(() => parseYielded(resource('aws_vpc', 'main'), 'values')).toThrow(
      'values sources cannot define resource blocks',
    );
    expect(() => parseYielded(tfvar('region', 'eu-west-1'))).toThrow(
      'tfvars values belong in a *.tfvars source',
    );
    expect(parseYielded({ region: 'eu-west-1' }, 'values')).toEqual([
      { kind: 'fragment', category: 'tfvars', type: 'region', body: 'eu-west-1' },
    ]);
  });
});

describe('need', () => {
  it('yields the request and returns the answer', () => {
    const gen = need(lookup('net.tf', 'vpcId'), z.string());

    expect(gen.next().value).toEqual({
      kind: 'request',
      from: 'export',
      source: 'net.tf',
      key: 'vpcId',
    });
    expect(gen.next('v-1')).toEqual({ done: true, value: 'v-1' });
  });

  it('validates the answer against the schema', () => {
    const gen = need(variableRequest('count'), z.string());
    gen.next();

    expect(() => gen.next(3)).toThrow('var.count has an unexpected value: Expected string, received number');
  });
});
