import { resource, tfvar } from '@tfweave/block-core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ProducerNotFoundError, TfweaveError } from '../../../src/core/errors.js';
import {
  classifySourceFile,
  discoverSources,
  loadSources,
  sourceFromModule,
} from '../../../src/core/loader.js';
import { createTempProject, type ProjectBuilder } from '../../helpers/project.js';
import { captureError } from '../../helpers/sources.js';

import type { ModuleImporter } from '../../../src/core/loader.js';

describe('classifySourceFile', () => {
  it('names sources after the file without its script extension', () => {
    expect(classifySourceFile('net.tf.ts')).toEqual({ name: 'net.tf', kind: 'config' });
    expect(classifySourceFile('prod.auto.tfvars.mjs')).toEqual({
      name: 'prod.auto.tfvars',
      kind: 'values',
    });
    expect(classifySourceFile('main.tf')).toBeUndefined();
    expect(classifySourceFile('main.tf.json')).toBeUndefined();
    expect(classifySourceFile('helpers.ts')).toBeUndefined();
  });
});

describe('loader', () => {
  let project: ProjectBuilder;

  beforeEach(async () => {
    project = await createTempProject('tfweave-loader');
    await project.addFile('base/net.tf.ts', '');
    await project.addFile('base/app.tf.js', '');
    await project.addFile('base/notes.md', '');
    await project.addFile('override/net.tf.mjs', '');
    await project.addFile('override/terraform.tfvars.ts', '');
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('lets a later directory replace a source of the same name', async () => {
    const found = await discoverSources(['base', 'override'], project.root);
    expect(found.map((entry) => [entry.name, entry.kind, entry.file])).toEqual([
      ['app.tf', 'config', project.path('base/app.tf.js')],
      ['net.tf', 'config', project.path('override/net.tf.mjs')],
      ['terraform.tfvars', 'values', project.path('override/terraform.tfvars.ts')],
    ]);
  });

  it('fails for a missing source directory', async () => {
    const error = await captureError(discoverSources(['nope'], project.root));
    expect(error).toBeInstanceOf(TfweaveError);
    expect(error).toHaveProperty('message', `Source directory not found: ${project.path('nope')}`);
  });

  it('loads producers through the importer and orders by priority, then name', async () => {
    const modules: Record<string, unknown> = {
      [project.path('base/app.tf.js')]: {
        *blocks() {
          yield resource('aws_s3_bucket', 'logs');
        },
      },
      [project.path('override/net.tf.mjs')]: {
        priority: -5,
        default: function* () {
          yield resource('aws_vpc', 'main');
        },
      },
      [project.path('override/terraform.tfvars.ts')]: {
        *variables() {
          yield tfvar('env', 'prod');
        },
      },
    };
    const importer: ModuleImporter = async (file) => modules[file];

    const sources = await loadSources(['base', 'override'], { cwd: project.root, importer });

    expect(sources.map((source) => [source.name, source.priority])).toEqual([
      ['net.tf', -5],
      ['app.tf', undefined],
      ['terraform.tfvars', undefined],
    ]);
    expect(sources[0]?.origin).toBe(project.path('override/net.tf.mjs'));
  });

  it('wraps importer failures', async () => {
    const importer: ModuleImporter = async () => {
      throw new SyntaxError('Unexpected token');
    };
    const error = await captureError(loadSources(['base'], { cwd: project.root, importer }));
    expect(error).toHaveProperty('code', 'SOURCE_LOAD_FAILED');
    expect(error).toHaveProperty(
      'message',
      `Failed to load ${project.path('base/app.tf.js')}: Unexpected token`,
    );
  });
});

describe('sourceFromModule', () => {
  const found = { name: 'main.tf', kind: 'config', file: '/stack/main.tf.ts' } as const;

  it('requires a producer export', () => {
    expect(() => sourceFromModule(found, { variables: function* () {} })).toThrow(ProducerNotFoundError);
    expect(() => sourceFromModule(found, {})).toThrow(
      '/stack/main.tf.ts exports no producer (expected a default export or blocks)',
    );
  });

  it('rejects producers that do not return a generator', () => {
    const source = sourceFromModule(found, { default: () => 42 });
    expect(() =>
      source.produce({
        name: 'main.tf',
        kind: 'config',
        lookup: (src, key) => ({ kind: 'request', from: 'export', source: src, key }),
        variable: (name) => ({ kind: 'request', from: 'variable', name }),
      }),
    ).toThrow('main.tf.ts producer must be a generator function');
  });
});
