import {
  exportValue,
  local,
  need,
  resource,
  tfvar,
  variable,
} from '@tfweave/block-core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { CycleError, DuplicateBlockError } from '../../../src/core/errors.js';
import { renderSources } from '../../../src/core/renderer.js';
import { createTempProject, type ProjectBuilder } from '../../helpers/project.js';
import {
  captureError,
  configSource,
  createRecordingLogger,
  valuesSource,
} from '../../helpers/sources.js';

import type { BlockSource } from '../../../src/core/block-source.js';

describe('renderSources', () => {
  let project: ProjectBuilder;

  beforeEach(async () => {
    project = await createTempProject('tfweave-render');
  });

  afterEach(async () => {
    await project.cleanup();
  });

  const net = configSource('net.cfg', function* () {
    yield resource('aws_vpc', 'main', { cidr_block: '10.0.0.0/16' });
    yield exportValue('vpcId', 'v-1');
  });
  const app = configSource('app.cfg', function* (ctx) {
    const vpcId = yield* need(ctx.lookup('net.cfg', 'vpcId'), z.string());
    yield resource('aws_subnet', 'app', { vpc_id: vpcId });
  });

  it('writes one artifact per source with exported values substituted', async () => {
    const result = await renderSources([app, net], { cwd: project.root, env: {} });

    expect(await project.list()).toEqual(['app.cfg.json', 'net.cfg.json']);
    expect(await project.readText('app.cfg.json')).toBe(
      '{\n  "resource": {\n    "aws_subnet": {\n      "app": {\n        "vpc_id": "v-1"\n      }\n    }\n  }\n}\n',
    );
    expect(result.exports).toEqual({ 'net.cfg': { vpcId: 'v-1' }, 'app.cfg': {} });
    expect(result.written).toEqual([project.path('app.cfg.json'), project.path('net.cfg.json')]);
  });

  it('writes into the output directory when one is given', async () => {
    await renderSources([net], { cwd: project.root, outputDir: 'build', env: {} });
    expect(await project.list('build')).toEqual(['net.cfg.json']);
  });

  it('writes nothing when a cycle stops the run', async () => {
    const a = configSource('a.cfg', function* (ctx) {
      yield resource('null_resource', 'a');
      yield ctx.lookup('b.cfg', 'x');
    });
    const b = configSource('b.cfg', function* (ctx) {
      yield ctx.lookup('a.cfg', 'y');
    });

    const error = await captureError(renderSources([a, b], { cwd: project.root, env: {} }));
    expect(error).toBeInstanceOf(CycleError);
    expect(await project.list()).toEqual([]);
  });

  it('writes nothing on a dry run but still returns the artifacts', async () => {
    const result = await renderSources([net], { cwd: project.root, env: {}, dryRun: true });
    expect(result.written).toEqual([]);
    expect(result.artifacts.map((artifact) => artifact.document)).toEqual([
      { resource: { aws_vpc: { main: { cidr_block: '10.0.0.0/16' } } } },
    ]);
    expect(await project.list()).toEqual([]);
  });

  describe('variables', () => {
    function stack(): BlockSource[] {
      return [
        configSource('main.tf', function* (ctx) {
          yield variable('env');
          const env = yield* need(ctx.variable('env'), z.string());
          yield local('env', env);
        }),
        valuesSource('prod.auto.tfvars', function* () {
          yield tfvar('env', 'auto');
        }),
      ];
    }

    beforeEach(async () => {
      await project.addJson('terraform.tfvars.json', { env: 'file' });
    });

    it('layers environment, tfvars files and produced auto files', async () => {
      const result = await renderSources(stack(), { cwd: project.root, env: { TF_VAR_env: 'shell' } });
      expect(result.tree['locals']).toEqual({ env: 'auto' });
      expect(await project.readJson('prod.auto.tfvars.json')).toEqual({ env: 'auto' });
    });

    it('lets -var on the command line win', async () => {
      const result = await renderSources(stack(), {
        cwd: project.root,
        env: {},
        argv: ['plan', '-var', 'env=cli'],
      });
      expect(result.tree['locals']).toEqual({ env: 'cli' });
    });

    it('uses static tfvars files when no source produces a value', async () => {
      const result = await renderSources(stack().slice(0, 1), { cwd: project.root, env: {} });
      expect(result.tree['locals']).toEqual({ env: 'file' });
    });

    it('leaves HCL var files to terraform', async () => {
      await project.addFile('prod.tfvars', 'env = "prod"\n');
      const logger = createRecordingLogger();
      const result = await renderSources(stack().slice(0, 1), {
        cwd: project.root,
        env: {},
        argv: ['plan', '-var-file=prod.tfvars'],
        logger,
      });

      expect(result.tree['locals']).toEqual({ env: 'file' });
      expect(logger.lines).toContainEqual({
        level: 'debug',
        message: 'skip: prod.tfvars (only JSON var files are read)',
      });
    });
  });

  describe('static configuration files', () => {
    beforeEach(async () => {
      await project.addJson('static.tf.json', { variable: { region: { default: 'eu-west-1' } } });
    });

    it('makes their variables visible to sources', async () => {
      const source = configSource('main.tf', function* (ctx) {
        const region = yield* need(ctx.variable('region'), z.string());
        yield local('region', region);
      });
      const result = await renderSources([source], { cwd: project.root, env: {} });
      expect(result.tree['locals']).toEqual({ region: 'eu-west-1' });
    });

    it('pre-claims their variable names', async () => {
      const source = configSource('main.tf', function* () {
        yield variable('region');
      });
      const error = await captureError(renderSources([source], { cwd: project.root, env: {} }));
      expect(error).toBeInstanceOf(DuplicateBlockError);
      expect(error).toHaveProperty(
        'message',
        'main.tf cannot define variable.region because static.tf.json already defined it',
      );
    });
  });
});
