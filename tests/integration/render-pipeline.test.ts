import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ErrorCode } from '../../src/core/errors.js';
import { createFiles } from '../../src/core/renderer.js';
import { createTempProject, type ProjectBuilder } from '../helpers/project.js';
import { captureError, createRecordingLogger } from '../helpers/sources.js';

const NET = `export default function* () {
  yield { resource: { aws_vpc: { main: { cidr_block: '10.0.0.0/16' } } } };
  yield { kind: 'export', name: 'vpc_id', value: '\${aws_vpc.main.id}' };
}
`;

const APP = `interface Requests {
  lookup(source: string, key: string): unknown;
  variable(name: string): unknown;
}

export const priority = 10;

export function* blocks(ctx: Requests): Generator<unknown, void, unknown> {
  const vpcId: unknown = yield ctx.lookup('net.tf', 'vpc_id');
  const region: unknown = yield ctx.variable('region');
  yield { resource: { aws_subnet: { app: { vpc_id: vpcId, tags: { region } } } } };
}
`;

const VARIABLES = `export function* blocks() {
  yield { variable: { region: { default: 'eu-west-1' } } };
}
`;

const PROD = `export function* variables() {
  yield { region: 'us-east-1' };
}
`;

describe('render pipeline', () => {
  let project: ProjectBuilder;

  beforeEach(async () => {
    project = await createTempProject('tfweave-pipeline');
    await project.addFile('defs/net.tf.mjs', NET);
    await project.addFile('defs/app.tf.ts', APP);
    await project.addFile('defs/variables.tf.mjs', VARIABLES);
    await project.addFile('defs/prod.auto.tfvars.mjs', PROD);
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it('loads JavaScript and TypeScript sources and writes one artifact each', async () => {
    const logger = createRecordingLogger();
    const result = await createFiles({ cwd: project.root, sourceDirs: ['defs'], env: {}, logger });

    expect(result.written.map((file) => file.slice(project.root.length + 1)).sort()).toEqual([
      'app.tf.json',
      'net.tf.json',
      'prod.auto.tfvars.json',
      'variables.tf.json',
    ]);
    expect(await project.readJson('app.tf.json')).toEqual({
      resource: {
        aws_subnet: { app: { vpc_id: '${aws_vpc.main.id}', tags: { region: 'us-east-1' } } },
      },
    });
    expect(await project.readJson('net.tf.json')).toEqual({
      resource: { aws_vpc: { main: { cidr_block: '10.0.0.0/16' } } },
    });
    expect(await project.readJson('prod.auto.tfvars.json')).toEqual({ region: 'us-east-1' });
    expect(await project.readJson('variables.tf.json')).toEqual({
      variable: { region: { default: 'eu-west-1' } },
    });
    expect(result.exports['net.tf']).toEqual({ vpc_id: '${aws_vpc.main.id}' });
    expect(result.exports['app.tf']).toEqual({});
  });

  it('gives -var on the command line the last word', async () => {
    await createFiles({
      cwd: project.root,
      sourceDirs: ['defs'],
      argv: ['plan', '-var', 'region=ap-south-1'],
      env: { TF_VAR_region: 'ca-central-1' },
    });

    expect(await project.readJson('app.tf.json')).toEqual({
      resource: {
        aws_subnet: { app: { vpc_id: '${aws_vpc.main.id}', tags: { region: 'ap-south-1' } } },
      },
    });
  });

  it('writes nothing when a source has no producer', async () => {
    await project.addFile('defs/broken.tf.mjs', 'export const notAProducer = 1;\n');

    const error = await captureError(createFiles({ cwd: project.root, sourceDirs: ['defs'], env: {} }));

    expect(error).toHaveProperty('code', ErrorCode.PRODUCER_NOT_FOUND);
    expect(await project.list()).toEqual(['defs']);
  });
});
