import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseArgs } from '../../../src/utils/args.js';

const always = () => true;
const never = () => false;

describe('parseArgs', () => {
  it('separates command, positionals and flags', () => {
    expect(parseArgs(['plan', '-out=tf.plan', '-input=false', 'envs/dev'], never)).toEqual({
      command: 'plan',
      args: ['envs/dev'],
      flags: ['-out=tf.plan', '-input=false'],
      configDir: 'envs/dev',
    });
  });

  it('keeps the value of a two-word flag with the flag', () => {
    const argv = ['plan', '-var', 'env=cli', '-var-file', 'prod.tfvars.json', '-target', 'aws_vpc.main'];
    expect(parseArgs(argv, never)).toEqual({
      command: 'plan',
      args: [],
      flags: ['-var', 'env=cli', '-var-file', 'prod.tfvars.json', '-target', 'aws_vpc.main'],
      configDir: '',
    });
    expect(parseArgs(['destroy', '-state', 'old.tfstate', 'envs/dev'], never).configDir).toBe('envs/dev');
  });

  it('takes the directory from -chdir', () => {
    expect(parseArgs(['-chdir=envs/prod', 'plan'], never).configDir).toBe('envs/prod');
    expect(parseArgs(['-chdir', 'envs/prod', 'apply', '-auto-approve'], never)).toEqual({
      command: 'apply',
      args: [],
      flags: ['-chdir', 'envs/prod', '-auto-approve'],
      configDir: 'envs/prod',
    });
    expect(parseArgs(['-chdir=envs', 'plan', 'prod'], never).configDir).toBe(path.join('envs', 'prod'));
  });

  it('checks the apply argument relative to -chdir', () => {
    const seen: string[] = [];
    const isDir = (target: string) => {
      seen.push(target);
      return true;
    };
    expect(parseArgs(['-chdir=envs', 'apply', 'prod'], isDir).configDir).toBe(path.join('envs', 'prod'));
    expect(seen).toEqual([path.join('envs', 'prod')]);
  });

  it('recognises help and version flags before a command', () => {
    expect(parseArgs(['-help'], never).command).toBe('help');
    expect(parseArgs(['--version'], never).command).toBe('version');
    expect(parseArgs(['plan', '-help'], never)).toMatchObject({ command: 'plan', flags: ['-help'] });
  });

  it('treats the apply argument as a directory only when it is one', () => {
    expect(parseArgs(['apply', 'envs/dev'], always).configDir).toBe('envs/dev');
    expect(parseArgs(['apply', 'tf.plan'], never).configDir).toBe('');
  });

  it('reads the directory of force-unlock from its second argument', () => {
    expect(parseArgs(['force-unlock', 'LOCK-ID', 'envs/dev'], never).configDir).toBe('envs/dev');
    expect(parseArgs(['force-unlock', 'LOCK-ID'], never).configDir).toBe('');
  });

  it('has no directory for other commands', () => {
    expect(parseArgs(['fmt', 'envs/dev'], always).configDir).toBe('');
    expect(parseArgs([], always)).toEqual({ command: '', args: [], flags: [], configDir: '' });
  });
});
