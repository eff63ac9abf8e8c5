import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { executeServeCommand } from '../../../src/cli/commands/serve.js';
import type { ServeCommandDeps } from '../../../src/cli/commands/serve.js';
import { loadConfig } from '../../../src/config/app-config.js';
import type { ValidatedConfig } from '../../../src/config/app-config.js';
import { readPatternFiles } from '../../../src/application/services/exclusion-policy.js';
import { makeTempDir, removeTempDir, writeTree } from '../../helpers/temp-tree.js';

describe('executeServeCommand', () => {
  let tmp: string;
  let started: ValidatedConfig[];
  let startFailure: Error | undefined;

  function deps(): ServeCommandDeps {
    return {
      env: {},
      cwd: tmp,
      isDirectory: (p) => fs.stat(p).then((s) => s.isDirectory(), () => false),
      isFile: (p) => fs.stat(p).then((s) => s.isFile(), () => false),
      readPatternFiles,
      loadConfig,
      startServer: async (config) => {
        if (startFailure) throw startFailure;
        started.push(config);
        return 'http://127.0.0.1:4321';
      },
    };
  }

  beforeEach(async () => {
    tmp = await makeTempDir();
    started = [];
    startFailure = undefined;
    await writeTree(tmp, { 'up': null, 'trash': null, 'ignore.txt': '# generated\n*.o\n' });
  });

  afterEach(async () => {
    await removeTempDir(tmp);
  });

  it('starts the server with the combined configuration', async () => {
    const result = await executeServeCommand(
      { host: '0.0.0.0', port: '9000' },
      { upload: 'up', removable: 'trash', exclude: ['*.tmp'], excludeFrom: ['ignore.txt'], directoryDownload: true },
      deps()
    );

    expect(result.kind).toBe('success');
    if (result.kind === 'success') {
      expect(result.output?.message).toBe('Listening on http://127.0.0.1:4321');
    }
    expect(started).toHaveLength(1);
    const config = started[0];
    expect(config?.server).toEqual({ host: '0.0.0.0', port: 9000 });
    expect(config?.paths.base).toBe(tmp);
    expect(config?.paths.upload).toBe(path.join(tmp, 'up'));
    expect(config?.paths.removable).toBe(path.join(tmp, 'trash'));
    expect(config?.exclude.patterns).toEqual(['*.tmp', '*.o']);
    expect(config?.archive.enabled).toBe(true);
  });

  it('disables directory downloads on request', async () => {
    await executeServeCommand({}, { directoryDownload: false }, deps());
    expect(started[0]?.archive.enabled).toBe(false);
  });

  it('rejects a non-numeric port as misuse', async () => {
    const result = await executeServeCommand({ port: 'http' }, {}, deps());

    expect(result).toMatchObject({ kind: 'failure', exitCode: { kind: 'misuse' }, output: { message: 'Invalid port: http' } });
    expect(started).toHaveLength(0);
  });

  it('rejects a missing directory', async () => {
    const result = await executeServeCommand({}, { upload: 'nope' }, deps());

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: `--upload: not a directory: ${path.join(tmp, 'nope')}` },
    });
  });

  it('rejects a missing pattern file', async () => {
    const result = await executeServeCommand({}, { excludeFrom: ['missing.txt'] }, deps());

    expect(result).toMatchObject({
      kind: 'failure',
      output: { message: `--exclude-from: not a file: ${path.join(tmp, 'missing.txt')}` },
    });
  });

  it('reports invalid configuration', async () => {
    const result = await executeServeCommand({}, { bufferSize: '1000' }, deps());

    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.exitCode).toEqual({ kind: 'misuse' });
      expect(result.output.message).toBe(
        'Invalid configuration\n\n  - bufferSize: Must be a multiple of 512 when compression is gzip'
      );
    }
  });

  it('reports a server that cannot start as a general failure', async () => {
    startFailure = new Error('listen EADDRINUSE');

    const result = await executeServeCommand({}, {}, deps());

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'failure' },
      output: { message: 'Failed to start server: listen EADDRINUSE' },
    });
  });
});
