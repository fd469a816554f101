import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Command } from 'commander';

import { generateCommand, setupGenerateCommand, toGenerateOptions } from '../../src/commands/generate.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

const LOCK = [
  'version = 3',
  '',
  '[[package]]',
  'name = "foo"',
  'version = "1.0.0"',
  'source = "registry+https://example/index"',
  'checksum = "abc123"',
  ''
].join('\n');

describe('toGenerateOptions', () => {
  it('maps command-line flags to generator options', () => {
    assert.deepEqual(
      toGenerateOptions('Cargo.lock', {
        output: 'out.json',
        gitDir: 'checkouts',
        format: 'flatpak',
        timeout: 500,
        debug: true
      }),
      {
        lockfilePath: 'Cargo.lock',
        outputPath: 'out.json',
        vendorConfigPath: undefined,
        configPath: undefined,
        vendorDir: undefined,
        gitCheckoutDir: 'checkouts',
        format: 'flatpak',
        gitTarballs: undefined,
        concurrency: undefined,
        retries: undefined,
        timeoutMs: 500,
        debug: true
      }
    );
  });

  it('rejects an unknown format', () => {
    assert.throws(() => toGenerateOptions('Cargo.lock', { format: 'xml' }), { name: 'ConfigError' });
  });
});

describe('generate command', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('command');
    await writeFile(path.join(dir, 'Cargo.lock'), LOCK);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('generates through the programmatic entry point', async () => {
    const result = await generateCommand({ lockfilePath: 'Cargo.lock' }, { cwd: dir });
    assert.equal(result.success, true);
    assert.equal(result.data?.sourceCount, 1);
  });

  it('wires the command-line flags', async () => {
    const program = new Command().exitOverride();
    setupGenerateCommand(program);
    const output = path.join(dir, 'flatpak.json');

    await program.parseAsync(
      [path.join(dir, 'Cargo.lock'), '-o', output, '--format', 'flatpak', '--vendor-dir', 'deps', '--concurrency', '2'],
      { from: 'user' }
    );

    const sources: unknown = JSON.parse(await readFile(output, 'utf8'));
    assert.ok(Array.isArray(sources));
    assert.deepEqual(sources[0], {
      type: 'archive',
      'archive-type': 'tar-gzip',
      url: 'https://static.example/crates/foo/foo-1.0.0.crate',
      sha256: 'abc123',
      dest: 'deps/foo-1.0.0'
    });
  });
});
