/**
 * Tests for locating packages inside a repository tree
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { locatePackages } from '../../../src/core/resolution/cargo-packages.js';

function fakeRepository(contents: Record<string, string>): {
  files: string[];
  reads: string[];
  read: (path: string) => Promise<string>;
} {
  const reads: string[] = [];
  return {
    files: Object.keys(contents),
    reads,
    read: async (path: string) => {
      reads.push(path);
      const text = contents[path];
      if (text === undefined) {
        throw new Error(`no such file: ${path}`);
      }
      return text;
    }
  };
}

const WORKSPACE = {
  'Cargo.toml': '[workspace]\nmembers = ["crates/*"]\n\n[workspace.package]\nversion = "0.3.0"\n',
  'crates/alpha/Cargo.toml': '[package]\nname = "alpha"\nversion.workspace = true\n',
  'crates/alpha/src/lib.rs': '',
  'crates/beta/Cargo.toml': '[package]\nname = "beta"\nversion = "0.3.0"\n',
  'crates/gamma/Cargo.toml': '[package]\nname = "gamma"\nversion = "0.3.0"\n',
  'README.md': ''
};

describe('locatePackages', () => {
  it('finds every workspace member', async () => {
    const repo = fakeRepository(WORKSPACE);
    const located = await locatePackages(
      repo.files,
      [
        { name: 'alpha', version: '0.3.0' },
        { name: 'beta', version: '0.3.0' },
        { name: 'gamma', version: '0.3.0' }
      ],
      repo.read
    );

    assert.deepEqual(
      [...located.entries()],
      [['alpha', 'crates/alpha'], ['beta', 'crates/beta'], ['gamma', 'crates/gamma']]
    );
  });

  it('stops reading manifests once every package is found', async () => {
    const repo = fakeRepository(WORKSPACE);
    await locatePackages(repo.files, [{ name: 'alpha', version: '0.3.0' }], repo.read);
    assert.deepEqual(repo.reads, ['Cargo.toml', 'crates/alpha/Cargo.toml']);
  });

  it('maps a root package to "."', async () => {
    const repo = fakeRepository({
      'Cargo.toml': '[package]\nname = "solo"\nversion = "1.0.0"\n',
      'examples/demo/Cargo.toml': '[package]\nname = "demo"\nversion = "0.0.0"\n'
    });
    const located = await locatePackages(repo.files, [{ name: 'solo', version: '1.0.0' }], repo.read);
    assert.equal(located.get('solo'), '.');
    assert.deepEqual(repo.reads, ['Cargo.toml']);
  });

  it('prefers the manifest whose version matches the lock', async () => {
    const repo = fakeRepository({
      'legacy/widget/Cargo.toml': '[package]\nname = "widget"\nversion = "1.0.0"\n',
      'widget/Cargo.toml': '[package]\nname = "widget"\nversion = "2.0.0"\n'
    });
    const located = await locatePackages(repo.files, [{ name: 'widget', version: '1.0.0' }], repo.read);
    assert.equal(located.get('widget'), 'legacy/widget');
  });

  it('falls back to a name match when no version matches', async () => {
    const repo = fakeRepository({
      'widget/Cargo.toml': '[package]\nname = "widget"\nversion = "2.0.0"\n'
    });
    const located = await locatePackages(repo.files, [{ name: 'widget', version: '1.0.0' }], repo.read);
    assert.equal(located.get('widget'), 'widget');
  });

  it('skips unparsable manifests', async () => {
    const repo = fakeRepository({
      'ok/Cargo.toml': '[package\nname = ',
      'nested/ok/Cargo.toml': '[package]\nname = "ok"\nversion = "1.0.0"\n'
    });
    const located = await locatePackages(repo.files, [{ name: 'ok', version: '1.0.0' }], repo.read);
    assert.equal(located.get('ok'), 'nested/ok');
    assert.deepEqual(repo.reads, ['ok/Cargo.toml', 'nested/ok/Cargo.toml']);
  });

  it('leaves packages it cannot find out of the result', async () => {
    const repo = fakeRepository(WORKSPACE);
    const located = await locatePackages(repo.files, [{ name: 'ghost', version: '1.0.0' }], repo.read);
    assert.equal(located.size, 0);
  });

  it('matches directory names with dashes or underscores first', async () => {
    const repo = fakeRepository({
      'a/Cargo.toml': '[package]\nname = "unrelated"\nversion = "1.0.0"\n',
      'crates/my-crate/Cargo.toml': '[package]\nname = "my_crate"\nversion = "1.0.0"\n'
    });
    await locatePackages(repo.files, [{ name: 'my_crate', version: '1.0.0' }], repo.read);
    assert.deepEqual(repo.reads, ['crates/my-crate/Cargo.toml']);
  });
});
