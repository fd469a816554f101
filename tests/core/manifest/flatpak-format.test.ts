import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { toFlatpakSources } from '../../../src/core/manifest/flatpak-format.js';
import type { SourceGroup } from '../../../src/types/index.js';

const COMMIT = 'a1b2c3d4e5f6';
const REPO = 'https://github.com/acme/tools';

const GROUPS: SourceGroup[] = [
  {
    kind: 'archive',
    key: 'archive\u0000foo\u00001.0.0\u0000abc123',
    name: 'foo',
    version: '1.0.0',
    protocol: 'registry',
    indexUrl: 'https://example/index',
    url: 'https://static.example/crates/foo/foo-1.0.0.crate',
    sha256: 'abc123',
    dest: 'vendor/foo-1.0.0'
  },
  {
    kind: 'git',
    key: `git\u0000${REPO}\u0000${COMMIT}`,
    repositoryUrl: REPO,
    commit: COMMIT,
    dest: 'git-checkouts/tools-a1b2c3d',
    references: [null],
    packages: [{ name: 'alpha', version: '0.3.0', subpath: 'crates/alpha' }]
  }
];

describe('toFlatpakSources', () => {
  it('renders archives, checkouts with copy steps and the cargo config', () => {
    const sources = toFlatpakSources(GROUPS, { directives: [], contents: '[source]\n' }, { vendorDir: 'vendor' });

    assert.deepEqual(sources, [
      {
        type: 'archive',
        'archive-type': 'tar-gzip',
        url: 'https://static.example/crates/foo/foo-1.0.0.crate',
        sha256: 'abc123',
        dest: 'vendor/foo-1.0.0'
      },
      {
        type: 'inline',
        contents: '{"package":"abc123","files":{}}',
        dest: 'vendor/foo-1.0.0',
        'dest-filename': '.cargo-checksum.json'
      },
      { type: 'git', url: REPO, commit: COMMIT, dest: 'git-checkouts/tools-a1b2c3d' },
      {
        type: 'shell',
        commands: [
          'mkdir -p "vendor"',
          'cp -r --reflink=auto "git-checkouts/tools-a1b2c3d/crates/alpha" "vendor/alpha-0.3.0"'
        ]
      },
      {
        type: 'inline',
        contents: '{"package":null,"files":{}}',
        dest: 'vendor/alpha-0.3.0',
        'dest-filename': '.cargo-checksum.json'
      },
      { type: 'inline', contents: '[source]\n', dest: 'cargo', 'dest-filename': 'config' }
    ]);
  });

  it('creates the vendor directory when only git packages are vendored', () => {
    const [, checkout] = GROUPS;
    const sources = toFlatpakSources([checkout], { directives: [], contents: '' }, { vendorDir: 'third_party/vendor' });

    assert.deepEqual(sources.slice(0, 2), [
      { type: 'git', url: REPO, commit: COMMIT, dest: 'git-checkouts/tools-a1b2c3d' },
      {
        type: 'shell',
        commands: [
          'mkdir -p "third_party/vendor"',
          'cp -r --reflink=auto "git-checkouts/tools-a1b2c3d/crates/alpha" "third_party/vendor/alpha-0.3.0"'
        ]
      }
    ]);
  });

  it('downloads tarballs instead of cloning when resolved', () => {
    const [, checkout] = GROUPS;
    assert.equal(checkout.kind, 'git');
    if (checkout.kind !== 'git') return;

    const sources = toFlatpakSources(
      [{ ...checkout, tarball: { url: `https://codeload.github.com/acme/tools/tar.gz/${COMMIT}`, sha256: 'feed' } }],
      { directives: [], contents: '' },
      { vendorDir: 'vendor' }
    );
    assert.deepEqual(sources[0], {
      type: 'archive',
      'archive-type': 'tar-gzip',
      url: `https://codeload.github.com/acme/tools/tar.gz/${COMMIT}`,
      sha256: 'feed',
      dest: 'git-checkouts/tools-a1b2c3d'
    });
  });
});
