import type { FlatpakSource, SourceGroup, VendorConfig } from '../../types/index.js';
import { DEFAULT_PATHS, FILE_PATTERNS } from '../../constants/index.js';
import { subdirectoryHints } from '../vendor/vendor-config.js';

export interface FlatpakFormatOptions {
  vendorDir: string;
}

function checksumFile(dest: string, packageChecksum: string | null): FlatpakSource {
  return {
    type: 'inline',
    contents: JSON.stringify({ package: packageChecksum, files: {} }),
    dest,
    'dest-filename': FILE_PATTERNS.CARGO_CHECKSUM_JSON
  };
}

/**
 * Render source groups as a flatpak-builder source list: each crate archive
 * with the `.cargo-checksum.json` cargo expects beside it, each checkout
 * followed by the commands that create the vendor directory and copy its
 * packages into it, and the cargo configuration as a final inline file.
 */
export function toFlatpakSources(
  groups: readonly SourceGroup[],
  vendorConfig: VendorConfig,
  options: FlatpakFormatOptions
): FlatpakSource[] {
  const sources: FlatpakSource[] = [];

  for (const group of groups) {
    if (group.kind === 'archive') {
      sources.push(
        { type: 'archive', 'archive-type': 'tar-gzip', url: group.url, sha256: group.sha256, dest: group.dest },
        checksumFile(group.dest, group.sha256)
      );
      continue;
    }

    sources.push(
      group.tarball
        ? { type: 'archive', 'archive-type': 'tar-gzip', url: group.tarball.url, sha256: group.tarball.sha256, dest: group.dest }
        : { type: 'git', url: group.repositoryUrl, commit: group.commit, dest: group.dest }
    );
    for (const hint of subdirectoryHints(group, options.vendorDir)) {
      sources.push(
        {
          type: 'shell',
          commands: [`mkdir -p "${options.vendorDir}"`, `cp -r --reflink=auto "${hint.from}" "${hint.to}"`]
        },
        // Git packages carry no crate checksum
        checksumFile(hint.to, null)
      );
    }
  }

  sources.push({
    type: 'inline',
    contents: vendorConfig.contents,
    dest: DEFAULT_PATHS.CARGO_HOME,
    'dest-filename': DEFAULT_PATHS.CARGO_CONFIG_FILENAME
  });
  return sources;
}
