import type {
  ManifestDocument,
  ManifestEntry,
  ManifestPackageEntry,
  SourceGroup,
  VendorConfig
} from '../../types/index.js';
import { writeTextFilesAtomic } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Map sorted source groups to manifest entries, keeping their order.
 */
export function toManifestEntries(groups: readonly SourceGroup[]): ManifestEntry[] {
  return groups.map((group): ManifestEntry => {
    if (group.kind === 'archive') {
      return { type: 'archive', url: group.url, sha256: group.sha256, dest: group.dest };
    }

    const packages: ManifestPackageEntry[] = group.packages.map(pkg => ({ name: pkg.name, subpath: pkg.subpath }));
    if (group.tarball) {
      return { type: 'archive', url: group.tarball.url, sha256: group.tarball.sha256, dest: group.dest, packages };
    }
    return { type: 'git', url: group.repositoryUrl, commit: group.commit, dest: group.dest, packages };
  });
}

export function buildManifest(groups: readonly SourceGroup[], vendorConfig: VendorConfig): ManifestDocument {
  return {
    sources: toManifestEntries(groups),
    vendorConfig: vendorConfig.contents
  };
}

/**
 * Serialize a document as 2-space indented JSON with a trailing newline.
 * Identical input always yields identical bytes.
 */
export function serializeDocument(document: unknown): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Write every output file atomically. All contents are rendered before this
 * is called, and no output is moved into place until all of them are staged.
 */
export async function writeOutputs(outputs: ReadonlyArray<{ path: string; content: string }>): Promise<void> {
  await writeTextFilesAtomic(outputs);
  for (const output of outputs) {
    logger.info(`Wrote ${output.path}`);
  }
}
