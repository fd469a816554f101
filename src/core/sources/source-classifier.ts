import { posix } from 'path';

import type {
  ClassifiedPackage,
  PackageRecord,
  RegistryProtocol,
  SourceKind
} from '../../types/index.js';
import { SOURCE_PREFIXES } from '../../constants/index.js';
import { MissingChecksumError, UnsupportedSourceKindError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { checkoutDirName, parseGitDescriptor } from './git-source-url.js';
import { crateDownloadUrl, registryDownloadBase } from './registry-url.js';

export interface ClassifyOptions {
  vendorDir: string;
  gitCheckoutDir: string;
  registries?: Record<string, string>;
}

/**
 * Vendor directory of one package: `<vendorDir>/<name>-<version>`.
 */
export function vendorPath(vendorDir: string, name: string, version: string): string {
  return posix.join(vendorDir, `${name}-${version}`);
}

function registryProtocol(source: string): RegistryProtocol | null {
  if (source.startsWith(SOURCE_PREFIXES.REGISTRY)) return 'registry';
  if (source.startsWith(SOURCE_PREFIXES.SPARSE)) return 'sparse';
  return null;
}

/**
 * Decide where a locked package comes from and derive its download and
 * vendor locations.
 */
export function classifySource(record: PackageRecord, options: ClassifyOptions): SourceKind {
  const { source } = record;

  if (source === undefined || source.length === 0) {
    return { kind: 'local' };
  }
  if (source.startsWith(SOURCE_PREFIXES.PATH)) {
    return { kind: 'local', path: source.slice(SOURCE_PREFIXES.PATH.length) };
  }

  const protocol = registryProtocol(source);
  if (protocol) {
    const indexUrl = source.slice(`${protocol}+`.length);
    if (!record.checksum) {
      throw new MissingChecksumError(record.name, record.version, source);
    }
    const base = registryDownloadBase(indexUrl, options.registries);
    return {
      kind: 'registry',
      protocol,
      indexUrl,
      url: crateDownloadUrl(base, record.name, record.version, record.checksum),
      sha256: record.checksum,
      dest: vendorPath(options.vendorDir, record.name, record.version)
    };
  }

  if (source.startsWith(SOURCE_PREFIXES.GIT)) {
    const descriptor = parseGitDescriptor(source);
    return {
      kind: 'git',
      ...descriptor,
      dest: posix.join(options.gitCheckoutDir, checkoutDirName(descriptor.repositoryUrl, descriptor.commit))
    };
  }

  throw new UnsupportedSourceKindError(record.name, record.version, source);
}

/**
 * Classify every record, failing on the first one that cannot be vendored.
 * Local packages stay in the result so callers can report them.
 */
export function classifyPackages(records: readonly PackageRecord[], options: ClassifyOptions): ClassifiedPackage[] {
  const classified = records.map(record => ({ record, source: classifySource(record, options) }));

  const counts = { registry: 0, git: 0, local: 0 };
  for (const { source } of classified) {
    counts[source.kind]++;
  }
  logger.debug('Classified lockfile sources', counts);

  return classified;
}
