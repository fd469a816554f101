import type {
  ArchiveGroup,
  CheckoutGroup,
  ClassifiedPackage,
  GitReference,
  GitResolution,
  SourceGroup
} from '../../types/index.js';
import { SourceResolutionError, VendorPathConflictError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { vendorPath } from '../sources/source-classifier.js';
import { archiveGroupKey, checkoutGroupKey, compareKeys } from './group-keys.js';

export interface GroupOptions {
  vendorDir: string;
}

function referenceId(reference: GitReference | null): string {
  return reference ? `${reference.kind}=${reference.value}` : '';
}

/**
 * Merge classified packages into disjoint source groups, sorted by group key.
 *
 * Identical archives collapse into one entry. Every package served by the
 * same (repository, commit) joins one checkout group, whatever branch, tag
 * or rev the lock used to reach that commit. Local packages are dropped.
 */
export function groupSources(
  classified: readonly ClassifiedPackage[],
  resolutions: ReadonlyMap<string, GitResolution>,
  options: GroupOptions
): SourceGroup[] {
  const archives = new Map<string, ArchiveGroup>();
  const checkouts = new Map<string, CheckoutGroup>();
  let localCount = 0;

  for (const { record, source } of classified) {
    switch (source.kind) {
      case 'local':
        localCount++;
        break;

      case 'registry': {
        const key = archiveGroupKey(record.name, record.version, source.sha256);
        if (!archives.has(key)) {
          archives.set(key, {
            kind: 'archive',
            key,
            name: record.name,
            version: record.version,
            protocol: source.protocol,
            indexUrl: source.indexUrl,
            url: source.url,
            sha256: source.sha256,
            dest: source.dest
          });
        }
        break;
      }

      case 'git': {
        const key = checkoutGroupKey(source.repositoryUrl, source.commit);
        const resolution = resolutions.get(key);
        const subpath = source.subpath ?? resolution?.subpaths.get(record.name);
        if (subpath === undefined) {
          throw new SourceResolutionError(
            source.repositoryUrl,
            source.commit,
            `no subdirectory resolved for package '${record.name}'`
          );
        }

        let group = checkouts.get(key);
        if (!group) {
          group = {
            kind: 'git',
            key,
            repositoryUrl: source.repositoryUrl,
            commit: source.commit,
            dest: source.dest,
            references: [],
            packages: [],
            ...(resolution?.tarball ? { tarball: resolution.tarball } : {})
          };
          checkouts.set(key, group);
        }

        const reference = source.reference ?? null;
        if (!group.references.some(existing => referenceId(existing) === referenceId(reference))) {
          group.references.push(reference);
        }
        if (!group.packages.some(pkg => pkg.name === record.name && pkg.version === record.version)) {
          group.packages.push({ name: record.name, version: record.version, subpath });
        }
        break;
      }

      default: {
        const unreachable: never = source;
        throw new TypeError(`Unhandled source kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  for (const group of checkouts.values()) {
    group.references.sort((a, b) => compareKeys(referenceId(a), referenceId(b)));
    group.packages.sort((a, b) => compareKeys(a.name, b.name) || compareKeys(a.version, b.version));
  }

  const groups: SourceGroup[] = [...archives.values(), ...checkouts.values()]
    .sort((a, b) => compareKeys(a.key, b.key));

  assertDisjointVendorPaths(groups, options.vendorDir);

  logger.debug('Grouped sources', {
    archives: archives.size,
    checkouts: checkouts.size,
    localSkipped: localCount
  });
  return groups;
}

/**
 * Two groups may not write into the same vendor directory (the same
 * name-version from two registries, or from a registry and a git checkout).
 */
function assertDisjointVendorPaths(groups: readonly SourceGroup[], vendorDir: string): void {
  const owners = new Map<string, string>();
  const claim = (dest: string, owner: string): void => {
    const existing = owners.get(dest);
    if (existing !== undefined) {
      throw new VendorPathConflictError(dest, existing, owner);
    }
    owners.set(dest, owner);
  };

  for (const group of groups) {
    if (group.kind === 'archive') {
      claim(group.dest, `${group.name}@${group.version} from ${group.indexUrl}`);
    } else {
      claim(group.dest, `${group.repositoryUrl}#${group.commit}`);
      for (const pkg of group.packages) {
        claim(vendorPath(vendorDir, pkg.name, pkg.version), `${pkg.name}@${pkg.version} from ${group.repositoryUrl}#${group.commit}`);
      }
    }
  }
}
