import { posix } from 'path';
import { minimatch } from 'minimatch';

import { FILE_PATTERNS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { getString, isTomlTable, parseToml, type TomlTable } from '../../utils/toml.js';

export interface WantedPackage {
  name: string;
  version: string;
}

interface ManifestInfo {
  name: string;
  version?: string;
}

interface WorkspaceInfo {
  members: string[];
  exclude: string[];
  packageVersion?: string;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function readWorkspace(manifest: TomlTable): WorkspaceInfo | null {
  const workspace = manifest.workspace;
  if (!isTomlTable(workspace)) {
    return null;
  }
  const shared = workspace.package;
  return {
    members: stringList(workspace.members).map(normalizeMember),
    exclude: stringList(workspace.exclude).map(normalizeMember),
    packageVersion: isTomlTable(shared) ? getString(shared, 'version') : undefined
  };
}

function normalizeMember(member: string): string {
  return posix.normalize(member).replace(/\/+$/, '');
}

/**
 * Name and version declared by a Cargo.toml, resolving `version.workspace = true`
 * against the root workspace.
 */
function readManifestInfo(manifest: TomlTable, workspace: WorkspaceInfo | null): ManifestInfo | null {
  const pkg = manifest.package;
  if (!isTomlTable(pkg)) {
    return null;
  }
  const name = getString(pkg, 'name');
  if (!name) {
    return null;
  }
  const version = getString(pkg, 'version')
    ?? (isTomlTable(pkg.version) && pkg.version.workspace === true ? workspace?.packageVersion : undefined);
  return { name, version };
}

function isWorkspaceMember(dir: string, workspace: WorkspaceInfo | null): boolean {
  if (!workspace) return false;
  if (workspace.exclude.some(pattern => dir === pattern || minimatch(dir, pattern))) return false;
  return workspace.members.some(pattern => dir === pattern || minimatch(dir, pattern));
}

function nameVariants(name: string): string[] {
  return [name, name.replace(/_/g, '-'), name.replace(/-/g, '_')];
}

/**
 * Order candidate directories so the manifests most likely to declare a
 * wanted package are read first: directories named after a wanted package,
 * then workspace members, then everything else; shallow before deep.
 */
function rankCandidates(dirs: string[], wanted: WantedPackage[], workspace: WorkspaceInfo | null): string[] {
  const wantedNames = new Set(wanted.flatMap(pkg => nameVariants(pkg.name)));
  const rank = (dir: string): number => {
    if (wantedNames.has(posix.basename(dir))) return 0;
    if (isWorkspaceMember(dir, workspace)) return 1;
    return 2;
  };
  const depth = (dir: string): number => dir.split('/').length;

  return [...dirs].sort((a, b) =>
    rank(a) - rank(b) || depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0)
  );
}

/**
 * Find the directory of each wanted package inside a repository, reading as
 * few manifests as possible. Cargo picks git dependencies from any Cargo.toml
 * in the tree, so every manifest is a candidate. When several declare the
 * same name, the one matching the locked version wins.
 *
 * @param files - every file path in the repository tree
 * @param readManifest - fetches one file by path
 * @returns package name -> subpath ('.' for the repository root); names that
 *          could not be found are absent
 */
export async function locatePackages(
  files: readonly string[],
  wanted: readonly WantedPackage[],
  readManifest: (path: string) => Promise<string>
): Promise<Map<string, string>> {
  const manifestDirs = files
    .filter(file => posix.basename(file) === FILE_PATTERNS.CARGO_TOML)
    .map(file => posix.dirname(file));

  const exact = new Map<string, string>();
  const fallback = new Map<string, string>();
  const versions = new Map(wanted.map((pkg): [string, string] => [pkg.name, pkg.version]));
  const pending = new Set(versions.keys());

  const parse = async (dir: string): Promise<TomlTable | null> => {
    const path = dir === '.' ? FILE_PATTERNS.CARGO_TOML : `${dir}/${FILE_PATTERNS.CARGO_TOML}`;
    const text = await readManifest(path);
    try {
      return parseToml(text);
    } catch (error) {
      logger.warn(`Skipping unparsable manifest ${path}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  };

  const record = (dir: string, info: ManifestInfo | null): void => {
    const lockedVersion = info ? versions.get(info.name) : undefined;
    if (!info || lockedVersion === undefined || exact.has(info.name)) {
      return;
    }
    if (info.version === lockedVersion) {
      exact.set(info.name, dir);
      pending.delete(info.name);
    } else if (!fallback.has(info.name)) {
      fallback.set(info.name, dir);
    }
  };

  let workspace: WorkspaceInfo | null = null;
  if (manifestDirs.includes('.')) {
    const root = await parse('.');
    if (root) {
      workspace = readWorkspace(root);
      record('.', readManifestInfo(root, workspace));
    }
  }

  for (const dir of rankCandidates(manifestDirs.filter(dir => dir !== '.'), [...wanted], workspace)) {
    if (pending.size === 0) break;
    const manifest = await parse(dir);
    if (manifest) {
      record(dir, readManifestInfo(manifest, workspace));
    }
  }

  const located = new Map<string, string>();
  for (const pkg of wanted) {
    const dir = exact.get(pkg.name) ?? fallback.get(pkg.name);
    if (dir !== undefined) {
      if (!exact.has(pkg.name)) {
        logger.warn(`Package '${pkg.name}' found at '${dir}' but its version differs from the locked ${pkg.version}`);
      }
      located.set(pkg.name, dir);
    }
  }
  return located;
}
