import type { PackageRecord } from './lockfile.js';

/**
 * How a registry index is reached. Cargo writes `registry+` for git-protocol
 * indexes and `sparse+` for HTTP indexes.
 */
export type RegistryProtocol = 'registry' | 'sparse';

export interface RegistrySource {
  kind: 'registry';
  protocol: RegistryProtocol;
  indexUrl: string;
  url: string;
  sha256: string;
  dest: string;
}

export type GitReferenceKind = 'branch' | 'tag' | 'rev';

export interface GitReference {
  kind: GitReferenceKind;
  value: string;
}

export interface GitSource {
  kind: 'git';
  repositoryUrl: string;
  commit: string;
  reference?: GitReference;
  /** Filled in by the metadata resolver */
  subpath?: string;
  dest: string;
}

export interface LocalSource {
  kind: 'local';
  path?: string;
}

export type SourceKind = RegistrySource | GitSource | LocalSource;

export interface ClassifiedPackage {
  record: PackageRecord;
  source: SourceKind;
}

/**
 * A git checkout that still needs its package subdirectories located.
 */
export interface GitResolutionRequest {
  key: string;
  repositoryUrl: string;
  commit: string;
  packages: Array<{ name: string; version: string }>;
}

export interface GitResolution {
  /** package name -> path inside the checkout ('.' for the repository root) */
  subpaths: Map<string, string>;
  tarball?: { url: string; sha256: string };
}

export interface ArchiveGroup {
  kind: 'archive';
  key: string;
  name: string;
  version: string;
  protocol: RegistryProtocol;
  indexUrl: string;
  url: string;
  sha256: string;
  dest: string;
}

export interface GitPackageMapping {
  name: string;
  version: string;
  subpath: string;
}

export interface CheckoutGroup {
  kind: 'git';
  key: string;
  repositoryUrl: string;
  commit: string;
  dest: string;
  /** Distinct ways the lock spells this checkout, sorted */
  references: Array<GitReference | null>;
  packages: GitPackageMapping[];
  tarball?: { url: string; sha256: string };
}

export type SourceGroup = ArchiveGroup | CheckoutGroup;
