import type { GitReference } from './sources.js';

export interface ManifestPackageEntry {
  name: string;
  subpath: string;
}

export interface ArchiveManifestEntry {
  type: 'archive';
  url: string;
  sha256: string;
  dest: string;
  /** Present only for git checkouts fetched as tarballs */
  packages?: ManifestPackageEntry[];
}

export interface GitManifestEntry {
  type: 'git';
  url: string;
  commit: string;
  dest: string;
  packages: ManifestPackageEntry[];
}

export type ManifestEntry = ArchiveManifestEntry | GitManifestEntry;

export interface ManifestDocument {
  sources: ManifestEntry[];
  vendorConfig: string;
}

/**
 * Copy instruction for a git-hosted package: the build copies `from` (inside
 * the checkout) to `to` (inside the vendor directory).
 */
export interface SubdirectoryHint {
  name: string;
  from: string;
  to: string;
}

export type VendorDirective =
  | { kind: 'vendored-directory'; name: string; directory: string }
  | { kind: 'registry'; name: string; registry?: string }
  | {
      kind: 'git';
      name: string;
      git: string;
      reference?: GitReference;
      checkout: string;
      hints: SubdirectoryHint[];
    };

export interface VendorConfig {
  directives: VendorDirective[];
  /** Cargo configuration text */
  contents: string;
}

// flatpak-builder source list entries
export type FlatpakSource =
  | { type: 'archive'; 'archive-type': 'tar-gzip'; url: string; sha256: string; dest: string }
  | { type: 'git'; url: string; commit: string; dest: string }
  | { type: 'inline'; contents: string; dest: string; 'dest-filename': string }
  | { type: 'shell'; commands: string[] };
