/**
 * Read-only access to a hosted git repository at a fixed commit, through the
 * host's HTTPS metadata endpoints. No clone is ever made.
 */
export interface GitHostProvider {
  readonly name: string;

  /** Whether this provider serves the given canonical repository URL */
  matches(repositoryUrl: URL): boolean;

  /** Every file path (blobs only, `/`-separated) in the tree at `commit` */
  listFiles(repositoryUrl: URL, commit: string): Promise<string[]>;

  /** Contents of one file at `commit` */
  readFile(repositoryUrl: URL, commit: string, path: string): Promise<string>;

  /** Download URL of a gzip tarball of the tree at `commit` */
  tarballUrl(repositoryUrl: URL, commit: string): string;
}

export interface TreeEntry {
  path: string;
  type: string;
}

/**
 * Pick the `path`/`type` pairs out of a JSON tree listing.
 */
export function readTreeEntries(value: unknown): TreeEntry[] {
  if (!Array.isArray(value)) {
    throw new TypeError('tree listing is not an array');
  }
  const items: unknown[] = value;
  const entries: TreeEntry[] = [];
  for (const item of items) {
    if (typeof item !== 'object' || item === null) continue;
    const path: unknown = 'path' in item ? item.path : undefined;
    const type: unknown = 'type' in item ? item.type : undefined;
    if (typeof path === 'string' && typeof type === 'string') {
      entries.push({ path, type });
    }
  }
  return entries;
}

export function encodePath(path: string): string {
  return path.split('/').map(segment => encodeURIComponent(segment)).join('/');
}

/**
 * Owner and repository name from a two-segment repository path.
 */
export function ownerAndRepo(url: URL): { owner: string; repo: string } | null {
  const segments = url.pathname.split('/').filter(s => s.length > 0);
  if (segments.length !== 2) {
    return null;
  }
  return { owner: segments[0], repo: segments[1] };
}
