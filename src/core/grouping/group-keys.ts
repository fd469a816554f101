/**
 * Source group identities. Keys are tuples joined with NUL so that plain
 * code-unit comparison of the strings orders them as tuples.
 */

const SEPARATOR = '\u0000';

export function archiveGroupKey(name: string, version: string, sha256: string): string {
  return ['archive', name, version, sha256].join(SEPARATOR);
}

export function checkoutGroupKey(repositoryUrl: string, commit: string): string {
  return ['git', repositoryUrl, commit].join(SEPARATOR);
}

/**
 * Locale-independent ordering for keys, names and paths.
 */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
