/**
 * Parsing of Cargo git source descriptors.
 *
 * Supported formats:
 * - git+https://host/owner/repo#<commit>
 * - git+https://host/owner/repo?branch=<name>#<commit>
 * - git+https://host/owner/repo?tag=<name>#<commit>
 * - git+https://host/owner/repo?rev=<rev>#<commit>
 */

import type { GitReference, GitReferenceKind } from '../../types/index.js';
import { COMMIT_SHORT_LENGTH, SOURCE_PREFIXES } from '../../constants/index.js';
import { ParseError } from '../../utils/errors.js';

export interface GitDescriptor {
  repositoryUrl: string;
  commit: string;
  reference?: GitReference;
}

const COMMIT_PATTERN = /^[0-9a-f]{7,64}$/i;

// Cargo checks rev before tag before branch
const REFERENCE_KINDS: GitReferenceKind[] = ['rev', 'tag', 'branch'];

/**
 * Canonical form of a repository URL, so that spellings cargo treats as the
 * same repository share one checkout: no query or fragment, no trailing
 * slash, no `.git` suffix, and lower-cased paths on github.com (which is
 * case-insensitive).
 */
export function canonicalGitUrl(input: string): string {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new ParseError(`invalid repository URL '${input}'`, { url: input });
  }

  let path = url.pathname;
  while (path.endsWith('/')) {
    path = path.slice(0, -1);
  }
  if (path.endsWith('.git')) {
    path = path.slice(0, -4);
  }

  let protocol = url.protocol;
  if (url.hostname === 'github.com') {
    protocol = 'https:';
    path = path.toLowerCase();
  }

  const auth = url.username ? `${url.username}@` : '';
  return `${protocol}//${auth}${url.host}${path}`;
}

/**
 * Parse a `git+` source descriptor from a lockfile.
 */
export function parseGitDescriptor(descriptor: string): GitDescriptor {
  if (!descriptor.startsWith(SOURCE_PREFIXES.GIT)) {
    throw new ParseError(`'${descriptor}' is not a git source`, { source: descriptor });
  }

  const raw = descriptor.slice(SOURCE_PREFIXES.GIT.length);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ParseError(`invalid git source '${descriptor}'`, { source: descriptor });
  }

  const commit = decodeURIComponent(url.hash.slice(1));
  if (!commit) {
    throw new ParseError(`git source '${descriptor}' does not pin a commit`, { source: descriptor });
  }
  if (!COMMIT_PATTERN.test(commit)) {
    throw new ParseError(`git source '${descriptor}' has invalid commit '${commit}'`, { source: descriptor });
  }

  let reference: GitReference | undefined;
  for (const kind of REFERENCE_KINDS) {
    const value = url.searchParams.get(kind);
    if (value) {
      reference = { kind, value };
      break;
    }
  }

  return {
    repositoryUrl: canonicalGitUrl(raw),
    commit: commit.toLowerCase(),
    ...(reference ? { reference } : {})
  };
}

/**
 * Last path segment of a canonical repository URL.
 */
export function repositoryName(repositoryUrl: string): string {
  const segments = new URL(repositoryUrl).pathname.split('/').filter(s => s.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : 'repository';
}

/**
 * Directory name of a checkout: `<repo>-<short commit>`.
 */
export function checkoutDirName(repositoryUrl: string, commit: string): string {
  return `${repositoryName(repositoryUrl)}-${commit.slice(0, COMMIT_SHORT_LENGTH)}`;
}

/**
 * Cargo `[source]` key for one spelling of a git source.
 */
export function gitSourceKey(repositoryUrl: string, reference?: GitReference | null): string {
  return reference ? `${repositoryUrl}?${reference.kind}=${reference.value}` : repositoryUrl;
}
