import type {
  ClassifiedPackage,
  GitResolution,
  GitResolutionRequest
} from '../../types/index.js';
import { LockvendorError } from '../../types/index.js';
import {
  CancelledError,
  HttpStatusError,
  SourceResolutionError,
  TransientNetworkError
} from '../../utils/errors.js';
import type { HttpClient } from '../../utils/http.js';
import { logger } from '../../utils/logger.js';
import { checkoutGroupKey, compareKeys } from '../grouping/group-keys.js';
import { locatePackages } from './cargo-packages.js';
import { selectHostProvider, type GitHostProvider } from './hosts/index.js';
import { ResolutionCache } from './resolution-cache.js';
import { runPool } from './worker-pool.js';

export interface MetadataResolverOptions {
  concurrency: number;
  providers: readonly GitHostProvider[];
  /** Used to hash tarballs when `gitTarballs` is set */
  http?: HttpClient;
  gitTarballs?: boolean;
  signal?: AbortSignal;
  /** Aborted on the first failure so lookups still in flight stop retrying */
  lookups?: AbortController;
  cache?: ResolutionCache<GitResolution>;
}

/**
 * One request per distinct (repository, commit) pair, listing every package
 * the lock expects to find in that checkout.
 */
export function collectGitRequests(classified: readonly ClassifiedPackage[]): GitResolutionRequest[] {
  const requests = new Map<string, GitResolutionRequest>();

  for (const { record, source } of classified) {
    if (source.kind !== 'git') continue;
    const key = checkoutGroupKey(source.repositoryUrl, source.commit);
    let request = requests.get(key);
    if (!request) {
      request = { key, repositoryUrl: source.repositoryUrl, commit: source.commit, packages: [] };
      requests.set(key, request);
    }
    if (!request.packages.some(pkg => pkg.name === record.name)) {
      request.packages.push({ name: record.name, version: record.version });
    }
  }

  return [...requests.values()].sort((a, b) => compareKeys(a.key, b.key));
}

function describeFailure(error: unknown): { reason: string; status?: number } {
  if (error instanceof HttpStatusError) {
    return error.status === 404
      ? { reason: `repository or revision not found (${error.message})`, status: 404 }
      : { reason: error.message, status: error.status };
  }
  if (error instanceof TransientNetworkError) {
    return { reason: `network lookup failed: ${error.message}`, status: error.status };
  }
  return { reason: `unexpected response: ${error instanceof Error ? error.message : String(error)}` };
}

async function resolveRequest(
  request: GitResolutionRequest,
  options: MetadataResolverOptions
): Promise<GitResolution> {
  const { repositoryUrl, commit } = request;
  const url = new URL(repositoryUrl);
  const provider = selectHostProvider(url, options.providers);
  if (!provider) {
    throw new SourceResolutionError(repositoryUrl, commit, `no metadata provider for host '${url.hostname}'`);
  }

  logger.debug(`Resolving ${request.packages.length} package(s) in ${repositoryUrl}#${commit} via ${provider.name}`);

  try {
    const files = await provider.listFiles(url, commit);
    const subpaths = await locatePackages(files, request.packages, path => provider.readFile(url, commit, path));

    const missing = request.packages.filter(pkg => !subpaths.has(pkg.name)).map(pkg => pkg.name);
    if (missing.length > 0) {
      throw new SourceResolutionError(
        repositoryUrl,
        commit,
        `package(s) not found in repository: ${missing.join(', ')}`,
        { missing }
      );
    }

    const resolution: GitResolution = { subpaths };
    if (options.gitTarballs) {
      if (!options.http) {
        throw new TypeError('gitTarballs requires an HTTP client');
      }
      const tarballUrl = provider.tarballUrl(url, commit);
      resolution.tarball = { url: tarballUrl, sha256: await options.http.getSha256(tarballUrl) };
    }
    return resolution;
  } catch (error) {
    if (error instanceof LockvendorError) {
      throw error;
    }
    const { reason, status } = describeFailure(error);
    throw new SourceResolutionError(repositoryUrl, commit, reason, status !== undefined ? { status } : undefined);
  }
}

/**
 * Resolve every git group with a bounded worker pool. The returned map is
 * keyed by group key, so callers never depend on completion order. The first
 * failure aborts the run.
 */
export async function resolveGitGroups(
  requests: readonly GitResolutionRequest[],
  options: MetadataResolverOptions
): Promise<Map<string, GitResolution>> {
  const cache = options.cache ?? new ResolutionCache<GitResolution>();
  if (options.signal?.aborted) {
    throw new CancelledError();
  }

  const resolved = await runPool(
    requests,
    options.concurrency,
    async request => {
      try {
        return await cache.claim(request.key, () => resolveRequest(request, options));
      } catch (error) {
        options.lookups?.abort();
        throw error;
      }
    },
    options.signal
  );

  const results = new Map<string, GitResolution>();
  requests.forEach((request, index) => results.set(request.key, resolved[index]));
  logger.debug(`Resolved ${results.size} git checkout(s) with ${cache.lookupCount} lookup(s)`);
  return results;
}
