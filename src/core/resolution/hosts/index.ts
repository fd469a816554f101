import type { HttpClient } from '../../../utils/http.js';
import { GitHubProvider } from './github.js';
import { GitLabProvider } from './gitlab.js';
import { GiteaProvider } from './gitea.js';
import type { GitHostProvider } from './types.js';

export type { GitHostProvider } from './types.js';
export { GitHubProvider, GitLabProvider, GiteaProvider };

/**
 * Default providers, authenticated from GITHUB_TOKEN, GITLAB_TOKEN and
 * GITEA_TOKEN when they are set.
 */
export function createHostProviders(
  http: HttpClient,
  env: Record<string, string | undefined> = process.env
): GitHostProvider[] {
  return [
    new GitHubProvider(http, env.GITHUB_TOKEN || undefined),
    new GitLabProvider(http, env.GITLAB_TOKEN || undefined),
    new GiteaProvider(http, env.GITEA_TOKEN || undefined)
  ];
}

export function selectHostProvider(
  repositoryUrl: URL,
  providers: readonly GitHostProvider[]
): GitHostProvider | null {
  return providers.find(provider => provider.matches(repositoryUrl)) ?? null;
}
