import type { HttpClient } from '../../../utils/http.js';
import { logger } from '../../../utils/logger.js';
import { encodePath, ownerAndRepo, readTreeEntries, type GitHostProvider } from './types.js';

/**
 * github.com through the REST trees API and raw.githubusercontent.com.
 */
export class GitHubProvider implements GitHostProvider {
  readonly name = 'github';

  constructor(
    private readonly http: HttpClient,
    private readonly token?: string
  ) {}

  matches(repositoryUrl: URL): boolean {
    return repositoryUrl.hostname === 'github.com' && ownerAndRepo(repositoryUrl) !== null;
  }

  private headers(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  private coordinates(repositoryUrl: URL): { owner: string; repo: string } {
    const coords = ownerAndRepo(repositoryUrl);
    if (!coords) {
      throw new TypeError(`not a GitHub repository URL: ${repositoryUrl.href}`);
    }
    return coords;
  }

  async listFiles(repositoryUrl: URL, commit: string): Promise<string[]> {
    const { owner, repo } = this.coordinates(repositoryUrl);
    const url = `https://api.github.com/repos/${owner}/${repo}/git/trees/${commit}?recursive=1`;
    const { body } = await this.http.getJson(url, {
      ...this.headers(),
      Accept: 'application/vnd.github+json'
    });

    if (typeof body !== 'object' || body === null || !('tree' in body)) {
      throw new TypeError(`unexpected tree response from ${url}`);
    }
    if ('truncated' in body && body.truncated === true) {
      logger.warn(`GitHub truncated the tree listing of ${owner}/${repo}@${commit}; some packages may not be found`);
    }

    return readTreeEntries(body.tree)
      .filter(entry => entry.type === 'blob')
      .map(entry => entry.path);
  }

  async readFile(repositoryUrl: URL, commit: string, path: string): Promise<string> {
    const { owner, repo } = this.coordinates(repositoryUrl);
    return this.http.getText(
      `https://raw.githubusercontent.com/${owner}/${repo}/${commit}/${encodePath(path)}`,
      this.headers()
    );
  }

  tarballUrl(repositoryUrl: URL, commit: string): string {
    const { owner, repo } = this.coordinates(repositoryUrl);
    return `https://codeload.github.com/${owner}/${repo}/tar.gz/${commit}`;
  }
}
