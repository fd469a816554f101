import type { HttpClient } from '../../../utils/http.js';
import { encodePath, ownerAndRepo, readTreeEntries, type GitHostProvider } from './types.js';

const KNOWN_HOSTS = new Set(['codeberg.org', 'gitea.com']);
const PAGE_SIZE = 1000;

/**
 * Gitea and Forgejo instances (Codeberg included).
 */
export class GiteaProvider implements GitHostProvider {
  readonly name = 'gitea';

  constructor(
    private readonly http: HttpClient,
    private readonly token?: string
  ) {}

  matches(repositoryUrl: URL): boolean {
    const host = repositoryUrl.hostname;
    const firstLabel = host.split('.')[0];
    const known = KNOWN_HOSTS.has(host) || firstLabel === 'gitea' || firstLabel === 'forgejo';
    return known && ownerAndRepo(repositoryUrl) !== null;
  }

  private headers(): Record<string, string> {
    return this.token ? { Authorization: `token ${this.token}` } : {};
  }

  private coordinates(repositoryUrl: URL): { owner: string; repo: string } {
    const coords = ownerAndRepo(repositoryUrl);
    if (!coords) {
      throw new TypeError(`not a Gitea repository URL: ${repositoryUrl.href}`);
    }
    return coords;
  }

  async listFiles(repositoryUrl: URL, commit: string): Promise<string[]> {
    const { owner, repo } = this.coordinates(repositoryUrl);
    const files: string[] = [];
    let page = 1;
    let truncated = true;

    while (truncated) {
      const url =
        `${repositoryUrl.origin}/api/v1/repos/${owner}/${repo}/git/trees/${commit}` +
        `?recursive=true&per_page=${PAGE_SIZE}&page=${page}`;
      const { body } = await this.http.getJson(url, this.headers());
      if (typeof body !== 'object' || body === null || !('tree' in body)) {
        throw new TypeError(`unexpected tree response from ${url}`);
      }
      const entries = readTreeEntries(body.tree ?? []);
      for (const entry of entries) {
        if (entry.type === 'blob') {
          files.push(entry.path);
        }
      }
      truncated = entries.length > 0 && 'truncated' in body && body.truncated === true;
      page++;
    }

    return files;
  }

  async readFile(repositoryUrl: URL, commit: string, path: string): Promise<string> {
    const { owner, repo } = this.coordinates(repositoryUrl);
    return this.http.getText(
      `${repositoryUrl.origin}/${owner}/${repo}/raw/commit/${commit}/${encodePath(path)}`,
      this.headers()
    );
  }

  tarballUrl(repositoryUrl: URL, commit: string): string {
    const { owner, repo } = this.coordinates(repositoryUrl);
    return `${repositoryUrl.origin}/${owner}/${repo}/archive/${commit}.tar.gz`;
  }
}
