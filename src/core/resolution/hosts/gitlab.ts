import type { HttpClient } from '../../../utils/http.js';
import { encodePath, readTreeEntries, type GitHostProvider } from './types.js';

const PAGE_SIZE = 100;

function projectPath(repositoryUrl: URL): string {
  return repositoryUrl.pathname.split('/').filter(s => s.length > 0).join('/');
}

/**
 * GitLab instances (gitlab.com and self-hosted `gitlab.*` hosts). Projects
 * may sit in nested groups, so the whole path is the project id.
 */
export class GitLabProvider implements GitHostProvider {
  readonly name = 'gitlab';

  constructor(
    private readonly http: HttpClient,
    private readonly token?: string
  ) {}

  matches(repositoryUrl: URL): boolean {
    const firstLabel = repositoryUrl.hostname.split('.')[0];
    return firstLabel === 'gitlab' && projectPath(repositoryUrl).includes('/');
  }

  private headers(): Record<string, string> {
    return this.token ? { 'PRIVATE-TOKEN': this.token } : {};
  }

  async listFiles(repositoryUrl: URL, commit: string): Promise<string[]> {
    const project = encodeURIComponent(projectPath(repositoryUrl));
    const files: string[] = [];
    let page: string | null = '1';

    while (page) {
      const url =
        `${repositoryUrl.origin}/api/v4/projects/${project}/repository/tree` +
        `?ref=${commit}&recursive=true&per_page=${PAGE_SIZE}&page=${page}`;
      const { body, headers } = await this.http.getJson(url, this.headers());
      for (const entry of readTreeEntries(body)) {
        if (entry.type === 'blob') {
          files.push(entry.path);
        }
      }
      page = headers.get('x-next-page') || null;
    }

    return files;
  }

  async readFile(repositoryUrl: URL, commit: string, path: string): Promise<string> {
    return this.http.getText(
      `${repositoryUrl.origin}/${projectPath(repositoryUrl)}/-/raw/${commit}/${encodePath(path)}`,
      this.headers()
    );
  }

  tarballUrl(repositoryUrl: URL, commit: string): string {
    const path = projectPath(repositoryUrl);
    const name = path.split('/').pop() ?? path;
    return `${repositoryUrl.origin}/${path}/-/archive/${commit}/${name}-${commit}.tar.gz`;
  }
}
