import { ComplianceService } from '../../application';
import { GitHubApiClient } from './GitHubApiClient';

interface Route {
  status: number;
  body: unknown;
  link?: string;
  /** Sent verbatim instead of serializing `body`. */
  raw?: string;
}

/**
 * Serves canned JSON responses keyed by path and query, recording requested URLs.
 */
function createFetch(routes: Record<string, Route>) {
  const requested: string[] = [];

  const fakeFetch = async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    requested.push(url.href);

    const route = routes[`${url.pathname}${url.search}`] ?? routes[url.pathname];
    if (!route) {
      return new Response(JSON.stringify({ message: 'Not Found' }), {
        status: 404,
        headers: { 'content-type': 'application/json; charset=utf-8' },
      });
    }

    const headers: Record<string, string> = { 'content-type': 'application/json; charset=utf-8' };
    if (route.link) {
      headers.link = route.link;
    }
    return new Response(route.raw ?? JSON.stringify(route.body), { status: route.status, headers });
  };

  return { fetch: fakeFetch, requested };
}

describe('GitHubApiClient', () => {
  describe('listRepositories', () => {
    it('should follow pagination links', async () => {
      const { fetch } = createFetch({
        '/orgs/acme/repos?per_page=100': {
          status: 200,
          body: [{ name: 'api' }, { name: 'web' }],
          link: '<https://api.github.com/orgs/acme/repos?per_page=100&page=2>; rel="next"',
        },
        '/orgs/acme/repos?per_page=100&page=2': {
          status: 200,
          body: [{ name: 'docs' }],
        },
      });
      const client = new GitHubApiClient({ fetch });

      const repos = await client.listRepositories('acme', 1000);

      expect(repos).toEqual([{ name: 'api' }, { name: 'web' }, { name: 'docs' }]);
    });

    it('should stop once the limit is reached', async () => {
      const { fetch, requested } = createFetch({
        '/orgs/acme/repos': {
          status: 200,
          body: [{ name: 'api' }, { name: 'web' }],
          link: '<https://api.github.com/orgs/acme/repos?per_page=2&page=2>; rel="next"',
        },
      });
      const client = new GitHubApiClient({ fetch });

      const repos = await client.listRepositories('acme', 2);

      expect(repos).toEqual([{ name: 'api' }, { name: 'web' }]);
      expect(requested).toHaveLength(1);
    });

    it('should throw when the organization cannot be read', async () => {
      const { fetch } = createFetch({});
      const client = new GitHubApiClient({ fetch });

      await expect(client.listRepositories('ghost', 10)).rejects.toThrow();
    });

    it('should send requests to the configured base URL', async () => {
      const { fetch, requested } = createFetch({
        '/api/v3/orgs/acme/repos': { status: 200, body: [{ name: 'api' }] },
      });
      const client = new GitHubApiClient({ fetch, baseUrl: 'https://github.example.com/api/v3' });

      await client.listRepositories('acme', 5);

      expect(requested).toEqual(['https://github.example.com/api/v3/orgs/acme/repos?per_page=5']);
    });
  });

  describe('getBranch', () => {
    it('should return branch metadata', async () => {
      const { fetch } = createFetch({
        '/repos/acme/api/branches/main': { status: 200, body: { name: 'main', protected: true } },
      });
      const client = new GitHubApiClient({ fetch });

      await expect(client.getBranch('acme', 'api', 'main')).resolves.toEqual({ name: 'main' });
    });

    it('should return null for a missing branch', async () => {
      const { fetch } = createFetch({});
      const client = new GitHubApiClient({ fetch });

      await expect(client.getBranch('acme', 'api', 'master')).resolves.toBeNull();
    });
  });

  describe('getBranchProtection', () => {
    it('should return the protection configuration', async () => {
      const { fetch } = createFetch({
        '/repos/acme/api/branches/main/protection': {
          status: 200,
          body: { url: 'https://api.github.com/repos/acme/api/branches/main/protection' },
        },
      });
      const client = new GitHubApiClient({ fetch });

      await expect(client.getBranchProtection('acme', 'api', 'main')).resolves.toEqual({
        url: 'https://api.github.com/repos/acme/api/branches/main/protection',
      });
    });

    it('should return null when the branch is not protected', async () => {
      const { fetch } = createFetch({});
      const client = new GitHubApiClient({ fetch });

      await expect(client.getBranchProtection('acme', 'api', 'main')).resolves.toBeNull();
    });

    it('should return null when access is forbidden', async () => {
      const { fetch } = createFetch({
        '/repos/acme/api/branches/main/protection': { status: 403, body: { message: 'Forbidden' } },
      });
      const client = new GitHubApiClient({ fetch });

      await expect(client.getBranchProtection('acme', 'api', 'main')).resolves.toBeNull();
    });
  });

  describe('getRequiredSignatures', () => {
    it('should return the raw body', async () => {
      const { fetch } = createFetch({
        '/repos/acme/api/branches/main/protection/required_signatures': {
          status: 200,
          body: { enabled: true },
        },
      });
      const client = new GitHubApiClient({ fetch });

      await expect(client.getRequiredSignatures('acme', 'api', 'main')).resolves.toEqual({ enabled: true });
    });

    it('should return null on failure', async () => {
      const { fetch } = createFetch({});
      const client = new GitHubApiClient({ fetch });

      await expect(client.getRequiredSignatures('acme', 'api', 'main')).resolves.toBeNull();
    });

    it('should report a malformed JSON body as unsigned', async () => {
      const { fetch } = createFetch({
        '/repos/acme/api/branches/main': { status: 200, body: { name: 'main' } },
        '/repos/acme/api/branches/main/protection': {
          status: 200,
          body: { url: 'https://api.github.com/repos/acme/api/branches/main/protection' },
        },
        '/repos/acme/api/branches/main/protection/required_signatures': {
          status: 200,
          body: null,
          raw: '{"enabled": tru',
        },
      });
      const service = new ComplianceService(new GitHubApiClient({ fetch }));

      await expect(service.checkRequiredSignatures('acme', 'api', 'main')).resolves.toBe(false);
      const audit = await service.auditRepository('acme', 'api');
      expect(audit.issues).toEqual(["Commit signing not required for 'main' branch"]);
    });
  });
});
