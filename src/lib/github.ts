import { Octokit } from '@octokit/rest';
import { throttling } from '@octokit/plugin-throttling';
import { HttpError, NetworkError, RateLimitedError, type TransportError } from './errors.js';
import { formatRepository, type RateLimit, type RemoteRepository, type RepositoryRef } from './types.js';

const ThrottledOctokit: typeof Octokit = Octokit.plugin(throttling);

export type GitHubClient = InstanceType<typeof ThrottledOctokit>;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  token?: string;
  baseUrl?: string;
  /** Replacement `fetch`, e.g. for tests. */
  fetch?: FetchLike;
  /** Per-request timeout (ms); each page of a paginated listing gets its own. */
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

const quiet = () => undefined;

/**
 * Octokit with the throttling plugin installed but every retry declined:
 * rate-limit policy belongs to the sync engine, so the request fails fast.
 * Every request, pagination included, is aborted after `timeoutMs`.
 */
export function createOctokit(options: ClientOptions = {}): GitHubClient {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const octokit = new ThrottledOctokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    request: options.fetch ? { fetch: options.fetch } : undefined,
    // Failed requests (304s included) surface as transport errors; don't print them twice.
    log: { debug: quiet, info: quiet, warn: console.warn, error: quiet },
    throttle: {
      onRateLimit(retryAfter: number, request: { method: string; url: string }) {
        console.warn(`Rate limit hit for ${request.method} ${request.url}. Resets in ${retryAfter}s; not retrying.`);
        return false;
      },
      onSecondaryRateLimit(retryAfter: number, request: { method: string; url: string }) {
        console.warn(
          `Secondary rate limit hit for ${request.method} ${request.url}. ` +
            `Retry after ${retryAfter}s; not retrying.`,
        );
        return false;
      },
    },
  });
  octokit.hook.wrap('request', (request, endpoint) =>
    request({
      ...endpoint,
      request: { ...endpoint.request, signal: endpoint.request?.signal ?? AbortSignal.timeout(timeoutMs) },
    }),
  );
  return octokit;
}

export type TreeFetchResult =
  | { status: 200; body: unknown; validator?: string; rate: RateLimit }
  | { status: 304; rate: RateLimit };

/** Read-only view of the host API used by the sync engine. */
export interface TransportClient {
  /**
   * Fetch the recursive tree listing for a repository at its ref. The
   * validator is sent as `If-None-Match`; an unchanged tree answers 304.
   *
   * @throws TransportError
   */
  fetchTree(repository: RepositoryRef, options?: { validator?: string }): Promise<TreeFetchResult>;
  /** @throws TransportError */
  listRepositories(account: string): Promise<RemoteRepository[]>;
}

type HeaderMap = Record<string, string | number | undefined>;

interface RequestFailure {
  status: number;
  message: string;
  response?: { headers: HeaderMap };
}

function isRequestFailure(error: unknown): error is RequestFailure {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    (!('response' in error) ||
      error.response === undefined ||
      (typeof error.response === 'object' && error.response !== null && 'headers' in error.response))
  );
}

function headerNumber(headers: HeaderMap, name: string): number | undefined {
  const raw = headers[name];
  if (raw === undefined) return undefined;
  const value = typeof raw === 'number' ? raw : Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}

export function readRateLimit(headers: HeaderMap): RateLimit {
  const reset = headerNumber(headers, 'x-ratelimit-reset');
  return {
    remaining: headerNumber(headers, 'x-ratelimit-remaining'),
    resetAt: reset === undefined ? undefined : reset * 1000,
  };
}

/** Classify whatever Octokit threw into the transport taxonomy. */
export function toTransportError(error: unknown, label: string, now = Date.now()): TransportError {
  if (!isRequestFailure(error) || !error.response) {
    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(`Network failure for ${label}: ${message}`, { cause: error });
  }

  const { status } = error;
  const headers = error.response.headers;
  const rate = readRateLimit(headers);
  const retryAfter = headerNumber(headers, 'retry-after');
  const limited =
    (status === 403 || status === 429) &&
    (rate.remaining === 0 || retryAfter !== undefined || /rate limit/i.test(error.message));

  if (limited) {
    const retryAt = retryAfter !== undefined ? now + retryAfter * 1000 : (rate.resetAt ?? now + 60_000);
    return new RateLimitedError(retryAt, `Rate limited for ${label} until ${new Date(retryAt).toISOString()}`, {
      cause: error,
    });
  }
  return new HttpError(status, `GitHub API error ${status} for ${label}: ${error.message}`, { cause: error });
}

/** The fields read from an org or user repository listing. */
interface ListedRepository {
  name: string;
  owner: { login: string };
  default_branch?: string;
}

export class GitHubTransport implements TransportClient {
  private readonly octokit: GitHubClient;

  constructor(options: ClientOptions = {}) {
    this.octokit = createOctokit(options);
  }

  async fetchTree(repository: RepositoryRef, options: { validator?: string } = {}): Promise<TreeFetchResult> {
    const label = formatRepository(repository);
    try {
      const response = await this.octokit.rest.git.getTree({
        owner: repository.owner,
        repo: repository.name,
        tree_sha: repository.ref,
        recursive: '1',
        headers: options.validator ? { 'if-none-match': options.validator } : {},
      });
      const body: unknown = response.data;
      return { status: 200, body, validator: response.headers.etag, rate: readRateLimit(response.headers) };
    } catch (err) {
      if (isRequestFailure(err) && err.status === 304 && err.response) {
        return { status: 304, rate: readRateLimit(err.response.headers) };
      }
      throw toTransportError(err, label);
    }
  }

  async listRepositories(account: string): Promise<RemoteRepository[]> {
    let repos: ListedRepository[];
    try {
      repos = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
        org: account,
        per_page: 100,
        type: 'all',
      });
    } catch (err) {
      if (!isRequestFailure(err) || err.status !== 404) throw toTransportError(err, `repositories of ${account}`);
      repos = await this.listUserRepositories(account);
    }
    return repos.map((repo) => ({
      owner: repo.owner.login,
      name: repo.name,
      defaultBranch: repo.default_branch ?? 'HEAD',
    }));
  }

  private async listUserRepositories(account: string): Promise<ListedRepository[]> {
    try {
      return await this.octokit.paginate(this.octokit.rest.repos.listForUser, {
        username: account,
        per_page: 100,
        type: 'owner',
      });
    } catch (err) {
      throw toTransportError(err, `repositories of ${account}`);
    }
  }
}
