import { Octokit } from "@octokit/rest";
import {
  GithubApiError,
  type ApiResponse,
  type CandidateObject,
  type Credential,
  type GithubGateway,
  type QuotaHeaders,
  type RateLimitPayload,
  type ReadmePayload,
  type RepositoryPayload,
  type SearchPagePayload,
  type SearchPageRequest,
} from "./types";

export interface SearchItem {
  html_url: string;
  full_name: string;
  name: string;
  owner: { login: string } | null;
  stargazers_count: number;
  description: string | null;
  topics?: string[];
  fork: boolean;
}

export function canonicalIdentity(url: string): string {
  return url.trim().replace(/\/+$/, "").toLowerCase();
}

export function toCandidate(item: SearchItem): CandidateObject {
  return {
    identity: canonicalIdentity(item.html_url),
    url: item.html_url,
    owner: item.owner?.login ?? item.full_name.split("/")[0],
    name: item.name,
    fullName: item.full_name,
    stars: item.stargazers_count,
    description: item.description,
    topics: item.topics ?? [],
    fork: item.fork,
  };
}

/** Page number of the `rel="last"` link, i.e. the item count of a `per_page=1` listing. */
export function parseLastPage(link: string | number | undefined): number | null {
  if (typeof link !== "string") {
    return null;
  }
  const match = /[?&]page=(\d+)[^>]*>;\s*rel="last"/.exec(link);
  return match ? Number.parseInt(match[1], 10) : null;
}

function copyHeaders(value: unknown): QuotaHeaders {
  const headers: QuotaHeaders = {};
  if (typeof value !== "object" || value === null) {
    return headers;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string" || typeof entry === "number") {
      headers[key.toLowerCase()] = entry;
    }
  }
  return headers;
}

export function toGithubApiError(error: unknown): GithubApiError {
  if (error instanceof GithubApiError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  const timedOut = name === "TimeoutError" || name === "AbortError" || /timeout|aborted/i.test(message);

  let status: number | null = null;
  let headers: QuotaHeaders = {};
  if (typeof error === "object" && error !== null) {
    if ("status" in error && typeof error.status === "number") {
      status = error.status;
    }
    if ("response" in error && typeof error.response === "object" && error.response !== null && "headers" in error.response) {
      headers = copyHeaders(error.response.headers);
    }
  }
  return new GithubApiError(message, { status: timedOut ? null : status, headers, timedOut });
}

export interface OctokitGatewayOptions {
  timeoutMs: number;
  userAgent?: string;
}

/** {@link GithubGateway} over one Octokit client per token. */
export class OctokitGateway implements GithubGateway {
  private readonly clients = new Map<string, Octokit>();

  constructor(private readonly options: OctokitGatewayOptions) {}

  searchRepositories(credential: Credential, request: SearchPageRequest): Promise<ApiResponse<SearchPagePayload>> {
    return this.call(async () => {
      const response = await this.client(credential).search.repos({
        q: request.query,
        sort: "stars",
        order: "desc",
        per_page: request.perPage,
        page: request.page,
        request: { signal: this.signal() },
      });
      return {
        data: { totalCount: response.data.total_count, items: response.data.items.map(toCandidate) },
        headers: response.headers,
      };
    });
  }

  getRepository(credential: Credential, owner: string, name: string): Promise<ApiResponse<RepositoryPayload>> {
    return this.call(async () => {
      const { data, headers } = await this.client(credential).repos.get({
        owner,
        repo: name,
        request: { signal: this.signal() },
      });
      return {
        data: {
          owner: data.owner.login,
          name: data.name,
          url: data.html_url,
          stars: data.stargazers_count,
          forks: data.forks_count,
          watchers: data.subscribers_count,
          openIssues: data.open_issues_count,
          language: data.language,
          license: data.license?.spdx_id ?? data.license?.key ?? null,
          fork: data.fork,
          archived: data.archived,
          createdAt: data.created_at,
          pushedAt: data.pushed_at,
          description: data.description,
          topics: data.topics ?? [],
        },
        headers,
      };
    });
  }

  getReadme(credential: Credential, owner: string, name: string): Promise<ApiResponse<ReadmePayload>> {
    return this.call(async () => {
      const { data, headers } = await this.client(credential).repos.getReadme({
        owner,
        repo: name,
        request: { signal: this.signal() },
      });
      return { data: { content: data.content, encoding: data.encoding }, headers };
    });
  }

  countContributors(credential: Credential, owner: string, name: string): Promise<ApiResponse<number>> {
    return this.call(async () => {
      const { data, headers } = await this.client(credential).repos.listContributors({
        owner,
        repo: name,
        per_page: 1,
        anon: "true",
        request: { signal: this.signal() },
      });
      const count = parseLastPage(headers.link) ?? (Array.isArray(data) ? data.length : 0);
      return { data: count, headers };
    });
  }

  getRateLimit(credential: Credential): Promise<ApiResponse<RateLimitPayload>> {
    return this.call(async () => {
      const { data, headers } = await this.client(credential).rateLimit.get({
        request: { signal: this.signal() },
      });
      const search = data.resources.search;
      const core = data.resources.core;
      return {
        data: {
          core: { limit: core.limit, remaining: core.remaining, reset: core.reset },
          search: { limit: search.limit, remaining: search.remaining, reset: search.reset },
        },
        headers,
      };
    });
  }

  private client(credential: Credential): Octokit {
    let client = this.clients.get(credential.id);
    if (!client) {
      client = new Octokit({
        auth: credential.token,
        userAgent: this.options.userAgent ?? "repo-readme-harvester",
      });
      this.clients.set(credential.id, client);
    }
    return client;
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.options.timeoutMs);
  }

  private async call<T>(request: () => Promise<ApiResponse<T>>): Promise<ApiResponse<T>> {
    try {
      return await request();
    } catch (error) {
      throw toGithubApiError(error);
    }
  }
}
