import type { ResponseHeaders } from "@octokit/types";

export type QuotaHeaders = ResponseHeaders;

export interface Credential {
  /** Label used in logs, e.g. `GITHUB_TOKEN_3`. Never the token itself. */
  readonly id: string;
  readonly token: string;
}

export interface QuotaState {
  remaining: number;
  resetAt: Date | null;
  limited: boolean;
}

/** Inclusive star range. */
export interface PopularityRange {
  low: number;
  high: number;
}

export interface CandidateObject {
  /** Lower-cased canonical html URL. */
  identity: string;
  url: string;
  owner: string;
  name: string;
  fullName: string;
  stars: number;
  description: string | null;
  topics: string[];
  fork: boolean;
}

export interface DetailRecord {
  identity: string;
  owner: string;
  name: string;
  url: string;
  stars: number;
  forks: number;
  watchers: number;
  openIssues: number;
  language: string | null;
  license: string | null;
  fork: boolean;
  archived: boolean;
  createdAt: string | null;
  pushedAt: string | null;
  description: string;
  topics: string[];
  contributors: number;
  readme: string;
  foundEmojis: string[];
  affiliation: string;
}

export interface SearchPageRequest {
  query: string;
  page: number;
  perPage: number;
}

export interface SearchPagePayload {
  totalCount: number;
  items: CandidateObject[];
}

export interface RepositoryPayload {
  owner: string;
  name: string;
  url: string;
  stars: number;
  forks: number;
  watchers: number;
  openIssues: number;
  language: string | null;
  license: string | null;
  fork: boolean;
  archived: boolean;
  createdAt: string | null;
  pushedAt: string | null;
  description: string | null;
  topics: string[];
}

export interface ReadmePayload {
  content: string;
  encoding: string;
}

export interface QuotaSnapshot {
  limit: number;
  remaining: number;
  /** Epoch seconds. */
  reset: number;
}

export interface RateLimitPayload {
  core: QuotaSnapshot;
  search: QuotaSnapshot;
}

export interface ApiResponse<T> {
  data: T;
  headers: QuotaHeaders;
}

/**
 * The slice of the GitHub REST API the harvester talks to. Implementations
 * throw {@link GithubApiError} on any failure.
 */
export interface GithubGateway {
  searchRepositories(credential: Credential, request: SearchPageRequest): Promise<ApiResponse<SearchPagePayload>>;
  getRepository(credential: Credential, owner: string, name: string): Promise<ApiResponse<RepositoryPayload>>;
  getReadme(credential: Credential, owner: string, name: string): Promise<ApiResponse<ReadmePayload>>;
  countContributors(credential: Credential, owner: string, name: string): Promise<ApiResponse<number>>;
  getRateLimit(credential: Credential): Promise<ApiResponse<RateLimitPayload>>;
}

export class GithubApiError extends Error {
  readonly status: number | null;
  readonly headers: QuotaHeaders;
  readonly timedOut: boolean;

  constructor(message: string, options: { status: number | null; headers?: QuotaHeaders; timedOut?: boolean }) {
    super(message);
    this.name = "GithubApiError";
    this.status = options.status;
    this.headers = options.headers ?? {};
    this.timedOut = options.timedOut ?? false;
  }

  get rateLimited(): boolean {
    if (this.status === 429) {
      return true;
    }
    if (this.status !== 403) {
      return false;
    }
    // Converted request errors may carry the header as a number.
    return String(this.headers["x-ratelimit-remaining"]) === "0" || this.headers["retry-after"] !== undefined;
  }
}

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
