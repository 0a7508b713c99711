import {
  GithubApiError,
  type ApiResponse,
  type CandidateObject,
  type Credential,
  type DetailRecord,
  type GithubGateway,
  type QuotaHeaders,
  type RateLimitPayload,
  type ReadmePayload,
  type RepositoryPayload,
  type SearchPagePayload,
  type SearchPageRequest,
} from "./types";

export function credential(n: number): Credential {
  return { id: `GITHUB_TOKEN_${n}`, token: `test-token-${n}` };
}

export function candidate(key: string, stars: number, overrides: Partial<CandidateObject> = {}): CandidateObject {
  const url = `https://github.com/owner-${key}/repo-${key}`;
  return {
    identity: url.toLowerCase(),
    url,
    owner: `owner-${key}`,
    name: `repo-${key}`,
    fullName: `owner-${key}/repo-${key}`,
    stars,
    description: null,
    topics: [],
    fork: false,
    ...overrides,
  };
}

export function detailRecord(from: CandidateObject, overrides: Partial<DetailRecord> = {}): DetailRecord {
  return {
    identity: from.identity,
    owner: from.owner,
    name: from.name,
    url: from.url,
    stars: from.stars,
    forks: 0,
    watchers: 0,
    openIssues: 0,
    language: null,
    license: null,
    fork: from.fork,
    archived: false,
    createdAt: null,
    pushedAt: null,
    description: from.description ?? "",
    topics: from.topics,
    contributors: 1,
    readme: `# ${from.name}`,
    foundEmojis: [],
    affiliation: "",
    ...overrides,
  };
}

/** `perStar` repositories at every star value in `[low, high]`. */
export function population(low: number, high: number, perStar: number): CandidateObject[] {
  const repos: CandidateObject[] = [];
  for (let stars = low; stars <= high; stars += 1) {
    for (let i = 0; i < perStar; i += 1) {
      repos.push(candidate(`${stars}-${i}`, stars));
    }
  }
  return repos;
}

export type DetailKind = "metadata" | "contributors" | "readme";

export interface FakeDetail {
  metadata?: Partial<RepositoryPayload>;
  contributors?: number;
  /** Plain text; served base64 encoded. Null answers 404. */
  readme?: string | null;
}

export interface FakeGatewayOptions {
  resultCap?: number;
  details?: Record<string, FakeDetail>;
}

type SearchHook = (credential: Credential, request: SearchPageRequest) => GithubApiError | null;
type DetailHook = (kind: DetailKind, credential: Credential, fullName: string) => GithubApiError | null;

/**
 * In-memory GitHub search and repository API. Search honours `stars:L..H`
 * queries, sorts by stars descending and refuses pages past the result cap.
 */
export class FakeGithubGateway implements GithubGateway {
  readonly searchCalls: Array<{ credential: string; query: string; page: number }> = [];
  readonly detailCalls: Array<{ kind: DetailKind; credential: string; fullName: string }> = [];
  readonly rateLimits = new Map<string, RateLimitPayload | GithubApiError>();
  searchFailure: SearchHook = () => null;
  detailFailure: DetailHook = () => null;
  headersFor: (credential: Credential, kind: DetailKind | "search") => QuotaHeaders = () => ({});

  private readonly resultCap: number;
  private readonly details: Record<string, FakeDetail>;

  constructor(private readonly repos: CandidateObject[], options: FakeGatewayOptions = {}) {
    this.resultCap = options.resultCap ?? 1000;
    this.details = options.details ?? {};
  }

  /** Distinct queries in call order. */
  get queries(): string[] {
    return this.searchCalls.filter((call) => call.page === 1).map((call) => call.query);
  }

  async searchRepositories(credential: Credential, request: SearchPageRequest): Promise<ApiResponse<SearchPagePayload>> {
    this.searchCalls.push({ credential: credential.id, query: request.query, page: request.page });
    const failure = this.searchFailure(credential, request);
    if (failure) {
      throw failure;
    }
    const match = /^stars:(\d+)\.\.(\d+)$/.exec(request.query);
    if (!match) {
      throw new GithubApiError(`Unsupported query ${request.query}`, { status: 422 });
    }
    const low = Number.parseInt(match[1], 10);
    const high = Number.parseInt(match[2], 10);
    const matched = this.repos
      .filter((repo) => repo.stars >= low && repo.stars <= high)
      .sort((a, b) => b.stars - a.stars || a.identity.localeCompare(b.identity));

    const start = (request.page - 1) * request.perPage;
    if (start >= this.resultCap) {
      throw new GithubApiError("Only the first 1000 search results are available", { status: 422 });
    }
    const end = Math.min(start + request.perPage, this.resultCap);
    return {
      data: { totalCount: matched.length, items: matched.slice(start, end) },
      headers: this.headersFor(credential, "search"),
    };
  }

  async getRepository(credential: Credential, owner: string, name: string): Promise<ApiResponse<RepositoryPayload>> {
    const { repo, detail } = this.lookup("metadata", credential, owner, name);
    return {
      data: {
        owner: repo.owner,
        name: repo.name,
        url: repo.url,
        stars: repo.stars,
        forks: 1,
        watchers: 2,
        openIssues: 3,
        language: "TypeScript",
        license: "MIT",
        fork: repo.fork,
        archived: false,
        createdAt: "2020-01-01T00:00:00Z",
        pushedAt: "2024-06-01T00:00:00Z",
        description: repo.description,
        topics: repo.topics,
        ...detail.metadata,
      },
      headers: this.headersFor(credential, "metadata"),
    };
  }

  async countContributors(credential: Credential, owner: string, name: string): Promise<ApiResponse<number>> {
    const { detail } = this.lookup("contributors", credential, owner, name);
    return { data: detail.contributors ?? 1, headers: this.headersFor(credential, "contributors") };
  }

  async getReadme(credential: Credential, owner: string, name: string): Promise<ApiResponse<ReadmePayload>> {
    const { repo, detail } = this.lookup("readme", credential, owner, name);
    if (detail.readme === null) {
      throw new GithubApiError("Not Found", { status: 404 });
    }
    const text = detail.readme ?? `# ${repo.name}`;
    return {
      data: { content: Buffer.from(text, "utf8").toString("base64"), encoding: "base64" },
      headers: this.headersFor(credential, "readme"),
    };
  }

  async getRateLimit(credential: Credential): Promise<ApiResponse<RateLimitPayload>> {
    const configured = this.rateLimits.get(credential.id);
    if (configured instanceof GithubApiError) {
      throw configured;
    }
    return {
      data: configured ?? {
        core: { limit: 5000, remaining: 5000, reset: 1_700_003_600 },
        search: { limit: 30, remaining: 30, reset: 1_700_000_060 },
      },
      headers: {},
    };
  }

  private lookup(kind: DetailKind, credential: Credential, owner: string, name: string) {
    const fullName = `${owner}/${name}`;
    this.detailCalls.push({ kind, credential: credential.id, fullName });
    const failure = this.detailFailure(kind, credential, fullName);
    if (failure) {
      throw failure;
    }
    const repo = this.repos.find((item) => item.fullName === fullName);
    if (!repo) {
      throw new GithubApiError("Not Found", { status: 404 });
    }
    return { repo, detail: this.details[fullName] ?? {} };
  }
}
