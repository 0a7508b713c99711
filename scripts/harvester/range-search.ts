import type { CredentialPool } from "./credential-pool";
import { formatRange } from "./partition";
import {
  GithubApiError,
  type CandidateObject,
  type Credential,
  type GithubGateway,
  type PopularityRange,
  type Sleeper,
} from "./types";

export interface RangeSearchResult {
  items: CandidateObject[];
  totalCount: number;
  /** False when pagination stopped on a failed request; `items` is then partial. */
  complete: boolean;
}

export interface RangeSearchOptions {
  resultCap: number;
  pageSize: number;
  sleeper: Sleeper;
  resetMarginMs: number;
  /** Assumed lockout when a rate-limited response carries no reset time. */
  fallbackLockoutMs?: number;
  now?: () => number;
  debug?: boolean;
}

export function buildStarQuery(range: PopularityRange): string {
  return `stars:${range.low}..${range.high}`;
}

/**
 * Runs one star-range query to completion, paginating up to the API's result
 * cap. Never throws: failures end pagination and yield a partial result.
 */
export class RangeSearchClient {
  constructor(
    private readonly gateway: GithubGateway,
    private readonly pool: CredentialPool,
    private readonly options: RangeSearchOptions
  ) {}

  async search(range: PopularityRange, credential: Credential): Promise<RangeSearchResult> {
    const { resultCap, pageSize } = this.options;
    const perPage = Math.min(pageSize, resultCap);
    const maxPages = Math.ceil(resultCap / perPage);
    const query = buildStarQuery(range);
    const items: CandidateObject[] = [];
    let totalCount = 0;
    let page = 1;

    while (items.length < resultCap) {
      try {
        await this.pool.waitForReset(credential, this.options.sleeper, this.options.resetMarginMs);
        const response = await this.gateway.searchRepositories(credential, { query, page, perPage });
        this.pool.recordHeaders(credential, response.headers);

        const pageItems = response.data.items;
        totalCount = response.data.totalCount;
        if (this.options.debug) {
          console.log(
            `[search] ${credential.id} ${query} page ${page}: ${pageItems.length} items (total ${totalCount})`
          );
        }
        if (pageItems.length === 0) {
          break;
        }
        items.push(...pageItems.slice(0, resultCap - items.length));
        if (items.length >= totalCount || pageItems.length < perPage || page >= maxPages) {
          break;
        }
        page += 1;
      } catch (error) {
        this.recordFailure(credential, error);
        console.warn(
          `⚠️  [search] ${credential.id} stars ${formatRange(range)} page ${page} failed: ${
            error instanceof Error ? error.message : String(error)
          } (keeping ${items.length} items)`
        );
        return { items, totalCount, complete: false };
      }
    }

    return { items, totalCount, complete: true };
  }

  private recordFailure(credential: Credential, error: unknown) {
    if (!(error instanceof GithubApiError)) {
      return;
    }
    this.pool.recordHeaders(credential, error.headers);
    if (error.rateLimited && !this.pool.stateOf(credential).limited) {
      const now = (this.options.now ?? Date.now)();
      this.pool.markLimited(credential, new Date(now + (this.options.fallbackLockoutMs ?? 60_000)));
    }
  }
}
