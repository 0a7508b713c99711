import { UNCLASSIFIED, type Classifier } from "./classifier";
import type { CredentialPool } from "./credential-pool";
import { detectSignalEmojis, type SignalEmoji } from "./signals";
import {
  GithubApiError,
  type ApiResponse,
  type CandidateObject,
  type Credential,
  type DetailRecord,
  type GithubGateway,
  type RepositoryPayload,
} from "./types";

export type FetchOutcome =
  | { kind: "record"; record: DetailRecord }
  | { kind: "skipped"; reason: string }
  | { kind: "rate-limited" };

export interface DetailFetcherOptions {
  readmeCharLimit: number;
  minContributors: number;
  excludeForks: boolean;
  emojiCatalog: SignalEmoji[];
  /** Null disables classification; the affiliation column is then left empty. */
  classifier: Classifier | null;
  fallbackLockoutMs?: number;
  now?: () => number;
  debug?: boolean;
}

export function decodeReadme(content: string, encoding: string): string {
  if (encoding === "base64") {
    return Buffer.from(content.replace(/\s+/g, ""), "base64").toString("utf8");
  }
  if (encoding === "utf-8" || encoding === "utf8") {
    return content;
  }
  return "";
}

/** Truncates by code points so surrogate pairs are never split. */
export function truncateText(text: string, limit: number): string {
  const codePoints = Array.from(text);
  return codePoints.length <= limit ? text : codePoints.slice(0, limit).join("");
}

function describeError(error: unknown): string {
  if (error instanceof GithubApiError) {
    return error.timedOut ? "timed out" : `${error.status ?? "network"} ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

class QuotaSignal extends Error {}

/**
 * Builds one {@link DetailRecord} from the metadata, contributors and README
 * endpoints. Non-quota failures degrade the affected field; a quota failure
 * abandons the item so it can be retried on another credential.
 */
export class DetailFetcher {
  constructor(
    private readonly gateway: GithubGateway,
    private readonly pool: CredentialPool,
    private readonly options: DetailFetcherOptions
  ) {}

  async fetch(candidate: CandidateObject, credential: Credential): Promise<FetchOutcome> {
    const { excludeForks, minContributors } = this.options;
    if (excludeForks && candidate.fork) {
      return { kind: "skipped", reason: "fork" };
    }

    try {
      const metadata = await this.attempt(credential, candidate, "metadata", () =>
        this.gateway.getRepository(credential, candidate.owner, candidate.name)
      );
      if (excludeForks && metadata?.fork) {
        return { kind: "skipped", reason: "fork" };
      }

      const contributors =
        (await this.attempt(credential, candidate, "contributors", () =>
          this.gateway.countContributors(credential, candidate.owner, candidate.name)
        )) ?? 0;
      if (contributors < minContributors) {
        return { kind: "skipped", reason: `${contributors} contributor(s) < ${minContributors}` };
      }

      const readmePayload = await this.attempt(credential, candidate, "readme", () =>
        this.gateway.getReadme(credential, candidate.owner, candidate.name)
      );
      const readme = readmePayload
        ? truncateText(decodeReadme(readmePayload.content, readmePayload.encoding), this.options.readmeCharLimit)
        : "";

      return { kind: "record", record: await this.buildRecord(candidate, metadata, contributors, readme) };
    } catch (error) {
      if (error instanceof QuotaSignal) {
        return { kind: "rate-limited" };
      }
      throw error;
    }
  }

  private async buildRecord(
    candidate: CandidateObject,
    metadata: RepositoryPayload | null,
    contributors: number,
    readme: string
  ): Promise<DetailRecord> {
    const description = metadata?.description ?? candidate.description ?? "";
    const foundEmojis = detectSignalEmojis(`${description}\n${readme}`, this.options.emojiCatalog);

    let affiliation = "";
    if (this.options.classifier) {
      affiliation =
        foundEmojis.length === 0
          ? UNCLASSIFIED
          : await this.options.classifier.classify(
              `Description: ${description}\nFound Emojis: ${foundEmojis.join(" ")}\n\nREADME:\n${readme}`
            );
    }

    return {
      identity: candidate.identity,
      owner: metadata?.owner ?? candidate.owner,
      name: metadata?.name ?? candidate.name,
      url: metadata?.url ?? candidate.url,
      stars: metadata?.stars ?? candidate.stars,
      forks: metadata?.forks ?? 0,
      watchers: metadata?.watchers ?? 0,
      openIssues: metadata?.openIssues ?? 0,
      language: metadata?.language ?? null,
      license: metadata?.license ?? null,
      fork: metadata?.fork ?? candidate.fork,
      archived: metadata?.archived ?? false,
      createdAt: metadata?.createdAt ?? null,
      pushedAt: metadata?.pushedAt ?? null,
      description,
      topics: metadata?.topics ?? candidate.topics,
      contributors,
      readme,
      foundEmojis,
      affiliation,
    };
  }

  /**
   * Runs one call and records its quota headers. Returns null on a non-quota
   * failure; throws {@link QuotaSignal} when the credential ran out.
   */
  private async attempt<T>(
    credential: Credential,
    candidate: CandidateObject,
    label: string,
    call: () => Promise<ApiResponse<T>>
  ): Promise<T | null> {
    try {
      const response = await call();
      this.pool.recordHeaders(credential, response.headers);
      return response.data;
    } catch (error) {
      if (error instanceof GithubApiError) {
        this.pool.recordHeaders(credential, error.headers);
        if (error.rateLimited) {
          if (!this.pool.stateOf(credential).limited) {
            const now = (this.options.now ?? Date.now)();
            this.pool.markLimited(credential, new Date(now + (this.options.fallbackLockoutMs ?? 60_000)));
          }
          throw new QuotaSignal(`${credential.id} rate limited`);
        }
        if (error.status === 404 && label === "readme") {
          return null;
        }
      }
      if (this.options.debug || label === "metadata") {
        console.warn(`⚠️  [detail] ${candidate.fullName} ${label} failed: ${describeError(error)}`);
      }
      return null;
    }
  }
}
