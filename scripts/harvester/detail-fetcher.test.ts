import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Classifier, type ClassificationChannel, type ClassificationRequest } from "./classifier";
import { CredentialPool } from "./credential-pool";
import { DetailFetcher, decodeReadme, truncateText, type DetailFetcherOptions } from "./detail-fetcher";
import { FakeGithubGateway, candidate, credential, type FakeDetail } from "./test-helpers";
import { GithubApiError } from "./types";

const NOW = 1_000_000;
const token = credential(1);
const repo = candidate("a", 100, { description: "summary" });

describe("decodeReadme", () => {
  it("decodes wrapped base64", () => {
    expect(decodeReadme("aMOp\nbGxv", "base64")).toBe("héllo");
  });

  it("passes utf-8 through and drops unknown encodings", () => {
    expect(decodeReadme("plain", "utf-8")).toBe("plain");
    expect(decodeReadme("plain", "none")).toBe("");
  });
});

describe("truncateText", () => {
  it("counts code points", () => {
    expect(truncateText("🍉🍉🍉abc", 4)).toBe("🍉🍉🍉a");
    expect(truncateText("short", 10)).toBe("short");
  });
});

describe("DetailFetcher", () => {
  let pool: CredentialPool;

  function setup(detail: FakeDetail = {}, overrides: Partial<DetailFetcherOptions> = {}, repos = [repo]) {
    const gateway = new FakeGithubGateway(repos, { details: { [repo.fullName]: detail } });
    const fetcher = new DetailFetcher(gateway, pool, {
      readmeCharLimit: 100,
      minContributors: 0,
      excludeForks: false,
      emojiCatalog: [{ emoji: "🍉", shortcodes: [":watermelon:"] }],
      classifier: null,
      now: () => NOW,
      ...overrides,
    });
    return { gateway, fetcher };
  }

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    pool = new CredentialPool([token], { resource: "core", lowWatermark: 10, ceiling: 5000, now: () => NOW });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("combines metadata, contributors and the decoded README", async () => {
    const { gateway, fetcher } = setup({ contributors: 4, readme: "Hello 🍉 world" });

    const outcome = await fetcher.fetch(repo, token);

    expect(outcome).toEqual({
      kind: "record",
      record: {
        identity: "https://github.com/owner-a/repo-a",
        owner: "owner-a",
        name: "repo-a",
        url: "https://github.com/owner-a/repo-a",
        stars: 100,
        forks: 1,
        watchers: 2,
        openIssues: 3,
        language: "TypeScript",
        license: "MIT",
        fork: false,
        archived: false,
        createdAt: "2020-01-01T00:00:00Z",
        pushedAt: "2024-06-01T00:00:00Z",
        description: "summary",
        topics: [],
        contributors: 4,
        readme: "Hello 🍉 world",
        foundEmojis: ["🍉"],
        affiliation: "",
      },
    });
    expect(gateway.detailCalls.map((call) => call.kind)).toEqual(["metadata", "contributors", "readme"]);
  });

  it("truncates the README at fetch time", async () => {
    const { fetcher } = setup({ readme: "🍉🍉🍉abc" }, { readmeCharLimit: 4 });
    const outcome = await fetcher.fetch(repo, token);
    expect(outcome.kind === "record" && outcome.record.readme).toBe("🍉🍉🍉a");
  });

  it("stores an empty README when none exists", async () => {
    const { fetcher } = setup({ readme: null });
    const outcome = await fetcher.fetch(repo, token);
    expect(outcome.kind === "record" && outcome.record.readme).toBe("");
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("falls back to the search summary when metadata fails", async () => {
    const { gateway, fetcher } = setup();
    gateway.detailFailure = (kind) => (kind === "metadata" ? new GithubApiError("Server Error", { status: 500 }) : null);

    const outcome = await fetcher.fetch(repo, token);

    expect(outcome.kind).toBe("record");
    if (outcome.kind === "record") {
      expect(outcome.record).toMatchObject({ stars: 100, forks: 0, language: null, description: "summary", readme: "# repo-a" });
    }
    expect(console.warn).toHaveBeenCalledWith("⚠️  [detail] owner-a/repo-a metadata failed: 500 Server Error");
  });

  it("skips forks without calling the API", async () => {
    const fork = candidate("f", 50, { fork: true });
    const { gateway, fetcher } = setup({}, { excludeForks: true }, [fork]);

    expect(await fetcher.fetch(fork, token)).toEqual({ kind: "skipped", reason: "fork" });
    expect(gateway.detailCalls).toHaveLength(0);
  });

  it("skips repositories below the contributor minimum before fetching the README", async () => {
    const { gateway, fetcher } = setup({ contributors: 4 }, { minContributors: 5 });

    expect(await fetcher.fetch(repo, token)).toEqual({ kind: "skipped", reason: "4 contributor(s) < 5" });
    expect(gateway.detailCalls.map((call) => call.kind)).toEqual(["metadata", "contributors"]);
  });

  it("abandons the item when the credential hits its rate limit", async () => {
    const { gateway, fetcher } = setup();
    gateway.detailFailure = (kind) =>
      kind === "contributors"
        ? new GithubApiError("API rate limit exceeded", {
            status: 403,
            headers: { "x-ratelimit-remaining": "0", "x-ratelimit-reset": "2000" },
          })
        : null;

    expect(await fetcher.fetch(repo, token)).toEqual({ kind: "rate-limited" });
    expect(pool.stateOf(token)).toEqual({ remaining: 0, resetAt: new Date(2_000_000), limited: true });
  });

  it("records quota from every response", async () => {
    const { gateway, fetcher } = setup();
    gateway.headersFor = () => ({ "x-ratelimit-remaining": "5", "x-ratelimit-reset": "3000" });

    const outcome = await fetcher.fetch(repo, token);

    expect(outcome.kind).toBe("record");
    expect(pool.stateOf(token)).toEqual({ remaining: 5, resetAt: new Date(3_000_000), limited: true });
  });

  describe("classification", () => {
    class FixedChannel implements ClassificationChannel {
      readonly requests: ClassificationRequest[] = [];
      async complete(request: ClassificationRequest): Promise<string> {
        this.requests.push(request);
        return "Palestine!";
      }
    }

    it("labels records that carry signal emojis", async () => {
      const channel = new FixedChannel();
      const { fetcher } = setup({ readme: "Hello 🍉 world" }, { classifier: new Classifier(channel) });

      const outcome = await fetcher.fetch(repo, token);

      expect(outcome.kind === "record" && outcome.record.affiliation).toBe("palestine");
      expect(channel.requests[0].userText).toBe(
        "Description: summary\nFound Emojis: 🍉\n\nREADME:\nHello 🍉 world\n\nClassification:"
      );
    });

    it("labels records without signals as none without a call", async () => {
      const channel = new FixedChannel();
      const { fetcher } = setup({ readme: "plain" }, { classifier: new Classifier(channel) });

      const outcome = await fetcher.fetch(repo, token);

      expect(outcome.kind === "record" && outcome.record.affiliation).toBe("none");
      expect(channel.requests).toHaveLength(0);
    });
  });
});
