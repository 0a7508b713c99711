import { describe, expect, it } from "vitest";

import { canonicalIdentity, parseLastPage, toCandidate, toGithubApiError } from "./github-api";
import { GithubApiError } from "./types";

describe("canonicalIdentity", () => {
  it("lower-cases and drops trailing slashes", () => {
    expect(canonicalIdentity(" https://github.com/Owner/Repo/ ")).toBe("https://github.com/owner/repo");
  });
});

describe("toCandidate", () => {
  it("maps a search item", () => {
    expect(
      toCandidate({
        html_url: "https://github.com/Acme/Widget",
        full_name: "Acme/Widget",
        name: "Widget",
        owner: null,
        stargazers_count: 1234,
        description: null,
        fork: true,
      })
    ).toEqual({
      identity: "https://github.com/acme/widget",
      url: "https://github.com/Acme/Widget",
      owner: "Acme",
      name: "Widget",
      fullName: "Acme/Widget",
      stars: 1234,
      description: null,
      topics: [],
      fork: true,
    });
  });
});

describe("parseLastPage", () => {
  it("reads the last page from a link header", () => {
    const link =
      '<https://api.github.com/repositories/1/contributors?per_page=1&anon=true&page=2>; rel="next", ' +
      '<https://api.github.com/repositories/1/contributors?per_page=1&anon=true&page=37>; rel="last"';
    expect(parseLastPage(link)).toBe(37);
  });

  it("returns null without a last link", () => {
    expect(parseLastPage(undefined)).toBeNull();
    expect(parseLastPage('<https://api.github.com/x?page=1>; rel="prev"')).toBeNull();
  });
});

describe("toGithubApiError", () => {
  it("keeps status and lower-cased headers of request errors", () => {
    const error = Object.assign(new Error("API rate limit exceeded"), {
      status: 403,
      response: { headers: { "X-RateLimit-Remaining": "0", "x-ratelimit-reset": 1700000000 } },
    });

    const converted = toGithubApiError(error);

    expect(converted.status).toBe(403);
    expect(converted.headers).toEqual({ "x-ratelimit-remaining": "0", "x-ratelimit-reset": 1700000000 });
    expect(converted.rateLimited).toBe(true);
    expect(converted.timedOut).toBe(false);
  });

  it("detects an exhausted quota from a numeric remaining header", () => {
    const error = Object.assign(new Error("Forbidden"), {
      status: 403,
      response: { headers: { "x-ratelimit-remaining": 0 } },
    });

    const converted = toGithubApiError(error);

    expect(converted.headers).toEqual({ "x-ratelimit-remaining": 0 });
    expect(converted.rateLimited).toBe(true);
  });

  it("flags aborted requests as timeouts", () => {
    const error = new Error("The operation was aborted due to timeout");
    error.name = "TimeoutError";

    const converted = toGithubApiError(error);

    expect(converted.timedOut).toBe(true);
    expect(converted.status).toBeNull();
  });

  it("passes existing errors through", () => {
    const original = new GithubApiError("Not Found", { status: 404 });
    expect(toGithubApiError(original)).toBe(original);
    expect(toGithubApiError("boom").message).toBe("boom");
  });
});
