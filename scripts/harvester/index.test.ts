import { describe, expect, it } from "vitest";

import type { HarvesterOptions } from "./config";
import { buildProgram, renderSummary } from "./index";
import type { PipelineSummary } from "./pipeline";

function parse(args: string[], env: NodeJS.ProcessEnv = {}) {
  return buildProgram(env)
    .parse(["node", "harvest", ...args])
    .opts<HarvesterOptions & { tuning?: string }>();
}

describe("buildProgram", () => {
  it("applies defaults", () => {
    const opts = parse([]);

    expect(opts).toMatchObject({
      minStars: 500,
      maxStars: 500000,
      output: "data/repos.csv",
      cacheDir: "data/cache",
      cacheTtl: 7,
      readmeLimit: 5000,
      minContributors: 0,
      resetMargin: 5,
      timeout: 30,
    });
    expect(opts.workers).toBeUndefined();
    expect(opts.excludeForks).toBeUndefined();
  });

  it("reads defaults from the environment and flags from argv", () => {
    const opts = parse(["--max-stars", "2000", "--exclude-forks", "--cache-ttl", "0.5", "-w", "3"], {
      MIN_STARS: "1000",
      HARVEST_OUTPUT: "out.csv",
    });

    expect(opts).toMatchObject({
      minStars: 1000,
      maxStars: 2000,
      output: "out.csv",
      cacheTtl: 0.5,
      workers: 3,
      excludeForks: true,
    });
  });
});

describe("renderSummary", () => {
  const base: PipelineSummary = {
    usableCredentials: 2,
    rejectedCredentials: 1,
    candidates: 1234,
    source: "network",
    enumeration: null,
    harvest: null,
  };

  it("lists harvest metrics only after a harvest", () => {
    expect(renderSummary(base)).toContain("1,234 (network)");
    expect(renderSummary(base)).not.toContain("Rows written");

    const output = renderSummary({
      ...base,
      harvest: { candidates: 1234, alreadyScraped: 34, rounds: 2, written: 1100, skipped: 99, failed: 1, quotaWaits: 1 },
    });
    expect(output).toContain("1,100");
    expect(output).toContain("99 / 1");
  });
});
