import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";

import {
  DEFAULT_TUNING,
  buildConfig,
  loadCredentials,
  readTuning,
  validateTuning,
  type HarvesterOptions,
} from "./config";
import { credential } from "./test-helpers";

const OPTIONS: HarvesterOptions = {
  minStars: 500,
  maxStars: 500000,
  output: "data/repos.csv",
  cacheDir: "data/cache",
  cacheTtl: 7,
  readmeLimit: 5000,
  minContributors: 0,
  resetMargin: 5,
  timeout: 30,
};

describe("loadCredentials", () => {
  it("orders numbered tokens numerically and drops duplicates and blanks", () => {
    const credentials = loadCredentials({
      GITHUB_TOKEN_10: "ten",
      GITHUB_TOKEN_2: "two",
      GITHUB_TOKEN_1: " one ",
      GITHUB_TOKEN_3: "",
      GITHUB_TOKENS: "two,extra,",
      GITHUB_TOKEN: "one",
    });

    expect(credentials).toEqual([
      { id: "GITHUB_TOKEN_1", token: "one" },
      { id: "GITHUB_TOKEN_2", token: "two" },
      { id: "GITHUB_TOKEN_10", token: "ten" },
      { id: "GITHUB_TOKENS[1]", token: "extra" },
    ]);
  });

  it("returns nothing when no token is set", () => {
    expect(loadCredentials({})).toEqual([]);
  });
});

describe("validateTuning", () => {
  it("sorts density bands", () => {
    const tuning = validateTuning({
      ...DEFAULT_TUNING,
      densityBands: [
        { upTo: 1000, step: 5 },
        { upTo: 100, step: 1 },
      ],
    });
    expect(tuning.densityBands.map((band) => band.upTo)).toEqual([100, 1000]);
  });

  it("rejects a saturation threshold above the result cap", () => {
    expect(() => validateTuning({ ...DEFAULT_TUNING, saturationThreshold: 1001 })).toThrow(
      "saturationThreshold must not exceed resultCap"
    );
  });

  it("rejects a shrink factor outside (0, 1)", () => {
    expect(() => validateTuning({ ...DEFAULT_TUNING, shrinkFactor: 1 })).toThrow("shrinkFactor must be between 0 and 1");
  });
});

describe("readTuning", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "harvester-tuning-"));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it("returns the defaults without a file", async () => {
    expect(await readTuning(undefined)).toBe(DEFAULT_TUNING);
  });

  it("merges overrides onto the defaults", async () => {
    const file = path.join(tmpDir, "tuning.json");
    await fs.writeJson(file, { maxResplits: 2, densityBands: [{ upTo: 1000, step: 10 }] });

    const tuning = await readTuning(file);

    expect(tuning.maxResplits).toBe(2);
    expect(tuning.growthFactor).toBe(DEFAULT_TUNING.growthFactor);
    expect(tuning.densityBands).toEqual([{ upTo: 1000, step: 10 }]);
  });

  it("rejects unknown keys and non-numeric values", async () => {
    const file = path.join(tmpDir, "tuning.json");
    await fs.writeJson(file, { bogus: 1 });
    await expect(readTuning(file)).rejects.toThrow("Unknown tuning option 'bogus'");

    await fs.writeJson(file, { minStep: "1" });
    await expect(readTuning(file)).rejects.toThrow("Tuning option 'minStep' must be a number");
  });

  it("fails on a missing file", async () => {
    const file = path.join(tmpDir, "missing.json");
    await expect(readTuning(file)).rejects.toThrow(`Tuning file not found: ${file}`);
  });
});

describe("buildConfig", () => {
  const tokens = [credential(1), credential(2)];

  it("derives workers and round size from the token count", () => {
    const config = buildConfig(OPTIONS, tokens);

    expect(config.workers).toBe(2);
    expect(config.roundSize).toBe(3333);
    expect(config.outputPath).toBe(path.resolve("data/repos.csv"));
    expect(config.checkpointPath).toBe(`${path.resolve("data/repos.csv")}.checkpoint.json`);
    expect(config.cacheTtlMs).toBe(7 * 24 * 60 * 60 * 1000);
    expect(config.resetMarginMs).toBe(5000);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config).toMatchObject({ searchLowWatermark: 2, coreLowWatermark: 10, searchCeiling: 30, coreCeiling: 5000 });
  });

  it("honours explicit workers and round size", () => {
    const config = buildConfig({ ...OPTIONS, workers: 5, roundSize: 50, excludeForks: true }, tokens);
    expect(config).toMatchObject({ workers: 5, roundSize: 50, excludeForks: true, classify: false });
  });

  it("requires at least one token", () => {
    expect(() => buildConfig(OPTIONS, [])).toThrow(/^No GitHub tokens found/);
  });

  it("rejects an inverted star range", () => {
    expect(() => buildConfig({ ...OPTIONS, minStars: 10, maxStars: 5 }, tokens)).toThrow(
      "--max-stars must be an integer >= 10 (got 5)"
    );
  });
});
