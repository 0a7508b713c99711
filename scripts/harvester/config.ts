import fs from "fs-extra";
import path from "node:path";
import type { Credential } from "./types";

export interface DensityBand {
  /** Band applies to cursors at or below this star count. */
  upTo: number;
  step: number;
}

/**
 * Knobs of the enumeration control law. The defaults were tuned against the
 * star distribution of public GitHub repositories.
 */
export interface EnumerationTuning {
  resultCap: number;
  pageSize: number;
  /** A batch at or above this size is treated as saturated. Must not exceed `resultCap`. */
  saturationThreshold: number;
  sparseThreshold: number;
  nearSaturationThreshold: number;
  growthFactor: number;
  shrinkFactor: number;
  saturationDivisor: number;
  minStep: number;
  maxStep: number;
  maxResplits: number;
  sliceRetries: number;
  densityBands: DensityBand[];
}

export const DEFAULT_TUNING: EnumerationTuning = {
  resultCap: 1000,
  pageSize: 100,
  saturationThreshold: 1000,
  sparseThreshold: 100,
  nearSaturationThreshold: 500,
  growthFactor: 3,
  shrinkFactor: 0.8,
  saturationDivisor: 3,
  minStep: 1,
  maxStep: 10_000,
  maxResplits: 5,
  sliceRetries: 2,
  densityBands: [
    { upTo: 200, step: 1 },
    { upTo: 1_000, step: 5 },
    { upTo: 5_000, step: 50 },
    { upTo: 20_000, step: 500 },
    { upTo: 50_000, step: 2_000 },
    { upTo: Number.MAX_SAFE_INTEGER, step: 10_000 },
  ],
};

export interface HarvesterConfig {
  credentials: Credential[];
  minStars: number;
  maxStars: number;
  workers: number;
  roundSize: number;
  outputPath: string;
  checkpointPath: string;
  cacheDir: string;
  cacheTtlMs: number;
  forceRefresh: boolean;
  readmeCharLimit: number;
  minContributors: number;
  excludeForks: boolean;
  classify: boolean;
  resetMarginMs: number;
  requestTimeoutMs: number;
  searchLowWatermark: number;
  coreLowWatermark: number;
  searchCeiling: number;
  coreCeiling: number;
  enumerateOnly: boolean;
  debug: boolean;
  tuning: EnumerationTuning;
}

export interface HarvesterOptions {
  minStars: number;
  maxStars: number;
  workers?: number;
  roundSize?: number;
  output: string;
  cacheDir: string;
  cacheTtl: number;
  refresh?: boolean;
  readmeLimit: number;
  minContributors: number;
  excludeForks?: boolean;
  classify?: boolean;
  resetMargin: number;
  timeout: number;
  enumerateOnly?: boolean;
  debug?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const CORE_REQUESTS_PER_REPO = 3;

export function loadCredentials(env: NodeJS.ProcessEnv): Credential[] {
  const numbered = Object.keys(env)
    .map((key) => /^GITHUB_TOKEN_(\d+)$/.exec(key))
    .filter((match): match is RegExpExecArray => match !== null)
    .sort((a, b) => Number.parseInt(a[1], 10) - Number.parseInt(b[1], 10))
    .map((match) => ({ id: match[0], token: env[match[0]] ?? "" }));

  const listed = (env.GITHUB_TOKENS ?? "")
    .split(",")
    .map((token, index) => ({ id: `GITHUB_TOKENS[${index}]`, token }));

  const single = env.GITHUB_TOKEN ? [{ id: "GITHUB_TOKEN", token: env.GITHUB_TOKEN }] : [];

  const seen = new Set<string>();
  const credentials: Credential[] = [];
  for (const candidate of [...numbered, ...listed, ...single]) {
    const token = candidate.token.trim();
    if (token.length === 0 || seen.has(token)) {
      continue;
    }
    seen.add(token);
    credentials.push({ id: candidate.id, token });
  }
  return credentials;
}

function requireInteger(name: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got ${value})`);
  }
}

export function validateTuning(tuning: EnumerationTuning): EnumerationTuning {
  requireInteger("resultCap", tuning.resultCap, 1);
  requireInteger("pageSize", tuning.pageSize, 1);
  requireInteger("saturationThreshold", tuning.saturationThreshold, 1);
  requireInteger("minStep", tuning.minStep, 1);
  requireInteger("maxStep", tuning.maxStep, tuning.minStep);
  requireInteger("maxResplits", tuning.maxResplits, 0);
  requireInteger("sliceRetries", tuning.sliceRetries, 0);
  if (tuning.saturationThreshold > tuning.resultCap) {
    throw new Error("saturationThreshold must not exceed resultCap");
  }
  if (!(tuning.sparseThreshold < tuning.nearSaturationThreshold)) {
    throw new Error("sparseThreshold must be below nearSaturationThreshold");
  }
  if (tuning.nearSaturationThreshold >= tuning.saturationThreshold) {
    throw new Error("nearSaturationThreshold must be below saturationThreshold");
  }
  if (!(tuning.growthFactor > 1)) {
    throw new Error("growthFactor must be greater than 1");
  }
  if (!(tuning.shrinkFactor > 0 && tuning.shrinkFactor < 1)) {
    throw new Error("shrinkFactor must be between 0 and 1");
  }
  if (!(tuning.saturationDivisor > 1)) {
    throw new Error("saturationDivisor must be greater than 1");
  }
  if (tuning.densityBands.length === 0) {
    throw new Error("densityBands must not be empty");
  }
  for (const band of tuning.densityBands) {
    requireInteger("densityBands[].step", band.step, 1);
  }
  return {
    ...tuning,
    densityBands: [...tuning.densityBands].sort((a, b) => a.upTo - b.upTo),
  };
}

export async function readTuning(filePath: string | undefined): Promise<EnumerationTuning> {
  if (!filePath) {
    return DEFAULT_TUNING;
  }
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Tuning file not found: ${resolved}`);
  }
  const parsed: unknown = await fs.readJson(resolved);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Tuning file must contain a JSON object");
  }
  const merged: EnumerationTuning = { ...DEFAULT_TUNING };
  for (const [key, value] of Object.entries(parsed)) {
    if (key === "densityBands") {
      if (!Array.isArray(value)) {
        throw new Error("densityBands must be an array");
      }
      merged.densityBands = value.map((band: unknown) => {
        if (
          typeof band !== "object" ||
          band === null ||
          !("upTo" in band) ||
          !("step" in band) ||
          typeof band.upTo !== "number" ||
          typeof band.step !== "number"
        ) {
          throw new Error("densityBands entries need numeric 'upTo' and 'step'");
        }
        return { upTo: band.upTo, step: band.step };
      });
      continue;
    }
    if (!isNumericTuningKey(key)) {
      throw new Error(`Unknown tuning option '${key}'`);
    }
    if (typeof value !== "number") {
      throw new Error(`Tuning option '${key}' must be a number`);
    }
    merged[key] = value;
  }
  return validateTuning(merged);
}

type NumericTuningKey = Exclude<keyof EnumerationTuning, "densityBands">;

function isNumericTuningKey(key: string): key is NumericTuningKey {
  return key !== "densityBands" && key in DEFAULT_TUNING;
}

export function buildConfig(
  options: HarvesterOptions,
  credentials: Credential[],
  tuning: EnumerationTuning = DEFAULT_TUNING
): HarvesterConfig {
  if (credentials.length === 0) {
    throw new Error("No GitHub tokens found. Set GITHUB_TOKEN_1, GITHUB_TOKEN_2, ... (or GITHUB_TOKENS) in the environment or .env file.");
  }
  requireInteger("--min-stars", options.minStars, 0);
  requireInteger("--max-stars", options.maxStars, options.minStars);
  requireInteger("--readme-limit", options.readmeLimit, 1);
  requireInteger("--min-contributors", options.minContributors, 0);
  requireInteger("--reset-margin", options.resetMargin, 0);
  requireInteger("--timeout", options.timeout, 1);
  if (!(options.cacheTtl > 0)) {
    throw new Error("--cache-ttl must be a positive number of days");
  }

  const workers = options.workers ?? credentials.length;
  requireInteger("--workers", workers, 1);

  const coreCeiling = 5000;
  // Each repository costs a metadata, a contributors and a README request.
  const roundSize = options.roundSize ?? Math.floor((credentials.length * coreCeiling) / CORE_REQUESTS_PER_REPO);
  requireInteger("--round-size", roundSize, 1);

  const outputPath = path.resolve(options.output);

  return {
    credentials,
    minStars: options.minStars,
    maxStars: options.maxStars,
    workers,
    roundSize,
    outputPath,
    checkpointPath: `${outputPath}.checkpoint.json`,
    cacheDir: path.resolve(options.cacheDir),
    cacheTtlMs: options.cacheTtl * DAY_MS,
    forceRefresh: Boolean(options.refresh),
    readmeCharLimit: options.readmeLimit,
    minContributors: options.minContributors,
    excludeForks: Boolean(options.excludeForks),
    classify: Boolean(options.classify),
    resetMarginMs: options.resetMargin * 1000,
    requestTimeoutMs: options.timeout * 1000,
    searchLowWatermark: 2,
    coreLowWatermark: 10,
    searchCeiling: 30,
    coreCeiling,
    enumerateOnly: Boolean(options.enumerateOnly),
    debug: Boolean(options.debug),
    tuning: validateTuning(tuning),
  };
}
