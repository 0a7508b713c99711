import fs from "fs-extra";
import path from "node:path";
import type { CandidateObject } from "./types";

export const CACHE_VERSION = 1;

export interface CacheEntry {
  version: number;
  timestamp: string;
  low: number;
  high: number;
  totalCount: number;
  objects: CandidateObject[];
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "version" in value &&
    value.version === CACHE_VERSION &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "low" in value &&
    typeof value.low === "number" &&
    "high" in value &&
    typeof value.high === "number" &&
    "objects" in value &&
    Array.isArray(value.objects)
  );
}

/** One JSON file per exact star range, trusted while younger than the TTL. */
export class EnumerationCache {
  constructor(
    private readonly cacheDir: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
    private readonly debug = false
  ) {}

  pathFor(low: number, high: number): string {
    return path.join(this.cacheDir, `stars-${low}-${high}.json`);
  }

  async load(low: number, high: number): Promise<CandidateObject[] | null> {
    const entry = await this.readEntry(this.pathFor(low, high));
    if (!entry || entry.low !== low || entry.high !== high || !this.isFresh(entry)) {
      return null;
    }
    return entry.objects;
  }

  /** `generatedAt` dates the oldest data in `objects`; defaults to now. */
  async save(low: number, high: number, objects: CandidateObject[], generatedAt: number = this.now()): Promise<void> {
    const entry: CacheEntry = {
      version: CACHE_VERSION,
      timestamp: new Date(generatedAt).toISOString(),
      low,
      high,
      totalCount: objects.length,
      objects,
    };
    try {
      await fs.outputJson(this.pathFor(low, high), entry);
    } catch (error) {
      console.error(`[cache] Failed to write ${this.pathFor(low, high)}:`, error instanceof Error ? error.message : error);
    }
  }

  /**
   * Finds the fresh cached entry that shares one bound with `[low, high]`, lies
   * inside it, and covers the most star values.
   */
  async findCovering(low: number, high: number): Promise<CacheEntry | null> {
    if (!(await fs.pathExists(this.cacheDir))) {
      return null;
    }
    const files = (await fs.readdir(this.cacheDir)).filter((name) => /^stars-\d+-\d+\.json$/.test(name));
    let best: CacheEntry | null = null;
    for (const name of files) {
      const entry = await this.readEntry(path.join(this.cacheDir, name));
      if (!entry || !this.isFresh(entry)) {
        continue;
      }
      const inside = entry.low >= low && entry.high <= high;
      const sharesBound = entry.low === low || entry.high === high;
      if (!inside || !sharesBound || (entry.low === low && entry.high === high)) {
        continue;
      }
      if (!best || entry.high - entry.low > best.high - best.low) {
        best = entry;
      }
    }
    return best;
  }

  private isFresh(entry: CacheEntry): boolean {
    const generatedAt = new Date(entry.timestamp).getTime();
    return !Number.isNaN(generatedAt) && this.now() - generatedAt <= this.ttlMs;
  }

  private async readEntry(filePath: string): Promise<CacheEntry | null> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }
    try {
      const parsed: unknown = await fs.readJson(filePath);
      return isCacheEntry(parsed) ? parsed : null;
    } catch (error) {
      if (this.debug) {
        console.error(`[cache] Failed to read ${filePath}:`, error instanceof Error ? error.message : error);
      }
      return null;
    }
  }
}
