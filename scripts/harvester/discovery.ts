import type { EnumerationCache } from "./enumeration-cache";
import { ResultCollection } from "./enumerator";
import { formatRange } from "./partition";
import type { CandidateObject, PopularityRange } from "./types";

export type CandidateSource = "cache" | "partial-cache" | "network";

export interface DiscoveryResult {
  objects: CandidateObject[];
  source: CandidateSource;
}

export interface DiscoveryDependencies {
  cache: EnumerationCache;
  enumerate: (range: PopularityRange) => Promise<CandidateObject[]>;
  forceRefresh?: boolean;
}

/**
 * Produces the candidate set for `range`, reusing a fresh cache entry for the
 * exact range, or a narrower one sharing a bound so that only the uncovered
 * remainder is enumerated.
 */
export async function discoverCandidates(
  range: PopularityRange,
  { cache, enumerate, forceRefresh = false }: DiscoveryDependencies
): Promise<DiscoveryResult> {
  if (!forceRefresh) {
    const cached = await cache.load(range.low, range.high);
    if (cached) {
      console.log(`📦 Using cached enumeration for stars ${formatRange(range)} (${cached.length.toLocaleString("en-US")} repositories)`);
      return { objects: cached, source: "cache" };
    }

    const covering = await cache.findCovering(range.low, range.high);
    if (covering) {
      const remainder =
        covering.low > range.low
          ? { low: range.low, high: covering.low - 1 }
          : { low: covering.high + 1, high: range.high };
      console.log(
        `📦 Cached stars ${formatRange(covering)} covers part of the request; enumerating ${formatRange(remainder)}`
      );
      const collection = new ResultCollection(covering.objects);
      collection.add(await enumerate(remainder));
      const objects = collection.values();
      // The merged entry is only as fresh as the cached slice inside it.
      await cache.save(range.low, range.high, objects, Date.parse(covering.timestamp));
      return { objects, source: "partial-cache" };
    }
  }

  const objects = await enumerate(range);
  await cache.save(range.low, range.high, objects);
  return { objects, source: "network" };
}
