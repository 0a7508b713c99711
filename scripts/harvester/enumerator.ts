import type { EnumerationTuning } from "./config";
import type { CredentialPool } from "./credential-pool";
import {
  formatRange,
  initialStep,
  isSaturated,
  logPartition,
  nextStepSize,
  shrinkOnSaturation,
} from "./partition";
import type { RangeSearchResult } from "./range-search";
import type { CandidateObject, Credential, PopularityRange } from "./types";

export interface RangeSearcher {
  search(range: PopularityRange, credential: Credential): Promise<RangeSearchResult>;
}

/** Candidate set keyed by identity; the first object seen for an identity wins. */
export class ResultCollection {
  private readonly byIdentity = new Map<string, CandidateObject>();

  constructor(initial: Iterable<CandidateObject> = []) {
    this.add(initial);
  }

  /** Returns how many of `items` were new. */
  add(items: Iterable<CandidateObject>): number {
    let added = 0;
    for (const item of items) {
      if (this.byIdentity.has(item.identity)) {
        continue;
      }
      this.byIdentity.set(item.identity, item);
      added += 1;
    }
    return added;
  }

  has(identity: string): boolean {
    return this.byIdentity.has(identity);
  }

  get size(): number {
    return this.byIdentity.size;
  }

  values(): CandidateObject[] {
    return Array.from(this.byIdentity.values());
  }
}

export interface EnumerationStats {
  queries: number;
  resplits: number;
  retries: number;
  incompleteSlices: number;
  saturatedAccepted: number;
}

export interface SpaceEnumeratorOptions {
  tuning: EnumerationTuning;
  debug?: boolean;
}

export class SpaceEnumerator {
  readonly stats: EnumerationStats = {
    queries: 0,
    resplits: 0,
    retries: 0,
    incompleteSlices: 0,
    saturatedAccepted: 0,
  };

  constructor(
    private readonly searcher: RangeSearcher,
    private readonly pool: CredentialPool,
    private readonly options: SpaceEnumeratorOptions
  ) {}

  async enumerate(range: PopularityRange, parts: number = this.pool.size): Promise<CandidateObject[]> {
    const credentials = this.pool.list();
    if (credentials.length === 0) {
      throw new Error("Cannot enumerate without credentials");
    }

    const subRanges = logPartition(range, parts);
    const collection = new ResultCollection();
    const startedAt = Date.now();
    let index = 0;

    console.log(
      `\n🔍 Enumerating stars ${formatRange(range)} across ${subRanges.length} sub-range(s) with ${Math.min(
        credentials.length,
        subRanges.length
      )} credential(s)`
    );

    const worker = async (credential: Credential) => {
      while (true) {
        const current = index++;
        if (current >= subRanges.length) {
          break;
        }
        const subRange = subRanges[current];
        const before = collection.size;
        await this.walk(subRange, credential, collection);
        console.log(
          `✅ [enumerate] ${credential.id} finished ${formatRange(subRange)}: +${collection.size - before} (total ${collection.size.toLocaleString("en-US")})`
        );
      }
    };

    const workerCount = Math.min(credentials.length, subRanges.length);
    await Promise.all(credentials.slice(0, workerCount).map((credential) => worker(credential)));

    const seconds = Math.round((Date.now() - startedAt) / 1000);
    console.log(`✅ Enumeration complete: ${collection.size.toLocaleString("en-US")} unique repositories in ${seconds}s`);
    if (this.stats.saturatedAccepted > 0 || this.stats.incompleteSlices > 0) {
      console.warn(
        `⚠️  Enumeration may be incomplete: ${this.stats.saturatedAccepted} saturated and ${this.stats.incompleteSlices} partial slice(s) were accepted`
      );
    }
    return collection.values();
  }

  /** Walks `subRange` from its high end down to its low end in adaptively sized slices. */
  async walk(subRange: PopularityRange, credential: Credential, collection: ResultCollection): Promise<void> {
    const { tuning, debug } = this.options;
    let cursor = subRange.high;
    let step = initialStep(cursor, tuning);
    let resplits = 0;

    while (cursor >= subRange.low) {
      const slice = { low: Math.max(subRange.low, cursor - step + 1), high: cursor };
      const result = await this.querySlice(slice, credential);
      const count = result.items.length;

      if (isSaturated(count, tuning)) {
        const width = slice.high - slice.low + 1;
        const smaller = shrinkOnSaturation(step, width, tuning);
        if (smaller < width && resplits < tuning.maxResplits) {
          resplits += 1;
          this.stats.resplits += 1;
          if (debug) {
            console.log(
              `   🔄 [${credential.id}] stars ${formatRange(slice)} hit the ${tuning.resultCap} cap (total ${result.totalCount}); re-querying with step ${smaller}`
            );
          }
          step = smaller;
          continue;
        }
        this.stats.saturatedAccepted += 1;
        console.warn(
          `⚠️  [${credential.id}] stars ${formatRange(slice)} still saturated after ${resplits} re-split(s); accepting ${count} of ${result.totalCount}`
        );
      } else {
        step = nextStepSize(count, step, tuning);
      }

      const added = collection.add(result.items);
      if (debug) {
        console.log(
          `   [${credential.id}] stars ${formatRange(slice)}: ${count} found, ${added} new, next step ${step}`
        );
      }
      resplits = 0;
      cursor = slice.low - 1;
    }
  }

  private async querySlice(slice: PopularityRange, credential: Credential): Promise<RangeSearchResult> {
    let result = await this.runQuery(slice, credential);
    for (let attempt = 1; !result.complete && attempt <= this.options.tuning.sliceRetries; attempt += 1) {
      this.stats.retries += 1;
      console.log(`   🔁 [${credential.id}] retrying stars ${formatRange(slice)} (attempt ${attempt + 1})`);
      result = await this.runQuery(slice, credential);
    }
    if (!result.complete) {
      this.stats.incompleteSlices += 1;
      console.warn(
        `⚠️  [${credential.id}] stars ${formatRange(slice)} returned a partial result (${result.items.length} items) after retries`
      );
    }
    return result;
  }

  private async runQuery(slice: PopularityRange, credential: Credential): Promise<RangeSearchResult> {
    this.stats.queries += 1;
    return this.searcher.search(slice, credential);
  }
}
