import type { Classifier } from "./classifier";
import type { HarvesterConfig } from "./config";
import { CredentialPool } from "./credential-pool";
import { DetailFetcher } from "./detail-fetcher";
import { discoverCandidates, type CandidateSource } from "./discovery";
import { EnumerationCache } from "./enumeration-cache";
import { SpaceEnumerator, type EnumerationStats } from "./enumerator";
import type { Notifier } from "./notify";
import { formatRange } from "./partition";
import { probeCredentials, seedPools } from "./probe";
import { RangeSearchClient } from "./range-search";
import { HarvestScheduler, type HarvestSummary } from "./scheduler";
import type { SignalEmoji } from "./signals";
import { CsvRecordSink } from "./sink";
import { sleep, type GithubGateway, type Sleeper } from "./types";

export interface PipelineDependencies {
  gateway: GithubGateway;
  notifier: Notifier;
  classifier: Classifier | null;
  emojiCatalog: SignalEmoji[];
  sleeper?: Sleeper;
  now?: () => number;
}

export interface PipelineSummary {
  usableCredentials: number;
  rejectedCredentials: number;
  candidates: number;
  source: CandidateSource;
  enumeration: EnumerationStats | null;
  harvest: HarvestSummary | null;
}

export async function runPipeline(config: HarvesterConfig, deps: PipelineDependencies): Promise<PipelineSummary> {
  const sleeper = deps.sleeper ?? sleep;
  const now = deps.now ?? Date.now;

  const probe = await probeCredentials(deps.gateway, config.credentials);
  if (probe.usable.length === 0) {
    throw new Error("No usable GitHub credentials; every token was rejected");
  }
  const credentials = probe.usable.map((probed) => probed.credential);

  const searchPool = new CredentialPool(credentials, {
    resource: "search",
    lowWatermark: config.searchLowWatermark,
    ceiling: config.searchCeiling,
    now,
  });
  const corePool = new CredentialPool(credentials, {
    resource: "core",
    lowWatermark: config.coreLowWatermark,
    ceiling: config.coreCeiling,
    now,
  });
  seedPools(probe, searchPool, corePool);

  const range = { low: config.minStars, high: config.maxStars };
  const cache = new EnumerationCache(config.cacheDir, config.cacheTtlMs, now, config.debug);
  const searchClient = new RangeSearchClient(deps.gateway, searchPool, {
    resultCap: config.tuning.resultCap,
    pageSize: config.tuning.pageSize,
    sleeper,
    resetMarginMs: config.resetMarginMs,
    now,
    debug: config.debug,
  });
  const enumerator = new SpaceEnumerator(searchClient, searchPool, { tuning: config.tuning, debug: config.debug });

  const discovery = await discoverCandidates(range, {
    cache,
    enumerate: (target) => enumerator.enumerate(target),
    forceRefresh: config.forceRefresh,
  });
  const enumeration = discovery.source === "cache" ? null : enumerator.stats;
  await deps.notifier.notify(
    `🔍 Enumeration finished for stars ${formatRange(range)}: ${discovery.objects.length.toLocaleString("en-US")} repositories (${discovery.source})`
  );

  const summary: PipelineSummary = {
    usableCredentials: credentials.length,
    rejectedCredentials: probe.rejected.length,
    candidates: discovery.objects.length,
    source: discovery.source,
    enumeration,
    harvest: null,
  };
  if (config.enumerateOnly) {
    return summary;
  }

  const sink = new CsvRecordSink(config.outputPath, config.checkpointPath, now);
  const alreadyScraped = await sink.loadSettled();
  const fetcher = new DetailFetcher(deps.gateway, corePool, {
    readmeCharLimit: config.readmeCharLimit,
    minContributors: config.minContributors,
    excludeForks: config.excludeForks,
    emojiCatalog: deps.emojiCatalog,
    classifier: deps.classifier,
    now,
    debug: config.debug,
  });
  const scheduler = new HarvestScheduler(fetcher, corePool, sink, {
    workers: config.workers,
    roundSize: config.roundSize,
    resetMarginMs: config.resetMarginMs,
    sleeper,
    now,
    notifier: deps.notifier,
    debug: config.debug,
  });

  summary.harvest = await scheduler.run(discovery.objects, alreadyScraped);
  await deps.notifier.notify(
    `🏁 Harvest finished: ${summary.harvest.written.toLocaleString("en-US")} written, ${summary.harvest.skipped.toLocaleString(
      "en-US"
    )} skipped in ${summary.harvest.rounds} round(s)`
  );
  return summary;
}
