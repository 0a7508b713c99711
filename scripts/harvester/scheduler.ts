import type { CredentialPool } from "./credential-pool";
import type { FetchOutcome } from "./detail-fetcher";
import type { Notifier } from "./notify";
import type { RecordSink } from "./sink";
import type { CandidateObject, Credential, DetailRecord, Sleeper } from "./types";

export type WorkerState = "ready" | "fetching" | "exhausted" | "done";

export interface DetailSource {
  fetch(candidate: CandidateObject, credential: Credential): Promise<FetchOutcome>;
}

export interface HarvestSchedulerOptions {
  workers: number;
  roundSize: number;
  resetMarginMs: number;
  sleeper: Sleeper;
  now?: () => number;
  notifier?: Notifier;
  debug?: boolean;
}

export interface HarvestSummary {
  candidates: number;
  alreadyScraped: number;
  rounds: number;
  written: number;
  skipped: number;
  failed: number;
  quotaWaits: number;
}

interface RoundResult {
  records: DetailRecord[];
  skipped: number;
  failed: number;
  unprocessed: CandidateObject[];
}

/** Splits credentials into one group per worker; with more workers than credentials, groups share. */
export function assignCredentialGroups(credentials: readonly Credential[], workers: number): Credential[][] {
  if (credentials.length === 0) {
    return [];
  }
  return Array.from({ length: workers }, (_, worker) =>
    workers <= credentials.length
      ? credentials.filter((_, index) => index % workers === worker)
      : [credentials[worker % credentials.length]]
  );
}

/**
 * Harvests detail records in rounds. Each round is persisted before the next
 * starts; when every credential is exhausted the whole pipeline sleeps until
 * the earliest reset.
 */
export class HarvestScheduler {
  private workerStates: WorkerState[] = [];

  constructor(
    private readonly fetcher: DetailSource,
    private readonly pool: CredentialPool,
    private readonly sink: RecordSink,
    private readonly options: HarvestSchedulerOptions
  ) {}

  get states(): readonly WorkerState[] {
    return this.workerStates;
  }

  async run(candidates: CandidateObject[], alreadyScraped: ReadonlySet<string> = new Set()): Promise<HarvestSummary> {
    const settled = new Set(alreadyScraped);
    let pending = candidates.filter((candidate) => !settled.has(candidate.identity));
    const summary: HarvestSummary = {
      candidates: candidates.length,
      alreadyScraped: candidates.length - pending.length,
      rounds: 0,
      written: 0,
      skipped: 0,
      failed: 0,
      quotaWaits: 0,
    };

    console.log(
      `\n⏳ Harvesting ${pending.length.toLocaleString("en-US")} repositories (${summary.alreadyScraped.toLocaleString(
        "en-US"
      )} already scraped) with ${this.options.workers} worker(s)`
    );

    while (pending.length > 0) {
      summary.rounds += 1;
      const chunk = pending.slice(0, this.options.roundSize);
      const rest = pending.slice(this.options.roundSize);

      const before = pending.length;
      const round = await this.runRound(chunk, settled);
      await this.sink.append(round.records, settled);

      summary.written += round.records.length;
      summary.skipped += round.skipped;
      summary.failed += round.failed;
      pending = [...round.unprocessed, ...rest];

      const message = `Round ${summary.rounds}: wrote ${round.records.length}, skipped ${round.skipped}, ${pending.length.toLocaleString(
        "en-US"
      )} remaining`;
      console.log(`✅ ${message}`);
      await this.options.notifier?.notify(`✅ ${message}`);

      const stalled = pending.length >= before;
      if (pending.length > 0 && (this.pool.allExhausted() || stalled)) {
        await this.waitForQuota();
        summary.quotaWaits += 1;
      }
    }

    return summary;
  }

  private async runRound(chunk: CandidateObject[], settled: Set<string>): Promise<RoundResult> {
    const groups = assignCredentialGroups(this.pool.list(), this.options.workers);
    const result: RoundResult = { records: [], skipped: 0, failed: 0, unprocessed: [] };
    const claimed = new Set<string>();
    let index = 0;
    this.workerStates = groups.map(() => "ready");

    const worker = async (workerIndex: number, group: Credential[]) => {
      const tag = `[W${workerIndex + 1}]`;
      const setState = (state: WorkerState) => {
        this.workerStates[workerIndex] = state;
      };

      while (this.workerStates[workerIndex] === "ready") {
        if (this.pool.allExhausted()) {
          setState("exhausted");
          break;
        }
        const current = index++;
        if (current >= chunk.length) {
          setState("done");
          break;
        }
        const candidate = chunk[current];
        if (settled.has(candidate.identity) || claimed.has(candidate.identity)) {
          continue;
        }
        claimed.add(candidate.identity);
        setState("fetching");

        let outcome: FetchOutcome | null;
        try {
          outcome = await this.fetchWithGroup(candidate, group);
        } catch (error) {
          console.error(
            `❌ ${tag} Failed to harvest ${candidate.fullName}: ${error instanceof Error ? error.message : String(error)}`
          );
          result.failed += 1;
          setState("ready");
          continue;
        }

        if (outcome === null) {
          claimed.delete(candidate.identity);
          result.unprocessed.push(candidate);
          if (this.options.debug) {
            console.log(`⏸️  ${tag} all credentials in group limited; stopping for this round`);
          }
          setState("exhausted");
          break;
        }

        settled.add(candidate.identity);
        if (outcome.kind === "record") {
          result.records.push(outcome.record);
          if (this.options.debug) {
            console.log(`   ${tag} ${candidate.fullName} (${outcome.record.stars}★)`);
          }
        } else if (outcome.kind === "skipped") {
          result.skipped += 1;
          if (this.options.debug) {
            console.log(`   ${tag} skipped ${candidate.fullName}: ${outcome.reason}`);
          }
        }
        setState("ready");
      }
    };

    await Promise.all(groups.map((group, workerIndex) => worker(workerIndex, group)));

    result.unprocessed.push(...chunk.slice(Math.min(index, chunk.length)));
    return result;
  }

  /** Returns null when no credential in `group` is usable. */
  private async fetchWithGroup(candidate: CandidateObject, group: Credential[]): Promise<FetchOutcome | null> {
    while (true) {
      const credential = this.pool.acquireUsable(group);
      if (!credential) {
        return null;
      }
      const outcome = await this.fetcher.fetch(candidate, credential);
      if (outcome.kind !== "rate-limited") {
        return outcome;
      }
      if (!this.pool.stateOf(credential).limited) {
        this.pool.markLimited(credential, null);
      }
    }
  }

  /**
   * Sleeps until the earliest reset when every credential is exhausted, then
   * releases them all. A round that stalled with some credentials still usable
   * only waits out the margin and releases the credentials whose reset passed.
   */
  private async waitForQuota() {
    const now = (this.options.now ?? Date.now)();
    const exhausted = this.pool.allExhausted();
    const reset = exhausted ? this.pool.earliestReset() : null;
    const waitMs = Math.max(0, reset ? reset.getTime() - now : 0) + this.options.resetMarginMs;
    const message = `${exhausted ? "All credentials exhausted" : "Round made no progress"}. Sleeping ${Math.ceil(waitMs / 1000)}s until ${
      reset ? reset.toISOString() : "the safety margin elapses"
    }`;
    console.log(`⏸️  ${message}…`);
    await this.options.notifier?.notify(`⏸️ ${message}`);
    await this.options.sleeper(waitMs);
    if (exhausted) {
      this.pool.resetAll();
    } else {
      this.pool.releaseExpired();
    }
  }
}
