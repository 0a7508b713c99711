import fs from "fs-extra";
import type { DetailRecord } from "./types";

export const CHECKPOINT_VERSION = 2;

export const CSV_COLUMNS = [
  "repo_owner",
  "repo_name",
  "repo_url",
  "repo_stars",
  "forks",
  "watchers",
  "open_issues",
  "language",
  "license",
  "fork",
  "archived",
  "created_at",
  "pushed_at",
  "description",
  "topics",
  "contributors",
  "found_emojis",
  "affiliation",
  "readme",
] as const;

export interface Checkpoint {
  version: number;
  updatedAt: string;
  /** Byte length of the CSV once the rows of every settled identity are in it. */
  committedSize: number;
  identities: string[];
}

/** Append-only destination for harvested rounds. */
export interface RecordSink {
  /** Persists one round. `settled` is every identity finished so far, written or skipped. */
  append(records: DetailRecord[], settled: ReadonlySet<string>): Promise<void>;
  loadSettled(): Promise<Set<string>>;
}

function csvCell(value: string | number | boolean | null): string {
  const text = value === null ? "" : String(value);
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsvRow(record: DetailRecord): string {
  return [
    record.owner,
    record.name,
    record.url,
    record.stars,
    record.forks,
    record.watchers,
    record.openIssues,
    record.language,
    record.license,
    record.fork,
    record.archived,
    record.createdAt,
    record.pushedAt,
    record.description,
    record.topics.join(";"),
    record.contributors,
    record.foundEmojis.join(" "),
    record.affiliation,
    record.readme,
  ]
    .map(csvCell)
    .join(",");
}

function isCheckpoint(value: unknown): value is Checkpoint {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    value.version === CHECKPOINT_VERSION &&
    "committedSize" in value &&
    typeof value.committedSize === "number" &&
    "identities" in value &&
    Array.isArray(value.identities) &&
    value.identities.every((identity: unknown) => typeof identity === "string")
  );
}

const HEADER_LINE = `${CSV_COLUMNS.map(csvCell).join(",")}\n`;

export interface Committed {
  size: number;
  identities: string[];
}

/**
 * CSV file plus a JSON checkpoint of settled identities beside it. The
 * checkpoint records how many CSV bytes belong to committed rounds; bytes
 * past that length come from a round that never committed and are cut off
 * before a resumed run appends again.
 */
export class CsvRecordSink implements RecordSink {
  private committed: Committed | null = null;

  constructor(
    private readonly outputPath: string,
    private readonly checkpointPath: string,
    private readonly now: () => number = Date.now
  ) {}

  async append(records: DetailRecord[], settled: ReadonlySet<string>): Promise<void> {
    if (!this.committed) {
      await this.loadSettled();
    }
    const previous = this.committed ?? { size: 0, identities: [] };
    // Pin the committed length before touching the CSV.
    await this.writeCheckpoint(previous);

    const lines = records.map(toCsvRow);
    const text = `${previous.size === 0 ? HEADER_LINE : ""}${lines.map((line) => `${line}\n`).join("")}`;
    if (text.length > 0) {
      await fs.ensureFile(this.outputPath);
      await fs.appendFile(this.outputPath, text, "utf8");
    }

    const next: Committed = { size: await this.fileSize(), identities: Array.from(settled) };
    await this.writeCheckpoint(next);
    this.committed = next;
  }

  /**
   * Identities settled by an earlier run. Rows from a round whose checkpoint
   * was never written are truncated away so the round is harvested again.
   */
  async loadSettled(): Promise<Set<string>> {
    this.committed = await this.readCommitted();
    return new Set(this.committed.identities);
  }

  protected async writeCheckpoint(committed: Committed): Promise<void> {
    const checkpoint: Checkpoint = {
      version: CHECKPOINT_VERSION,
      updatedAt: new Date(this.now()).toISOString(),
      committedSize: committed.size,
      identities: committed.identities,
    };
    const tmpPath = `${this.checkpointPath}.tmp`;
    await fs.outputJson(tmpPath, checkpoint);
    await fs.move(tmpPath, this.checkpointPath, { overwrite: true });
  }

  private async readCommitted(): Promise<Committed> {
    if (!(await fs.pathExists(this.outputPath))) {
      return { size: 0, identities: [] };
    }
    const size = await this.fileSize();
    const checkpoint = await this.readCheckpoint();

    if (!checkpoint) {
      if (size === 0 || (await fs.readFile(this.outputPath, "utf8")) === HEADER_LINE) {
        return { size, identities: [] };
      }
      throw new Error(
        `${this.outputPath} has rows but no usable checkpoint at ${this.checkpointPath}; move the CSV aside to start over`
      );
    }
    if (size < checkpoint.committedSize) {
      throw new Error(
        `${this.outputPath} is shorter (${size} bytes) than its checkpoint records (${checkpoint.committedSize} bytes)`
      );
    }
    if (size > checkpoint.committedSize) {
      console.warn(
        `⚠️  Discarding ${size - checkpoint.committedSize} byte(s) of uncommitted rows from ${this.outputPath}`
      );
      await fs.truncate(this.outputPath, checkpoint.committedSize);
    }
    return { size: checkpoint.committedSize, identities: checkpoint.identities };
  }

  private async readCheckpoint(): Promise<Checkpoint | null> {
    if (!(await fs.pathExists(this.checkpointPath))) {
      return null;
    }
    try {
      const parsed: unknown = await fs.readJson(this.checkpointPath);
      if (isCheckpoint(parsed)) {
        return parsed;
      }
      console.warn(`⚠️  Ignoring unrecognised checkpoint ${this.checkpointPath}`);
    } catch (error) {
      console.warn(
        `⚠️  Failed to read checkpoint ${this.checkpointPath}:`,
        error instanceof Error ? error.message : error
      );
    }
    return null;
  }

  private async fileSize(): Promise<number> {
    const stats = await fs.stat(this.outputPath);
    return stats.size;
  }
}
