#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import Table from "cli-table3";
import { pathToFileURL } from "node:url";

import { ChatCompletionsChannel, Classifier } from "./classifier";
import { buildConfig, loadCredentials, readTuning, type HarvesterOptions } from "./config";
import { OctokitGateway } from "./github-api";
import { WebhookNotifier } from "./notify";
import { runPipeline, type PipelineSummary } from "./pipeline";
import { loadSignalCatalog } from "./signals";

const DEFAULT_CLASSIFIER_URL = "http://localhost:11434/v1/chat/completions";
const DEFAULT_CLASSIFIER_MODEL = "llama3.1";

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name("harvest")
    .description("Enumerate popular GitHub repositories by star range and harvest their README files")
    .option("--min-stars <number>", "Lowest star count to include", parseInteger, parseInteger(env.MIN_STARS ?? "500"))
    .option("--max-stars <number>", "Highest star count to include", parseInteger, parseInteger(env.MAX_STARS ?? "500000"))
    .option(
      "-w, --workers <number>",
      "Harvest workers (default: one per token)",
      parseInteger,
      env.HARVEST_WORKERS ? parseInteger(env.HARVEST_WORKERS) : undefined
    )
    .option("--round-size <number>", "Repositories per persisted round (default: derived from hourly quota)", parseInteger)
    .option("-o, --output <path>", "CSV file to append harvested rows to", env.HARVEST_OUTPUT ?? "data/repos.csv")
    .option("--cache-dir <dir>", "Directory for cached enumerations", env.HARVEST_CACHE_DIR ?? "data/cache")
    .option(
      "--cache-ttl <days>",
      "Days before a cached enumeration is considered stale",
      (value) => Number.parseFloat(value),
      Number.parseFloat(env.CACHE_TTL_DAYS ?? "7")
    )
    .option("--refresh", "Ignore cached enumerations and query the API")
    .option(
      "--readme-limit <number>",
      "Maximum README characters kept per repository",
      parseInteger,
      parseInteger(env.README_CHAR_LIMIT ?? "5000")
    )
    .option("--min-contributors <number>", "Skip repositories with fewer contributors", parseInteger, 0)
    .option("--exclude-forks", "Skip forked repositories")
    .option("--classify", "Label repositories with signal emojis through the classification service")
    .option("--tuning <path>", "JSON file overriding enumeration heuristics")
    .option("--reset-margin <seconds>", "Extra seconds to wait past a quota reset", parseInteger, 5)
    .option("--timeout <seconds>", "Timeout for each API call", parseInteger, 30)
    .option("--enumerate-only", "Stop after enumeration and caching")
    .option("--debug", "Enable verbose per-page and per-repository logging");
}

function createClassifier(env: NodeJS.ProcessEnv): Classifier {
  const channel = new ChatCompletionsChannel({
    url: env.CLASSIFIER_API_URL ?? DEFAULT_CLASSIFIER_URL,
    apiKey: env.CLASSIFIER_API_KEY,
    model: env.CLASSIFIER_MODEL ?? DEFAULT_CLASSIFIER_MODEL,
  });
  return new Classifier(channel);
}

export function renderSummary(summary: PipelineSummary): string {
  const table = new Table({ head: ["Metric", "Value"] });
  table.push(
    ["Tokens (usable / rejected)", `${summary.usableCredentials} / ${summary.rejectedCredentials}`],
    ["Candidates", `${summary.candidates.toLocaleString("en-US")} (${summary.source})`]
  );
  if (summary.enumeration) {
    const { queries, resplits, retries, saturatedAccepted, incompleteSlices } = summary.enumeration;
    table.push(
      ["Search queries", queries],
      ["Re-splits / retries", `${resplits} / ${retries}`],
      ["Saturated / partial slices accepted", `${saturatedAccepted} / ${incompleteSlices}`]
    );
  }
  if (summary.harvest) {
    const { rounds, written, skipped, failed, alreadyScraped, quotaWaits } = summary.harvest;
    table.push(
      ["Rounds", rounds],
      ["Rows written", written.toLocaleString("en-US")],
      ["Skipped / failed", `${skipped} / ${failed}`],
      ["Already scraped", alreadyScraped.toLocaleString("en-US")],
      ["Quota waits", quotaWaits]
    );
  }
  return table.toString();
}

async function run(notifier: WebhookNotifier) {
  const program = buildProgram().parse(process.argv);
  const opts = program.opts<HarvesterOptions & { tuning?: string }>();

  if (opts.debug) {
    console.log("ℹ️  Debug mode enabled");
  }

  const tuning = await readTuning(opts.tuning);
  const config = buildConfig(opts, loadCredentials(process.env), tuning);
  const emojiCatalog = await loadSignalCatalog();

  console.log(`ℹ️  Stars ${config.minStars}..${config.maxStars}, ${config.credentials.length} token(s), ${config.workers} worker(s)`);

  const summary = await runPipeline(config, {
    gateway: new OctokitGateway({ timeoutMs: config.requestTimeoutMs }),
    notifier,
    classifier: config.classify ? createClassifier(process.env) : null,
    emojiCatalog,
  });

  console.log("\n✅ Harvest complete:");
  console.log(renderSummary(summary));
  if (!config.enumerateOnly) {
    console.log(`  • CSV: ${config.outputPath}`);
  }
}

const harvesterDirectInvocation = (() => {
  try {
    return pathToFileURL(process.argv[1] ?? "").href === import.meta.url;
  } catch {
    return false;
  }
})();

if (harvesterDirectInvocation) {
  const notifier = new WebhookNotifier(process.env.HARVEST_WEBHOOK_URL);
  run(notifier).catch(async (error) => {
    const message = error instanceof Error ? error.message : String(error);
    await notifier.notify(`❌ Harvester failed: ${message}`);
    console.error("\n❌ Harvester failed:", message);
    process.exit(1);
  });
}
