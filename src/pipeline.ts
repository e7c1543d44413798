import * as fs from "fs";
import { InputRecord, RedditCredentials, RunSummary, SubmissionSource } from "./types";
import { SetupError } from "./errors";
import { readInputRecords } from "./core/file-reader";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_PAUSE_MS,
} from "./core/config";
import { formatDuration } from "./core/utils";
import { createRedditSession } from "./reddit-client";
import { enrichRecords } from "./enricher";
import { exportResults } from "./exporter";

const RATE_LIMITED_STATUS = 429;

export interface ProcessOptions {
  outputPath?: string;
  batchSize?: number;
  pauseMs?: number;
  /** Used to build the session when `source` is not given */
  credentials?: RedditCredentials;
  source?: SubmissionSource;
  sleep?: (ms: number) => Promise<void>;
  exists?: (candidate: string) => boolean;
  log?: (line: string) => void;
}

export type PipelineResult =
  | { success: true; outputPath: string; summary: RunSummary }
  | { success: false; error: SetupError };

/**
 * Read the input spreadsheet, look up every URL on Reddit and save the
 * enriched rows. Setup problems come back as `{ success: false }` before
 * any request is made; errors while writing the output are thrown.
 * @param filePath - Input spreadsheet with "URL" and traffic columns
 */
export async function processUrls(
  filePath: string,
  options: ProcessOptions = {}
): Promise<PipelineResult> {
  const log = options.log ?? ((line: string) => console.log(line));
  const outputPath = options.outputPath ?? DEFAULT_OUTPUT_PATH;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;

  // ── Step 1: Load URLs ─────────────────────────────────────────────
  log(`Step 1: Reading URLs from file: ${filePath}...`);
  let inputs: InputRecord[];
  try {
    inputs = readInputRecords(filePath);
  } catch (err: unknown) {
    if (err instanceof SetupError) return { success: false, error: err };
    throw err;
  }
  log(`   Found ${inputs.length} URLs\n`);

  // ── Step 2: Look up threads ───────────────────────────────────────
  const source =
    options.source ?? createRedditSession(options.credentials ?? {});
  log(`Step 2: Checking ${inputs.length} threads (pause every ${batchSize})...`);

  const startTime = Date.now();
  const report = await enrichRecords(inputs, source, {
    batchSize,
    pauseMs,
    sleep: options.sleep,
    onItemDone: (index, total, url, outcome) => {
      if (outcome.success) {
        log(`   [${index}/${total}]  + ${outcome.data.comment_count} ${url}`);
      } else {
        log(`   [${index}/${total}]  x ${url}`);
        log(`      Error processing URL ${url}: ${outcome.error.error_message}`);
      }
    },
    onPause: (index, total, ms) => {
      log(
        `   Processed ${index}/${total} URLs. Sleeping for ${formatDuration(ms)} to avoid rate limits.`
      );
    },
  });
  const elapsed = Date.now() - startTime;

  // ── Step 3: Export ────────────────────────────────────────────────
  log("\nStep 3: Exporting...");
  const writtenPath = exportResults(
    report.records,
    outputPath,
    options.exists ?? fs.existsSync
  );
  log(`   ${writtenPath} (${report.records.length} rows)`);

  const total = inputs.length;
  const rateLimited = report.failures.filter(
    (f) => f.status_code === RATE_LIMITED_STATUS
  ).length;
  const successRate =
    total > 0
      ? ((report.records.length / total) * 100).toFixed(1) + "%"
      : "0%";

  const summary: RunSummary = {
    input_file: filePath,
    output_file: writtenPath,
    total_urls: total,
    total_success: report.records.length,
    total_errors: report.failures.length,
    total_rate_limited: rateLimited,
    success_rate: successRate,
    elapsed_time: formatDuration(elapsed),
    finished_at: new Date().toISOString(),
  };

  // ── Done ──────────────────────────────────────────────────────────
  log(`\nDone in ${summary.elapsed_time}`);
  log(`   Success: ${summary.total_success}/${total} (${successRate})`);
  log(`   Errors:  ${summary.total_errors}/${total}`);
  if (rateLimited > 0) {
    log(`   Rate limited (HTTP 429): ${rateLimited}/${total}`);
  }
  log(`Process completed. Results saved to --> ${writtenPath}.`);

  return { success: true, outputPath: writtenPath, summary };
}
