import {
  EnrichmentReport,
  InputRecord,
  LookupError,
  LookupOutcome,
  OutputRecord,
  SubmissionSource,
} from "./types";
import { DEFAULT_BATCH_SIZE, DEFAULT_PAUSE_MS } from "./core/config";
import { getErrorMessage, getErrorStatus, sleep } from "./core/utils";

export interface EnrichOptions {
  /** URLs processed (failed ones included) between rate-limit pauses */
  batchSize?: number;
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onItemDone?: (
    index: number,
    total: number,
    url: string,
    outcome: LookupOutcome
  ) => void;
  onPause?: (index: number, total: number, pauseMs: number) => void;
}

/**
 * Look up one thread and map its state to a comment count.
 * Never throws: any failure comes back as `{ success: false }`.
 * @param source - Client session used for the lookup
 * @param url - Thread URL as it appears in the input
 */
export async function checkPost(
  source: SubmissionSource,
  url: string
): Promise<LookupOutcome> {
  try {
    const submission = await source.fetchSubmission(url);
    if (submission.locked) {
      return { success: true, data: { url, comment_count: "locked" } };
    }
    if (submission.archived) {
      return { success: true, data: { url, comment_count: "archived" } };
    }
    return {
      success: true,
      data: { url, comment_count: submission.numComments },
    };
  } catch (err) {
    return {
      success: false,
      error: {
        url,
        status_code: getErrorStatus(err),
        error_message: getErrorMessage(err),
      },
    };
  }
}

/**
 * Look up every URL in order, one at a time, and join each result back to
 * its traffic value. Failed lookups are left out of `records`.
 * Pauses for `pauseMs` after every `batchSize` URLs.
 */
export async function enrichRecords(
  inputs: InputRecord[],
  source: SubmissionSource,
  options: EnrichOptions = {}
): Promise<EnrichmentReport> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
  const wait = options.sleep ?? sleep;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const trafficByUrl = new Map(inputs.map((r) => [r.url, r.traffic]));
  const records: OutputRecord[] = [];
  const failures: LookupError[] = [];
  let pauses = 0;

  for (let i = 0; i < inputs.length; i++) {
    const index = i + 1;
    const { url } = inputs[i];

    const outcome = await checkPost(source, url);
    options.onItemDone?.(index, inputs.length, url, outcome);

    if (outcome.success) {
      records.push({
        url: outcome.data.url,
        traffic: trafficByUrl.get(outcome.data.url) ?? null,
        comment_count: outcome.data.comment_count,
      });
    } else {
      failures.push(outcome.error);
    }

    if (index % batchSize === 0) {
      options.onPause?.(index, inputs.length, pauseMs);
      await wait(pauseMs);
      pauses++;
    }
  }

  return { records, failures, pauses };
}
