import { describe, it, expect, vi } from "vitest";
import { AxiosError, AxiosHeaders, InternalAxiosRequestConfig } from "axios";
import { checkPost, enrichRecords } from "./enricher";
import { InputRecord, SubmissionSource, SubmissionStatus } from "./types";

type Fixture = Partial<Omit<SubmissionStatus, "id">> | Error;

/** Source answering from a table; unknown URLs fail */
function tableSource(table: Record<string, Fixture>) {
  const fetchSubmission = vi.fn(async (url: string): Promise<SubmissionStatus> => {
    const entry = table[url];
    if (entry === undefined) throw new Error(`no fixture for ${url}`);
    if (entry instanceof Error) throw entry;
    return { id: "x", locked: false, archived: false, numComments: 0, ...entry };
  });
  const source: SubmissionSource = { fetchSubmission };
  return { source, fetchSubmission };
}

const noSleep = () => vi.fn(async (_ms: number) => {});

// =============================================================================
// checkPost
// =============================================================================

describe("checkPost", () => {
  it("maps thread state to a comment count", async () => {
    const { source } = tableSource({
      "https://redd.it/open": { numComments: 12 },
      "https://redd.it/empty": { numComments: 0 },
      "https://redd.it/locked": { locked: true, numComments: 5 },
      "https://redd.it/archived": { archived: true, numComments: 5 },
      "https://redd.it/both": { locked: true, archived: true },
    });

    const counts: (number | string)[] = [];
    for (const id of ["open", "empty", "locked", "archived", "both"]) {
      const outcome = await checkPost(source, `https://redd.it/${id}`);
      counts.push(outcome.success ? outcome.data.comment_count : "failed");
    }

    expect(counts).toEqual([12, 0, "locked", "archived", "locked"]);
  });

  it("turns a thrown HTTP error into a failed outcome", async () => {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    const rateLimited = new AxiosError("Too Many Requests", "ERR_BAD_REQUEST", config, null, {
      data: {},
      status: 429,
      statusText: "Too Many Requests",
      headers: {},
      config,
    });
    const { source } = tableSource({ "https://redd.it/busy": rateLimited });

    expect(await checkPost(source, "https://redd.it/busy")).toEqual({
      success: false,
      error: {
        url: "https://redd.it/busy",
        status_code: 429,
        error_message: "HTTP 429: rate limited by Reddit",
      },
    });
  });
});

// =============================================================================
// enrichRecords
// =============================================================================

describe("enrichRecords", () => {
  it("drops the URL whose lookup fails and keeps the other", async () => {
    const { source } = tableSource({
      "https://reddit.com/r/x/1": { numComments: 3 },
      "https://reddit.com/r/x/2": new Error("boom"),
    });
    const inputs: InputRecord[] = [
      { url: "https://reddit.com/r/x/1", traffic: 50 },
      { url: "https://reddit.com/r/x/2", traffic: 10 },
    ];

    const report = await enrichRecords(inputs, source, { sleep: noSleep() });

    expect(report.records).toEqual([
      { url: "https://reddit.com/r/x/1", traffic: 50, comment_count: 3 },
    ]);
    expect(report.failures).toEqual([
      { url: "https://reddit.com/r/x/2", status_code: null, error_message: "boom" },
    ]);
    expect(report.pauses).toBe(0);
  });

  it("keeps input order and pairs each URL with its own traffic", async () => {
    const { source } = tableSource({
      "https://redd.it/a": { numComments: 1 },
      "https://redd.it/b": new Error("deleted"),
      "https://redd.it/c": { archived: true },
      "https://redd.it/d": { numComments: 4 },
    });
    const inputs: InputRecord[] = [
      { url: "https://redd.it/a", traffic: 400 },
      { url: "https://redd.it/b", traffic: 300 },
      { url: "https://redd.it/c", traffic: null },
      { url: "https://redd.it/d", traffic: 100 },
    ];

    const report = await enrichRecords(inputs, source, { sleep: noSleep() });

    expect(report.records).toEqual([
      { url: "https://redd.it/a", traffic: 400, comment_count: 1 },
      { url: "https://redd.it/c", traffic: null, comment_count: "archived" },
      { url: "https://redd.it/d", traffic: 100, comment_count: 4 },
    ]);
  });

  it("carries non-numeric traffic cells through unchanged", async () => {
    const { source } = tableSource({ "https://redd.it/a": { numComments: 2 } });

    const report = await enrichRecords(
      [{ url: "https://redd.it/a", traffic: "n/a" }],
      source,
      { sleep: noSleep() }
    );

    expect(report.records).toEqual([
      { url: "https://redd.it/a", traffic: "n/a", comment_count: 2 },
    ]);
  });

  it("uses the last traffic value when a URL repeats", async () => {
    const { source } = tableSource({ "https://redd.it/a": { numComments: 2 } });
    const inputs: InputRecord[] = [
      { url: "https://redd.it/a", traffic: 5 },
      { url: "https://redd.it/a", traffic: 7 },
    ];

    const report = await enrichRecords(inputs, source, { sleep: noSleep() });

    expect(report.records.map((r) => r.traffic)).toEqual([7, 7]);
  });

  it("reports progress for every URL, failed or not", async () => {
    const { source } = tableSource({
      "https://redd.it/a": { numComments: 1 },
      "https://redd.it/b": new Error("boom"),
    });
    const onItemDone = vi.fn();

    await enrichRecords(
      [
        { url: "https://redd.it/a", traffic: 1 },
        { url: "https://redd.it/b", traffic: 2 },
      ],
      source,
      { sleep: noSleep(), onItemDone }
    );

    expect(onItemDone.mock.calls.map((c) => [c[0], c[1], c[2], c[3].success])).toEqual([
      [1, 2, "https://redd.it/a", true],
      [2, 2, "https://redd.it/b", false],
    ]);
  });

  it("pauses after the 100th and 200th of 250 URLs", async () => {
    const table: Record<string, Fixture> = {};
    const inputs: InputRecord[] = [];
    for (let i = 1; i <= 250; i++) {
      const url = `https://redd.it/t${i}`;
      // every seventh lookup fails; failures still count toward the batch
      table[url] = i % 7 === 0 ? new Error("boom") : { numComments: i };
      inputs.push({ url, traffic: i });
    }
    const { source, fetchSubmission } = tableSource(table);
    const sleep = noSleep();
    const onPause = vi.fn();

    const report = await enrichRecords(inputs, source, {
      batchSize: 100,
      sleep,
      onPause,
    });

    expect(fetchSubmission).toHaveBeenCalledTimes(250);
    expect(sleep.mock.calls).toEqual([[60_000], [60_000]]);
    expect(onPause.mock.calls).toEqual([
      [100, 250, 60_000],
      [200, 250, 60_000],
    ]);
    expect(report.pauses).toBe(2);
  });

  it("pauses after the last URL when the total is a multiple of the batch size", async () => {
    const { source } = tableSource({
      "https://redd.it/a": { numComments: 1 },
      "https://redd.it/b": { numComments: 1 },
    });
    const sleep = noSleep();

    await enrichRecords(
      [
        { url: "https://redd.it/a", traffic: 1 },
        { url: "https://redd.it/b", traffic: 1 },
      ],
      source,
      { batchSize: 1, pauseMs: 5, sleep }
    );

    expect(sleep.mock.calls).toEqual([[5], [5]]);
  });

  it("rejects a batch size that is not a positive integer", async () => {
    const { source, fetchSubmission } = tableSource({});

    await expect(
      enrichRecords([{ url: "https://redd.it/a", traffic: 1 }], source, {
        batchSize: 0,
      })
    ).rejects.toBeInstanceOf(RangeError);
    expect(fetchSubmission).not.toHaveBeenCalled();
  });
});
