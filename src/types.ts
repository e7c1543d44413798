/** Traffic cell exactly as read; null for an empty cell */
export type TrafficValue = number | string | boolean | null;

/** One row of the input spreadsheet */
export interface InputRecord {
  url: string;
  traffic: TrafficValue;
}

/** Comment count of a thread, or the terminal state that replaces it */
export type CommentCount = number | "locked" | "archived";

/** Outcome of a successful lookup for a single URL */
export interface LookupResult {
  url: string;
  comment_count: CommentCount;
}

/** Record for a URL whose lookup failed */
export interface LookupError {
  url: string;
  status_code: number | null;
  error_message: string;
}

/** Result of looking up a single URL: discriminated union */
export type LookupOutcome =
  | { success: true; data: LookupResult }
  | { success: false; error: LookupError };

/** Row written to the output spreadsheet */
export interface OutputRecord {
  url: string;
  traffic: TrafficValue;
  comment_count: CommentCount;
}

/** Reddit credentials, read once from the environment */
export interface RedditCredentials {
  clientId?: string;
  clientSecret?: string;
  userAgent?: string;
  username?: string;
  password?: string;
}

/** Thread metadata reported by the API for one submission */
export interface SubmissionStatus {
  id: string;
  locked: boolean;
  archived: boolean;
  numComments: number;
}

/** Anything that can look up a submission by URL */
export interface SubmissionSource {
  fetchSubmission(url: string): Promise<SubmissionStatus>;
}

/** What the enrichment loop produced */
export interface EnrichmentReport {
  records: OutputRecord[];
  failures: LookupError[];
  pauses: number;
}

/** Statistics printed after a run completes */
export interface RunSummary {
  input_file: string;
  output_file: string;
  total_urls: number;
  total_success: number;
  total_errors: number;
  /** Failures Reddit answered with HTTP 429 */
  total_rate_limited: number;
  success_rate: string;
  elapsed_time: string;
  finished_at: string;
}
