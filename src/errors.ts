/**
 * Failures that stop a run before any lookup is made.
 * The pipeline returns these instead of throwing them.
 */
export abstract class SetupError extends Error {
  abstract readonly kind: "input_not_found" | "unsupported_file" | "missing_columns";
}

export class InputNotFoundError extends SetupError {
  readonly kind = "input_not_found";

  constructor(readonly filePath: string) {
    super(`The file '${filePath}' does not exist.`);
    this.name = "InputNotFoundError";
  }
}

export class UnsupportedFileTypeError extends SetupError {
  readonly kind = "unsupported_file";

  constructor(readonly extension: string) {
    super(
      `Unsupported file type "${extension}". Only .csv and .xlsx/.xls are supported.`
    );
    this.name = "UnsupportedFileTypeError";
  }
}

export class MissingColumnError extends SetupError {
  readonly kind = "missing_columns";

  constructor(readonly columns: string[]) {
    super(`Missing required columns: ${columns.join(", ")}`);
    this.name = "MissingColumnError";
  }
}

// ── Per-URL failures ─────────────────────────────────────────────────────────

export class RedditConfigurationError extends Error {
  constructor(readonly missing: string[]) {
    super(`Reddit credentials not configured: ${missing.join(", ")}`);
    this.name = "RedditConfigurationError";
  }
}

export class RedditAuthError extends Error {
  constructor(reason: string) {
    super(`Reddit authentication failed: ${reason}`);
    this.name = "RedditAuthError";
  }
}

export class InvalidSubmissionUrlError extends Error {
  constructor(readonly url: string, reason = "not a submission URL") {
    super(`Invalid URL (${reason}): ${url}`);
    this.name = "InvalidSubmissionUrlError";
  }
}

export class SubmissionNotFoundError extends Error {
  constructor(readonly submissionId: string) {
    super(`Submission ${submissionId} not found`);
    this.name = "SubmissionNotFoundError";
  }
}
