import { AxiosInstance } from "axios";
import { z } from "zod";
import { RedditCredentials, SubmissionSource, SubmissionStatus } from "./types";
import { DEFAULT_REQUEST_TIMEOUT_MS, missingCredentials } from "./core/config";
import { createHttpClient } from "./core/utils";
import {
  InvalidSubmissionUrlError,
  RedditAuthError,
  RedditConfigurationError,
  SubmissionNotFoundError,
} from "./errors";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const OAUTH_BASE = "https://oauth.reddit.com";

/** Tokens are refreshed this long before Reddit says they expire */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().optional(),
  expires_in: z.number().optional(),
  error: z.union([z.string(), z.number()]).optional(),
});

const InfoListingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.object({
          id: z.string(),
          locked: z.boolean(),
          archived: z.boolean(),
          num_comments: z.number().int().nonnegative(),
        }),
      })
    ),
  }),
});

export interface RedditSessionOptions {
  /** Pre-built HTTP client; defaults to one carrying the credentials' user agent */
  http?: AxiosInstance;
  timeout?: number;
  now?: () => number;
}

/**
 * Extract the base36 submission id from a Reddit URL.
 * Understands /comments/<id>/..., /gallery/<id> and redd.it/<id> links.
 */
export function submissionIdFromUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidSubmissionUrlError(url, "unparseable");
  }

  const parts = parsed.pathname.split("/").filter((p) => p !== "");
  let id: string | undefined;

  if (parts.includes("gallery")) {
    id = parts[parts.indexOf("gallery") + 1];
  } else if (parts.includes("comments")) {
    id = parts[parts.indexOf("comments") + 1];
  } else {
    if (parts.includes("r")) {
      throw new InvalidSubmissionUrlError(url, "subreddit, not submission");
    }
    id = parts[parts.length - 1];
  }

  if (!id || !/^[a-z0-9]+$/i.test(id)) {
    throw new InvalidSubmissionUrlError(url);
  }
  return id;
}

/**
 * Create one authenticated handle to the Reddit API.
 * Nothing is checked or fetched here; credentials are exchanged for a
 * token on the first lookup, and that token is reused afterwards.
 */
export function createRedditSession(
  credentials: RedditCredentials,
  options: RedditSessionOptions = {}
): SubmissionSource {
  const http =
    options.http ??
    createHttpClient(
      options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS,
      credentials.userAgent
    );
  const now = options.now ?? Date.now;
  let token: { value: string; expiresAt: number } | null = null;

  async function accessToken(): Promise<string> {
    if (token && now() < token.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return token.value;
    }

    const { clientId, clientSecret, userAgent, username, password } =
      credentials;
    if (!clientId || !clientSecret || !userAgent || !username || !password) {
      throw new RedditConfigurationError(missingCredentials(credentials));
    }

    const response = await http.post<unknown>(
      TOKEN_URL,
      new URLSearchParams({ grant_type: "password", username, password }).toString(),
      {
        auth: { username: clientId, password: clientSecret },
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      }
    );

    const body = TokenResponseSchema.safeParse(response.data);
    if (!body.success) {
      throw new RedditAuthError("unexpected token response");
    }
    // Reddit answers a bad username/password with 200 and an error field
    if (body.data.error !== undefined || !body.data.access_token) {
      throw new RedditAuthError(String(body.data.error ?? "no access token"));
    }

    token = {
      value: body.data.access_token,
      expiresAt: now() + (body.data.expires_in ?? 3600) * 1000,
    };
    return token.value;
  }

  return {
    async fetchSubmission(url: string): Promise<SubmissionStatus> {
      const id = submissionIdFromUrl(url);
      const bearer = await accessToken();

      const response = await http.get<unknown>(`${OAUTH_BASE}/api/info`, {
        params: { id: `t3_${id}`, raw_json: 1 },
        headers: { Authorization: `bearer ${bearer}` },
      });

      const listing = InfoListingSchema.safeParse(response.data);
      if (!listing.success) {
        const issue = listing.error.issues[0];
        throw new Error(
          `Unexpected response from Reddit for ${id}: ${issue?.path.join(".")} ${issue?.message}`
        );
      }

      const submission = listing.data.data.children.find((c) => c.kind === "t3");
      if (!submission) {
        throw new SubmissionNotFoundError(id);
      }

      return {
        id: submission.data.id,
        locked: submission.data.locked,
        archived: submission.data.archived,
        numComments: submission.data.num_comments,
      };
    },
  };
}
