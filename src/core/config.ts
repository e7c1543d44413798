import { RedditCredentials } from "../types";

export const DEFAULT_OUTPUT_PATH = "output.xlsx";
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_PAUSE_MS = 60_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 16_000;

/** Environment variable that feeds each credential field */
export const CREDENTIAL_ENV_VARS: Record<keyof RedditCredentials, string> = {
  clientId: "REDDIT_CLIENT_ID",
  clientSecret: "REDDIT_CLIENT_SECRET",
  userAgent: "REDDIT_USER_AGENT",
  username: "REDDIT_USERNAME",
  password: "REDDIT_PASSWORD",
};

const CREDENTIAL_KEYS: (keyof RedditCredentials)[] = [
  "clientId",
  "clientSecret",
  "userAgent",
  "username",
  "password",
];

/**
 * Read Reddit credentials from the environment.
 * Empty values count as unset. Nothing is validated here: the session
 * reports missing credentials when it first authenticates.
 */
export function loadRedditCredentials(
  env: NodeJS.ProcessEnv = process.env
): RedditCredentials {
  const read = (key: keyof RedditCredentials): string | undefined => {
    const value = env[CREDENTIAL_ENV_VARS[key]];
    return value ? value : undefined;
  };

  return {
    clientId: read("clientId"),
    clientSecret: read("clientSecret"),
    userAgent: read("userAgent"),
    username: read("username"),
    password: read("password"),
  };
}

/** Names of the environment variables whose credential is unset */
export function missingCredentials(credentials: RedditCredentials): string[] {
  return CREDENTIAL_KEYS.filter((key) => !credentials[key]).map(
    (key) => CREDENTIAL_ENV_VARS[key]
  );
}
