import * as fs from "fs";
import { loadRedditCredentials } from "./core/config";
import { getErrorMessage } from "./core/utils";
import { processUrls, ProcessOptions } from "./pipeline";

const HELP_TEXT = `
Usage:
  reddit-thread-enricher <input-file>

Reads an .xlsx/.xls/.csv export with the columns "URL" and
"Traffic with commercial intents in top 20", looks up each Reddit thread
and writes url, traffic and comment_count to output.xlsx.

Environment (a .env file is read too):
  REDDIT_CLIENT_ID, REDDIT_CLIENT_SECRET, REDDIT_USER_AGENT,
  REDDIT_USERNAME, REDDIT_PASSWORD

Options:
  -h, --help  Show this help
`;

export type ParsedCliArgs = { inputFile: string } | "help" | "usage";

export function parseCliArgs(argv: string[]): ParsedCliArgs {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }
  const positional = argv.filter((arg) => !arg.startsWith("-"));
  if (positional.length !== 1) {
    return "usage";
  }
  return { inputFile: positional[0] };
}

/**
 * Run the command line and return the process exit code.
 * Only problems found before the first lookup produce a non-zero code.
 * @param env - Credential source, read once here
 * @param overrides - In-process options passed through to the pipeline
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: ProcessOptions = {}
): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  if (parsed === "usage") {
    console.error(HELP_TEXT.trim());
    return 1;
  }

  const { inputFile } = parsed;
  if (!fs.existsSync(inputFile)) {
    console.error(`Error: The file '${inputFile}' does not exist.`);
    return 1;
  }

  try {
    const result = await processUrls(inputFile, {
      credentials: loadRedditCredentials(env),
      ...overrides,
    });
    if (!result.success) {
      console.error(`Error: ${result.error.message}`);
      return 1;
    }
  } catch (err: unknown) {
    console.error(`An unexpected error occurred: ${getErrorMessage(err)}`);
  }
  return 0;
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
