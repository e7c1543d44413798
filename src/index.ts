#!/usr/bin/env node
import * as dotenv from "dotenv";
import { runCli } from "./cli";

async function main(): Promise<void> {
  dotenv.config();
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fatal: ${message}`);
  process.exitCode = 1;
});
