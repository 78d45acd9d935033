#!/usr/bin/env node
import { runCli } from "./cli";

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(`fatal: ${detail}`);
  process.exitCode = 1;
});
