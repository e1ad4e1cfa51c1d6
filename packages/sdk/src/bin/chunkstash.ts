#!/usr/bin/env tsx
/**
 * chunkstash CLI
 */

import { parseArgs, reportFatal, runCli } from '../cli.js';

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  return runCli(parsed);
}

main().then(
  (status) => {
    process.exitCode = status;
  },
  (error: unknown) => {
    reportFatal(error);
    process.exit(1);
  },
);
