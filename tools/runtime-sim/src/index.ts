#!/usr/bin/env tsx
/*
 * Headless simulator that builds the demo economy, fast-forwards it and
 * prints a JSON report with formatted amounts to stdout.
 */

import process from 'node:process';

import { createConsoleTelemetry } from '@tickwork/core';

import { parseArgs, runReport, USAGE } from './report.js';

function printHelpAndExit(code: number): never {
  // Keep stdout clean for JSON consumers; print help on stderr.
  console.error(USAGE);
  // eslint-disable-next-line no-process-exit
  process.exit(code);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    printHelpAndExit(0);
  }
  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.message}`);
    printHelpAndExit(2);
  }

  const report = await runReport(parsed.args, createConsoleTelemetry());
  process.stdout.write(`${JSON.stringify(report)}\n`);
}

// eslint-disable-next-line unicorn/prefer-top-level-await
main().catch((error: unknown) => {
  console.error('runtime-sim failed:', error instanceof Error ? error.message : String(error));
  // eslint-disable-next-line no-process-exit
  process.exit(1);
});
