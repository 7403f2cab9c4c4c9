#!/usr/bin/env node
/**
 * feedbackscan CLI
 *
 * Runs one report against FEEDBACKSCAN_URI, printing the audited batch
 * followed by the per-day volumes.
 */

import { FeedbackScan } from './feedbackscan.js';
import { configFromEnv } from './config.js';
import { ScanError } from './errors.js';
import { formatReport } from './format.js';

async function main(): Promise<void> {
  const scanner = await FeedbackScan.create(configFromEnv(process.env));

  scanner.on('batch', ({ sql }) => {
    console.log(sql);
    console.log('');
  });
  scanner.on('catalog', ({ columns, tuples }) => {
    console.error(`[feedbackscan] ${columns} columns scanned, ${tuples} candidate pairs`);
  });
  scanner.on('slow-run', ({ durationMs, threshold }) => {
    console.error(`[feedbackscan] run took ${durationMs}ms (threshold ${threshold}ms)`);
  });
  scanner.on('error', ({ code, stage }) => {
    console.error(`[feedbackscan] ${code} during ${stage}`);
  });

  try {
    const report = await scanner.run();
    for (const line of formatReport(report)) console.log(line);
  } finally {
    await scanner.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof ScanError ? err.message : err);
  process.exitCode = 1;
});
