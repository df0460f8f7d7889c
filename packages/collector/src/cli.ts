#!/usr/bin/env node
/**
 * ddb-metrics: collect DynamoDB request metrics from CloudWatch into a run
 * root of raw artifacts and consolidated reports.
 *
 * Exit codes: 0 on completion (even with failed jobs), 2 on a configuration
 * or credential problem, 1 on anything unexpected.
 */

import { USAGE, loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { collect, consolidate, formatSummary } from "./run.js";

async function main(): Promise<number> {
  const { command, help, config } = loadConfig(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return 0;
  }

  if (command === "consolidate") {
    const batch = await consolidate(config);
    console.log(
      `Consolidation complete: ${batch.written.length} report(s) written, ` +
        `${batch.failed.length} failed`,
    );
    return 0;
  }

  const summary = await collect(config);
  console.log(formatSummary(summary));
  return 0;
}

main()
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`);
      return 2;
    }
    console.error("Collection failed:", err);
    return 1;
  })
  .then((code) => {
    // Idle SDK connections would otherwise keep the process alive
    process.exit(code);
  });
