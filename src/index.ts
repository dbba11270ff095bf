#!/usr/bin/env node
import { parseArgs, USAGE } from "./cli/args";
import { ConsoleDecisionProvider } from "./cli/prompt";
import { createAdapters, runBatch, schedule } from "./scheduler";
import { openTrackers, resetTrackers } from "./trackers";
import { loadConfig } from "./utils/config";
import { logger } from "./utils/logger";

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  logger.info("Job mail reconciler starting up...");
  const config = loadConfig({ analysisMode: options.mode });
  const days = options.days ?? config.gmail.searchDays;
  const dryRun = options.dryRun;

  if (dryRun) {
    logger.info("Dry run: nothing will be written to the store or the trackers");
  }

  const trackers = await openTrackers(config.dataDir, { dryRun });
  if (options.resetTrackers) {
    await resetTrackers(trackers);
  }

  const adapters = await createAdapters(config, { dryRun });

  const interactive =
    config.interactive && !options.nonInteractive && !options.watch && Boolean(process.stdin.isTTY);
  const provider = interactive ? new ConsoleDecisionProvider() : null;

  try {
    await runBatch(config, adapters, trackers, { days, dryRun, provider });
  } finally {
    provider?.close();
  }

  if (options.watch) {
    schedule(config.cron.schedule, async () => {
      await runBatch(config, adapters, trackers, { days, dryRun, provider: null });
    });
    logger.info("Job mail reconciler is running. Press Ctrl+C to stop.");
  }
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
