import cron, { type ScheduledTask } from "node-cron";
import { Client } from "@notionhq/client";
import type { RunSummary } from "./types";
import type { AppConfig } from "./utils/config";
import { logger } from "./utils/logger";
import { logTrackerStats, type Trackers } from "./trackers";
import { DryRunRecordStore, type RecordStore } from "./services/record-store";
import { createOAuthClient, GmailFetcher, type MailSource } from "./services/gmail.service";
import { SheetsRecordStore } from "./services/sheets.service";
import { NotionRecordStore } from "./services/notion.service";
import { LlmClassifier, OpenAICompletionClient, type ClassificationBackend } from "./services/llm.service";
import { EmailAnalyzer } from "./services/analyzer.service";
import { ApplicationRepository } from "./reconciliation/application-repository";
import { ApplicationMatcher } from "./reconciliation/matcher";
import { ConflictResolver, type DecisionProvider } from "./reconciliation/conflict-resolver";
import { MergeEngine } from "./reconciliation/merge-engine";
import { Reconciler, sortByDate } from "./reconciliation/pipeline";

export interface Adapters {
  mail: MailSource;
  store: RecordStore;
  backend: ClassificationBackend | null;
}

export interface BatchOptions {
  days: number;
  dryRun: boolean;
  provider: DecisionProvider | null;
}

export type BatchConfig = Pick<AppConfig, "analysisMode" | "detectionThreshold" | "matcher"> & {
  gmail: Pick<AppConfig["gmail"], "maxResults">;
};

/**
 * Builds the live adapters for the configured store. Fails fast when the
 * store is unreachable or its layout is wrong.
 */
export async function createAdapters(config: AppConfig, options: { dryRun: boolean }): Promise<Adapters> {
  const auth = createOAuthClient(config.gmail);
  let store: RecordStore;

  if (config.store.kind === "sheets") {
    const sheets = new SheetsRecordStore(auth, config.store.spreadsheetId, config.store.sheetName);
    if (!options.dryRun) {
      await sheets.ensureHeader();
    }
    store = sheets;
  } else {
    const notion = new NotionRecordStore(new Client({ auth: config.store.token }), config.store.databaseId);
    if (!(await notion.verifySchema())) {
      throw new Error("Notion database verification failed. Please check your database schema.");
    }
    store = notion;
  }

  return {
    mail: new GmailFetcher(auth),
    store,
    backend: config.analysisMode === "llm" ? new LlmClassifier(new OpenAICompletionClient(config.llm)) : null,
  };
}

/** One fetch, classify and reconcile pass. */
export async function runBatch(
  config: BatchConfig,
  adapters: Adapters,
  trackers: Trackers,
  options: BatchOptions
): Promise<RunSummary> {
  const { dryRun } = options;
  const store = dryRun ? new DryRunRecordStore(adapters.store) : adapters.store;

  const reconciler = new Reconciler({
    repository: new ApplicationRepository(store, trackers.processed, trackers.falsePositives, { dryRun }),
    matcher: new ApplicationMatcher(trackers.mergedThreads, config.matcher),
    resolver: new ConflictResolver(trackers.resolutions, options.provider),
    mergeEngine: new MergeEngine(store, trackers.mergedThreads),
  });

  const analyzer = new EmailAnalyzer({
    mode: config.analysisMode,
    backend: adapters.backend,
    cache: trackers.classifications,
    detectionThreshold: config.detectionThreshold,
  });

  logger.info(`Scanning the last ${options.days} days (store: ${store.name}, mode: ${config.analysisMode})`);

  const emails = sortByDate(await adapters.mail.fetchRecent(options.days, config.gmail.maxResults));
  const classified = await analyzer.analyzeBatch(emails);
  const summary = await reconciler.reconcile(classified, { dryRun });

  logger.info(
    `Run complete: ${summary.scanned} scanned, ${summary.jobRelated} job-related, ${summary.created} created, ` +
      `${summary.updated} updated, ${summary.skipped} skipped, ${summary.merges} merges, ${summary.errors} errors`
  );
  logTrackerStats(trackers);
  return summary;
}

/** Wraps `task` so a trigger that fires while the previous run is still going is skipped. */
export function withoutOverlap(task: () => Promise<void>): () => Promise<void> {
  let running = false;
  return async () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this trigger");
      return;
    }
    running = true;
    try {
      await task();
    } catch (error) {
      logger.error("Scheduled run failed", error);
    } finally {
      running = false;
    }
  };
}

export function schedule(expression: string, task: () => Promise<void>): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid CRON_SCHEDULE "${expression}"`);
  }

  const guarded = withoutOverlap(task);
  logger.info(`Scheduling cron: ${expression}`);
  return cron.schedule(expression, () => {
    logger.info("Cron triggered - checking for new emails...");
    void guarded();
  });
}
