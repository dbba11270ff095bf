import path from "path";
import type { z } from "zod";
import { JsonFileDocument, ReadOnlyDocument, type DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";
import { ProcessedMessagesTracker, processedMessagesSchema } from "./processed-messages";
import { FalsePositivesTracker, falsePositivesSchema } from "./false-positives";
import { MergedThreadsTracker, mergedThreadsSchema } from "./merged-threads";
import { ConflictResolutionTracker, conflictResolutionsSchema } from "./conflict-resolutions";
import { ClassificationCache, classificationCacheSchema } from "./classification-cache";

export interface Trackers {
  processed: ProcessedMessagesTracker;
  falsePositives: FalsePositivesTracker;
  mergedThreads: MergedThreadsTracker;
  resolutions: ConflictResolutionTracker;
  classifications: ClassificationCache;
}

export const TRACKER_FILES = {
  processed: "processed-messages.json",
  falsePositives: "false-positives.json",
  mergedThreads: "merged-threads.json",
  resolutions: "conflict-resolutions.json",
  classifications: "classification-cache.json",
} as const;

/**
 * Opens and loads every tracker document under `dataDir`. In a dry run the
 * documents are read but never written.
 */
export async function openTrackers(
  dataDir: string,
  options: { dryRun?: boolean } = {}
): Promise<Trackers> {
  function doc<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DocumentStore<T> {
    const store = new JsonFileDocument<T>(path.join(dataDir, file), schema);
    return options.dryRun ? new ReadOnlyDocument(store) : store;
  }

  const trackers: Trackers = {
    processed: new ProcessedMessagesTracker(doc(TRACKER_FILES.processed, processedMessagesSchema)),
    falsePositives: new FalsePositivesTracker(doc(TRACKER_FILES.falsePositives, falsePositivesSchema)),
    mergedThreads: new MergedThreadsTracker(doc(TRACKER_FILES.mergedThreads, mergedThreadsSchema)),
    resolutions: new ConflictResolutionTracker(doc(TRACKER_FILES.resolutions, conflictResolutionsSchema)),
    classifications: new ClassificationCache(doc(TRACKER_FILES.classifications, classificationCacheSchema)),
  };

  await loadTrackers(trackers);
  return trackers;
}

export async function loadTrackers(trackers: Trackers): Promise<void> {
  await trackers.processed.load();
  await trackers.falsePositives.load();
  await trackers.mergedThreads.load();
  await trackers.resolutions.load();
  await trackers.classifications.load();
}

export async function resetTrackers(trackers: Trackers): Promise<void> {
  await trackers.processed.reset();
  await trackers.falsePositives.reset();
  await trackers.mergedThreads.reset();
  await trackers.resolutions.reset();
  await trackers.classifications.reset();
  logger.info("All trackers reset");
}

export function logTrackerStats(trackers: Trackers): void {
  logger.info("Tracker stats", {
    ...trackers.processed.stats(),
    falsePositives: trackers.falsePositives.stats(),
    merges: trackers.mergedThreads.stats(),
    ...trackers.resolutions.stats(),
    ...trackers.classifications.stats(),
  });
}

export {
  ProcessedMessagesTracker,
  FalsePositivesTracker,
  MergedThreadsTracker,
  ConflictResolutionTracker,
  ClassificationCache,
};
