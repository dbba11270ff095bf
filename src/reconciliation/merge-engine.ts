import type { Application } from "../types";
import type { RecordStore } from "../services/record-store";
import { parseApplications, toRow } from "../services/row-codec";
import { fieldToString } from "../utils/field-value";
import { logger } from "../utils/logger";
import type { MergeRecord } from "../trackers/merged-threads";
import { mostProgressedStatus } from "./status-gate";

export class MergeValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MergeValidationError";
  }
}

export interface MergePair {
  source: Application;
  target: Application;
}

export interface MergeRecorder {
  recordMerge(record: MergeRecord): Promise<void>;
}

export interface MergeOutcome {
  applications: Application[];
  mergeCount: number;
  plan: MergePair[];
}

function describe(app: Application): string {
  return `row ${app.rowRef} (${fieldToString(app.company, "Company")})`;
}

/** Throws for self, circular and chain merges. */
export function validateMerge(source: Application, target: Application): void {
  if (source.rowRef === target.rowRef) {
    throw new MergeValidationError(`Row ${source.rowRef} cannot merge into itself`);
  }
  if (target.mergeTarget !== null && target.mergeTarget === source.rowRef) {
    throw new MergeValidationError(`Circular merge detected: row ${source.rowRef} <-> row ${target.rowRef}`);
  }
  if (target.mergeTarget !== null) {
    throw new MergeValidationError(
      `Chain merge detected: row ${source.rowRef} -> row ${target.rowRef} -> row ${target.mergeTarget}. ` +
        `Resolve the target merge first.`
    );
  }
}

/** Valid (source, target) pairs; invalid requests are logged and skipped. */
export function findMergeRequests(applications: readonly Application[]): MergePair[] {
  const pairs: MergePair[] = [];

  for (const source of applications) {
    if (source.mergeTarget === null) continue;
    const targetRef = source.mergeTarget.trim();
    const target = applications.find((candidate) => candidate.rowRef === targetRef);
    if (!target) {
      logger.warn(`Merge target ${targetRef} not found for row ${source.rowRef}, skipping`);
      continue;
    }

    try {
      validateMerge(source, target);
      pairs.push({ source, target });
    } catch (error) {
      if (!(error instanceof MergeValidationError)) throw error;
      logger.warn(`${error.message}, skipping merge`);
    }
  }

  return pairs;
}

/** Source folded into target. Neither input is mutated. */
export function foldInto(source: Application, target: Application, now: Date): Application {
  const sourceLatest = source.latestEmailDate;
  const targetLatest = target.latestEmailDate;

  let gmailLink = target.gmailLink;
  if (sourceLatest && targetLatest) {
    if (sourceLatest > targetLatest && source.gmailLink) gmailLink = source.gmailLink;
  } else if (source.gmailLink && !target.gmailLink) {
    gmailLink = source.gmailLink;
  }

  let latestEmailDate = targetLatest;
  if (sourceLatest && (!targetLatest || sourceLatest > targetLatest)) {
    latestEmailDate = sourceLatest;
  }

  let notes = target.notes || source.notes;
  if (source.notes && target.notes) notes = `${target.notes} | ${source.notes}`;

  return {
    ...target,
    applicationDate:
      source.applicationDate < target.applicationDate ? source.applicationDate : target.applicationDate,
    currentStatus: mostProgressedStatus(target.currentStatus, source.currentStatus),
    emailCount: source.emailCount + target.emailCount,
    latestEmailDate,
    gmailLink,
    notes,
    threadIds: [...target.threadIds, ...source.threadIds.filter((id) => !target.threadIds.includes(id))],
    lastUpdated: now,
    mergeTarget: null,
  };
}

/**
 * Collapses applications flagged with a merge target into that target,
 * then deletes the flagged rows.
 */
export class MergeEngine {
  constructor(
    private readonly store: RecordStore,
    private readonly recorder: MergeRecorder,
    private readonly now: () => Date = () => new Date()
  ) {}

  async executeMerges(
    applications: Application[],
    options: { dryRun?: boolean } = {}
  ): Promise<MergeOutcome> {
    const plan = findMergeRequests(applications);
    if (plan.length === 0) {
      return { applications, mergeCount: 0, plan };
    }

    logger.info(`Found ${plan.length} merge request(s)`);

    if (options.dryRun) {
      for (const { source, target } of plan) {
        logger.info(`[dry run] Would merge ${describe(source)} -> ${describe(target)}`);
      }
      return { applications, mergeCount: plan.length, plan };
    }

    // Descending source position so deletes never shift a pending source
    const ordered = [...plan].sort((a, b) => b.source.rowPosition - a.source.rowPosition);
    const now = this.now();
    const folded = new Map<string, Application>();

    for (const { source, target } of ordered) {
      const targetRef = target.rowRef ?? "";
      const current = folded.get(targetRef) ?? target;
      const merged = foldInto(source, current, now);
      folded.set(targetRef, merged);
      logger.info(
        `Merging ${describe(source)} -> ${describe(target)}: ${current.emailCount} + ${source.emailCount} emails`
      );
    }

    for (const [targetRef, merged] of folded) {
      await this.store.update(targetRef, toRow(merged));
    }

    for (const { source, target } of ordered) {
      const merged = folded.get(target.rowRef ?? "");
      await this.recorder.recordMerge({
        timestamp: now.toISOString(),
        sourceRef: source.rowRef ?? "",
        targetRef: target.rowRef ?? "",
        sourceCompany: fieldToString(source.company, "Company"),
        targetCompany: fieldToString(target.company, "Company"),
        sourceThreadIds: source.threadIds,
        targetThreadIds: merged ? merged.threadIds : target.threadIds,
      });
    }

    for (const { source } of ordered) {
      if (source.rowRef !== null) {
        await this.store.delete(source.rowRef);
      }
    }

    logger.info(`Completed ${ordered.length} merge(s)`);
    const rows = await this.store.readAll();
    return { applications: parseApplications(rows, now), mergeCount: ordered.length, plan };
  }
}
