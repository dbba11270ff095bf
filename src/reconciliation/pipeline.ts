import type { Application, ClassifiedEmail, RunSummary } from "../types";
import { fieldToString } from "../utils/field-value";
import { logger } from "../utils/logger";
import type { ApplicationRepository } from "./application-repository";
import { detectConflicts } from "./conflict-detector";
import type { ConflictResolver } from "./conflict-resolver";
import type { ApplicationMatcher } from "./matcher";
import type { MergeEngine } from "./merge-engine";

export interface ReconcilerDeps {
  repository: ApplicationRepository;
  matcher: ApplicationMatcher;
  resolver: ConflictResolver;
  mergeEngine: MergeEngine;
}

export function emptySummary(): RunSummary {
  return { scanned: 0, jobRelated: 0, created: 0, updated: 0, skipped: 0, merges: 0, errors: 0 };
}

/** Oldest first; equal timestamps keep their input order. */
export function sortByDate<T extends { date: Date }>(emails: readonly T[]): T[] {
  return [...emails].sort((a, b) => a.date.getTime() - b.date.getTime());
}

/**
 * Runs pending merges, then folds each job email into its application or
 * creates a new one. A failure on one email is logged and counted, never
 * fatal to the batch.
 */
export class Reconciler {
  constructor(private readonly deps: ReconcilerDeps) {}

  async reconcile(emails: readonly ClassifiedEmail[], options: { dryRun?: boolean } = {}): Promise<RunSummary> {
    const { repository } = this.deps;
    const summary = emptySummary();
    summary.scanned = emails.length;

    const jobEmails = sortByDate(emails.filter((email) => email.isJobRelated));
    summary.jobRelated = jobEmails.length;

    let applications = await repository.getAll();
    logger.info(`Loaded ${applications.length} existing applications`);

    try {
      const outcome = await this.deps.mergeEngine.executeMerges(applications, options);
      applications = outcome.applications;
      summary.merges = outcome.mergeCount;
    } catch (error) {
      summary.errors++;
      logger.error("Merge pass failed, continuing with a fresh read", error);
      applications = await repository.getAll();
    }

    for (const email of jobEmails) {
      try {
        await this.reconcileOne(email, applications, summary);
      } catch (error) {
        summary.errors++;
        logger.error(`Failed to reconcile message ${email.id} (${email.subject})`, error);
      }
    }

    return summary;
  }

  private async reconcileOne(
    email: ClassifiedEmail,
    applications: Application[],
    summary: RunSummary
  ): Promise<void> {
    const { repository, matcher, resolver } = this.deps;

    if (repository.isProcessed(email.id)) {
      logger.debug(`Already processed: ${email.id}`);
      summary.skipped++;
      return;
    }

    const match = matcher.findMatch(email, applications);
    if (!match) {
      const created = await repository.create(email);
      if (created) {
        applications.push(created);
        summary.created++;
      } else {
        summary.skipped++;
      }
      return;
    }

    const conflicts = detectConflicts(match.application, email);
    const resolution = await resolver.resolve(match.application, email, conflicts);

    if (resolution.createNewEntry) {
      logger.info(
        `Creating a separate entry for ${fieldToString(resolution.company, "Company")} - ` +
          fieldToString(resolution.position, "Position")
      );
      const created = await repository.create(email, resolution);
      if (created) {
        applications.push(created);
        summary.created++;
      } else {
        summary.skipped++;
      }
      return;
    }

    const outcome = await repository.update(match.application, email, resolution);
    if (outcome.kind === "updated") {
      const index = applications.indexOf(match.application);
      if (index !== -1) applications[index] = outcome.application;
      summary.updated++;
    } else {
      summary.skipped++;
    }
  }
}
