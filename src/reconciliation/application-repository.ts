import type { Application, ClassifiedEmail, ConflictResolution } from "../types";
import type { RecordStore } from "../services/record-store";
import { parseApplications, toRow } from "../services/row-codec";
import type { ProcessedMessagesTracker } from "../trackers/processed-messages";
import type { FalsePositivesTracker } from "../trackers/false-positives";
import { fieldToString } from "../utils/field-value";
import { logger } from "../utils/logger";
import { normalizeCompanyName, normalizePosition } from "../utils/text";
import { allowTransition, isTerminal } from "./status-gate";

export type UpdateOutcome =
  | { kind: "updated"; application: Application }
  | { kind: "already-processed" }
  | { kind: "vanished" };

function label(app: Pick<Application, "company" | "position">): string {
  return `${fieldToString(app.company, "Company")} - ${fieldToString(app.position, "Position")}`;
}

function identityKey(app: Application): string {
  return `${normalizeCompanyName(fieldToString(app.company, "Company"))}|${normalizePosition(
    fieldToString(app.position, "Position")
  )}`;
}

/**
 * Reads and writes applications through a RecordStore, keeping the processed
 * and false-positive trackers in step with every write.
 */
export class ApplicationRepository {
  // Rows appended during a dry run never reach the store
  private readonly unsaved: Application[] = [];

  constructor(
    private readonly store: RecordStore,
    private readonly processed: ProcessedMessagesTracker,
    private readonly falsePositives: FalsePositivesTracker,
    private readonly options: { dryRun?: boolean; now?: () => Date } = {}
  ) {}

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  isProcessed(messageId: string): boolean {
    return this.processed.isProcessed(messageId);
  }

  async getAll(): Promise<Application[]> {
    return parseApplications(await this.store.readAll(), this.now());
  }

  /** Null when the message was already processed or is a known false positive. */
  async create(
    email: ClassifiedEmail,
    fields: Pick<Application, "company" | "position"> = email
  ): Promise<Application | null> {
    if (this.processed.isProcessed(email.id)) {
      logger.info(`Skipping already processed email: ${label(fields)} (message: ${email.id})`);
      return null;
    }

    const company = fieldToString(fields.company, "Company");
    const position = fieldToString(fields.position, "Position");
    if (this.falsePositives.isFalsePositive(email.id, company, position)) {
      logger.info(`Skipping false positive: ${company} - ${position} (previously deleted)`);
      return null;
    }

    const draft: Application = {
      company: fields.company,
      position: fields.position,
      applicationDate: email.date,
      currentStatus: email.status,
      lastUpdated: email.date,
      emailCount: 1,
      latestEmailDate: email.date,
      notes: "",
      gmailLink: email.link,
      threadIds: email.threadId ? [email.threadId] : [],
      rowRef: null,
      rowPosition: 0,
      mergeTarget: null,
    };

    const ref = await this.store.append(toRow(draft));
    const parsedPosition = Number.parseInt(ref, 10);
    const application: Application = {
      ...draft,
      rowRef: ref,
      rowPosition: Number.isNaN(parsedPosition) ? 0 : parsedPosition,
    };
    if (this.options.dryRun) this.unsaved.push(application);

    await this.processed.markProcessed(email.id);
    logger.info(`Created: ${company} - ${position}`);
    return application;
  }

  /**
   * Folds an email into a matched application. The row is re-located first
   * since the store may have been edited since it was read; a row that is
   * gone turns the email into a false positive.
   */
  async update(
    application: Application,
    email: ClassifiedEmail,
    resolution?: ConflictResolution
  ): Promise<UpdateOutcome> {
    if (this.processed.isProcessed(email.id)) {
      logger.info(`Skipping already processed email: ${label(application)} (message: ${email.id})`);
      return { kind: "already-processed" };
    }

    const current = await this.relocate(application);
    if (!current || current.rowRef === null) {
      logger.warn(`${label(application)} was deleted from ${this.store.name}, recording as false positive`);
      await this.falsePositives.add(
        email.id,
        fieldToString(application.company, "Company"),
        fieldToString(application.position, "Position")
      );
      await this.processed.markProcessed(email.id);
      return { kind: "vanished" };
    }

    const updated: Application = { ...current, threadIds: [...current.threadIds] };

    if (resolution) {
      updated.company = resolution.company;
      updated.position = resolution.position;
    }

    if (email.date < updated.applicationDate) {
      updated.applicationDate = email.date;
    }

    if (allowTransition(updated.currentStatus, email.status)) {
      if (updated.currentStatus !== email.status) {
        logger.info(`Updating status for ${label(updated)}: ${updated.currentStatus} -> ${email.status}`);
      }
      updated.currentStatus = email.status;
    } else if (isTerminal(updated.currentStatus)) {
      logger.info(`Preserving terminal status for ${label(updated)}: ${updated.currentStatus}`);
    } else {
      logger.info(`Preserving status for ${label(updated)}: ${updated.currentStatus} (not ${email.status})`);
    }

    updated.emailCount += 1;
    if (!updated.latestEmailDate || email.date > updated.latestEmailDate) {
      updated.latestEmailDate = email.date;
    }
    updated.lastUpdated = email.date;
    if (email.link) updated.gmailLink = email.link;
    if (email.threadId && !updated.threadIds.includes(email.threadId)) {
      updated.threadIds.push(email.threadId);
    }

    await this.store.update(current.rowRef, toRow(updated));
    await this.processed.markProcessed(email.id);
    logger.info(`Updated: ${label(updated)} -> ${updated.currentStatus}`);
    return { kind: "updated", application: updated };
  }

  /** Fresh copy of an application by thread id, else by company and position. */
  async relocate(application: Application): Promise<Application | null> {
    const fresh = [...(await this.getAll()), ...this.unsaved];

    if (application.threadIds.length > 0) {
      const byThread = fresh.find((app) => app.threadIds.some((id) => application.threadIds.includes(id)));
      if (byThread) return byThread;
    }

    const key = identityKey(application);
    return fresh.find((app) => identityKey(app) === key) ?? null;
  }
}
