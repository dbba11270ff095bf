import type { Application } from "../types";
import { fieldFromRaw, fieldToString } from "../utils/field-value";
import { logger } from "../utils/logger";
import type { StoredRow } from "./record-store";

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

export function parseDate(value: string): Date | null {
  const trimmed = value.trim();
  if (!ISO_DAY.test(trimmed)) return null;
  const date = new Date(`${trimmed}T00:00:00.000Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function joinThreadIds(threadIds: readonly string[]): string {
  return threadIds.join(",");
}

export function splitThreadIds(value: string): string[] {
  const ids: string[] = [];
  for (const part of value.split(",")) {
    const id = part.trim();
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function toRow(app: Application): string[] {
  return [
    fieldToString(app.company, "Company"),
    fieldToString(app.position, "Position"),
    formatDate(app.applicationDate),
    app.currentStatus,
    formatDate(app.lastUpdated),
    String(app.emailCount),
    app.latestEmailDate ? formatDate(app.latestEmailDate) : "",
    app.notes,
    app.gmailLink,
    joinThreadIds(app.threadIds),
    app.mergeTarget ?? "",
  ];
}

/**
 * Missing trailing cells read as empty. Unparseable dates fall back to
 * `now` and unparseable counts to 1.
 */
export function fromRow(row: StoredRow, now: Date): Application {
  const cell = (index: number) => (row.cells[index] ?? "").trim();

  const applicationDate = parseDate(cell(2));
  if (!applicationDate) {
    logger.warn(`Row ${row.ref}: bad application date "${cell(2)}", using today`);
  }
  const lastUpdated = parseDate(cell(4));
  if (!lastUpdated) {
    logger.warn(`Row ${row.ref}: bad last-updated date "${cell(4)}", using today`);
  }

  let emailCount = parseInt(cell(5), 10);
  if (!/^\d+$/.test(cell(5)) || emailCount < 1) {
    logger.warn(`Row ${row.ref}: bad email count "${cell(5)}", using 1`);
    emailCount = 1;
  }

  return {
    company: fieldFromRaw(cell(0), "Company"),
    position: fieldFromRaw(cell(1), "Position"),
    applicationDate: applicationDate ?? now,
    currentStatus: cell(3) || "Applied",
    lastUpdated: lastUpdated ?? now,
    emailCount,
    latestEmailDate: parseDate(cell(6)),
    notes: row.cells[7] ?? "",
    gmailLink: cell(8),
    threadIds: splitThreadIds(cell(9)),
    rowRef: row.ref,
    rowPosition: row.position,
    mergeTarget: cell(10) || null,
  };
}

/** Rows with an empty Company cell are blank lines, not applications. */
export function parseApplications(rows: StoredRow[], now: Date): Application[] {
  const applications: Application[] = [];
  for (const row of rows) {
    if (!row.cells[0]?.trim()) continue;
    applications.push(fromRow(row, now));
  }
  return applications;
}
