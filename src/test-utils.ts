import type { Application, ClassifiedEmail } from "./types";
import type { DocumentStore } from "./utils/json-document";
import { findInRows, type ColumnName, type RecordStore, type StoredRow } from "./services/record-store";
import { known, UNKNOWN } from "./utils/field-value";

export class MemoryDocumentStore<T> implements DocumentStore<T> {
  readonly name = "memory";
  writes = 0;

  constructor(public data: T | null = null) {}

  async read(): Promise<T | null> {
    return this.data === null ? null : structuredClone(this.data);
  }

  async write(data: T): Promise<void> {
    this.writes++;
    this.data = structuredClone(data);
  }
}

/**
 * Behaves like a spreadsheet: refs are row numbers (the header is row 1)
 * and deleting a row shifts every row below it up by one.
 */
export class MemoryRecordStore implements RecordStore {
  readonly name = "memory";
  rows: string[][];

  constructor(rows: string[][] = []) {
    this.rows = rows.map((row) => [...row]);
  }

  async readAll(): Promise<StoredRow[]> {
    return this.rows.map((cells, index) => ({
      ref: String(index + 2),
      position: index + 2,
      cells: [...cells],
    }));
  }

  async append(cells: string[]): Promise<string> {
    this.rows.push([...cells]);
    return String(this.rows.length + 1);
  }

  async appendMany(rows: string[][]): Promise<string[]> {
    const refs: string[] = [];
    for (const row of rows) refs.push(await this.append(row));
    return refs;
  }

  async update(ref: string, cells: string[]): Promise<void> {
    this.rows[this.indexOf(ref)] = [...cells];
  }

  async delete(ref: string): Promise<void> {
    this.rows.splice(this.indexOf(ref), 1);
  }

  async find(column: ColumnName, value: string): Promise<string | null> {
    return findInRows(await this.readAll(), column, value);
  }

  private indexOf(ref: string): number {
    const index = Number(ref) - 2;
    if (!Number.isInteger(index) || index < 0 || index >= this.rows.length) {
      throw new Error(`No row ${ref}`);
    }
    return index;
  }
}

export function makeApplication(overrides: Partial<Application> = {}): Application {
  return {
    company: known("Acme"),
    position: known("Software Engineer"),
    applicationDate: new Date("2026-10-01T00:00:00.000Z"),
    currentStatus: "Applied",
    lastUpdated: new Date("2026-10-01T00:00:00.000Z"),
    emailCount: 1,
    latestEmailDate: new Date("2026-10-01T00:00:00.000Z"),
    notes: "",
    gmailLink: "",
    threadIds: [],
    rowRef: null,
    rowPosition: 0,
    mergeTarget: null,
    ...overrides,
  };
}

export function makeEmail(overrides: Partial<ClassifiedEmail> = {}): ClassifiedEmail {
  return {
    id: "msg-1",
    threadId: "thread-1",
    from: "Acme Recruiting <jobs@acme.com>",
    senderEmail: "jobs@acme.com",
    subject: "Your application",
    date: new Date("2026-10-10T12:00:00.000Z"),
    body: "",
    link: "https://mail.google.com/mail/u/0/#all/msg-1",
    isJobRelated: true,
    confidence: 90,
    company: known("Acme"),
    position: known("Software Engineer"),
    status: "Applied",
    emailType: "application",
    source: "rules",
    ...overrides,
  };
}

export { known, UNKNOWN };
