import { logger } from "../utils/logger";

export const COLUMNS = [
  "Company",
  "Position",
  "Application Date",
  "Current Status",
  "Last Updated",
  "Email Count",
  "Latest Email Date",
  "Notes",
  "Source Link",
  "Thread Ids",
  "Merge Target",
] as const;

export type ColumnName = (typeof COLUMNS)[number];

export interface StoredRow {
  /** Opaque handle: a sheet row number, a Notion page id. */
  ref: string;
  /** Ordinal at read time; later rows have larger positions. */
  position: number;
  cells: string[];
}

/**
 * Tabular backing store for applications. Refs are only valid until the
 * next structural change (a delete may shift every later ref), so callers
 * re-read before mutating.
 */
export interface RecordStore {
  readonly name: string;
  readAll(): Promise<StoredRow[]>;
  append(cells: string[]): Promise<string>;
  appendMany(rows: string[][]): Promise<string[]>;
  update(ref: string, cells: string[]): Promise<void>;
  delete(ref: string): Promise<void>;
  /** Ref of the first row whose cell in `column` equals `value` exactly. */
  find(column: ColumnName, value: string): Promise<string | null>;
}

export function columnIndex(column: ColumnName): number {
  return COLUMNS.indexOf(column);
}

export function findInRows(rows: StoredRow[], column: ColumnName, value: string): string | null {
  const index = columnIndex(column);
  const row = rows.find((candidate) => (candidate.cells[index] ?? "") === value);
  return row ? row.ref : null;
}

/** Reads through to the real store and logs the writes it would have made. */
export class DryRunRecordStore implements RecordStore {
  private appended = 0;

  constructor(private readonly inner: RecordStore) {}

  get name(): string {
    return `${this.inner.name} (dry run)`;
  }

  readAll(): Promise<StoredRow[]> {
    return this.inner.readAll();
  }

  async append(cells: string[]): Promise<string> {
    this.appended++;
    logger.info(`[dry run] Would append: ${cells[0]} - ${cells[1]}`);
    return `dry-run-${this.appended}`;
  }

  async appendMany(rows: string[][]): Promise<string[]> {
    const refs: string[] = [];
    for (const row of rows) {
      refs.push(await this.append(row));
    }
    return refs;
  }

  async update(ref: string, cells: string[]): Promise<void> {
    logger.info(`[dry run] Would update ${ref}: ${cells[0]} - ${cells[1]} -> ${cells[3]}`);
  }

  async delete(ref: string): Promise<void> {
    logger.info(`[dry run] Would delete ${ref}`);
  }

  find(column: ColumnName, value: string): Promise<string | null> {
    return this.inner.find(column, value);
  }
}
