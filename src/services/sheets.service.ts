import { google, type sheets_v4 } from "googleapis";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import type { GoogleAuth } from "./gmail.service";
import { COLUMNS, findInRows, type ColumnName, type RecordStore, type StoredRow } from "./record-store";

const LAST_COLUMN = String.fromCharCode("A".charCodeAt(0) + COLUMNS.length - 1);

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/** First and last row numbers of an A1 range such as `'Applications'!A5:K7`. */
export function rowSpan(range: string): { start: number; end: number } {
  const match = range.match(/![A-Z]+(\d+)(?::[A-Z]+(\d+))?$/);
  if (!match) throw new Error(`Cannot read row numbers from range "${range}"`);
  const start = parseInt(match[1], 10);
  const end = match[2] ? parseInt(match[2], 10) : start;
  return { start, end };
}

export function rowNumber(ref: string): number {
  const row = Number(ref);
  if (!Number.isInteger(row) || row < 2) {
    throw new Error(`Invalid sheet row reference "${ref}"`);
  }
  return row;
}

/** Pads or trims to the header width so ragged API rows line up. */
export function normalizeCells(cells: readonly unknown[]): string[] {
  return COLUMNS.map((_, index) => {
    const cell = cells[index];
    return cell === undefined || cell === null ? "" : String(cell);
  });
}

/**
 * Google Sheets backend. Row 1 is the header and refs are row numbers,
 * so a delete shifts every ref below it.
 */
export class SheetsRecordStore implements RecordStore {
  readonly name: string;
  private readonly sheets: sheets_v4.Sheets;
  private readonly sheet: string;
  private sheetId: number | null = null;

  constructor(
    auth: GoogleAuth,
    private readonly spreadsheetId: string,
    private readonly sheetName: string
  ) {
    this.sheets = google.sheets({ version: "v4", auth });
    this.sheet = quoteSheetName(sheetName);
    this.name = `sheet ${sheetName}`;
  }

  async ensureHeader(): Promise<void> {
    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.values.get({
          spreadsheetId: this.spreadsheetId,
          range: `${this.sheet}!A1:${LAST_COLUMN}1`,
        }),
      { operation: "Sheets header read" }
    );

    const header = response.data.values?.[0] ?? [];
    if (header.length === 0) {
      await this.write(`${this.sheet}!A1:${LAST_COLUMN}1`, [...COLUMNS]);
      logger.info(`Wrote header row to ${this.name}`);
      return;
    }

    const actual = normalizeCells(header);
    const mismatched = COLUMNS.filter((column, index) => actual[index] !== column);
    if (mismatched.length > 0) {
      logger.warn(`Header of ${this.name} differs from the expected columns: ${mismatched.join(", ")}`);
    }
  }

  async readAll(): Promise<StoredRow[]> {
    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.values.get({
          spreadsheetId: this.spreadsheetId,
          range: `${this.sheet}!A2:${LAST_COLUMN}`,
        }),
      { operation: "Sheets read" }
    );

    return (response.data.values ?? []).map((cells, index) => ({
      ref: String(index + 2),
      position: index + 2,
      cells: normalizeCells(cells),
    }));
  }

  async append(cells: string[]): Promise<string> {
    const [ref] = await this.appendMany([cells]);
    return ref;
  }

  async appendMany(rows: string[][]): Promise<string[]> {
    if (rows.length === 0) return [];

    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.values.append({
          spreadsheetId: this.spreadsheetId,
          range: `${this.sheet}!A:${LAST_COLUMN}`,
          valueInputOption: "RAW",
          insertDataOption: "INSERT_ROWS",
          requestBody: { values: rows },
        }),
      { operation: "Sheets append" }
    );

    const updatedRange = response.data.updates?.updatedRange;
    if (!updatedRange) throw new Error("Sheets append returned no updated range");

    const { start } = rowSpan(updatedRange);
    return rows.map((_, index) => String(start + index));
  }

  async update(ref: string, cells: string[]): Promise<void> {
    const row = rowNumber(ref);
    await this.write(`${this.sheet}!A${row}:${LAST_COLUMN}${row}`, cells);
  }

  async delete(ref: string): Promise<void> {
    const row = rowNumber(ref);
    const sheetId = await this.resolveSheetId();

    await withRetry(
      () =>
        this.sheets.spreadsheets.batchUpdate({
          spreadsheetId: this.spreadsheetId,
          requestBody: {
            requests: [
              {
                deleteDimension: {
                  range: { sheetId, dimension: "ROWS", startIndex: row - 1, endIndex: row },
                },
              },
            ],
          },
        }),
      { operation: `Sheets delete row ${row}` }
    );
  }

  async find(column: ColumnName, value: string): Promise<string | null> {
    return findInRows(await this.readAll(), column, value);
  }

  private async write(range: string, cells: string[]): Promise<void> {
    await withRetry(
      () =>
        this.sheets.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range,
          valueInputOption: "RAW",
          requestBody: { values: [cells] },
        }),
      { operation: "Sheets update" }
    );
  }

  private async resolveSheetId(): Promise<number> {
    if (this.sheetId !== null) return this.sheetId;

    const response = await withRetry(
      () =>
        this.sheets.spreadsheets.get({
          spreadsheetId: this.spreadsheetId,
          fields: "sheets.properties",
        }),
      { operation: "Sheets metadata" }
    );

    const sheet = response.data.sheets?.find((s) => s.properties?.title === this.sheetName);
    const sheetId = sheet?.properties?.sheetId;
    if (sheetId === undefined || sheetId === null) {
      throw new Error(`Sheet "${this.sheetName}" not found in spreadsheet ${this.spreadsheetId}`);
    }

    this.sheetId = sheetId;
    return sheetId;
  }
}
