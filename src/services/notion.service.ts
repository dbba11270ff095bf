import { Client, isFullPage } from "@notionhq/client";
import type { CreatePageParameters, PageObjectResponse } from "@notionhq/client/build/src/api-endpoints";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { COLUMNS, findInRows, type ColumnName, type RecordStore, type StoredRow } from "./record-store";

type PropertyKind = "title" | "rich_text" | "date" | "select" | "number" | "url";
type PropertyInput = Extract<
  CreatePageParameters["properties"][string],
  { title: unknown } | { rich_text: unknown } | { date: unknown } | { select: unknown } | { number: unknown } | { url: unknown }
>;
type PageProperty = PageObjectResponse["properties"][string];

export const PROPERTY_KINDS: Record<ColumnName, PropertyKind> = {
  Company: "title",
  Position: "rich_text",
  "Application Date": "date",
  "Current Status": "select",
  "Last Updated": "date",
  "Email Count": "number",
  "Latest Email Date": "date",
  Notes: "rich_text",
  "Source Link": "url",
  "Thread Ids": "rich_text",
  "Merge Target": "rich_text",
};

// Notion rejects rich text items longer than this
const TEXT_LIMIT = 2000;

function toProperty(kind: PropertyKind, cell: string): PropertyInput {
  switch (kind) {
    case "title":
      return { title: [{ text: { content: cell.slice(0, TEXT_LIMIT) } }] };
    case "rich_text":
      return { rich_text: cell ? [{ text: { content: cell.slice(0, TEXT_LIMIT) } }] : [] };
    case "date":
      return { date: cell ? { start: cell } : null };
    case "select":
      return { select: cell ? { name: cell } : null };
    case "number": {
      const value = parseInt(cell, 10);
      return { number: Number.isNaN(value) ? null : value };
    }
    case "url":
      return { url: cell || null };
  }
}

export function cellsToProperties(cells: readonly string[]): Record<string, PropertyInput> {
  const properties: Record<string, PropertyInput> = {};
  COLUMNS.forEach((column, index) => {
    properties[column] = toProperty(PROPERTY_KINDS[column], cells[index] ?? "");
  });
  return properties;
}

export function propertyText(property: PageProperty | undefined): string {
  if (!property) return "";
  switch (property.type) {
    case "title":
      return property.title.map((t) => t.plain_text).join("");
    case "rich_text":
      return property.rich_text.map((t) => t.plain_text).join("");
    case "date":
      return property.date ? property.date.start.slice(0, 10) : "";
    case "select":
      return property.select?.name ?? "";
    case "number":
      return property.number === null ? "" : String(property.number);
    case "url":
      return property.url ?? "";
    default:
      return "";
  }
}

export function propertiesToCells(properties: Record<string, PageProperty>): string[] {
  return COLUMNS.map((column) => propertyText(properties[column]));
}

/** Notion database backend. Refs are page ids and deleting archives the page. */
export class NotionRecordStore implements RecordStore {
  readonly name = "notion";

  constructor(
    private readonly notion: Client,
    private readonly databaseId: string
  ) {}

  /**
   * Verify the database has every column as a property of the right type.
   */
  async verifySchema(): Promise<boolean> {
    try {
      const db = await withRetry(() => this.notion.databases.retrieve({ database_id: this.databaseId }), {
        operation: "Notion schema read",
      });

      const problems: string[] = [];
      for (const column of COLUMNS) {
        const property = db.properties[column];
        if (!property) {
          problems.push(`${column} (missing)`);
        } else if (property.type !== PROPERTY_KINDS[column]) {
          problems.push(`${column} (${property.type}, expected ${PROPERTY_KINDS[column]})`);
        }
      }

      if (problems.length > 0) {
        logger.error(`Notion database has unexpected properties: ${problems.join(", ")}`);
        return false;
      }

      logger.info("Notion database verified successfully");
      return true;
    } catch (error) {
      logger.error("Failed to verify Notion database", error);
      return false;
    }
  }

  async readAll(): Promise<StoredRow[]> {
    const pages: PageObjectResponse[] = [];
    let cursor: string | undefined;

    do {
      const response = await withRetry(
        () =>
          this.notion.databases.query({
            database_id: this.databaseId,
            start_cursor: cursor,
            sorts: [{ timestamp: "created_time", direction: "ascending" }],
          }),
        { operation: "Notion query" }
      );
      pages.push(...response.results.filter(isFullPage));
      cursor = response.has_more ? response.next_cursor ?? undefined : undefined;
    } while (cursor);

    return pages.map((page, index) => ({
      ref: page.id,
      position: index + 1,
      cells: propertiesToCells(page.properties),
    }));
  }

  async append(cells: string[]): Promise<string> {
    const page = await withRetry(
      () =>
        this.notion.pages.create({
          parent: { database_id: this.databaseId },
          properties: cellsToProperties(cells),
        }),
      { operation: "Notion create" }
    );
    logger.debug(`Created Notion entry: ${cells[0]} - ${cells[1]}`);
    return page.id;
  }

  async appendMany(rows: string[][]): Promise<string[]> {
    const refs: string[] = [];
    for (const row of rows) {
      refs.push(await this.append(row));
    }
    return refs;
  }

  async update(ref: string, cells: string[]): Promise<void> {
    await withRetry(
      () => this.notion.pages.update({ page_id: ref, properties: cellsToProperties(cells) }),
      { operation: `Notion update ${ref}` }
    );
  }

  async delete(ref: string): Promise<void> {
    await withRetry(() => this.notion.pages.update({ page_id: ref, archived: true }), {
      operation: `Notion archive ${ref}`,
    });
  }

  async find(column: ColumnName, value: string): Promise<string | null> {
    const kind = PROPERTY_KINDS[column];
    if (!value || (kind !== "title" && kind !== "rich_text")) {
      return findInRows(await this.readAll(), column, value);
    }

    const response = await withRetry(
      () =>
        this.notion.databases.query({
          database_id: this.databaseId,
          page_size: 1,
          filter:
            kind === "title"
              ? { property: column, title: { equals: value } }
              : { property: column, rich_text: { equals: value } },
          sorts: [{ timestamp: "created_time", direction: "ascending" }],
        }),
      { operation: "Notion find" }
    );
    return response.results[0]?.id ?? null;
  }
}
