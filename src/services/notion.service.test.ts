import { describe, it, expect } from "vitest";
import type { PageObjectResponse } from "@notionhq/client/build/src/api-endpoints";
import { cellsToProperties, propertiesToCells, propertyText } from "./notion.service";

type PageProperty = PageObjectResponse["properties"][string];

function richText(content: string) {
  return {
    type: "text" as const,
    text: { content, link: null },
    annotations: {
      bold: false,
      italic: false,
      strikethrough: false,
      underline: false,
      code: false,
      color: "default" as const,
    },
    plain_text: content,
    href: null,
  };
}

const title = (content: string): PageProperty => ({ id: "title", type: "title", title: [richText(content)] });
const text = (...parts: string[]): PageProperty => ({ id: "t", type: "rich_text", rich_text: parts.map(richText) });
const date = (start: string | null): PageProperty => ({
  id: "d",
  type: "date",
  date: start ? { start, end: null, time_zone: null } : null,
});

describe("cellsToProperties", () => {
  it("maps each column to its property type", () => {
    const properties = cellsToProperties([
      "Acme",
      "Engineer",
      "2026-10-01",
      "Interview Scheduled",
      "2026-10-05",
      "2",
      "",
      "",
      "https://mail.google.com/mail/u/0/#all/m1",
      "t1,t2",
      "",
    ]);

    expect(properties).toEqual({
      Company: { title: [{ text: { content: "Acme" } }] },
      Position: { rich_text: [{ text: { content: "Engineer" } }] },
      "Application Date": { date: { start: "2026-10-01" } },
      "Current Status": { select: { name: "Interview Scheduled" } },
      "Last Updated": { date: { start: "2026-10-05" } },
      "Email Count": { number: 2 },
      "Latest Email Date": { date: null },
      Notes: { rich_text: [] },
      "Source Link": { url: "https://mail.google.com/mail/u/0/#all/m1" },
      "Thread Ids": { rich_text: [{ text: { content: "t1,t2" } }] },
      "Merge Target": { rich_text: [] },
    });
  });

  it("truncates long text", () => {
    const properties = cellsToProperties(["Acme", "", "", "", "", "", "", "n".repeat(2500)]);
    expect(properties.Notes).toEqual({ rich_text: [{ text: { content: "n".repeat(2000) } }] });
  });
});

describe("propertiesToCells", () => {
  it("reads page properties back into cells", () => {
    const cells = propertiesToCells({
      Company: title("Globex"),
      Position: text("Data ", "Engineer"),
      "Application Date": date("2026-09-01T10:00:00.000+00:00"),
      "Current Status": { id: "s", type: "select", select: { id: "x", name: "Rejected", color: "red" } },
      "Last Updated": date("2026-09-20"),
      "Email Count": { id: "n", type: "number", number: 3 },
      "Latest Email Date": date(null),
      "Source Link": { id: "u", type: "url", url: null },
      "Thread Ids": text("t9"),
    });

    expect(cells).toEqual([
      "Globex",
      "Data Engineer",
      "2026-09-01",
      "Rejected",
      "2026-09-20",
      "3",
      "",
      "",
      "",
      "t9",
      "",
    ]);
  });

  it("treats other property types as empty", () => {
    expect(propertyText({ id: "c", type: "checkbox", checkbox: true })).toBe("");
    expect(propertyText(undefined)).toBe("");
  });
});
