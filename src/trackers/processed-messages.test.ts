import { describe, it, expect } from "vitest";
import { ProcessedMessagesTracker, type ProcessedMessagesData } from "./processed-messages";
import { MemoryDocumentStore } from "../test-utils";

describe("ProcessedMessagesTracker", () => {
  it("loads existing ids", async () => {
    const tracker = new ProcessedMessagesTracker(
      new MemoryDocumentStore<ProcessedMessagesData>({ messageIds: ["m1", "m2"] })
    );
    await tracker.load();

    expect(tracker.isProcessed("m1")).toBe(true);
    expect(tracker.isProcessed("m3")).toBe(false);
    expect(tracker.stats()).toEqual({ totalProcessed: 2 });
  });

  it("marks each id once and saves only on change", async () => {
    const doc = new MemoryDocumentStore<ProcessedMessagesData>();
    const tracker = new ProcessedMessagesTracker(doc);
    await tracker.load();

    expect(await tracker.markProcessed("m1")).toBe(true);
    expect(await tracker.markProcessed("m1")).toBe(false);
    expect(doc.writes).toBe(1);
    expect(doc.data).toEqual({ messageIds: ["m1"] });
  });

  it("resets to empty", async () => {
    const doc = new MemoryDocumentStore<ProcessedMessagesData>({ messageIds: ["m1"] });
    const tracker = new ProcessedMessagesTracker(doc);
    await tracker.load();

    await tracker.reset();

    expect(tracker.isProcessed("m1")).toBe(false);
    expect(doc.data).toEqual({ messageIds: [] });
  });
});
