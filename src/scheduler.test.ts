import { describe, it, expect, vi } from "vitest";
import { runBatch, withoutOverlap, type BatchConfig } from "./scheduler";
import { loadTrackers, type Trackers } from "./trackers";
import { ProcessedMessagesTracker, type ProcessedMessagesData } from "./trackers/processed-messages";
import { FalsePositivesTracker, type FalsePositivesData } from "./trackers/false-positives";
import { MergedThreadsTracker, type MergedThreadsData } from "./trackers/merged-threads";
import { ConflictResolutionTracker, type ConflictResolutionsData } from "./trackers/conflict-resolutions";
import { ClassificationCache, type ClassificationCacheData } from "./trackers/classification-cache";
import type { MailSource } from "./services/gmail.service";
import { DEFAULT_MATCHER_THRESHOLDS } from "./utils/config";
import type { ParsedEmail } from "./types";
import { MemoryDocumentStore, MemoryRecordStore } from "./test-utils";

const config: BatchConfig = {
  analysisMode: "rules",
  detectionThreshold: 5,
  matcher: DEFAULT_MATCHER_THRESHOLDS,
  gmail: { maxResults: 100 },
};

function parsed(overrides: Partial<ParsedEmail>): ParsedEmail {
  return {
    id: "m",
    threadId: "t1",
    from: "",
    senderEmail: "",
    subject: "",
    date: new Date("2026-10-01T09:00:00.000Z"),
    body: "",
    link: "",
    ...overrides,
  };
}

const confirmation = parsed({
  id: "m1",
  from: "Acme Talent <no-reply@greenhouse.io>",
  senderEmail: "no-reply@greenhouse.io",
  subject: "Your application for Backend Engineer",
  body: "Thank you for applying to Acme. We have received your application.",
  date: new Date("2026-10-01T09:00:00.000Z"),
  link: "https://mail.google.com/mail/u/0/#all/m1",
});

const invite = parsed({
  id: "m2",
  from: "Acme Recruiting <jobs@acme.com>",
  senderEmail: "jobs@acme.com",
  subject: "Interview invitation: Data Analyst",
  body: "Hi Sam, we would like to schedule an interview for the Data Analyst role. Best, the recruiting team",
  date: new Date("2026-10-05T09:00:00.000Z"),
  link: "https://mail.google.com/mail/u/0/#all/m2",
});

const alert = parsed({ id: "m3", threadId: "t3", subject: "New jobs matching your profile" });

class FakeMail implements MailSource {
  requested: Array<{ days: number; maxResults: number }> = [];
  constructor(private readonly emails: ParsedEmail[]) {}

  async fetchRecent(days: number, maxResults: number): Promise<ParsedEmail[]> {
    this.requested.push({ days, maxResults });
    return this.emails;
  }
}

async function memoryTrackers(): Promise<Trackers> {
  const trackers: Trackers = {
    processed: new ProcessedMessagesTracker(new MemoryDocumentStore<ProcessedMessagesData>()),
    falsePositives: new FalsePositivesTracker(new MemoryDocumentStore<FalsePositivesData>()),
    mergedThreads: new MergedThreadsTracker(new MemoryDocumentStore<MergedThreadsData>()),
    resolutions: new ConflictResolutionTracker(new MemoryDocumentStore<ConflictResolutionsData>()),
    classifications: new ClassificationCache(new MemoryDocumentStore<ClassificationCacheData>()),
  };
  await loadTrackers(trackers);
  return trackers;
}

describe("runBatch", () => {
  it("classifies in date order and folds a thread into one row", async () => {
    const store = new MemoryRecordStore();
    const mail = new FakeMail([invite, alert, confirmation]);
    const trackers = await memoryTrackers();

    const summary = await runBatch(config, { mail, store, backend: null }, trackers, {
      days: 30,
      dryRun: false,
      provider: null,
    });

    expect(mail.requested).toEqual([{ days: 30, maxResults: 100 }]);
    expect(summary).toEqual({
      scanned: 3,
      jobRelated: 2,
      created: 1,
      updated: 1,
      skipped: 0,
      merges: 0,
      errors: 0,
    });
    expect(store.rows).toHaveLength(1);
    const [row] = store.rows;
    expect(row[0]).toBe("Acme");
    expect(row[1]).toBe("Backend Engineer");
    expect(row[2]).toBe("2026-10-01");
    expect(row[3]).toBe("Interview Scheduled");
    expect(row[5]).toBe("2");
    expect(row[9]).toBe("t1");
  });

  it("skips everything on a second run", async () => {
    const store = new MemoryRecordStore();
    const mail = new FakeMail([confirmation, invite]);
    const trackers = await memoryTrackers();
    const options = { days: 30, dryRun: false, provider: null };

    await runBatch(config, { mail, store, backend: null }, trackers, options);
    const second = await runBatch(config, { mail, store, backend: null }, trackers, options);

    expect(second.skipped).toBe(2);
    expect(second.created + second.updated).toBe(0);
    expect(store.rows).toHaveLength(1);
  });

  it("writes nothing in a dry run", async () => {
    const store = new MemoryRecordStore();
    const trackers = await memoryTrackers();

    const summary = await runBatch(config, { mail: new FakeMail([confirmation]), store, backend: null }, trackers, {
      days: 7,
      dryRun: true,
      provider: null,
    });

    expect(summary.created).toBe(1);
    expect(store.rows).toHaveLength(0);
  });
});

describe("withoutOverlap", () => {
  it("skips a trigger while the previous run is active", async () => {
    let release: () => void = () => undefined;
    const task = vi.fn(() => new Promise<void>((resolve) => (release = resolve)));
    const guarded = withoutOverlap(task);

    const first = guarded();
    await guarded();
    release();
    await first;
    const third = guarded();
    release();
    await third;

    expect(task).toHaveBeenCalledTimes(2);
  });

  it("contains task failures", async () => {
    const guarded = withoutOverlap(() => Promise.reject(new Error("boom")));
    await expect(guarded()).resolves.toBeUndefined();
  });
});
