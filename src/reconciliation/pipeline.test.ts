import { describe, it, expect } from "vitest";
import { Reconciler, sortByDate } from "./pipeline";
import { ApplicationRepository } from "./application-repository";
import { ApplicationMatcher } from "./matcher";
import { ConflictResolver, type ConflictDecision, type DecisionProvider, type FieldDecision } from "./conflict-resolver";
import { MergeEngine } from "./merge-engine";
import { ProcessedMessagesTracker, type ProcessedMessagesData } from "../trackers/processed-messages";
import { FalsePositivesTracker, type FalsePositivesData } from "../trackers/false-positives";
import { MergedThreadsTracker, type MergedThreadsData } from "../trackers/merged-threads";
import { ConflictResolutionTracker, type ConflictResolutionsData } from "../trackers/conflict-resolutions";
import { toRow } from "../services/row-codec";
import { DEFAULT_MATCHER_THRESHOLDS } from "../utils/config";
import type { Application } from "../types";
import { MemoryDocumentStore, MemoryRecordStore, known, UNKNOWN, makeApplication, makeEmail } from "../test-utils";

const NOW = new Date("2026-10-18T09:00:00.000Z");
const day = (iso: string) => new Date(`${iso}T00:00:00.000Z`);

class CountingProvider implements DecisionProvider {
  asked = 0;
  constructor(private readonly decision: ConflictDecision) {}
  async decide(): Promise<ConflictDecision> {
    this.asked++;
    return this.decision;
  }
  async decideField(): Promise<FieldDecision> {
    return { kind: "keep_stored" };
  }
}

async function setup(apps: Application[], options: { provider?: DecisionProvider; store?: MemoryRecordStore } = {}) {
  const store = options.store ?? new MemoryRecordStore(apps.map(toRow));
  const processed = new ProcessedMessagesTracker(new MemoryDocumentStore<ProcessedMessagesData>());
  const falsePositives = new FalsePositivesTracker(new MemoryDocumentStore<FalsePositivesData>());
  const mergedThreads = new MergedThreadsTracker(new MemoryDocumentStore<MergedThreadsData>());
  const resolutions = new ConflictResolutionTracker(new MemoryDocumentStore<ConflictResolutionsData>());
  await Promise.all([processed.load(), falsePositives.load(), mergedThreads.load(), resolutions.load()]);

  const repository = new ApplicationRepository(store, processed, falsePositives, { now: () => NOW });
  const reconciler = new Reconciler({
    repository,
    matcher: new ApplicationMatcher(mergedThreads, DEFAULT_MATCHER_THRESHOLDS, () => NOW),
    resolver: new ConflictResolver(resolutions, options.provider ?? null),
    mergeEngine: new MergeEngine(store, mergedThreads, () => NOW),
  });
  return { store, repository, reconciler, processed, falsePositives };
}

describe("Reconciler", () => {
  it("creates an application for an unmatched email", async () => {
    const { store, reconciler, processed } = await setup([]);

    const summary = await reconciler.reconcile([makeEmail()]);

    expect(summary).toEqual({
      scanned: 1,
      jobRelated: 1,
      created: 1,
      updated: 0,
      skipped: 0,
      merges: 0,
      errors: 0,
    });
    expect(store.rows).toEqual([
      [
        "Acme",
        "Software Engineer",
        "2026-10-10",
        "Applied",
        "2026-10-10",
        "1",
        "2026-10-10",
        "",
        "https://mail.google.com/mail/u/0/#all/msg-1",
        "thread-1",
        "",
      ],
    ]);
    expect(processed.isProcessed("msg-1")).toBe(true);
  });

  it("ignores emails that are not job related", async () => {
    const { store, reconciler } = await setup([]);

    const summary = await reconciler.reconcile([makeEmail({ isJobRelated: false })]);

    expect(summary.scanned).toBe(1);
    expect(summary.jobRelated).toBe(0);
    expect(store.rows).toEqual([]);
  });

  it("never counts the same message twice", async () => {
    const { store, reconciler } = await setup([]);
    const email = makeEmail();

    const first = await reconciler.reconcile([email, email]);
    const second = await reconciler.reconcile([email]);

    expect(first.created).toBe(1);
    expect(first.skipped).toBe(1);
    expect(second.skipped).toBe(1);
    expect(store.rows).toHaveLength(1);
    expect(store.rows[0][5]).toBe("1");
  });

  it("upgrades an unknown position through a company-only match", async () => {
    const { store, reconciler } = await setup([
      makeApplication({ company: known("Acme Inc"), position: UNKNOWN, currentStatus: "Applied" }),
    ]);
    const email = makeEmail({
      threadId: "thread-9",
      company: known("Acme"),
      position: known("Senior Engineer"),
      status: "Interview Scheduled",
      emailType: "interview",
    });

    const summary = await reconciler.reconcile([email]);

    expect(summary.updated).toBe(1);
    expect(store.rows[0].slice(0, 6)).toEqual([
      "Acme Inc",
      "Senior Engineer",
      "2026-10-01",
      "Interview Scheduled",
      "2026-10-10",
      "2",
    ]);
    expect(store.rows[0][9]).toBe("thread-9");
  });

  it("keeps a terminal status but still records the email", async () => {
    const { store, reconciler } = await setup([
      makeApplication({
        company: known("Globex"),
        position: known("Data Engineer"),
        currentStatus: "Rejected",
        lastUpdated: day("2026-09-20"),
        emailCount: 2,
        threadIds: ["t-g"],
      }),
    ]);
    const email = makeEmail({
      threadId: "t-g",
      company: known("Globex"),
      position: known("Data Engineer"),
      status: "Offer Received",
      emailType: "offer",
    });

    await reconciler.reconcile([email]);

    const row = store.rows[0];
    expect(row[3]).toBe("Rejected");
    expect(row[4]).toBe("2026-10-10");
    expect(row[5]).toBe("3");
  });

  it("keeps the earliest application date across out-of-order emails", async () => {
    const { store, reconciler } = await setup([]);
    const later = makeEmail({ id: "m1", threadId: "t5", date: new Date("2026-10-12T08:00:00.000Z") });
    const earlier = makeEmail({ id: "m2", threadId: "t5", date: new Date("2026-10-03T08:00:00.000Z") });

    const summary = await reconciler.reconcile([later, earlier]);

    expect(summary.created).toBe(1);
    expect(summary.updated).toBe(1);
    expect(store.rows[0][2]).toBe("2026-10-03");
    expect(store.rows[0][6]).toBe("2026-10-12");
    expect(store.rows[0][8]).toBe("https://mail.google.com/mail/u/0/#all/msg-1");
  });

  it("moves the application date earlier on update", async () => {
    const { store, reconciler } = await setup([
      makeApplication({ applicationDate: day("2026-10-05"), threadIds: ["t1"] }),
    ]);

    await reconciler.reconcile([makeEmail({ threadId: "t1", date: new Date("2026-10-02T10:00:00.000Z") })]);

    expect(store.rows[0][2]).toBe("2026-10-02");
  });

  it("asks about an identical conflict only once", async () => {
    const provider = new CountingProvider("keep_stored");
    const { store, reconciler } = await setup(
      [makeApplication({ company: known("Acme"), threadIds: ["t1"] })],
      { provider }
    );

    await reconciler.reconcile([
      makeEmail({ id: "m1", threadId: "t1", company: known("Acme Corp") }),
      makeEmail({ id: "m2", threadId: "t1", company: known("ACME corp") }),
    ]);

    expect(provider.asked).toBe(1);
    expect(store.rows[0][0]).toBe("Acme");
    expect(store.rows[0][5]).toBe("3");
  });

  it("appends a separate entry when asked to create a new one", async () => {
    const provider = new CountingProvider("create_new");
    const original = makeApplication({ company: known("Acme"), position: known("Software Engineer"), threadIds: ["t1"] });
    const { store, reconciler, processed } = await setup([original], { provider });

    const summary = await reconciler.reconcile([
      makeEmail({ id: "m1", threadId: "t1", company: known("Acme"), position: known("Data Engineer") }),
    ]);

    expect(provider.asked).toBe(1);
    expect(summary.created).toBe(1);
    expect(summary.updated).toBe(0);
    expect(store.rows).toHaveLength(2);
    expect(store.rows[0]).toEqual(toRow(original));
    expect(store.rows[1].slice(0, 2)).toEqual(["Acme", "Data Engineer"]);
    expect(store.rows[1][9]).toBe("t1");
    expect(processed.isProcessed("m1")).toBe(true);
  });

  it("runs pending merges before matching", async () => {
    const { store, reconciler } = await setup([
      makeApplication({ threadIds: ["t1"] }),
      makeApplication({ company: known("Acme Inc"), position: UNKNOWN, threadIds: ["t2"], mergeTarget: "2" }),
    ]);

    const summary = await reconciler.reconcile([makeEmail({ threadId: "t2" })]);

    expect(summary.merges).toBe(1);
    expect(summary.updated).toBe(1);
    expect(store.rows).toHaveLength(1);
    expect(store.rows[0][5]).toBe("3");
    expect(store.rows[0][9]).toBe("t1,t2");
  });

  it("carries on after a failing email", async () => {
    class FlakyStore extends MemoryRecordStore {
      failures = 1;
      async append(cells: string[]): Promise<string> {
        if (this.failures-- > 0) throw new Error("append failed");
        return super.append(cells);
      }
    }
    const store = new FlakyStore();
    const { reconciler, processed } = await setup([], { store });

    const summary = await reconciler.reconcile([
      makeEmail({ id: "m1", threadId: "ta", company: known("Initech") }),
      makeEmail({ id: "m2", threadId: "tb", company: known("Hooli"), date: new Date("2026-10-11T00:00:00.000Z") }),
    ]);

    expect(summary.errors).toBe(1);
    expect(summary.created).toBe(1);
    expect(store.rows.map((row) => row[0])).toEqual(["Hooli"]);
    expect(processed.isProcessed("m1")).toBe(false);
  });
});

describe("ApplicationRepository", () => {
  it("treats a vanished row as a false positive", async () => {
    const stale = makeApplication({ rowRef: "2", threadIds: ["t1"] });
    const { store, repository, processed, falsePositives } = await setup([stale]);
    store.rows = [];

    const outcome = await repository.update(stale, makeEmail({ id: "m1", threadId: "t1" }));

    expect(outcome).toEqual({ kind: "vanished" });
    expect(processed.isProcessed("m1")).toBe(true);
    expect(falsePositives.isFalsePositive("m9", "acme", "software engineer")).toBe(true);
    expect(await repository.create(makeEmail({ id: "m9", threadId: "t9" }))).toBeNull();
  });

  it("re-locates a row that moved", async () => {
    const app = makeApplication({ company: known("Globex"), position: known("Data Engineer"), threadIds: ["t1"] });
    const { store, repository } = await setup([app]);
    store.rows.unshift(toRow(makeApplication({ company: known("Initech") })));

    const outcome = await repository.update({ ...app, rowRef: "2" }, makeEmail({ id: "m1", threadId: "t1" }));

    expect(outcome.kind).toBe("updated");
    expect(store.rows[0][5]).toBe("1");
    expect(store.rows[1][5]).toBe("2");
  });
});

describe("sortByDate", () => {
  it("orders oldest first and keeps ties stable", () => {
    const a = makeEmail({ id: "a", date: new Date("2026-10-02T00:00:00.000Z") });
    const b = makeEmail({ id: "b", date: new Date("2026-10-01T00:00:00.000Z") });
    const c = makeEmail({ id: "c", date: new Date("2026-10-02T00:00:00.000Z") });

    expect(sortByDate([a, b, c]).map((email) => email.id)).toEqual(["b", "a", "c"]);
  });
});
