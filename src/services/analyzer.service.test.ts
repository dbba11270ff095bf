import { describe, it, expect, beforeEach } from "vitest";
import { EmailAnalyzer, buildThreadContext, toClassifiedEmail } from "./analyzer.service";
import type { AnalyzeInput, ClassificationBackend } from "./llm.service";
import { ClassificationCache, type ClassificationCacheData } from "../trackers/classification-cache";
import type { ClassificationResult } from "../types";
import { MemoryDocumentStore, known, UNKNOWN, makeEmail } from "../test-utils";

class FakeBackend implements ClassificationBackend {
  calls: AnalyzeInput[] = [];
  constructor(private readonly result: ClassificationResult | null) {}

  async analyze(input: AnalyzeInput): Promise<ClassificationResult | null> {
    this.calls.push(input);
    return this.result;
  }
}

const interview: ClassificationResult = {
  isJobRelated: true,
  confidence: 0.93,
  company: "Globex",
  position: "Data Engineer",
  status: "Interview Scheduled",
  reasoning: "invitation",
};

const email = makeEmail({
  id: "m1",
  subject: "Let's talk",
  body: "We would like to schedule an interview.",
  from: "Globex Careers <careers@globex.com>",
  senderEmail: "careers@globex.com",
});

describe("toClassifiedEmail", () => {
  it("maps sentinels and unknown statuses", () => {
    const classified = toClassifiedEmail(
      email,
      { isJobRelated: true, confidence: 0.876, company: "Unknown", position: null, status: "Pending", reasoning: "" },
      "llm"
    );

    expect(classified.company).toEqual(UNKNOWN);
    expect(classified.position).toEqual(UNKNOWN);
    expect(classified.status).toBe("Applied");
    expect(classified.emailType).toBe("application");
    expect(classified.confidence).toBe(88);
  });
});

describe("buildThreadContext", () => {
  it("summarizes earlier job emails in the same thread", () => {
    const first = makeEmail({ id: "a", threadId: "t1", date: new Date("2026-10-01T00:00:00.000Z") });
    const second = makeEmail({ id: "b", threadId: "t1", date: new Date("2026-10-05T00:00:00.000Z") });
    const lookup = (id: string): ClassificationResult | null =>
      id === "a" ? { ...interview, company: "Acme", position: null, status: "Applied" } : null;

    expect(buildThreadContext(second, [first, second], lookup)).toBe(
      [
        "Earlier emails in this conversation:",
        "- Earlier email: company=Acme, position=unknown, status=Applied",
        "Use them for the company or position if this email does not name them.",
      ].join("\n")
    );
    expect(buildThreadContext(first, [first, second], lookup)).toBe("");
  });
});

describe("EmailAnalyzer", () => {
  let cache: ClassificationCache;

  beforeEach(async () => {
    cache = new ClassificationCache(new MemoryDocumentStore<ClassificationCacheData>());
    await cache.load();
  });

  it("uses keyword rules in rules mode", async () => {
    const backend = new FakeBackend(interview);
    const analyzer = new EmailAnalyzer({ mode: "rules", backend, cache });

    const result = await analyzer.analyze(email);

    expect(result.source).toBe("rules");
    expect(result.status).toBe("Interview Scheduled");
    expect(backend.calls).toHaveLength(0);
  });

  it("classifies with the backend once and then serves the cache", async () => {
    const backend = new FakeBackend(interview);
    const analyzer = new EmailAnalyzer({ mode: "llm", backend, cache });

    const first = await analyzer.analyze(email);
    const second = await analyzer.analyze(email);

    expect(first.source).toBe("llm");
    expect(first.company).toEqual(known("Globex"));
    expect(first.emailType).toBe("interview");
    expect(first.confidence).toBe(93);
    expect(second.source).toBe("cache");
    expect(backend.calls).toHaveLength(1);
    expect(backend.calls[0].sender).toBe("careers@globex.com");
  });

  it("falls back to rules when the backend fails", async () => {
    const analyzer = new EmailAnalyzer({ mode: "llm", backend: new FakeBackend(null), cache });

    const result = await analyzer.analyze(email);

    expect(result.source).toBe("rules");
    expect(cache.get("m1")).toBeNull();
  });
});
