import { z } from "zod";
import type { MergeAuditEntry } from "../types";
import type { DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";

export const mergedThreadsSchema = z.object({
  mergedThreadIds: z.record(z.array(z.string())).default({}),
  history: z
    .array(
      z.object({
        timestamp: z.string(),
        sourceRef: z.string(),
        targetRef: z.string(),
        sourceCompany: z.string(),
        targetCompany: z.string(),
      })
    )
    .default([]),
});

export type MergedThreadsData = z.infer<typeof mergedThreadsSchema>;

export interface MergeRecord extends MergeAuditEntry {
  sourceThreadIds: string[];
  targetThreadIds: string[];
}

/** Where the threads of merged-away applications now live. */
export class MergedThreadsTracker {
  private data: MergedThreadsData = { mergedThreadIds: {}, history: [] };

  constructor(private readonly doc: DocumentStore<MergedThreadsData>) {}

  async load(): Promise<void> {
    this.data = (await this.doc.read()) ?? { mergedThreadIds: {}, history: [] };
    const count = Object.keys(this.data.mergedThreadIds).length;
    if (count > 0) {
      logger.info(`Loaded ${count} merged thread ID mappings`);
    }
  }

  async recordMerge(record: MergeRecord): Promise<void> {
    for (const threadId of record.sourceThreadIds) {
      if (threadId) {
        this.data.mergedThreadIds[threadId] = [...record.targetThreadIds];
      }
    }

    this.data.history.push({
      timestamp: record.timestamp,
      sourceRef: record.sourceRef,
      targetRef: record.targetRef,
      sourceCompany: record.sourceCompany,
      targetCompany: record.targetCompany,
    });

    await this.doc.write(this.data);
  }

  /** Thread ids a merged-away thread was folded into, or null. */
  redirect(threadId: string): string[] | null {
    return this.data.mergedThreadIds[threadId] ?? null;
  }

  history(): readonly MergeAuditEntry[] {
    return this.data.history;
  }

  async reset(): Promise<void> {
    this.data = { mergedThreadIds: {}, history: [] };
    await this.doc.write(this.data);
  }

  stats(): { mergedThreadIds: number; totalMerges: number } {
    return {
      mergedThreadIds: Object.keys(this.data.mergedThreadIds).length,
      totalMerges: this.data.history.length,
    };
  }
}
