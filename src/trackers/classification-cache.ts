import { z } from "zod";
import type { ClassificationResult } from "../types";
import type { DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";

export const classificationResultSchema = z.object({
  isJobRelated: z.boolean(),
  confidence: z.number().min(0).max(1),
  company: z.string().nullable(),
  position: z.string().nullable(),
  status: z.string().nullable(),
  reasoning: z.string(),
});

export const classificationCacheSchema = z.object({
  results: z.record(classificationResultSchema).default({}),
});

export type ClassificationCacheData = z.infer<typeof classificationCacheSchema>;

/** Backend answers keyed by message id, so re-runs skip the remote call. */
export class ClassificationCache {
  private data: ClassificationCacheData = { results: {} };

  constructor(private readonly doc: DocumentStore<ClassificationCacheData>) {}

  async load(): Promise<void> {
    this.data = (await this.doc.read()) ?? { results: {} };
    const count = Object.keys(this.data.results).length;
    if (count > 0) {
      logger.info(`Loaded ${count} cached classification results`);
    }
  }

  get(messageId: string): ClassificationResult | null {
    return this.data.results[messageId] ?? null;
  }

  async set(messageId: string, result: ClassificationResult): Promise<void> {
    this.data.results[messageId] = result;
    await this.doc.write(this.data);
  }

  async reset(): Promise<void> {
    this.data = { results: {} };
    await this.doc.write(this.data);
  }

  stats(): { cached: number } {
    return { cached: Object.keys(this.data.results).length };
  }
}
