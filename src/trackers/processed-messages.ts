import { z } from "zod";
import type { DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";

export const processedMessagesSchema = z.object({
  messageIds: z.array(z.string()).default([]),
});

export type ProcessedMessagesData = z.infer<typeof processedMessagesSchema>;

/** Message ids already folded into an application. */
export class ProcessedMessagesTracker {
  private ids = new Set<string>();

  constructor(private readonly doc: DocumentStore<ProcessedMessagesData>) {}

  async load(): Promise<void> {
    const data = await this.doc.read();
    this.ids = new Set(data?.messageIds ?? []);
    if (this.ids.size > 0) {
      logger.info(`Loaded ${this.ids.size} processed email IDs`);
    }
  }

  isProcessed(messageId: string): boolean {
    return this.ids.has(messageId);
  }

  /** Returns false when the id was already marked. */
  async markProcessed(messageId: string): Promise<boolean> {
    if (this.ids.has(messageId)) return false;
    this.ids.add(messageId);
    await this.save();
    return true;
  }

  async reset(): Promise<void> {
    this.ids.clear();
    await this.save();
  }

  stats(): { totalProcessed: number } {
    return { totalProcessed: this.ids.size };
  }

  private save(): Promise<void> {
    return this.doc.write({ messageIds: [...this.ids] });
  }
}
