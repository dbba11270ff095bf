import { z } from "zod";
import type { DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";
import { normalizeText } from "../utils/text";

export const falsePositivesSchema = z.object({
  messageIds: z.array(z.string()).default([]),
  companies: z.record(z.array(z.string())).default({}),
});

export type FalsePositivesData = z.infer<typeof falsePositivesSchema>;

/**
 * Emails and company/position combinations the user rejected, usually by
 * deleting a created row. A match here blocks re-creation.
 */
export class FalsePositivesTracker {
  private messageIds: string[] = [];
  // Company names are arbitrary text, so they never index a plain object
  private companies = new Map<string, string[]>();

  constructor(private readonly doc: DocumentStore<FalsePositivesData>) {}

  async load(): Promise<void> {
    const data = await this.doc.read();
    this.messageIds = data?.messageIds ?? [];
    this.companies = new Map(Object.entries(data?.companies ?? {}));
    if (this.messageIds.length > 0) {
      logger.info(`Loaded ${this.messageIds.length} false positive message IDs`);
    }
  }

  isFalsePositive(messageId: string, company: string, position: string): boolean {
    if (this.messageIds.includes(messageId)) return true;
    const positions = this.companies.get(normalizeText(company));
    return positions !== undefined && positions.includes(normalizeText(position));
  }

  async add(messageId: string, company: string, position: string): Promise<void> {
    if (!this.messageIds.includes(messageId)) {
      this.messageIds.push(messageId);
    }

    const companyKey = normalizeText(company);
    const positionKey = normalizeText(position);
    const positions = this.companies.get(companyKey) ?? [];
    if (!positions.includes(positionKey)) {
      positions.push(positionKey);
    }
    this.companies.set(companyKey, positions);

    await this.save();
    logger.info(`Recorded false positive: ${company} - ${position} (message: ${messageId})`);
  }

  async reset(): Promise<void> {
    this.messageIds = [];
    this.companies = new Map();
    await this.save();
  }

  stats(): { messageIds: number; companyPositionCombinations: number } {
    let combinations = 0;
    for (const positions of this.companies.values()) combinations += positions.length;
    return { messageIds: this.messageIds.length, companyPositionCombinations: combinations };
  }

  private async save(): Promise<void> {
    await this.doc.write({ messageIds: this.messageIds, companies: Object.fromEntries(this.companies) });
  }
}
