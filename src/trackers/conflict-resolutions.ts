import { z } from "zod";
import type { FieldName, ResolutionKind, ResolutionRecord } from "../types";
import type { DocumentStore } from "../utils/json-document";
import { logger } from "../utils/logger";
import { normalizeText } from "../utils/text";

const resolutionSchema = z.object({
  field: z.enum(["Company", "Position"]),
  storedValue: z.string(),
  incomingValue: z.string(),
  chosenValue: z.string(),
  kind: z.enum(["keep_stored", "use_incoming", "manual"]),
});

export const conflictResolutionsSchema = z.object({
  resolutions: z.record(resolutionSchema).default({}),
});

export type ConflictResolutionsData = z.infer<typeof conflictResolutionsSchema>;

export function resolutionKey(field: FieldName, storedValue: string, incomingValue: string): string {
  return `${field.toLowerCase()}:${normalizeText(storedValue)}:${normalizeText(incomingValue)}`;
}

/**
 * Remembers how each distinct conflict was settled so the same pattern
 * (modulo case and spacing) is never asked about twice.
 */
export class ConflictResolutionTracker {
  private data: ConflictResolutionsData = { resolutions: {} };

  constructor(private readonly doc: DocumentStore<ConflictResolutionsData>) {}

  async load(): Promise<void> {
    this.data = (await this.doc.read()) ?? { resolutions: {} };
    const count = Object.keys(this.data.resolutions).length;
    if (count > 0) {
      logger.info(`Loaded ${count} conflict resolution(s)`);
    }
  }

  find(field: FieldName, storedValue: string, incomingValue: string): ResolutionRecord | null {
    return this.data.resolutions[resolutionKey(field, storedValue, incomingValue)] ?? null;
  }

  async save(
    field: FieldName,
    storedValue: string,
    incomingValue: string,
    chosenValue: string,
    kind: ResolutionKind
  ): Promise<void> {
    this.data.resolutions[resolutionKey(field, storedValue, incomingValue)] = {
      field,
      storedValue,
      incomingValue,
      chosenValue,
      kind,
    };
    await this.doc.write(this.data);
    logger.info(`Saved resolution: ${field} '${storedValue}' vs '${incomingValue}' -> '${chosenValue}'`);
  }

  async reset(): Promise<void> {
    this.data = { resolutions: {} };
    await this.doc.write(this.data);
  }

  stats(): { resolutions: number } {
    return { resolutions: Object.keys(this.data.resolutions).length };
  }
}
