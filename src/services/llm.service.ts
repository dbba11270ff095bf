import OpenAI from "openai";
import { z } from "zod";
import type { ClassificationResult } from "../types";
import type { AppConfig } from "../utils/config";
import { logger } from "../utils/logger";
import { withRetry } from "../utils/retry";

export const BODY_EXCERPT_LENGTH = 2000;

export interface AnalyzeInput {
  subject: string;
  body: string;
  sender: string;
  threadContext: string;
}

/** A remote classifier. Returns null instead of throwing on any failure. */
export interface ClassificationBackend {
  analyze(input: AnalyzeInput): Promise<ClassificationResult | null>;
}

/** One system + user turn in, the raw reply text out. */
export interface CompletionClient {
  complete(system: string, user: string): Promise<string | null>;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly config: AppConfig["llm"]) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      // withRetry owns retries
      maxRetries: 0,
    });
  }

  async complete(system: string, user: string): Promise<string | null> {
    const response = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.config.model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
          response_format: { type: "json_object" },
          temperature: 0,
          max_tokens: 400,
        }),
      { operation: "LLM classification" }
    );
    return response.choices[0]?.message?.content ?? null;
  }
}

const SYSTEM_PROMPT = `You classify emails for a personal job application tracker.
Decide whether the email is about one of the recipient's own job applications (a confirmation,
interview invitation, assessment, offer or rejection). Newsletters, job alerts, marketplace
receipts and promotions are not job-related.
The company is the actual employer, never the applicant tracking system that sent the mail.
The position is a real job title, not a phrase like "your interest".
Status must be one of: "Applied", "Application Received", "Interview Scheduled",
"Assessment Sent", "Offer Received", "Rejected".
Reply with a single JSON object:
{"is_job_related": boolean, "confidence": number between 0 and 1, "company": string or null,
"position": string or null, "status": string or null, "reasoning": short string}`;

export function buildUserPrompt(input: AnalyzeInput): string {
  const lines = [
    `Subject: ${input.subject}`,
    `From: ${input.sender}`,
    `Body:`,
    input.body.slice(0, BODY_EXCERPT_LENGTH),
  ];
  if (input.threadContext) {
    lines.push("", input.threadContext);
  }
  return lines.join("\n");
}

const responseSchema = z.object({
  is_job_related: z.boolean(),
  confidence: z.coerce.number().min(0).max(1).catch(0),
  company: z.string().nullable().optional(),
  position: z.string().nullable().optional(),
  status: z.string().nullable().optional(),
  reasoning: z.string().optional(),
});

function emptyToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Parses a model reply, tolerating code fences. Null when unusable. */
export function parseClassification(raw: string): ClassificationResult | null {
  const text = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger.warn("LLM returned non-JSON output", error instanceof Error ? error.message : error);
    return null;
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("LLM output failed validation", parsed.error.message);
    return null;
  }

  const data = parsed.data;
  return {
    isJobRelated: data.is_job_related,
    confidence: data.confidence,
    company: emptyToNull(data.company),
    position: emptyToNull(data.position),
    status: emptyToNull(data.status),
    reasoning: data.reasoning ?? "",
  };
}

export class LlmClassifier implements ClassificationBackend {
  constructor(private readonly client: CompletionClient) {}

  async analyze(input: AnalyzeInput): Promise<ClassificationResult | null> {
    let reply: string | null;
    try {
      reply = await this.client.complete(SYSTEM_PROMPT, buildUserPrompt(input));
    } catch (error) {
      logger.warn(`LLM call failed for "${input.subject}"`, error instanceof Error ? error.message : error);
      return null;
    }

    if (!reply) {
      logger.warn(`LLM returned an empty reply for "${input.subject}"`);
      return null;
    }
    return parseClassification(reply);
  }
}
