import type {
  ApplicationStatus,
  ClassificationResult,
  ClassificationSource,
  ClassifiedEmail,
  EmailType,
  ParsedEmail,
} from "../types";
import type { ClassificationCache } from "../trackers/classification-cache";
import { isApplicationStatus } from "../reconciliation/status-gate";
import type { AnalysisMode } from "../utils/config";
import { fieldFromRaw } from "../utils/field-value";
import { logger } from "../utils/logger";
import type { ClassificationBackend } from "./llm.service";
import { classifyWithRules, DEFAULT_DETECTION_THRESHOLD } from "./parser.service";

const EMAIL_TYPES: Record<ApplicationStatus, EmailType> = {
  Applied: "application",
  "Application Received": "application_received",
  "Under Review": "application_received",
  "Phone Screen Scheduled": "interview",
  "Interview Scheduled": "interview",
  "Assessment Sent": "assessment",
  "Offer Received": "offer",
  Rejected: "rejection",
  Withdrawn: "rejection",
};

/** Sentinels and unrecognized statuses become tagged values and "Applied". */
export function toClassifiedEmail(
  email: ParsedEmail,
  result: ClassificationResult,
  source: ClassificationSource
): ClassifiedEmail {
  const status: ApplicationStatus =
    result.status && isApplicationStatus(result.status) ? result.status : "Applied";

  return {
    ...email,
    isJobRelated: result.isJobRelated,
    confidence: Math.round(result.confidence * 100),
    company: fieldFromRaw(result.company, "Company"),
    position: fieldFromRaw(result.position, "Position"),
    status,
    emailType: EMAIL_TYPES[status],
    source,
    reasoning: result.reasoning,
  };
}

/**
 * What earlier emails in the same thread were classified as, so a reply
 * that never names the company still lands on the right application.
 */
export function buildThreadContext(
  email: ParsedEmail,
  batch: readonly ParsedEmail[],
  lookup: (messageId: string) => ClassificationResult | null
): string {
  if (!email.threadId) return "";

  const lines: string[] = [];
  for (const other of batch) {
    if (other.threadId !== email.threadId || other.id === email.id || other.date >= email.date) continue;
    const earlier = lookup(other.id);
    if (earlier?.isJobRelated && earlier.company) {
      lines.push(
        `- Earlier email: company=${earlier.company}, position=${earlier.position ?? "unknown"}, status=${
          earlier.status ?? "unknown"
        }`
      );
    }
  }

  if (lines.length === 0) return "";
  return [
    "Earlier emails in this conversation:",
    ...lines,
    "Use them for the company or position if this email does not name them.",
  ].join("\n");
}

export interface AnalyzerOptions {
  mode: AnalysisMode;
  backend: ClassificationBackend | null;
  cache: ClassificationCache;
  detectionThreshold?: number;
}

/** LLM classification with a per-message cache, falling back to keyword rules. */
export class EmailAnalyzer {
  constructor(private readonly options: AnalyzerOptions) {}

  async analyzeBatch(emails: readonly ParsedEmail[]): Promise<ClassifiedEmail[]> {
    const classified: ClassifiedEmail[] = [];
    for (const [index, email] of emails.entries()) {
      if ((index + 1) % 10 === 0) {
        logger.info(`Analyzing: ${index + 1}/${emails.length}`);
      }
      classified.push(await this.analyze(email, emails));
    }
    return classified;
  }

  async analyze(email: ParsedEmail, batch: readonly ParsedEmail[] = []): Promise<ClassifiedEmail> {
    const { mode, backend, cache } = this.options;
    const threshold = this.options.detectionThreshold ?? DEFAULT_DETECTION_THRESHOLD;

    if (mode === "rules" || !backend) {
      return classifyWithRules(email, threshold);
    }

    const cached = cache.get(email.id);
    if (cached) {
      return toClassifiedEmail(email, cached, "cache");
    }

    const result = await backend.analyze({
      subject: email.subject,
      body: email.body,
      sender: email.senderEmail,
      threadContext: buildThreadContext(email, batch, (id) => cache.get(id)),
    });

    if (!result) {
      logger.warn(`LLM failed for ${email.id}, using rules fallback`);
      return classifyWithRules(email, threshold);
    }

    await cache.set(email.id, result);
    return toClassifiedEmail(email, result, "llm");
  }
}
