import type {
  ApplicationStatus,
  ClassifiedEmail,
  EmailType,
  FieldValue,
  ParsedEmail,
} from "../types";
import keywords from "../data/keywords.json";
import { UNKNOWN, known } from "../utils/field-value";
import { containsAnyKeyword, domainCompanyName, extractEmailDomain, extractSenderName } from "../utils/text";

export const DEFAULT_DETECTION_THRESHOLD = 5;

const RECRUITING_SENDER = new RegExp(keywords.recruitingSenderPatterns.join("|"), "i");

// Checked in order: a rejection that mentions "next steps" is still a rejection
const STATUS_RULES: { keywords: string[]; emailType: EmailType; status: ApplicationStatus }[] = [
  { keywords: keywords.statusKeywords.rejected, emailType: "rejection", status: "Rejected" },
  { keywords: keywords.statusKeywords.offer, emailType: "offer", status: "Offer Received" },
  { keywords: keywords.statusKeywords.interview, emailType: "interview", status: "Interview Scheduled" },
  { keywords: keywords.statusKeywords.assessment, emailType: "assessment", status: "Assessment Sent" },
  {
    keywords: keywords.statusKeywords.applicationReceived,
    emailType: "application_received",
    status: "Application Received",
  },
];

export interface Detection {
  isJobRelated: boolean;
  score: number;
}

/**
 * Weighted keyword score. Newsletters and job alerts are excluded outright;
 * otherwise ATS senders, recruiting addresses and application phrases add
 * points and job boards take some away.
 */
export function detectJobEmail(
  email: ParsedEmail,
  threshold = DEFAULT_DETECTION_THRESHOLD
): Detection {
  const subject = email.subject.toLowerCase();
  const body = email.body.toLowerCase();

  if (containsAnyKeyword(`${subject} ${body}`, keywords.exclusionPatterns)) {
    return { isJobRelated: false, score: 0 };
  }

  let score = 0;
  const domain = extractEmailDomain(email.senderEmail);
  if (keywords.atsDomains.some((ats) => domain.includes(ats))) score += 5;
  if (keywords.jobBoardDomains.some((board) => domain.includes(board))) score -= 3;
  if (RECRUITING_SENDER.test(email.senderEmail)) score += 3;

  const { high, medium, low } = keywords.detectionKeywords;
  if (containsAnyKeyword(subject, high)) score += 3;
  else if (containsAnyKeyword(subject, medium)) score += 2;

  if (containsAnyKeyword(body, high)) score += 3;
  else if (containsAnyKeyword(body, medium)) score += 2;
  else if (containsAnyKeyword(body, low)) score += 1;

  return { isJobRelated: score >= threshold, score };
}

export function classifyStatus(email: ParsedEmail): { emailType: EmailType; status: ApplicationStatus } {
  const text = `${email.subject} ${email.body}`;
  for (const rule of STATUS_RULES) {
    if (containsAnyKeyword(text, rule.keywords)) {
      return { emailType: rule.emailType, status: rule.status };
    }
  }
  return { emailType: "application", status: "Applied" };
}

/** Local, keyword-only classification. Also the fallback when the LLM fails. */
export function classifyWithRules(
  email: ParsedEmail,
  threshold = DEFAULT_DETECTION_THRESHOLD
): ClassifiedEmail {
  const detection = detectJobEmail(email, threshold);
  const { emailType, status } = classifyStatus(email);
  const body = email.body.slice(0, 3000);

  return {
    ...email,
    isJobRelated: detection.isJobRelated,
    confidence: Math.max(0, Math.min(100, detection.score * 10)),
    company: extractCompany(email, body),
    position: extractPosition(email, body),
    status,
    emailType,
    source: "rules",
    reasoning: `keyword score ${detection.score}`,
  };
}

// Words that indicate a sender name is generic, not a company name
const GENERIC_SENDER_NAMES =
  /^(no[- ]?reply|do[- ]?not[- ]?reply|recruiting|careers|talent|hr|jobs|notifications?|info|support|admin|hello|team|mailer|updates?|alerts?)/i;

// Common suffixes in sender display names that aren't part of the company name
const SENDER_SUFFIXES =
  /\s+(recruiting|careers|talent acquisition|talent|team|hr|jobs|hiring|staffing|notifications?)\s*$/i;

export function extractCompany(email: ParsedEmail, body: string = email.body): FieldValue {
  const bodyCompany = extractCompanyFromBody(body);
  const fromCompany = extractCompanyFromSender(email.from);
  const subjectCompany = extractCompanyFromSubject(email.subject);
  const domainCompany = extractCompanyFromDomain(email.from);

  // ATS senders speak for many companies, so the text is more telling
  const isAts = keywords.atsDomains.some((d) => email.from.toLowerCase().includes(d));
  const company = isAts
    ? bodyCompany || subjectCompany || fromCompany || domainCompany
    : fromCompany || bodyCompany || subjectCompany || domainCompany;

  return company ? known(company) : UNKNOWN;
}

function extractCompanyFromBody(body: string): string | null {
  const patterns = [
    // "your application to/at/with Company Name"
    /(?:your\s+)?application\s+(?:to|at|with|for)\s+(?:the\s+)?([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s+(?:has been|was|is|for the|for a)\b)/i,
    // "applying to/at Company Name"
    /(?:applying|applied)\s+(?:to|at|with|for)\s+(?:the\s+)?([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[.!,]|\s+(?:for|and|as)\b)/i,
    // "Thank you for your interest in Company Name"
    /interest\s+in\s+(?:working\s+(?:at|with)\s+)?([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[.!,]|\s+(?:and|we)\b)/i,
    // "on behalf of Company Name"
    /on\s+behalf\s+of\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[.!,])/i,
    // "position at Company Name"
    /(?:position|role|opportunity)\s+(?:at|with)\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[.!,]|\s+(?:and|has|is|we)\b)/i,
    // "Company Name has received"
    /^([A-Z][A-Za-z0-9\s&.,'-]+?)\s+(?:has\s+received|received|confirms|would like)/im,
    // "team at Company Name"
    /team\s+at\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[.!,])/i,
  ];

  for (const pattern of patterns) {
    const match = body.match(pattern);
    if (match) {
      const name = cleanCompanyName(match[1]);
      if (name && name.length >= 2 && name.length < 80) {
        return name;
      }
    }
  }

  return null;
}

function extractCompanyFromSender(from: string): string | null {
  // "Company Name <email>" or "Company Name" <email>
  if (!from.includes("<")) return null;

  const name = extractSenderName(from);
  if (GENERIC_SENDER_NAMES.test(name)) return null;

  const cleaned = cleanCompanyName(name);
  if (cleaned && cleaned.length >= 2 && cleaned.length < 80) {
    return cleaned;
  }

  return null;
}

function extractCompanyFromSubject(subject: string): string | null {
  const patterns = [
    /\bat\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[-–|!]|\s*$)/,
    /\bfrom\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[-–|!]|\s*$)/,
    /\bwith\s+([A-Z][A-Za-z0-9\s&.,'-]+?)(?:\s*[-–|!]|\s*$)/,
    // "Company Name - ..."
    /^([A-Z][A-Za-z0-9\s&.,'-]+?)\s*[-–|:]\s/,
  ];

  for (const pattern of patterns) {
    const match = subject.match(pattern);
    if (match) {
      const name = cleanCompanyName(match[1]);
      if (name && name.length >= 2 && name.length < 80) {
        return name;
      }
    }
  }

  return null;
}

const SKIPPED_DOMAIN_NAMES = new Set([
  ...keywords.genericEmailProviders,
  ...keywords.atsDomains.map(domainCompanyName),
]);

function extractCompanyFromDomain(from: string): string | null {
  const name = domainCompanyName(extractEmailDomain(from));
  if (!name || SKIPPED_DOMAIN_NAMES.has(name)) return null;

  return name.charAt(0).toUpperCase() + name.slice(1);
}

const NOT_A_COMPANY = new Set([
  "the",
  "a",
  "an",
  "your",
  "our",
  "this",
  "that",
  "us",
  "we",
  "thank",
  "thanks",
  "hi",
  "hello",
  "dear",
  "application",
  "confirmation",
  "update",
  "status",
  "re",
  "fwd",
  "unknown",
]);

function cleanCompanyName(name: string): string | null {
  const cleaned = name
    .replace(SENDER_SUFFIXES, "")
    .replace(/\s*(Inc\.?|LLC|Ltd\.?|Corp\.?|Co\.?)\s*$/i, "")
    .replace(/\s+/g, " ")
    .trim();

  if (NOT_A_COMPANY.has(cleaned.toLowerCase())) return null;
  return cleaned || null;
}

// ---- Position extraction ----

const JOB_TITLE_KEYWORDS =
  /\b(developer|engineer|designer|analyst|manager|director|coordinator|specialist|consultant|administrator|architect|lead|senior|junior|intern|associate|assistant|full[- ]?stack|front[- ]?end|back[- ]?end|devops|qa|sre|data|software|web|mobile|cloud|product|project|program|marketing|sales|support|operations|it\b|ux|ui)\b/i;

const NOT_A_POSITION =
  /^(thank you|thanks|application|confirmation|update|status|their interest|your interest|our team|the team|dear|hi|hello|regarding|re|fwd|fw|unknown)/i;

export function extractPosition(email: ParsedEmail, body: string = email.body): FieldValue {
  const bodyPosition = extractPositionFromBody(body);
  if (bodyPosition) return known(bodyPosition);

  const subjectPosition = extractPositionFromSubject(email.subject);
  if (subjectPosition) return known(subjectPosition);

  // Bare subject, if it reads like a job title
  const cleanSubject = email.subject
    .replace(/^(re:|fwd?:|fw:)\s*/gi, "")
    .replace(/^(application|confirmation|thank you|update|your)\s*[-–:|]\s*/gi, "")
    .replace(/\s*[-–|]\s*.+$/, "")
    .trim();

  if (cleanSubject && JOB_TITLE_KEYWORDS.test(cleanSubject) && !NOT_A_POSITION.test(cleanSubject)) {
    return known(cleanSubject);
  }

  return UNKNOWN;
}

function extractPositionFromBody(body: string): string | null {
  const patterns = [
    // "for the Senior Developer position/role"
    /for\s+the\s+([A-Za-z0-9\s/,.-]+?)\s+(?:position|role|opening|opportunity)/i,
    // "position: Senior Developer" or "role: Senior Developer"
    /(?:position|role|job\s*title)\s*[:–-]\s*([A-Za-z0-9\s/,.-]+?)(?:\s*[.\n,;]|\s+(?:at|with|in|is)\b)/i,
    // "applied for Senior Developer"
    /(?:applied|applying)\s+(?:for|to)\s+(?:the\s+)?(?:position\s+of\s+)?([A-Za-z0-9\s/,.-]+?)(?:\s+(?:position|role|at|with)\b|\s*[.,;])/i,
    // "your application for Senior Developer"
    /application\s+for\s+(?:the\s+)?(?:position\s+of\s+)?([A-Za-z0-9\s/,.-]+?)(?:\s+(?:position|role|at|with|has)\b|\s*[.,;])/i,
    // "the Senior Developer role at"
    /the\s+([A-Za-z0-9\s/,.-]+?)\s+(?:role|position|opening)\s+(?:at|with)\b/i,
    // "interested in the Senior Developer"
    /interested\s+in\s+(?:the\s+)?(?:position\s+of\s+)?([A-Za-z0-9\s/,.-]+?)(?:\s+(?:position|role|at|with)\b|\s*[.,;])/i,
  ];

  for (const pattern of patterns) {
    const match = body.match(pattern);
    if (match) {
      const position = match[1].trim();
      if (isValidPosition(position)) {
        return position;
      }
    }
  }

  return null;
}

function extractPositionFromSubject(subject: string): string | null {
  const patterns = [
    // "Application: Senior Developer" or "Application - Senior Developer"
    /application\s*[-–:]\s*([A-Za-z0-9\s/,.-]+?)(?:\s+(?:at|with|-)\b|\s*$)/i,
    // "Senior Developer at Company"
    /^(?:re:\s*)?([A-Za-z0-9\s/,.-]+?)\s+(?:at|@)\s+/i,
    // "Your application for Senior Developer"
    /application\s+for\s+(?:the\s+)?([A-Za-z0-9\s/,.-]+?)(?:\s+(?:at|with)\b|\s*$)/i,
    // "Role: Senior Developer"
    /(?:role|position|job)\s*[-–:]\s*([A-Za-z0-9\s/,.-]+)/i,
  ];

  for (const pattern of patterns) {
    const match = subject.match(pattern);
    if (match) {
      const position = match[1].trim();
      if (isValidPosition(position)) {
        return position;
      }
    }
  }

  return null;
}

function isValidPosition(text: string): boolean {
  if (!text || text.length < 3 || text.length > 100) return false;
  if (NOT_A_POSITION.test(text)) return false;
  if (JOB_TITLE_KEYWORDS.test(text)) return true;
  // Multi-word titles without a keyword, e.g. "IT Analyst"
  return text.split(/\s+/).length >= 2;
}
