export const APPLICATION_STATUSES = [
  "Applied",
  "Application Received",
  "Under Review",
  "Phone Screen Scheduled",
  "Interview Scheduled",
  "Assessment Sent",
  "Offer Received",
  "Rejected",
  "Withdrawn",
] as const;

// Ordered by progression
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export const TERMINAL_STATUSES: readonly ApplicationStatus[] = [
  "Rejected",
  "Withdrawn",
  "Offer Received",
];

/** A company or position that may not have been extracted yet. */
export type FieldValue =
  | { kind: "known"; value: string }
  | { kind: "unknown" };

export type FieldName = "Company" | "Position";

export interface Application {
  company: FieldValue;
  position: FieldValue;
  applicationDate: Date;
  // Usually an ApplicationStatus, but the store may hold anything a user typed
  currentStatus: string;
  lastUpdated: Date;
  emailCount: number;
  latestEmailDate: Date | null;
  notes: string;
  gmailLink: string;
  threadIds: string[];
  rowRef: string | null;
  rowPosition: number;
  mergeTarget: string | null;
}

export interface ParsedEmail {
  id: string;
  threadId: string;
  from: string; // raw From header
  senderEmail: string;
  subject: string;
  date: Date;
  body: string; // plain text or stripped HTML
  link: string;
}

export type EmailType =
  | "application"
  | "application_received"
  | "interview"
  | "assessment"
  | "offer"
  | "rejection";

export type ClassificationSource = "llm" | "rules" | "cache";

export interface ClassifiedEmail extends ParsedEmail {
  isJobRelated: boolean;
  confidence: number; // 0-100
  company: FieldValue;
  position: FieldValue;
  status: ApplicationStatus;
  emailType: EmailType;
  source: ClassificationSource;
  reasoning?: string;
}

/** Raw output of a classification backend, before sentinel handling. */
export interface ClassificationResult {
  isJobRelated: boolean;
  confidence: number; // 0..1
  company: string | null;
  position: string | null;
  status: string | null;
  reasoning: string;
}

export interface FieldConflict {
  field: FieldName;
  storedValue: string;
  incomingValue: string;
  isUpgrade: boolean;
}

export type ResolutionKind = "keep_stored" | "use_incoming" | "manual";

export interface ResolutionRecord {
  field: FieldName;
  storedValue: string;
  incomingValue: string;
  chosenValue: string;
  kind: ResolutionKind;
}

export interface ConflictResolution {
  company: FieldValue;
  position: FieldValue;
  userModified: boolean;
  createNewEntry: boolean;
}

export interface MergeAuditEntry {
  timestamp: string; // ISO
  sourceRef: string;
  targetRef: string;
  sourceCompany: string;
  targetCompany: string;
}

export interface RunSummary {
  scanned: number;
  jobRelated: number;
  created: number;
  updated: number;
  skipped: number;
  merges: number;
  errors: number;
}
