import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../.env") });

export type AnalysisMode = "llm" | "rules";

export interface MatcherThresholds {
  /** Minimum weighted score for a fuzzy match. */
  matching: number;
  fuzzyCompany: number;
  fuzzyPosition: number;
  /** Company-only fuzzy match when a position is unknown. */
  fuzzyCompanyOnly: number;
  recentPosition: number;
  recentWindowDays: number;
}

export const DEFAULT_MATCHER_THRESHOLDS: MatcherThresholds = {
  matching: 80,
  fuzzyCompany: 85,
  fuzzyPosition: 75,
  fuzzyCompanyOnly: 90,
  recentPosition: 85,
  recentWindowDays: 30,
};

export interface AppConfig {
  gmail: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    searchDays: number;
    maxResults: number;
  };
  store:
    | { kind: "sheets"; spreadsheetId: string; sheetName: string }
    | { kind: "notion"; token: string; databaseId: string };
  llm: {
    apiKey: string;
    baseUrl?: string;
    model: string;
    timeoutMs: number;
  };
  analysisMode: AnalysisMode;
  detectionThreshold: number;
  matcher: MatcherThresholds;
  dataDir: string;
  cron: {
    schedule: string;
  };
  interactive: boolean;
}

function required(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function integer(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  }
  return parsed;
}

function flag(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (!raw) return fallback;
  return !["false", "0", "no", "off"].includes(raw.toLowerCase());
}

export function parseAnalysisMode(value: string): AnalysisMode {
  if (value === "llm" || value === "rules") return value;
  throw new Error(`Unknown analysis mode "${value}" (expected llm or rules)`);
}

function storeConfig(): AppConfig["store"] {
  const kind = process.env.RECORD_STORE || "sheets";
  if (kind === "notion") {
    return {
      kind: "notion",
      token: required("NOTION_TOKEN"),
      databaseId: required("NOTION_DATABASE_ID"),
    };
  }
  if (kind === "sheets") {
    return {
      kind: "sheets",
      spreadsheetId: required("SPREADSHEET_ID"),
      sheetName: process.env.SHEET_NAME || "Applications",
    };
  }
  throw new Error(`Unknown RECORD_STORE "${kind}" (expected sheets or notion)`);
}

/**
 * Reads the environment into a typed config. Only the store selected by
 * RECORD_STORE needs credentials, and LLM_API_KEY only when the resolved
 * analysis mode is llm.
 */
export function loadConfig(overrides: { analysisMode?: AnalysisMode } = {}): AppConfig {
  const analysisMode =
    overrides.analysisMode ?? parseAnalysisMode(process.env.ANALYSIS_MODE || "llm");

  return {
    gmail: {
      clientId: required("GMAIL_CLIENT_ID"),
      clientSecret: required("GMAIL_CLIENT_SECRET"),
      redirectUri:
        process.env.GMAIL_REDIRECT_URI || "http://localhost:3000/oauth2callback",
      refreshToken: required("GMAIL_REFRESH_TOKEN"),
      searchDays: integer("GMAIL_SEARCH_DAYS", 60),
      maxResults: integer("GMAIL_MAX_RESULTS", 500),
    },
    store: storeConfig(),
    llm: {
      apiKey: analysisMode === "llm" ? required("LLM_API_KEY") : "",
      baseUrl: process.env.LLM_BASE_URL || undefined,
      model: process.env.LLM_MODEL || "gpt-4o-mini",
      timeoutMs: integer("LLM_TIMEOUT_MS", 30_000),
    },
    analysisMode,
    detectionThreshold: integer("DETECTION_THRESHOLD", 5),
    matcher: {
      ...DEFAULT_MATCHER_THRESHOLDS,
      matching: integer("MATCHING_THRESHOLD", DEFAULT_MATCHER_THRESHOLDS.matching),
    },
    dataDir: path.resolve(process.env.DATA_DIR || path.resolve(__dirname, "../../data")),
    cron: {
      schedule: process.env.CRON_SCHEDULE || "0 */6 * * *",
    },
    interactive: flag("INTERACTIVE", true),
  };
}
