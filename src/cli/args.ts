import { parseAnalysisMode, type AnalysisMode } from "../utils/config";

export interface CliOptions {
  days?: number;
  dryRun: boolean;
  mode?: AnalysisMode;
  resetTrackers: boolean;
  nonInteractive: boolean;
  watch: boolean;
  help: boolean;
}

export const USAGE = `Usage: job-mail-reconciler [options]

Options:
  --days N            Look back N days in Gmail (default GMAIL_SEARCH_DAYS or 60)
  --dry-run           Read the store and report changes without writing anything
  --mode llm|rules    Classify with the LLM or with keyword rules only
  --reset-trackers    Clear processed, false-positive, merge and resolution history
  --non-interactive   Never prompt; conflicts keep the stored values
  --watch             Keep running and process new mail on CRON_SCHEDULE
  --help              Show this message`;

const BOOLEAN_FLAGS = {
  "dry-run": "dryRun",
  "reset-trackers": "resetTrackers",
  "non-interactive": "nonInteractive",
  watch: "watch",
  help: "help",
} as const;

function isBooleanFlag(key: string): key is keyof typeof BOOLEAN_FLAGS {
  return key in BOOLEAN_FLAGS;
}

function parseDays(raw: string): number {
  const days = Number(raw);
  if (!Number.isInteger(days) || days < 1) {
    throw new Error(`--days expects a positive whole number, got "${raw}"`);
  }
  return days;
}

/** Parses `process.argv.slice(2)`. Throws on unknown flags and bad values. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    dryRun: false,
    resetTrackers: false,
    nonInteractive: false,
    watch: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      throw new Error(`Unexpected argument "${token}"`);
    }

    const [key, inline] = token.slice(2).split("=", 2);

    if (isBooleanFlag(key)) {
      options[BOOLEAN_FLAGS[key]] = true;
      continue;
    }

    if (key !== "days" && key !== "mode") {
      throw new Error(`Unknown option --${key}`);
    }

    let value = inline;
    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`--${key} needs a value`);
      }
      i += 1;
    }

    if (key === "days") {
      options.days = parseDays(value);
    } else {
      options.mode = parseAnalysisMode(value);
    }
  }

  return options;
}
