import type { Application, ClassifiedEmail, FieldValue } from "../types";
import { DEFAULT_MATCHER_THRESHOLDS, type MatcherThresholds } from "../utils/config";
import { isKnown } from "../utils/field-value";
import { normalizeCompanyName, normalizePosition } from "../utils/text";
import { similarityRatio } from "../utils/similarity";
import { logger } from "../utils/logger";

export type MatchStrategy = "thread" | "exact" | "fuzzy" | "recent-company";

export interface MatchResult {
  application: Application;
  /** 0-100; only meaningful within one strategy. */
  confidence: number;
  strategy: MatchStrategy;
}

/** Lookup for threads that were folded into another application. */
export interface ThreadRedirects {
  redirect(threadId: string): string[] | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function normalizedCompany(field: FieldValue): string | null {
  return isKnown(field) ? normalizeCompanyName(field.value) : null;
}

function normalizedPosition(field: FieldValue): string | null {
  return isKnown(field) ? normalizePosition(field.value) : null;
}

/**
 * Finds the one existing application an email belongs to. Strategies run in
 * priority order and the first hit wins: thread id, exact company and
 * position, fuzzy similarity, then a lone recent application at the same
 * company.
 */
export class ApplicationMatcher {
  constructor(
    private readonly redirects: ThreadRedirects,
    private readonly thresholds: MatcherThresholds = DEFAULT_MATCHER_THRESHOLDS,
    private readonly now: () => Date = () => new Date()
  ) {}

  findMatch(email: ClassifiedEmail, applications: readonly Application[]): MatchResult | null {
    if (applications.length === 0) return null;

    const match =
      this.matchByThread(email, applications) ??
      this.matchExact(email, applications) ??
      this.matchFuzzy(email, applications) ??
      this.matchRecentCompany(email, applications);

    if (match) {
      logger.debug(
        `Matched ${email.id} by ${match.strategy} (${match.confidence}%) to row ${match.application.rowRef}`
      );
    }
    return match;
  }

  private matchByThread(email: ClassifiedEmail, applications: readonly Application[]): MatchResult | null {
    if (!email.threadId) return null;

    const threadIds = new Set([email.threadId]);
    for (const redirected of this.redirects.redirect(email.threadId) ?? []) {
      threadIds.add(redirected);
    }

    const application = applications.find((app) => app.threadIds.some((id) => threadIds.has(id)));
    return application ? { application, confidence: 100, strategy: "thread" } : null;
  }

  private matchExact(email: ClassifiedEmail, applications: readonly Application[]): MatchResult | null {
    const company = normalizedCompany(email.company);
    const position = normalizedPosition(email.position);
    if (company === null || position === null) return null;

    const application = applications.find(
      (app) => normalizedCompany(app.company) === company && normalizedPosition(app.position) === position
    );
    return application ? { application, confidence: 95, strategy: "exact" } : null;
  }

  private matchFuzzy(email: ClassifiedEmail, applications: readonly Application[]): MatchResult | null {
    const company = normalizedCompany(email.company);
    if (company === null) return null;
    const position = normalizedPosition(email.position);
    const t = this.thresholds;

    let best: Application | null = null;
    let bestScore = 0;

    for (const app of applications) {
      const appCompany = normalizedCompany(app.company);
      if (appCompany === null) continue;
      const appPosition = normalizedPosition(app.position);
      const companyScore = similarityRatio(company, appCompany);

      let score: number;
      if (position === null || appPosition === null) {
        if (companyScore < t.fuzzyCompanyOnly) continue;
        score = companyScore;
      } else {
        const positionScore = similarityRatio(position, appPosition);
        if (companyScore < t.fuzzyCompany || positionScore < t.fuzzyPosition) continue;
        score = companyScore * 0.6 + positionScore * 0.4;
      }

      if (score > bestScore) {
        best = app;
        bestScore = score;
      }
    }

    if (best && bestScore >= t.matching) {
      return { application: best, confidence: Math.floor(bestScore), strategy: "fuzzy" };
    }
    return null;
  }

  private matchRecentCompany(email: ClassifiedEmail, applications: readonly Application[]): MatchResult | null {
    const company = normalizedCompany(email.company);
    if (company === null) return null;

    const cutoff = this.now().getTime() - this.thresholds.recentWindowDays * DAY_MS;
    const candidates = applications.filter(
      (app) => normalizedCompany(app.company) === company && app.applicationDate.getTime() >= cutoff
    );
    if (candidates.length !== 1) return null;

    const [application] = candidates;
    const position = normalizedPosition(email.position);
    const appPosition = normalizedPosition(application.position);
    if (position !== null && appPosition !== null) {
      if (similarityRatio(position, appPosition) < this.thresholds.recentPosition) return null;
    }
    return { application, confidence: 70, strategy: "recent-company" };
  }
}
