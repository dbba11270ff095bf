import type {
  Application,
  ClassifiedEmail,
  ConflictResolution,
  FieldConflict,
  FieldName,
  FieldValue,
  ResolutionKind,
  ResolutionRecord,
} from "../types";
import { known } from "../utils/field-value";
import { logger } from "../utils/logger";

export type ConflictDecision = "keep_stored" | "use_incoming" | "per_field" | "create_new" | "abstain";

export type FieldDecision =
  | { kind: "keep_stored" }
  | { kind: "use_incoming" }
  | { kind: "manual"; value: string };

export interface ConflictContext {
  application: Application;
  email: ClassifiedEmail;
  /** Only the real conflicts; upgrades are never asked about. */
  conflicts: FieldConflict[];
}

/** Whoever settles conflicts the resolver cannot settle by itself. */
export interface DecisionProvider {
  decide(context: ConflictContext): Promise<ConflictDecision>;
  decideField(conflict: FieldConflict, context: ConflictContext): Promise<FieldDecision>;
}

export interface ResolutionMemory {
  find(field: FieldName, storedValue: string, incomingValue: string): ResolutionRecord | null;
  save(
    field: FieldName,
    storedValue: string,
    incomingValue: string,
    chosenValue: string,
    kind: ResolutionKind
  ): Promise<void>;
}

export type ResolutionPlan =
  | { kind: "resolved"; resolution: ConflictResolution }
  | { kind: "ask"; realConflicts: FieldConflict[]; upgrades: FieldConflict[] };

export interface DecisionOutcome {
  resolution: ConflictResolution;
  /** Choices to remember for identical future conflicts. */
  records: ResolutionRecord[];
}

interface Values {
  company: FieldValue;
  position: FieldValue;
}

function withField(values: Values, field: FieldName, value: string): Values {
  return field === "Company" ? { ...values, company: known(value) } : { ...values, position: known(value) };
}

function applyUpgrades(values: Values, upgrades: readonly FieldConflict[]): Values {
  return upgrades.reduce((acc, upgrade) => withField(acc, upgrade.field, upgrade.incomingValue), values);
}

function resolution(values: Values, userModified: boolean, createNewEntry = false): ConflictResolution {
  return { ...values, userModified, createNewEntry };
}

/**
 * Settles what can be settled without asking: no conflicts, upgrades only,
 * non-interactive runs, or real conflicts that all have a remembered answer.
 */
export function planResolution(
  application: Application,
  conflicts: readonly FieldConflict[],
  options: { interactive: boolean; lookup: (conflict: FieldConflict) => ResolutionRecord | null }
): ResolutionPlan {
  const stored: Values = { company: application.company, position: application.position };
  if (conflicts.length === 0) {
    return { kind: "resolved", resolution: resolution(stored, false) };
  }

  const upgrades = conflicts.filter((conflict) => conflict.isUpgrade);
  const realConflicts = conflicts.filter((conflict) => !conflict.isUpgrade);
  const upgraded = applyUpgrades(stored, upgrades);

  if (!options.interactive || realConflicts.length === 0) {
    return { kind: "resolved", resolution: resolution(upgraded, false) };
  }

  let remembered = upgraded;
  for (const conflict of realConflicts) {
    const saved = options.lookup(conflict);
    if (!saved) return { kind: "ask", realConflicts, upgrades };
    remembered = withField(remembered, conflict.field, saved.chosenValue);
  }
  return { kind: "resolved", resolution: resolution(remembered, true) };
}

/** Turns a decision (and per-field answers, if any) into final values. */
export function applyDecision(
  application: Application,
  email: ClassifiedEmail,
  plan: { realConflicts: readonly FieldConflict[]; upgrades: readonly FieldConflict[] },
  decision: ConflictDecision,
  fieldDecisions: ReadonlyMap<FieldName, FieldDecision> = new Map()
): DecisionOutcome {
  const stored: Values = { company: application.company, position: application.position };

  switch (decision) {
    case "abstain":
      return { resolution: resolution(stored, false), records: [] };

    case "create_new":
      return {
        resolution: resolution({ company: email.company, position: email.position }, true, true),
        records: [],
      };

    case "keep_stored":
      return {
        resolution: resolution(applyUpgrades(stored, plan.upgrades), true),
        records: plan.realConflicts.map((conflict) => record(conflict, conflict.storedValue, "keep_stored")),
      };

    case "use_incoming": {
      let values = applyUpgrades(stored, plan.upgrades);
      for (const conflict of plan.realConflicts) {
        values = withField(values, conflict.field, conflict.incomingValue);
      }
      return {
        resolution: resolution(values, true),
        records: plan.realConflicts.map((conflict) => record(conflict, conflict.incomingValue, "use_incoming")),
      };
    }

    case "per_field": {
      let values = applyUpgrades(stored, plan.upgrades);
      const records: ResolutionRecord[] = [];
      for (const conflict of plan.realConflicts) {
        const chosen = fieldChoice(conflict, fieldDecisions.get(conflict.field));
        values = withField(values, conflict.field, chosen.value);
        records.push(record(conflict, chosen.value, chosen.kind));
      }
      return { resolution: resolution(values, true), records };
    }
  }
}

function fieldChoice(
  conflict: FieldConflict,
  decision: FieldDecision | undefined
): { value: string; kind: ResolutionKind } {
  if (decision?.kind === "use_incoming") {
    return { value: conflict.incomingValue, kind: "use_incoming" };
  }
  if (decision?.kind === "manual") {
    const value = decision.value.trim();
    if (value) return { value, kind: "manual" };
  }
  return { value: conflict.storedValue, kind: "keep_stored" };
}

function record(conflict: FieldConflict, chosenValue: string, kind: ResolutionKind): ResolutionRecord {
  return {
    field: conflict.field,
    storedValue: conflict.storedValue,
    incomingValue: conflict.incomingValue,
    chosenValue,
    kind,
  };
}

/**
 * Reconciles stored and incoming company/position. Without a provider the
 * resolver runs non-interactively and stored values always win.
 */
export class ConflictResolver {
  constructor(
    private readonly memory: ResolutionMemory,
    private readonly provider: DecisionProvider | null
  ) {}

  get interactive(): boolean {
    return this.provider !== null;
  }

  async resolve(
    application: Application,
    email: ClassifiedEmail,
    conflicts: FieldConflict[]
  ): Promise<ConflictResolution> {
    const provider = this.provider;
    const plan = planResolution(application, conflicts, {
      interactive: provider !== null,
      lookup: (conflict) => this.memory.find(conflict.field, conflict.storedValue, conflict.incomingValue),
    });

    for (const upgrade of conflicts.filter((conflict) => conflict.isUpgrade)) {
      logger.debug(`Upgrade: ${upgrade.field} '${upgrade.storedValue}' -> '${upgrade.incomingValue}'`);
    }

    if (plan.kind === "resolved") {
      if (!provider && conflicts.some((conflict) => !conflict.isUpgrade)) {
        logger.info(`Non-interactive: preserving stored values for row ${application.rowRef}`);
      } else if (plan.resolution.userModified) {
        logger.info(`Applied saved resolution(s) for row ${application.rowRef}`);
      }
      return plan.resolution;
    }

    if (!provider) {
      throw new Error(`Unresolved conflicts for row ${application.rowRef} in non-interactive mode`);
    }

    const context: ConflictContext = { application, email, conflicts: plan.realConflicts };
    const decision = await provider.decide(context);

    const fieldDecisions = new Map<FieldName, FieldDecision>();
    if (decision === "per_field") {
      for (const conflict of plan.realConflicts) {
        fieldDecisions.set(conflict.field, await provider.decideField(conflict, context));
      }
    }

    const outcome = applyDecision(application, email, plan, decision, fieldDecisions);
    for (const saved of outcome.records) {
      await this.memory.save(saved.field, saved.storedValue, saved.incomingValue, saved.chosenValue, saved.kind);
    }
    return outcome.resolution;
  }
}
