import readline from "node:readline";
import type { FieldConflict } from "../types";
import type {
  ConflictContext,
  ConflictDecision,
  DecisionProvider,
  FieldDecision,
} from "../reconciliation/conflict-resolver";
import { fieldToString } from "../utils/field-value";
import { logger } from "../utils/logger";

/** Resolves null once the input has closed. */
export type Ask = (question: string) => Promise<string | null>;

export interface ConsoleDecisionProviderOptions {
  ask?: Ask;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const DECISIONS: Record<string, ConflictDecision> = {
  k: "keep_stored",
  u: "use_incoming",
  p: "per_field",
  n: "create_new",
  s: "abstain",
};

export function parseDecision(answer: string): ConflictDecision | null {
  return DECISIONS[answer.trim().toLowerCase().charAt(0)] ?? null;
}

export function describeConflicts(context: ConflictContext): string {
  const { application, email, conflicts } = context;
  const lines = [
    "",
    `Conflict: "${email.subject}" matched ${fieldToString(application.company, "Company")} - ${fieldToString(
      application.position,
      "Position"
    )}`,
    ...conflicts.map((c) => `  ${c.field}: stored "${c.storedValue}" / email "${c.incomingValue}"`),
  ];
  return lines.join("\n");
}

/**
 * Asks on the terminal. Keeps asking until the answer is one of the listed
 * keys. Once the input closes every remaining conflict is skipped and every
 * field keeps its stored value.
 */
export class ConsoleDecisionProvider implements DecisionProvider {
  private rl: readline.Interface | null = null;
  private inputClosed = false;
  private readonly ask: Ask;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: ConsoleDecisionProviderOptions = {}) {
    this.ask = options.ask ?? ((question) => this.question(question));
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async decide(context: ConflictContext): Promise<ConflictDecision> {
    console.log(describeConflicts(context));
    for (;;) {
      const answer = await this.ask("[k]eep stored, [u]se email, [p]er field, [n]ew entry, [s]kip: ");
      if (answer === null) {
        logger.warn(`Input closed, skipping conflict for "${context.email.subject}"`);
        return "abstain";
      }
      const decision = parseDecision(answer);
      if (decision) return decision;
    }
  }

  async decideField(conflict: FieldConflict): Promise<FieldDecision> {
    for (;;) {
      const answer = await this.ask(
        `${conflict.field}: [k]eep "${conflict.storedValue}", [u]se "${conflict.incomingValue}", [m]anual: `
      );
      if (answer === null) return { kind: "keep_stored" };

      const choice = answer.trim().toLowerCase();
      if (choice.startsWith("k")) return { kind: "keep_stored" };
      if (choice.startsWith("u")) return { kind: "use_incoming" };
      if (choice.startsWith("m")) {
        const value = await this.ask(`New ${conflict.field.toLowerCase()}: `);
        return value === null ? { kind: "keep_stored" } : { kind: "manual", value: value.trim() };
      }
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private open(): readline.Interface | null {
    if (this.inputClosed) return null;
    if (!this.rl) {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      rl.on("close", () => {
        this.inputClosed = true;
        this.rl = null;
      });
      this.rl = rl;
    }
    return this.rl;
  }

  private question(question: string): Promise<string | null> {
    const rl = this.open();
    if (!rl) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      rl.once("close", onClose);
      rl.question(question, (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    });
  }
}
