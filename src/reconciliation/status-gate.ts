import { APPLICATION_STATUSES, TERMINAL_STATUSES, type ApplicationStatus } from "../types";

export function isApplicationStatus(value: string): value is ApplicationStatus {
  return APPLICATION_STATUSES.some((status) => status === value);
}

export function isTerminal(status: string): boolean {
  return TERMINAL_STATUSES.some((terminal) => terminal === status);
}

function progressIndex(status: string): number {
  return APPLICATION_STATUSES.findIndex((candidate) => candidate === status);
}

/**
 * Whether `current` may move to `proposed`. Terminal statuses never change,
 * same-status updates are allowed, and an unrecognized current status
 * accepts any recognized proposal.
 */
export function allowTransition(current: string, proposed: string): boolean {
  if (isTerminal(current)) return false;
  if (!isApplicationStatus(proposed)) return false;
  const currentIndex = progressIndex(current);
  if (currentIndex === -1) return true;
  return progressIndex(proposed) >= currentIndex;
}

/**
 * The further-along of two statuses. Terminal beats non-terminal, and a
 * recognized status beats one that is not in the progression. Ties keep `a`.
 */
export function mostProgressedStatus(a: string, b: string): string {
  const aTerminal = isTerminal(a);
  const bTerminal = isTerminal(b);
  if (aTerminal !== bTerminal) return aTerminal ? a : b;
  return progressIndex(b) > progressIndex(a) ? b : a;
}
