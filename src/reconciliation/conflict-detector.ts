import type { Application, ClassifiedEmail, FieldConflict, FieldName, FieldValue } from "../types";
import { fieldToString, isKnown, sameField } from "../utils/field-value";

export function detectFieldConflict(
  field: FieldName,
  stored: FieldValue,
  incoming: FieldValue
): FieldConflict | null {
  if (!isKnown(incoming)) return null; // never downgrade
  if (!isKnown(stored)) {
    return { field, storedValue: fieldToString(stored, field), incomingValue: incoming.value, isUpgrade: true };
  }
  if (sameField(stored, incoming)) return null;
  return { field, storedValue: stored.value, incomingValue: incoming.value, isUpgrade: false };
}

/** Company and position disagreements between a stored application and an email. */
export function detectConflicts(application: Application, email: ClassifiedEmail): FieldConflict[] {
  const conflicts: FieldConflict[] = [];
  const company = detectFieldConflict("Company", application.company, email.company);
  if (company) conflicts.push(company);
  const position = detectFieldConflict("Position", application.position, email.position);
  if (position) conflicts.push(position);
  return conflicts;
}
