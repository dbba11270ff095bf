import type { FieldName, FieldValue } from "../types";

export const UNKNOWN_COMPANY = "Unknown";
export const UNKNOWN_POSITION = "Unknown Position";

export const UNKNOWN: FieldValue = { kind: "unknown" };

export function known(value: string): FieldValue {
  return { kind: "known", value };
}

export function isKnown(
  field: FieldValue
): field is { kind: "known"; value: string } {
  return field.kind === "known";
}

/**
 * Interpret a raw string at the storage or classifier boundary. Empty
 * values and the sentinels ("Unknown", plus "Unknown Position" for
 * positions) mean the field has not been extracted.
 */
export function fieldFromRaw(
  raw: string | null | undefined,
  field: FieldName
): FieldValue {
  const value = (raw ?? "").trim();
  if (!value || value === UNKNOWN_COMPANY) return UNKNOWN;
  if (field === "Position" && value === UNKNOWN_POSITION) return UNKNOWN;
  return known(value);
}

export function fieldToString(value: FieldValue, field: FieldName): string {
  if (isKnown(value)) return value.value;
  return field === "Company" ? UNKNOWN_COMPANY : UNKNOWN_POSITION;
}

export function sameField(a: FieldValue, b: FieldValue): boolean {
  if (isKnown(a) && isKnown(b)) return a.value === b.value;
  return a.kind === b.kind;
}
