// Legal-form suffixes stripped before company names are compared
const COMPANY_SUFFIXES = [
  "inc",
  "llc",
  "ltd",
  "gmbh",
  "ag",
  "corp",
  "corporation",
  "company",
  "co",
  "plc",
  "sa",
];

const SUFFIX_PATTERNS = COMPANY_SUFFIXES.map(
  (suffix) => new RegExp(`[\\s,]+${suffix}\\.?\\s*$`, "i")
);

/** Lowercase, trim and collapse runs of whitespace. */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return "";
  return text.toLowerCase().trim().split(/\s+/).filter(Boolean).join(" ");
}

/** "Acme, Inc." and "ACME  inc" both become "acme". */
export function normalizeCompanyName(company: string | null | undefined): string {
  if (!company) return "";
  let normalized = company.toLowerCase().trim();
  for (const pattern of SUFFIX_PATTERNS) {
    normalized = normalized.replace(pattern, "");
  }
  return normalizeText(normalized);
}

export function normalizePosition(position: string | null | undefined): string {
  if (!position) return "";
  return position.toLowerCase().trim();
}

const EMAIL_PATTERN = /[\w.+-]+@[\w.-]+/;

export function extractEmailAddress(senderField: string): string {
  if (!senderField) return "";
  const match = senderField.match(EMAIL_PATTERN);
  return (match ? match[0] : senderField).toLowerCase();
}

export function extractEmailDomain(address: string): string {
  const match = address.match(EMAIL_PATTERN);
  if (!match) return "";
  return match[0].split("@")[1].toLowerCase();
}

/** Display name from `"Acme Recruiting" <jobs@acme.com>`, or the local part. */
export function extractSenderName(senderField: string): string {
  if (!senderField) return "";
  const match = senderField.match(/^([^<]+)\s*</);
  if (match) {
    return match[1].trim().replace(/^["']|["']$/g, "").trim();
  }
  if (senderField.includes("@")) {
    return senderField.split("@")[0].trim();
  }
  return senderField.trim();
}

/** "careers.google.com" -> "google" */
export function domainCompanyName(domain: string): string {
  if (!domain) return "";
  const stripped = domain.replace(/^(www|mail|careers|jobs|recruiting|talent)\./, "");
  const parts = stripped.split(".");
  return parts.length >= 2 ? parts[parts.length - 2] : stripped;
}

export function truncate(text: string, maxLength = 100): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + "...";
}

export function containsAnyKeyword(text: string, keywords: readonly string[]): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
}
