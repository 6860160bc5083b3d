import type { Message } from "../utils/apiSchema";
import { safeError } from "../utils/logging";
import { BANK_ACCOUNT, PHONE_CANDIDATE, SUSPICIOUS_KEYWORDS, UPI_ID, URL } from "./patterns";

export type ExtractedIntelligence = {
  bankAccounts: Set<string>;
  upiIds: Set<string>;
  phishingLinks: Set<string>;
  phoneNumbers: Set<string>;
  suspiciousKeywords: Set<string>;
};

export type IntelligenceLists = {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
};

export const INTELLIGENCE_FIELDS = [
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "phoneNumbers",
  "suspiciousKeywords"
] as const;

export type IntelligenceField = (typeof INTELLIGENCE_FIELDS)[number];

const HISTORY_WINDOW = 5;

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    bankAccounts: new Set<string>(),
    upiIds: new Set<string>(),
    phishingLinks: new Set<string>(),
    phoneNumbers: new Set<string>(),
    suspiciousKeywords: new Set<string>()
  };
}

/**
 * Canonicalizes an Indian mobile number to `+91XXXXXXXXXX`.
 * Returns null for anything that is not a 10-digit number starting with 6-9
 * once the country or trunk prefix is removed.
 */
export function normalizePhone(raw: string): string | null {
  let digits = raw.replace(/[\s\-()]/g, "");
  if (digits.startsWith("+91")) {
    digits = digits.slice(3);
  } else if (digits.startsWith("91") && digits.length === 12) {
    digits = digits.slice(2);
  } else if (digits.startsWith("0") && digits.length === 11) {
    digits = digits.slice(1);
  }
  if (!/^[6-9]\d{9}$/.test(digits)) return null;
  return `+91${digits}`;
}

function normalizeUrl(url: string): string {
  return url.replace(/[),\].}>'"!?;:]+$/g, "").trim();
}

function scanText(text: string, into: ExtractedIntelligence): void {
  for (const match of text.match(BANK_ACCOUNT) ?? []) {
    into.bankAccounts.add(match.replace(/[-.\s]/g, ""));
  }
  for (const match of text.match(UPI_ID) ?? []) {
    into.upiIds.add(match.toLowerCase());
  }
  for (const match of text.match(PHONE_CANDIDATE) ?? []) {
    const phone = normalizePhone(match);
    if (phone) into.phoneNumbers.add(phone);
  }
  for (const match of text.match(URL) ?? []) {
    const url = normalizeUrl(match);
    if (url) into.phishingLinks.add(url);
  }
  const lower = text.toLowerCase();
  for (const keyword of SUSPICIOUS_KEYWORDS) {
    if (lower.includes(keyword)) into.suspiciousKeywords.add(keyword);
  }
}

/**
 * Pulls artifacts out of the current message and the last few history entries.
 * Stateless: the same input always yields the same sets, and errors yield an empty result.
 */
export function extractIntelligence(
  text: string,
  recentHistory: readonly Pick<Message, "text">[] = []
): ExtractedIntelligence {
  const result = emptyIntelligence();
  try {
    scanText(text, result);
    for (const entry of recentHistory.slice(-HISTORY_WINDOW)) {
      scanText(entry.text, result);
    }
    return result;
  } catch (err) {
    safeError("[EXTRACT] extraction failed", err);
    return emptyIntelligence();
  }
}

/** Returns a new value; neither input is modified. */
export function mergeIntelligence(
  existing: ExtractedIntelligence,
  incoming: ExtractedIntelligence
): ExtractedIntelligence {
  const merged = emptyIntelligence();
  for (const field of INTELLIGENCE_FIELDS) {
    for (const value of existing[field]) merged[field].add(value);
    for (const value of incoming[field]) merged[field].add(value);
  }
  return merged;
}

export function hasIntelligence(intel: ExtractedIntelligence): boolean {
  return INTELLIGENCE_FIELDS.some((field) => intel[field].size > 0);
}

export function toLists(intel: ExtractedIntelligence): IntelligenceLists {
  return {
    bankAccounts: Array.from(intel.bankAccounts),
    upiIds: Array.from(intel.upiIds),
    phishingLinks: Array.from(intel.phishingLinks),
    phoneNumbers: Array.from(intel.phoneNumbers),
    suspiciousKeywords: Array.from(intel.suspiciousKeywords)
  };
}
