import type { ClassificationRule, Metadata } from "../types.js";

/** Name fields in the order a record's display name is resolved from. */
export const NAME_FIELDS = ["product_name", "document_name", "source"] as const;

export function readString(metadata: Metadata, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value : "";
}

export function resolveDisplayName(metadata: Metadata): string {
  for (const field of NAME_FIELDS) {
    const value = readString(metadata, field);
    if (value) {
      return value;
    }
  }
  return "";
}

export function normalizeName(value: string): string {
  return value.toUpperCase().trim();
}

/**
 * Permissive product-name match: the whole target appears in the candidate, or one of the
 * target's first two words does. "HERITAGE" matches "HERITAGE FUNGICIDE" and also
 * "HERITAGE TL"; a target whose distinguishing word comes third is never matched on it.
 */
export function matchesName(candidate: string, target: string): boolean {
  const normalizedTarget = normalizeName(target);
  if (!normalizedTarget) {
    return false;
  }

  const normalizedCandidate = candidate.toUpperCase();
  if (normalizedCandidate.includes(normalizedTarget)) {
    return true;
  }

  const leadingTokens = normalizedTarget.split(/\s+/).slice(0, 2);
  return leadingTokens.some((token) => token.length > 0 && normalizedCandidate.includes(token));
}

export function containsAnyKeyword(name: string, keywords: readonly string[]): boolean {
  return findKeyword(name, keywords) !== null;
}

export function findKeyword(name: string, keywords: readonly string[]): string | null {
  const normalized = normalizeName(name);
  for (const keyword of keywords) {
    const needle = normalizeName(keyword);
    if (needle && normalized.includes(needle)) {
      return keyword;
    }
  }
  return null;
}

export interface Classification<T> {
  outcome: T;
  rule: string | null;
}

/** First matching rule wins; list order is the precedence. */
export function classify<T>(
  name: string,
  rules: readonly ClassificationRule<T>[],
  fallback: T,
): Classification<T> {
  for (const rule of rules) {
    if (containsAnyKeyword(name, rule.keywords)) {
      return { outcome: rule.outcome, rule: rule.label };
    }
  }
  return { outcome: fallback, rule: null };
}

/** True when any of the given fields holds a string containing the fragment, case-insensitively. */
export function anyFieldContains(metadata: Metadata, fields: readonly string[], fragment: string): boolean {
  const needle = fragment.trim().toLowerCase();
  if (!needle) {
    return false;
  }
  return fields.some((field) => readString(metadata, field).toLowerCase().includes(needle));
}
