import type { Metadata, ScannedRecord } from "../types.js";
import { classify, readString, resolveDisplayName } from "./match.js";
import { PUBLIC_DOCUMENT_TYPES, SOURCE_CATEGORY_RULES, type SourceCategory } from "./rulesets.js";

export interface SourceSummary {
  name: string;
  type: string;
  chunks: number;
  category: SourceCategory;
}

export interface NameListing {
  id: string;
  name: string;
  type: string;
  brand: string;
}

export function categorizeSource(name: string, type: string): SourceCategory {
  if (PUBLIC_DOCUMENT_TYPES.includes(type)) {
    return "public";
  }
  return classify(name, SOURCE_CATEGORY_RULES, "unknown").outcome;
}

/** Groups scanned chunks by display name; the first chunk seen decides the type. */
export function summarizeSources(records: readonly ScannedRecord[]): SourceSummary[] {
  const byName = new Map<string, SourceSummary>();
  for (const record of records) {
    const name = resolveDisplayName(record.metadata) || "(unnamed)";
    const existing = byName.get(name);
    if (existing) {
      existing.chunks += 1;
      continue;
    }
    const type = readString(record.metadata, "type") || "unknown";
    byName.set(name, { name, type, chunks: 1, category: categorizeSource(name, type) });
  }
  return [...byName.values()].sort((a, b) => a.name.localeCompare(b.name));
}

export function countByCategory(sources: readonly SourceSummary[]): Record<SourceCategory, number> {
  const counts: Record<SourceCategory, number> = { public: 0, manufacturer: 0, copyrighted: 0, unknown: 0 };
  for (const source of sources) {
    counts[source.category] += 1;
  }
  return counts;
}

export function listNames(records: readonly ScannedRecord[], limit: number): NameListing[] {
  return records.slice(0, Math.max(0, limit)).map((record) => toListing(record.id, record.metadata));
}

function toListing(id: string, metadata: Metadata): NameListing {
  return {
    id,
    name: resolveDisplayName(metadata) || "NO NAME",
    type: readString(metadata, "type") || "unknown",
    brand: readString(metadata, "brand") || "unknown",
  };
}
