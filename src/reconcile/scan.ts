import { MAX_QUERY_TOP_K, type StoreClient } from "../store/client.js";
import type { ApproximateCoverage, MetadataFilter, ScanResult } from "../types.js";

export interface ScanOptions {
  cap: number;
  dimension: number;
  filter?: MetadataFilter;
  totalRecordCount?: number | null;
}

export function neutralVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

/**
 * Approximates a full scan with one similarity query against an all-zero vector.
 *
 * The store exposes no cursor, so anything beyond `cap` is silently left out. The returned
 * coverage says how close the scan came; callers decide whether to warn about it.
 */
export async function scanIndex(store: StoreClient, options: ScanOptions): Promise<ScanResult> {
  const { cap, dimension } = options;
  if (!Number.isInteger(cap) || cap < 1 || cap > MAX_QUERY_TOP_K) {
    throw new Error(`Scan cap must be an integer between 1 and ${MAX_QUERY_TOP_K}, got: ${cap}`);
  }
  if (!Number.isInteger(dimension) || dimension < 1) {
    throw new Error(`Index dimension must be a positive integer, got: ${dimension}`);
  }

  const result = await store.query({
    vector: neutralVector(dimension),
    topK: cap,
    filter: options.filter,
    includeMetadata: true,
  });

  const records = result.matches.map((match) => ({
    id: match.id,
    score: match.score,
    metadata: match.metadata,
  }));

  return {
    records,
    coverage: {
      cap,
      returned: records.length,
      capReached: records.length >= cap,
      totalRecordCount: options.totalRecordCount ?? null,
    },
  };
}

export function mayBeIncomplete(coverage: ApproximateCoverage): boolean {
  if (coverage.capReached) {
    return true;
  }
  return coverage.totalRecordCount !== null && coverage.totalRecordCount > coverage.cap;
}
