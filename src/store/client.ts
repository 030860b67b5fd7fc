import type { Metadata, MetadataFilter, StoredRecord } from "../types.js";

/** Store-side ceiling on `topK` for a single query. */
export const MAX_QUERY_TOP_K = 10_000;
/** Store-side ceiling on ids per delete call. */
export const MAX_DELETE_BATCH = 100;

export interface QueryParams {
  vector: number[];
  topK: number;
  filter?: MetadataFilter;
  includeMetadata: boolean;
}

export interface QueryMatch {
  id: string;
  score: number;
  metadata: Metadata;
}

export interface QueryResult {
  matches: QueryMatch[];
}

export interface FetchResult {
  records: Record<string, StoredRecord>;
}

export interface IndexStats {
  totalRecordCount: number;
  dimension: number | null;
}

/**
 * The four data-plane operations of the external index plus its stats call.
 * Every method is awaited on its own; callers never issue them concurrently.
 */
export interface StoreClient {
  query(params: QueryParams): Promise<QueryResult>;
  fetch(ids: string[]): Promise<FetchResult>;
  upsert(records: StoredRecord[]): Promise<void>;
  delete(ids: string[]): Promise<void>;
  describeIndexStats(): Promise<IndexStats>;
}
