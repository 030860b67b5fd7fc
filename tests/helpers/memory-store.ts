import type { FetchResult, IndexStats, QueryParams, QueryResult, StoreClient } from "../../src/store/client.js";
import type { Metadata, MetadataFilter, StoredRecord } from "../../src/types.js";

export interface MemoryStoreOptions {
  dimension?: number;
  /** Overrides the record count reported by describeIndexStats. */
  totalRecordCount?: number;
  statsError?: Error;
}

function isInClause(value: unknown): value is { $in: unknown[] } {
  return typeof value === "object" && value !== null && "$in" in value && Array.isArray(value.$in);
}

function matchesFilter(metadata: Metadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, expected]) => {
    const actual = metadata[key];
    if (isInClause(expected)) {
      return expected.$in.includes(actual);
    }
    return actual === expected;
  });
}

export function record(id: string, metadata: Metadata, values: number[] = [0.1, 0.2, 0.3, 0.4]): StoredRecord {
  return { id, values, metadata };
}

/** In-process stand-in for the vector index. Query returns records in insertion order. */
export class MemoryStore implements StoreClient {
  readonly records = new Map<string, StoredRecord>();
  /** Records the scan still returns but fetch no longer finds. */
  readonly stale = new Map<string, Metadata>();
  readonly failUpsertIds = new Set<string>();
  /** Zero-based indexes of delete calls that should fail. */
  readonly failDeleteCalls = new Set<number>();

  readonly queries: QueryParams[] = [];
  readonly fetches: string[][] = [];
  readonly upserts: StoredRecord[][] = [];
  readonly deletes: string[][] = [];

  private readonly options: MemoryStoreOptions;

  constructor(initial: StoredRecord[] = [], options: MemoryStoreOptions = {}) {
    this.options = options;
    for (const item of initial) {
      this.records.set(item.id, { ...item, metadata: { ...item.metadata } });
    }
  }

  metadataOf(id: string): Metadata | undefined {
    return this.records.get(id)?.metadata;
  }

  async query(params: QueryParams): Promise<QueryResult> {
    this.queries.push(params);
    const live = [...this.records.values()].map((item) => ({ id: item.id, metadata: item.metadata }));
    const ghosts = [...this.stale.entries()].map(([id, metadata]) => ({ id, metadata }));
    const matches = [...live, ...ghosts]
      .filter((item) => matchesFilter(item.metadata, params.filter))
      .slice(0, params.topK)
      .map((item) => ({ id: item.id, score: 0, metadata: { ...item.metadata } }));
    return { matches };
  }

  async fetch(ids: string[]): Promise<FetchResult> {
    this.fetches.push(ids);
    const records: FetchResult["records"] = {};
    for (const id of ids) {
      const found = this.records.get(id);
      if (found) {
        records[id] = { id: found.id, values: [...found.values], metadata: { ...found.metadata } };
      }
    }
    return { records };
  }

  async upsert(records: StoredRecord[]): Promise<void> {
    this.upserts.push(records);
    for (const item of records) {
      if (this.failUpsertIds.has(item.id)) {
        throw new Error(`upsert rejected for ${item.id}`);
      }
      this.records.set(item.id, { ...item, metadata: { ...item.metadata } });
    }
  }

  async delete(ids: string[]): Promise<void> {
    const call = this.deletes.length;
    this.deletes.push(ids);
    if (this.failDeleteCalls.has(call)) {
      throw new Error(`delete call ${call} rejected`);
    }
    for (const id of ids) {
      this.records.delete(id);
    }
  }

  async describeIndexStats(): Promise<IndexStats> {
    if (this.options.statsError) {
      throw this.options.statsError;
    }
    return {
      totalRecordCount: this.options.totalRecordCount ?? this.records.size,
      dimension: this.options.dimension ?? 4,
    };
  }
}
