import { Pinecone, type Index, type RecordMetadata } from "@pinecone-database/pinecone";
import { BatchLimitError } from "../errors.js";
import type { Metadata, StoredRecord } from "../types.js";
import {
  MAX_DELETE_BATCH,
  MAX_QUERY_TOP_K,
  type FetchResult,
  type IndexStats,
  type QueryParams,
  type QueryResult,
  type StoreClient,
} from "./client.js";

export interface PineconeStoreOptions {
  apiKey: string;
  index: string;
  namespace?: string;
}

export function toMetadata(value: RecordMetadata | undefined): Metadata {
  if (!value) {
    return {};
  }
  return { ...value };
}

/** The slice of the SDK index handle the client calls. */
export type PineconeIndex = Pick<
  Index<RecordMetadata>,
  "query" | "fetch" | "upsert" | "deleteMany" | "describeIndexStats"
>;

export class PineconeStoreClient implements StoreClient {
  private readonly index: PineconeIndex;
  private readonly namespace: string | null;

  /** `namespace` names the namespace `index` is scoped to, if any. */
  constructor(index: PineconeIndex, namespace?: string) {
    this.index = index;
    this.namespace = namespace || null;
  }

  static connect(options: PineconeStoreOptions): PineconeStoreClient {
    const client = new Pinecone({ apiKey: options.apiKey });
    const index = client.index<RecordMetadata>(options.index);
    if (!options.namespace) {
      return new PineconeStoreClient(index);
    }
    return new PineconeStoreClient(index.namespace(options.namespace), options.namespace);
  }

  async query(params: QueryParams): Promise<QueryResult> {
    if (params.topK > MAX_QUERY_TOP_K) {
      throw new BatchLimitError(params.topK, MAX_QUERY_TOP_K);
    }
    const response = await this.index.query({
      vector: params.vector,
      topK: params.topK,
      filter: params.filter,
      includeMetadata: params.includeMetadata,
      includeValues: false,
    });

    return {
      matches: response.matches.map((match) => ({
        id: match.id,
        score: match.score ?? 0,
        metadata: toMetadata(match.metadata),
      })),
    };
  }

  async fetch(ids: string[]): Promise<FetchResult> {
    const response = await this.index.fetch(ids);
    const records: Record<string, StoredRecord> = {};
    for (const [id, record] of Object.entries(response.records)) {
      records[id] = {
        id: record.id,
        values: record.values ?? [],
        metadata: toMetadata(record.metadata),
      };
    }
    return { records };
  }

  async upsert(records: StoredRecord[]): Promise<void> {
    await this.index.upsert(
      records.map((record) => ({
        id: record.id,
        values: record.values,
        metadata: record.metadata,
      })),
    );
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length > MAX_DELETE_BATCH) {
      throw new BatchLimitError(ids.length, MAX_DELETE_BATCH);
    }
    if (ids.length === 0) {
      return;
    }
    await this.index.deleteMany(ids);
  }

  async describeIndexStats(): Promise<IndexStats> {
    const stats = await this.index.describeIndexStats();
    // The stats call is index-wide even on a namespaced handle.
    const totalRecordCount =
      this.namespace === null
        ? stats.totalRecordCount ?? 0
        : stats.namespaces?.[this.namespace]?.recordCount ?? 0;
    return {
      totalRecordCount,
      dimension: stats.dimension ?? null,
    };
  }
}
