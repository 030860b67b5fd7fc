import { errorMessage } from "../errors.js";
import { MAX_DELETE_BATCH, type StoreClient } from "../store/client.js";
import type { Metadata, MetadataFilter, MetadataPatch, PassSummary, ScannedRecord, ScanResult } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { resolveDisplayName } from "./match.js";
import { applyPatch, isEmptyPatch } from "./patch.js";
import { silentReporter, type Reporter } from "./report.js";
import { scanIndex } from "./scan.js";

export const DELETE_BATCH_SIZE = MAX_DELETE_BATCH;
export const AFFIRMATIVE_ANSWER = "yes";

/** Resolves to the operator's typed answer, or null when the prompt was cancelled. */
export type ConfirmFn = (message: string) => Promise<string | null>;

export interface ReconciliationDriverDeps {
  store: StoreClient;
  dimension: number;
  scanCap: number;
  totalRecordCount?: number | null;
  confirmFn: ConfirmFn;
  previewFn?: (lines: string[]) => void;
  reporter?: Reporter;
  logger?: Logger;
}

export interface UpdatePass<T> {
  label: string;
  filter?: MetadataFilter;
  /** Runs once on the scanned records before any `match` call, e.g. to check their links. */
  prepare?: (records: readonly ScannedRecord[]) => Promise<void>;
  /** Returns the ground-truth target that applies to the record, or null when none does. */
  match: (record: ScannedRecord) => T | null;
  buildPatch: (current: Metadata, target: T, record: ScannedRecord) => MetadataPatch;
  describe?: (record: ScannedRecord, target: T) => string;
  confirm?: boolean;
  dryRun?: boolean;
}

export interface DeletePass {
  label: string;
  filter?: MetadataFilter;
  /** Returns the reason the record should be deleted, or null to keep it. */
  match: (record: ScannedRecord) => string | null;
  dryRun?: boolean;
}

export interface DeletePassSummary extends PassSummary {
  reasons: Record<string, number>;
  batches: number;
}

interface PlannedUpdate<T> {
  record: ScannedRecord;
  target: T;
}

interface PlannedDelete {
  record: ScannedRecord;
  reason: string;
}

export function isAffirmative(answer: string | null | undefined): boolean {
  return typeof answer === "string" && answer.trim().toLowerCase() === AFFIRMATIVE_ANSWER;
}

export function chunkIds(ids: readonly string[], size: number = DELETE_BATCH_SIZE): string[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Batch size must be a positive integer, got: ${size}`);
  }
  const batches: string[][] = [];
  for (let i = 0; i < ids.length; i += size) {
    batches.push(ids.slice(i, i + size));
  }
  return batches;
}

function describeRecord(record: ScannedRecord): string {
  return `${resolveDisplayName(record.metadata) || "(unnamed)"} [${record.id}]`;
}

function createSummary(label: string, scan: ScanResult, dryRun: boolean): PassSummary {
  return {
    label,
    scanned: scan.records.length,
    matched: 0,
    updated: 0,
    skipped: 0,
    removed: 0,
    errors: 0,
    cancelled: false,
    dryRun,
    coverage: scan.coverage,
  };
}

export class ReconciliationDriver {
  private readonly store: StoreClient;
  private readonly dimension: number;
  private readonly scanCap: number;
  private readonly totalRecordCount: number | null;
  private readonly confirmFn: ConfirmFn;
  private readonly previewFn: (lines: string[]) => void;
  private readonly reporter: Reporter;
  private readonly logger: Logger;

  constructor(deps: ReconciliationDriverDeps) {
    this.store = deps.store;
    this.dimension = deps.dimension;
    this.scanCap = deps.scanCap;
    this.totalRecordCount = deps.totalRecordCount ?? null;
    this.confirmFn = deps.confirmFn;
    this.previewFn = deps.previewFn ?? (() => undefined);
    this.reporter = deps.reporter ?? silentReporter;
    this.logger = deps.logger ?? silentLogger;
  }

  scan(filter?: MetadataFilter): Promise<ScanResult> {
    return scanIndex(this.store, {
      cap: this.scanCap,
      dimension: this.dimension,
      filter,
      totalRecordCount: this.totalRecordCount,
    });
  }

  async runUpdatePass<T>(pass: UpdatePass<T>): Promise<PassSummary> {
    const dryRun = pass.dryRun === true;
    const scan = await this.scan(pass.filter);
    const summary = createSummary(pass.label, scan, dryRun);
    if (pass.prepare) {
      await pass.prepare(scan.records);
    }

    const planned: PlannedUpdate<T>[] = [];
    for (const record of scan.records) {
      try {
        const target = pass.match(record);
        if (target !== null) {
          planned.push({ record, target });
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error("record_match_failed", { pass: pass.label, id: record.id, error: errorMessage(error) });
      }
    }
    summary.matched = planned.length;
    this.reporter.start(summary, planned.length);

    if (planned.length > 0 && (dryRun || pass.confirm)) {
      const describe = pass.describe ?? ((record: ScannedRecord) => describeRecord(record));
      this.previewFn(planned.map((item) => describe(item.record, item.target)));
    }

    if (dryRun) {
      this.reporter.finish(summary);
      return summary;
    }

    if (pass.confirm && planned.length > 0) {
      const answer = await this.confirmFn(
        `Apply ${pass.label} to ${planned.length} record${planned.length === 1 ? "" : "s"}? (yes/no)`,
      );
      if (!isAffirmative(answer)) {
        summary.cancelled = true;
        this.reporter.finish(summary);
        return summary;
      }
    }

    let processed = 0;
    for (const item of planned) {
      await this.applyUpdate(pass, item, summary);
      processed += 1;
      this.reporter.progress(processed, summary);
    }

    this.reporter.finish(summary);
    return summary;
  }

  private async applyUpdate<T>(pass: UpdatePass<T>, item: PlannedUpdate<T>, summary: PassSummary): Promise<void> {
    const { record, target } = item;
    try {
      // The scan snapshot may be stale and carries no values; write from the authoritative copy.
      const fetched = await this.store.fetch([record.id]);
      const current = fetched.records[record.id];
      if (!current) {
        summary.skipped += 1;
        this.logger.warn("record_missing", { pass: pass.label, id: record.id });
        return;
      }

      const patch = pass.buildPatch(current.metadata, target, record);
      if (isEmptyPatch(patch)) {
        summary.skipped += 1;
        return;
      }

      await this.store.upsert([
        {
          id: current.id,
          values: current.values,
          metadata: applyPatch(current.metadata, patch),
        },
      ]);
      summary.updated += 1;
    } catch (error) {
      summary.errors += 1;
      this.logger.error("record_failed", { pass: pass.label, id: record.id, error: errorMessage(error) });
    }
  }

  async runDeletePass(pass: DeletePass): Promise<DeletePassSummary> {
    const dryRun = pass.dryRun === true;
    const scan = await this.scan(pass.filter);
    const summary: DeletePassSummary = { ...createSummary(pass.label, scan, dryRun), reasons: {}, batches: 0 };

    const planned: PlannedDelete[] = [];
    const seen = new Set<string>();
    for (const record of scan.records) {
      if (seen.has(record.id)) {
        continue;
      }
      try {
        const reason = pass.match(record);
        if (reason !== null) {
          seen.add(record.id);
          planned.push({ record, reason });
          summary.reasons[reason] = (summary.reasons[reason] ?? 0) + 1;
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error("record_match_failed", { pass: pass.label, id: record.id, error: errorMessage(error) });
      }
    }
    summary.matched = planned.length;

    const batches = chunkIds(planned.map((item) => item.record.id));
    this.reporter.start(summary, planned.length);

    if (planned.length === 0) {
      this.reporter.finish(summary);
      return summary;
    }

    this.previewFn(planned.map((item) => `${describeRecord(item.record)}: ${item.reason}`));

    if (dryRun) {
      this.reporter.finish(summary);
      return summary;
    }

    const answer = await this.confirmFn(
      `Delete these ${planned.length} record${planned.length === 1 ? "" : "s"}? (yes/no)`,
    );
    if (!isAffirmative(answer)) {
      summary.cancelled = true;
      this.reporter.finish(summary);
      return summary;
    }

    let processed = 0;
    for (const batch of batches) {
      try {
        await this.store.delete(batch);
        summary.removed += batch.length;
        summary.batches += 1;
      } catch (error) {
        summary.errors += 1;
        this.logger.error("delete_batch_failed", {
          pass: pass.label,
          ids: batch.length,
          firstId: batch[0],
          error: errorMessage(error),
        });
      }
      processed += batch.length;
      this.reporter.batch(processed, summary);
    }

    this.reporter.finish(summary);
    return summary;
  }
}
