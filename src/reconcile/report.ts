import type { ApproximateCoverage, PassSummary } from "../types.js";
import { mayBeIncomplete } from "./scan.js";

export interface ReporterOutput {
  info: (message: string) => void;
  warn: (message: string) => void;
}

export interface Reporter {
  start(summary: PassSummary, total: number): void;
  progress(processed: number, summary: PassSummary): void;
  batch(processed: number, summary: PassSummary): void;
  finish(summary: PassSummary): void;
}

export function progressInterval(total: number): number {
  if (total <= 50) {
    return 5;
  }
  if (total <= 500) {
    return 10;
  }
  if (total <= 5000) {
    return 50;
  }
  return 100;
}

export function formatCoverage(coverage: ApproximateCoverage): string {
  const total = coverage.totalRecordCount === null ? "unknown" : String(coverage.totalRecordCount);
  return `scan returned ${coverage.returned} of cap ${coverage.cap} (index reports ${total} records)`;
}

export function formatTally(summary: PassSummary): string {
  return [
    `scanned=${summary.scanned}`,
    `matched=${summary.matched}`,
    `updated=${summary.updated}`,
    `skipped=${summary.skipped}`,
    `removed=${summary.removed}`,
    `errors=${summary.errors}`,
  ].join(" ");
}

export function createReporter(output: ReporterOutput): Reporter {
  let interval = progressInterval(0);
  let total = 0;

  return {
    start(summary, plannedTotal) {
      total = plannedTotal;
      interval = progressInterval(plannedTotal);
      output.info(`${summary.label}: ${formatCoverage(summary.coverage)}`);
      if (mayBeIncomplete(summary.coverage)) {
        output.warn(
          `${summary.label}: the scan may not cover the whole index; records past the cap were not considered.`,
        );
      }
    },
    progress(processed, summary) {
      if (processed === 0 || processed % interval !== 0) {
        return;
      }
      output.info(`${summary.label}: ${processed}/${total} processed (${formatTally(summary)})`);
    },
    batch(processed, summary) {
      output.info(`${summary.label}: ${processed}/${total} submitted (${formatTally(summary)})`);
    },
    finish(summary) {
      if (summary.cancelled) {
        output.warn(`${summary.label}: cancelled. No changes were made.`);
        return;
      }
      const prefix = summary.dryRun ? `${summary.label} (dry run)` : summary.label;
      output.info(`${prefix}: ${formatTally(summary)}`);
      if (summary.errors > 0) {
        output.warn(`${summary.label}: ${summary.errors} error(s); rerun the pass to retry skipped records.`);
      }
    },
  };
}

export const silentReporter: Reporter = createReporter({ info: () => undefined, warn: () => undefined });
