import { describe, expect, it } from "vitest";
import { createReporter, formatCoverage, formatTally, progressInterval } from "../../src/reconcile/report.js";
import type { PassSummary } from "../../src/types.js";

function makeSummary(overrides: Partial<PassSummary> = {}): PassSummary {
  return {
    label: "tag-country",
    scanned: 12,
    matched: 12,
    updated: 0,
    skipped: 0,
    removed: 0,
    errors: 0,
    cancelled: false,
    dryRun: false,
    coverage: { cap: 100, returned: 12, capReached: false, totalRecordCount: 12 },
    ...overrides,
  };
}

function capture(): { info: string[]; warn: string[]; output: { info: (m: string) => void; warn: (m: string) => void } } {
  const info: string[] = [];
  const warn: string[] = [];
  return {
    info,
    warn,
    output: {
      info: (message) => info.push(message),
      warn: (message) => warn.push(message),
    },
  };
}

describe("progressInterval", () => {
  it("scales with the planned total", () => {
    expect([0, 50, 51, 500, 501, 5000, 5001].map(progressInterval)).toEqual([5, 5, 10, 10, 50, 50, 100]);
  });
});

describe("formatting", () => {
  it("formats coverage with an unknown total", () => {
    expect(formatCoverage({ cap: 10, returned: 10, capReached: true, totalRecordCount: null })).toBe(
      "scan returned 10 of cap 10 (index reports unknown records)",
    );
  });

  it("formats the tally in a fixed order", () => {
    expect(formatTally(makeSummary({ updated: 3, skipped: 1, errors: 2 }))).toBe(
      "scanned=12 matched=12 updated=3 skipped=1 removed=0 errors=2",
    );
  });
});

describe("createReporter", () => {
  it("reports coverage at start and warns when the scan may be incomplete", () => {
    const { info, warn, output } = capture();
    const reporter = createReporter(output);

    reporter.start(makeSummary({ coverage: { cap: 12, returned: 12, capReached: true, totalRecordCount: null } }), 12);

    expect(info).toEqual(["tag-country: scan returned 12 of cap 12 (index reports unknown records)"]);
    expect(warn).toEqual([
      "tag-country: the scan may not cover the whole index; records past the cap were not considered.",
    ]);
  });

  it("emits progress on the interval only", () => {
    const { info, output } = capture();
    const reporter = createReporter(output);
    const summary = makeSummary();

    reporter.start(summary, 12);
    for (let processed = 1; processed <= 12; processed += 1) {
      summary.updated = processed;
      reporter.progress(processed, summary);
    }

    expect(info.slice(1)).toEqual([
      "tag-country: 5/12 processed (scanned=12 matched=12 updated=5 skipped=0 removed=0 errors=0)",
      "tag-country: 10/12 processed (scanned=12 matched=12 updated=10 skipped=0 removed=0 errors=0)",
    ]);
  });

  it("always reports delete batches", () => {
    const { info, output } = capture();
    const reporter = createReporter(output);
    const summary = makeSummary({ label: "prune", matched: 3, removed: 3 });

    reporter.start(summary, 3);
    reporter.batch(3, summary);

    expect(info[1]).toBe("prune: 3/3 submitted (scanned=12 matched=3 updated=0 skipped=0 removed=3 errors=0)");
  });

  it("labels dry runs and warns about errors at finish", () => {
    const { info, warn, output } = capture();
    const reporter = createReporter(output);

    reporter.finish(makeSummary({ dryRun: true }));
    reporter.finish(makeSummary({ updated: 10, errors: 2 }));

    expect(info).toEqual([
      "tag-country (dry run): scanned=12 matched=12 updated=0 skipped=0 removed=0 errors=0",
      "tag-country: scanned=12 matched=12 updated=10 skipped=0 removed=0 errors=2",
    ]);
    expect(warn).toEqual(["tag-country: 2 error(s); rerun the pass to retry skipped records."]);
  });

  it("reports a cancelled pass", () => {
    const { info, warn, output } = capture();
    createReporter(output).finish(makeSummary({ cancelled: true }));

    expect(info).toEqual([]);
    expect(warn).toEqual(["tag-country: cancelled. No changes were made."]);
  });
});
