import * as clack from "@clack/prompts";
import { countByCategory, listNames, summarizeSources, type NameListing, type SourceSummary } from "../reconcile/audit.js";
import { formatCoverage } from "../reconcile/report.js";
import { mayBeIncomplete } from "../reconcile/scan.js";
import type { MetadataFilter } from "../types.js";
import { formatPreview, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

const DEFAULT_NAME_LIMIT = 50;

export interface StatsSummary {
  totalRecordCount: number;
  dimension: number;
  scanCap: number;
  mayBeIncomplete: boolean;
}

export interface NamesCommandOptions extends StoreCommandOptions {
  limit?: number;
  type?: string;
}

export interface AuditSummary {
  scanned: number;
  sources: SourceSummary[];
  categories: Record<SourceSummary["category"], number>;
}

export interface ReportDeps extends StoreCommandDeps {
  noteFn: (message: string, title: string) => void;
}

function resolveReportDeps(deps?: Partial<ReportDeps>): ReportDeps {
  return {
    ...resolveStoreDeps(deps),
    noteFn: deps?.noteFn ?? ((message, title) => clack.note(message, title)),
  };
}

export async function runStatsCommand(
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<StatsSummary>> {
  return runStoreCommand(options, resolveStoreDeps(deps), async ({ stats, dimension, scanCap, output }) => {
    const total = stats.totalRecordCount;
    output.info(`Records: ${total}`);
    output.info(`Dimension: ${dimension}`);
    output.info(`Scan cap: ${scanCap}`);

    const incomplete = total > scanCap;
    if (incomplete) {
      output.warn(`The index holds more records than one scan returns; passes see at most ${scanCap}.`);
    }
    return { exitCode: 0, summary: { totalRecordCount: total, dimension, scanCap, mayBeIncomplete: incomplete } };
  });
}

function formatListing(listing: NameListing): string {
  return `${listing.name} | ${listing.type} | ${listing.brand} [${listing.id}]`;
}

export async function runNamesCommand(
  options: NamesCommandOptions,
  deps?: Partial<ReportDeps>,
): Promise<CommandResult<NameListing[]>> {
  const reportDeps = resolveReportDeps(deps);
  const limit = options.limit ?? DEFAULT_NAME_LIMIT;
  const type = options.type?.trim();
  const filter: MetadataFilter | undefined = type ? { type } : undefined;

  return runStoreCommand(options, reportDeps, async ({ driver, output }) => {
    const scan = await driver.scan(filter);
    output.info(`names: ${formatCoverage(scan.coverage)}`);

    const listings = listNames(scan.records, limit);
    if (listings.length === 0) {
      output.warn(type ? `No records of type "${type}".` : "No records returned.");
      return { exitCode: 0, summary: listings };
    }
    reportDeps.noteFn(listings.map(formatListing).join("\n"), `First ${listings.length} of ${scan.records.length}`);
    return { exitCode: 0, summary: listings };
  });
}

export async function runAuditCommand(
  options: StoreCommandOptions,
  deps?: Partial<ReportDeps>,
): Promise<CommandResult<AuditSummary>> {
  const reportDeps = resolveReportDeps(deps);

  return runStoreCommand(options, reportDeps, async ({ driver, output }) => {
    const scan = await driver.scan();
    output.info(`audit: ${formatCoverage(scan.coverage)}`);
    if (mayBeIncomplete(scan.coverage)) {
      output.warn("audit: the scan may not cover the whole index; records past the cap were not considered.");
    }

    const sources = summarizeSources(scan.records);
    const categories = countByCategory(sources);

    for (const category of ["copyrighted", "manufacturer", "unknown"] as const) {
      const flagged = sources.filter((source) => source.category === category);
      if (flagged.length > 0) {
        reportDeps.noteFn(
          formatPreview(flagged.map((source) => `${source.name} (${source.type}, ${source.chunks} chunks)`)),
          `${category}: ${flagged.length}`,
        );
      }
    }

    output.info(
      `audit: ${sources.length} sources; public=${categories.public} manufacturer=${categories.manufacturer} ` +
        `copyrighted=${categories.copyrighted} unknown=${categories.unknown}`,
    );
    return { exitCode: 0, summary: { scanned: scan.records.length, sources, categories } };
  });
}
