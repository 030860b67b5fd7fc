import * as clack from "@clack/prompts";
import { readConfig, resolveApiKey, resolveScanCap } from "../config.js";
import { errorMessage, StoreUnavailableError } from "../errors.js";
import { ReconciliationDriver, type ConfirmFn } from "../reconcile/driver.js";
import { createReporter, type ReporterOutput } from "../reconcile/report.js";
import type { IndexStats, StoreClient } from "../store/client.js";
import { PineconeStoreClient, type PineconeStoreOptions } from "../store/pinecone.js";
import type { PassSummary, VecmendConfig } from "../types.js";
import { banner, formatError } from "../ui.js";
import { createLogger, type Logger } from "../utils/logger.js";

const PREVIEW_LIMIT = 20;

export interface StoreCommandOptions {
  dryRun?: boolean;
  cap?: number;
  namespace?: string;
}

export interface StoreCommandDeps {
  readConfigFn: typeof readConfig;
  resolveApiKeyFn: typeof resolveApiKey;
  createStoreFn: (options: PineconeStoreOptions) => StoreClient;
  confirmFn: ConfirmFn;
  previewFn: (lines: string[]) => void;
  output: ReporterOutput;
  logger?: Logger;
  quiet: boolean;
}

export interface CommandSession {
  config: VecmendConfig;
  store: StoreClient;
  stats: IndexStats;
  dimension: number;
  scanCap: number;
  driver: ReconciliationDriver;
  output: ReporterOutput;
  logger: Logger;
}

export interface CommandResult<S = PassSummary> {
  exitCode: number;
  summary?: S;
}

export function formatPreview(lines: string[], limit = PREVIEW_LIMIT): string {
  const shown = lines.slice(0, limit);
  if (lines.length > limit) {
    shown.push(`... and ${lines.length - limit} more`);
  }
  return shown.join("\n");
}

async function promptText(message: string): Promise<string | null> {
  const result = await clack.text({ message });
  if (clack.isCancel(result)) {
    return null;
  }
  return String(result);
}

export function resolveStoreDeps(deps?: Partial<StoreCommandDeps>): StoreCommandDeps {
  return {
    readConfigFn: deps?.readConfigFn ?? readConfig,
    resolveApiKeyFn: deps?.resolveApiKeyFn ?? resolveApiKey,
    createStoreFn: deps?.createStoreFn ?? ((options) => PineconeStoreClient.connect(options)),
    confirmFn: deps?.confirmFn ?? promptText,
    previewFn: deps?.previewFn ?? ((lines) => clack.note(formatPreview(lines), "Planned changes")),
    output: deps?.output ?? {
      info: (message) => clack.log.info(message),
      warn: (message) => clack.log.warn(message),
    },
    logger: deps?.logger,
    // Injected output means a caller is capturing lines; skip the banner.
    quiet: deps?.quiet ?? deps?.output !== undefined,
  };
}

/**
 * Reads config, connects to the index and runs the stats preflight. Any failure here aborts the
 * command before a scan is issued.
 */
export async function openSession(options: StoreCommandOptions, deps: StoreCommandDeps): Promise<CommandSession> {
  const config = deps.readConfigFn(process.env);
  const apiKey = deps.resolveApiKeyFn(process.env);
  if (!apiKey) {
    throw new StoreUnavailableError("PINECONE_API_KEY is not set.");
  }

  const store = deps.createStoreFn({
    apiKey,
    index: config.index,
    namespace: options.namespace?.trim() || config.namespace,
  });

  let stats: IndexStats;
  try {
    stats = await store.describeIndexStats();
  } catch (error) {
    throw new StoreUnavailableError(`Could not reach index "${config.index}": ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const scanCap = resolveScanCap(config, options.cap);
  const dimension = stats.dimension ?? config.dimension;
  const logger = deps.logger ?? createLogger({ level: config.logLevel });

  const driver = new ReconciliationDriver({
    store,
    dimension,
    scanCap,
    totalRecordCount: stats.totalRecordCount,
    confirmFn: deps.confirmFn,
    previewFn: deps.previewFn,
    reporter: createReporter(deps.output),
    logger,
  });

  return { config, store, stats, dimension, scanCap, driver, output: deps.output, logger };
}

/** Wraps a store command with the banner, startup error handling and exit code. */
export async function runStoreCommand<S>(
  options: StoreCommandOptions,
  deps: StoreCommandDeps,
  body: (session: CommandSession) => Promise<CommandResult<S>>,
): Promise<CommandResult<S>> {
  if (!deps.quiet) {
    clack.intro(banner());
  }

  let session: CommandSession;
  try {
    session = await openSession(options, deps);
  } catch (error) {
    deps.output.warn(formatError(errorMessage(error)));
    return { exitCode: 1 };
  }

  const result = await body(session);
  if (!deps.quiet) {
    clack.outro(result.exitCode === 0 ? "Done." : "Finished with problems.");
  }
  return result;
}

export function exitCodeFor(summary: PassSummary): number {
  return summary.cancelled ? 1 : 0;
}
