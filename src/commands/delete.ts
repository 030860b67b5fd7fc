import type { DeletePassSummary } from "../reconcile/driver.js";
import { keywordDeletePass, prunePass } from "../reconcile/passes.js";
import { formatError } from "../ui.js";
import {
  exitCodeFor,
  resolveStoreDeps,
  runStoreCommand,
  type CommandResult,
  type CommandSession,
  type StoreCommandDeps,
  type StoreCommandOptions,
} from "./shared.js";

function reportReasons(session: CommandSession, summary: DeletePassSummary): void {
  const entries = Object.entries(summary.reasons).sort((a, b) => b[1] - a[1]);
  for (const [reason, count] of entries) {
    session.output.info(`${reason}: ${count}`);
  }
}

export async function runDeleteCommand(
  keywords: string[],
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<DeletePassSummary>> {
  const storeDeps = resolveStoreDeps(deps);
  const cleaned = keywords.map((keyword) => keyword.trim()).filter(Boolean);
  if (cleaned.length === 0) {
    storeDeps.output.warn(formatError("delete needs at least one non-empty keyword"));
    return { exitCode: 1 };
  }

  return runStoreCommand(options, storeDeps, async (session) => {
    const summary = await session.driver.runDeletePass(keywordDeletePass(cleaned, { dryRun: options.dryRun }));
    reportReasons(session, summary);
    return { exitCode: exitCodeFor(summary), summary };
  });
}

export async function runPruneCommand(
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<DeletePassSummary>> {
  return runStoreCommand(options, resolveStoreDeps(deps), async (session) => {
    const summary = await session.driver.runDeletePass(prunePass({ dryRun: options.dryRun }));
    reportReasons(session, summary);
    return { exitCode: exitCodeFor(summary), summary };
  });
}
