import { tagCountryPass } from "../reconcile/passes.js";
import type { PassSummary } from "../types.js";
import { exitCodeFor, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

export async function runTagCountryCommand(
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  return runStoreCommand(options, resolveStoreDeps(deps), async ({ driver }) => {
    const summary = await driver.runUpdatePass(tagCountryPass({ dryRun: options.dryRun }));
    return { exitCode: exitCodeFor(summary), summary };
  });
}
